import type { Book } from "../library/model";
import { LibraryError } from "../library/errors";

export type CopyState = Pick<Book, "status" | "totalCopies" | "availableCopies" | "timesBorrowed">;

/**
 * Toggles a book between `available` and `borrowed` to match its copy counters.
 * Statuses a librarian set by hand (reserved, maintenance, lost, damaged) are left alone.
 */
export function reconcileStatus<T extends CopyState>(book: T): T {
  if (book.availableCopies === 0 && book.status === "available") {
    return { ...book, status: "borrowed" };
  }
  if (book.availableCopies > 0 && book.status === "borrowed") {
    return { ...book, status: "available" };
  }
  return book;
}

export function assertCopyBounds(book: Pick<Book, "totalCopies" | "availableCopies">): void {
  if (!Number.isInteger(book.totalCopies) || book.totalCopies < 1) {
    throw new LibraryError("CapacityViolation", "totalCopies must be an integer of at least 1.", {
      totalCopies: book.totalCopies,
    });
  }
  if (!Number.isInteger(book.availableCopies) || book.availableCopies < 0 || book.availableCopies > book.totalCopies) {
    throw new LibraryError("CapacityViolation", "availableCopies must be between 0 and totalCopies.", {
      totalCopies: book.totalCopies,
      availableCopies: book.availableCopies,
    });
  }
}

export function applyBorrowDelta<T extends CopyState>(book: T): T {
  if (book.availableCopies <= 0) {
    throw new LibraryError("CapacityViolation", "No copy left to lend.", {
      availableCopies: book.availableCopies,
    });
  }
  return reconcileStatus({
    ...book,
    availableCopies: book.availableCopies - 1,
    timesBorrowed: book.timesBorrowed + 1,
  });
}

export function applyReturnDelta<T extends CopyState>(book: T): T {
  return reconcileStatus({
    ...book,
    availableCopies: Math.min(book.totalCopies, book.availableCopies + 1),
  });
}

export function adjustForCapacityChange<T extends CopyState>(book: T, oldTotal: number, newTotal: number): T {
  if (!Number.isInteger(newTotal) || newTotal < 1) {
    throw new LibraryError("CapacityViolation", "totalCopies must be an integer of at least 1.", {
      totalCopies: newTotal,
    });
  }
  const shifted = book.availableCopies + (newTotal - oldTotal);
  return reconcileStatus({
    ...book,
    totalCopies: newTotal,
    availableCopies: Math.max(0, Math.min(newTotal, shifted)),
  });
}
