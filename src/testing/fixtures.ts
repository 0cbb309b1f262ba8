import crypto from "node:crypto";
import type { Book, BookRating, Loan, User } from "../library/model";
import { DAY_MS } from "../library/model";
import type { LibraryStore } from "../stores/interfaces";

export const T0 = "2026-03-02T09:00:00.000Z";

export class ManualClock {
  private current: number;

  constructor(start: string = T0) {
    this.current = Date.parse(start);
  }

  readonly now = (): Date => new Date(this.current);

  advanceDays(days: number): void {
    this.current += days * DAY_MS;
  }

  advanceMs(ms: number): void {
    this.current += ms;
  }
}

export function daysAfter(iso: string, days: number): string {
  return new Date(Date.parse(iso) + days * DAY_MS).toISOString();
}

export function makeUser(patch: Partial<User> = {}): User {
  const id = patch.id ?? crypto.randomUUID();
  return {
    id,
    email: `${id}@library.test`,
    username: `reader-${id.slice(0, 8)}`,
    firstName: "Ada",
    lastName: "Reader",
    phoneNumber: null,
    address: null,
    dateOfBirth: null,
    isLibrarian: false,
    isActiveMember: true,
    membershipDate: T0,
    ...patch,
  };
}

export function makeBook(patch: Partial<Book> = {}): Book {
  const id = patch.id ?? crypto.randomUUID();
  return {
    id,
    title: "The Quiet Stacks",
    author: "M. Archivist",
    isbn: id.replace(/-/g, "").slice(0, 13),
    publisher: "Shelfmark Press",
    publicationDate: "2019-05-01",
    genre: "fiction",
    pages: 320,
    language: "English",
    edition: null,
    description: null,
    shelfLocation: null,
    status: "available",
    totalCopies: 1,
    availableCopies: 1,
    averageRating: 0,
    totalRatings: 0,
    timesBorrowed: 0,
    addedBy: null,
    dateAdded: T0,
    lastUpdated: T0,
    ...patch,
  };
}

export function makeLoan(patch: Partial<Loan> & Pick<Loan, "userId" | "bookId">): Loan {
  const loanDate = patch.loanDate ?? T0;
  return {
    id: crypto.randomUUID(),
    loanDate,
    dueDate: daysAfter(loanDate, 14),
    returnDate: null,
    status: "borrowed",
    renewalCount: 0,
    maxRenewals: 2,
    issuedBy: null,
    returnedTo: null,
    notes: null,
    fineAmount: 0,
    finePaid: false,
    createdAt: loanDate,
    updatedAt: loanDate,
    ...patch,
  };
}

export function makeRating(patch: Partial<BookRating> & Pick<BookRating, "userId" | "bookId">): BookRating {
  return {
    id: crypto.randomUUID(),
    rating: 5,
    review: null,
    createdAt: T0,
    updatedAt: T0,
    ...patch,
  };
}

export async function seedUser(store: LibraryStore, patch: Partial<User> = {}): Promise<User> {
  return store.users.insert(makeUser(patch));
}

export async function seedBook(store: LibraryStore, patch: Partial<Book> = {}): Promise<Book> {
  return store.books.insert(makeBook(patch));
}
