import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import { withRetry } from "../connectivity/retry";
import type { Book, Loan, User } from "../library/model";
import { isLibraryError, notFound } from "../library/errors";
import { requireLibrarian } from "../library/actors";
import type { LibraryStore } from "../stores/interfaces";
import type { LoanLifecycle } from "./lifecycle";

export type BorrowOptions = {
  /** Librarians may lend on behalf of another member. */
  borrowerId?: string;
  dueDate?: string;
  notes?: string | null;
};

export type BorrowResult = {
  loan: Loan;
  book: Book;
};

export type BorrowCoordinatorOptions = {
  logger?: Logger;
  conflictAttempts?: number;
  retryBaseDelayMs?: number;
};

/**
 * Serializes borrows of one book behind its row lock. Lock timeouts surface as
 * `Conflict` and are retried; a borrower who gets the lock after the last copy
 * went out sees `BookUnavailable`.
 */
export class BorrowCoordinator {
  private readonly logger: Logger;
  private readonly conflictAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(
    private readonly store: LibraryStore,
    private readonly lifecycle: LoanLifecycle,
    options: BorrowCoordinatorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.conflictAttempts = options.conflictAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 50;
  }

  async borrow(actor: User, bookId: string, options: BorrowOptions = {}): Promise<BorrowResult> {
    const onBehalf = options.borrowerId !== undefined && options.borrowerId !== actor.id;
    if (onBehalf) requireLibrarian(actor, "lend books to other members");
    const borrowerId = options.borrowerId ?? actor.id;

    const result = await withRetry(
      `borrow:${bookId}`,
      () =>
        this.store.transaction(async (tx) => {
          const borrower = await tx.users.get(borrowerId);
          if (!borrower) throw notFound("user", borrowerId);
          const book = await tx.lockBook(bookId);
          return this.lifecycle.createLoan(tx, {
            borrower,
            book,
            issuedBy: actor,
            dueDate: options.dueDate,
            notes: options.notes,
          });
        }),
      this.logger,
      {
        attempts: this.conflictAttempts,
        baseDelayMs: this.retryBaseDelayMs,
        maxDelayMs: this.retryBaseDelayMs * 8,
        jitterMs: this.retryBaseDelayMs,
        shouldRetry: (error) => isLibraryError(error, "Conflict"),
      }
    );

    this.logger.info("loan_created", {
      loanId: result.loan.id,
      bookId,
      userId: result.loan.userId,
      availableCopies: result.book.availableCopies,
    });
    return result;
  }
}
