import crypto from "node:crypto";
import type { Clock } from "../types/core";
import { systemClock } from "../types/core";
import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import type { Book, Loan, LoanPolicy, LoanStatus, ReturnCondition, User } from "../library/model";
import { DAY_MS, DEFAULT_LOAN_POLICY, canBorrowBooks, isBookAvailable, roundCurrency } from "../library/model";
import { LibraryError, isLibraryError, notFound } from "../library/errors";
import { SYSTEM_ACTOR, actorOf, requireLibrarian, requireOwnerOrLibrarian } from "../library/actors";
import { applyBorrowDelta, applyReturnDelta } from "../availability/engine";
import type { LibraryStore, LibraryTransaction } from "../stores/interfaces";

export const MAX_RENEWAL_DAYS = 30;

type LoanClockFields = Pick<Loan, "status" | "dueDate">;

export function isOverdue(loan: LoanClockFields, now: Date): boolean {
  if (loan.status === "overdue") return true;
  return loan.status === "borrowed" && now.getTime() > Date.parse(loan.dueDate);
}

export function daysOverdue(loan: LoanClockFields, now: Date): number {
  if (!isOverdue(loan, now)) return 0;
  return Math.max(0, Math.floor((now.getTime() - Date.parse(loan.dueDate)) / DAY_MS));
}

export function canRenew(loan: Pick<Loan, "status" | "dueDate" | "renewalCount" | "maxRenewals">, now: Date): boolean {
  return loan.status === "borrowed" && loan.renewalCount < loan.maxRenewals && !isOverdue(loan, now);
}

export function computeFine(loan: LoanClockFields, now: Date, dailyRate: number): number {
  if (!isOverdue(loan, now)) return 0;
  return roundCurrency(daysOverdue(loan, now) * dailyRate);
}

export function statusForCondition(condition: ReturnCondition): LoanStatus {
  switch (condition) {
    case "good":
      return "returned";
    case "damaged":
      return "damaged";
    case "lost":
      return "lost";
  }
}

export type LoanView = Loan & {
  isOverdue: boolean;
  daysOverdue: number;
  canRenew: boolean;
};

export function describeLoan(loan: Loan, now: Date): LoanView {
  return {
    ...loan,
    isOverdue: isOverdue(loan, now),
    daysOverdue: daysOverdue(loan, now),
    canRenew: canRenew(loan, now),
  };
}

function addDays(iso: string, days: number): string {
  return new Date(Date.parse(iso) + days * DAY_MS).toISOString();
}

function notRenewableReason(loan: Loan, now: Date): string {
  if (loan.status !== "borrowed") return "Only active loans can be renewed.";
  if (isOverdue(loan, now)) return "Overdue loans cannot be renewed.";
  return `Loan has reached its limit of ${loan.maxRenewals} renewals.`;
}

export type CreateLoanInput = {
  borrower: User;
  /** The book row as locked by the caller's transaction. */
  book: Book;
  issuedBy: User | null;
  dueDate?: string;
  notes?: string | null;
};

export type ReturnLoanInput = {
  condition?: ReturnCondition;
  notes?: string | null;
};

export type ReturnLoanResult = {
  loan: Loan;
  book: Book | null;
};

export type FineResult = {
  loan: Loan;
  fine: number;
};

export type OverdueSweepResult = {
  scanned: number;
  promoted: number;
  finesUpdated: number;
  skipped: number;
};

export type LoanListFilter = {
  userId?: string;
  statuses?: LoanStatus[];
  limit?: number;
  offset?: number;
};

export type LoanLifecycleOptions = {
  policy?: LoanPolicy;
  clock?: Clock;
  logger?: Logger;
};

export class LoanLifecycle {
  readonly policy: LoanPolicy;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly store: LibraryStore,
    options: LoanLifecycleOptions = {}
  ) {
    this.policy = options.policy ?? DEFAULT_LOAN_POLICY;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  view(loan: Loan): LoanView {
    return describeLoan(loan, this.clock());
  }

  /**
   * Runs inside the caller's transaction with `input.book` already locked.
   * Persists the loan and the book's borrow delta together.
   */
  async createLoan(tx: LibraryTransaction, input: CreateLoanInput): Promise<{ loan: Loan; book: Book }> {
    const { borrower, book } = input;
    const activeLoans = await tx.loans.countActiveForUser(borrower.id);
    if (!canBorrowBooks(borrower, activeLoans, this.policy.maxActiveLoans)) {
      throw new LibraryError(
        "BorrowLimitExceeded",
        borrower.isActiveMember
          ? `Borrowing limit of ${this.policy.maxActiveLoans} active loans reached.`
          : "Membership is not active.",
        { userId: borrower.id, activeLoans, maxActiveLoans: this.policy.maxActiveLoans }
      );
    }
    if (!isBookAvailable(book)) {
      throw new LibraryError("BookUnavailable", "This book is not available for borrowing.", {
        bookId: book.id,
        status: book.status,
        availableCopies: book.availableCopies,
      });
    }
    if (await tx.loans.findActive(borrower.id, book.id)) {
      throw new LibraryError("DuplicateActiveLoan", "You have already borrowed this book.", {
        userId: borrower.id,
        bookId: book.id,
      });
    }

    const now = this.clock();
    const loanDate = now.toISOString();
    let dueDate = addDays(loanDate, this.policy.loanPeriodDays);
    if (input.dueDate !== undefined) {
      const requested = Date.parse(input.dueDate);
      if (Number.isNaN(requested) || requested <= now.getTime()) {
        throw new LibraryError("ValidationFailed", "dueDate must be a date after the loan date.", {
          dueDate: input.dueDate,
        });
      }
      dueDate = new Date(requested).toISOString();
    }

    const loan = await tx.loans.insert({
      id: crypto.randomUUID(),
      userId: borrower.id,
      bookId: book.id,
      loanDate,
      dueDate,
      returnDate: null,
      status: "borrowed",
      renewalCount: 0,
      maxRenewals: this.policy.maxRenewals,
      issuedBy: input.issuedBy?.isLibrarian ? input.issuedBy.id : null,
      returnedTo: null,
      notes: input.notes ?? null,
      fineAmount: 0,
      finePaid: false,
      createdAt: loanDate,
      updatedAt: loanDate,
    });
    const updatedBook = await tx.books.update({ ...applyBorrowDelta(book), lastUpdated: loanDate });
    await tx.events.append({
      ...actorOf(input.issuedBy ?? borrower),
      action: "loan.created",
      subjectType: "loan",
      subjectId: loan.id,
      metadata: { bookId: book.id, userId: borrower.id, dueDate, availableCopies: updatedBook.availableCopies },
    });
    return { loan, book: updatedBook };
  }

  async renew(actor: User, loanId: string, extraDays: number = this.policy.renewalDays): Promise<Loan> {
    if (!Number.isInteger(extraDays) || extraDays < 1 || extraDays > MAX_RENEWAL_DAYS) {
      throw new LibraryError("ValidationFailed", `extraDays must be an integer between 1 and ${MAX_RENEWAL_DAYS}.`, {
        extraDays,
      });
    }
    const renewed = await this.store.transaction(async (tx) => {
      const loan = await tx.lockLoan(loanId);
      requireOwnerOrLibrarian(actor, loan.userId, "renew");
      const now = this.clock();
      if (!canRenew(loan, now)) {
        throw new LibraryError("NotRenewable", notRenewableReason(loan, now), {
          loanId,
          status: loan.status,
          renewalCount: loan.renewalCount,
          maxRenewals: loan.maxRenewals,
        });
      }
      const next = await tx.loans.update({
        ...loan,
        dueDate: addDays(loan.dueDate, extraDays),
        renewalCount: loan.renewalCount + 1,
        updatedAt: now.toISOString(),
      });
      await tx.events.append({
        ...actorOf(actor),
        action: "loan.renewed",
        subjectType: "loan",
        subjectId: loan.id,
        metadata: { extraDays, dueDate: next.dueDate, renewalCount: next.renewalCount },
      });
      return next;
    });
    this.logger.info("loan_renewed", { loanId, renewalCount: renewed.renewalCount, dueDate: renewed.dueDate });
    return renewed;
  }

  async returnLoan(actor: User, loanId: string, input: ReturnLoanInput = {}): Promise<ReturnLoanResult> {
    const condition = input.condition ?? "good";
    const result = await this.store.transaction(async (tx) => {
      const loan = await tx.lockLoan(loanId);
      requireOwnerOrLibrarian(actor, loan.userId, "return");
      if (loan.status !== "borrowed" && loan.status !== "overdue") {
        throw new LibraryError("InvalidState", `Loan is already ${loan.status}.`, { loanId, status: loan.status });
      }
      const now = this.clock();
      const at = now.toISOString();
      const fineAmount =
        isOverdue(loan, now) && !loan.finePaid ? computeFine(loan, now, this.policy.dailyFineRate) : loan.fineAmount;
      const returned = await tx.loans.update({
        ...loan,
        fineAmount,
        status: statusForCondition(condition),
        returnDate: at,
        returnedTo: actor.isLibrarian ? actor.id : null,
        notes: input.notes ?? loan.notes,
        updatedAt: at,
      });

      let book: Book | null = null;
      if (returned.status === "returned") {
        const locked = await tx.lockBook(loan.bookId);
        book = await tx.books.update({ ...applyReturnDelta(locked), lastUpdated: at });
      }
      await tx.events.append({
        ...actorOf(actor),
        action: "loan.returned",
        subjectType: "loan",
        subjectId: loan.id,
        metadata: { condition, status: returned.status, fineAmount, restoredCopy: book !== null },
      });
      return { loan: returned, book };
    });
    this.logger.info("loan_returned", {
      loanId,
      status: result.loan.status,
      fineAmount: result.loan.fineAmount,
    });
    return result;
  }

  async calculateFine(actor: User, loanId: string, dailyRate: number = this.policy.dailyFineRate): Promise<FineResult> {
    requireLibrarian(actor, "calculate fines");
    if (!Number.isFinite(dailyRate) || dailyRate < 0) {
      throw new LibraryError("ValidationFailed", "dailyRate must be a non-negative number.", { dailyRate });
    }
    return this.store.transaction(async (tx) => {
      const loan = await tx.lockLoan(loanId);
      const now = this.clock();
      if (!isOverdue(loan, now)) {
        return { loan, fine: 0 };
      }
      if (loan.finePaid) {
        return { loan, fine: loan.fineAmount };
      }
      const fine = computeFine(loan, now, dailyRate);
      if (fine === loan.fineAmount) {
        return { loan, fine };
      }
      const next = await tx.loans.update({ ...loan, fineAmount: fine, updatedAt: now.toISOString() });
      await tx.events.append({
        ...actorOf(actor),
        action: "loan.fine_calculated",
        subjectType: "loan",
        subjectId: loan.id,
        metadata: { fine, dailyRate, daysOverdue: daysOverdue(loan, now) },
      });
      return { loan: next, fine };
    });
  }

  async settleFine(actor: User, loanId: string): Promise<Loan> {
    requireLibrarian(actor, "settle fines");
    return this.store.transaction(async (tx) => {
      const loan = await tx.lockLoan(loanId);
      if (loan.fineAmount <= 0) {
        throw new LibraryError("InvalidState", "This loan has no fine to settle.", { loanId });
      }
      if (loan.finePaid) {
        throw new LibraryError("InvalidState", "This fine has already been paid.", { loanId });
      }
      const next = await tx.loans.update({ ...loan, finePaid: true, updatedAt: this.clock().toISOString() });
      await tx.events.append({
        ...actorOf(actor),
        action: "loan.fine_paid",
        subjectType: "loan",
        subjectId: loan.id,
        metadata: { fineAmount: loan.fineAmount },
      });
      return next;
    });
  }

  /**
   * Marks every past-due borrowed loan overdue and brings unpaid fines up to date.
   * Loans whose lock cannot be taken are counted as skipped and picked up on the next run.
   */
  async promoteOverdueLoans(): Promise<OverdueSweepResult> {
    const now = this.clock();
    const at = now.toISOString();
    const candidates = await this.store.loans.list({
      statuses: ["borrowed", "overdue"],
      dueBefore: at,
      orderBy: "dueDate",
    });
    const result: OverdueSweepResult = { scanned: candidates.length, promoted: 0, finesUpdated: 0, skipped: 0 };

    for (const candidate of candidates) {
      try {
        const outcome = await this.store.transaction(async (tx) => {
          const loan = await tx.lockLoan(candidate.id);
          if (!isOverdue(loan, now)) return "unchanged";
          const promote = loan.status === "borrowed";
          const fineAmount = loan.finePaid ? loan.fineAmount : computeFine(loan, now, this.policy.dailyFineRate);
          if (!promote && fineAmount === loan.fineAmount) return "unchanged";
          await tx.loans.update({ ...loan, status: "overdue", fineAmount, updatedAt: at });
          if (promote) {
            await tx.events.append({
              ...SYSTEM_ACTOR,
              action: "loan.overdue",
              subjectType: "loan",
              subjectId: loan.id,
              metadata: { dueDate: loan.dueDate, fineAmount },
            });
          }
          return promote ? "promoted" : "fine_updated";
        });
        if (outcome === "promoted") result.promoted += 1;
        if (outcome === "fine_updated") result.finesUpdated += 1;
      } catch (error) {
        if (!isLibraryError(error, "Conflict")) throw error;
        result.skipped += 1;
        this.logger.warn("overdue_promotion_skipped", { loanId: candidate.id, message: error.message });
      }
    }

    if (result.promoted > 0 || result.finesUpdated > 0 || result.skipped > 0) {
      this.logger.info("overdue_loans_promoted", result);
    }
    return result;
  }

  async getLoan(actor: User, loanId: string): Promise<LoanView> {
    const loan = await this.store.loans.get(loanId);
    if (!loan) throw notFound("loan", loanId);
    requireOwnerOrLibrarian(actor, loan.userId, "view");
    return this.view(loan);
  }

  /** Librarians see every loan (optionally one member's); members only their own. */
  async listLoans(actor: User, filter: LoanListFilter = {}): Promise<LoanView[]> {
    const userId = actor.isLibrarian ? filter.userId : actor.id;
    const loans = await this.store.loans.list({
      userId,
      statuses: filter.statuses,
      limit: filter.limit,
      offset: filter.offset,
    });
    return loans.map((loan) => this.view(loan));
  }

  async currentLoans(user: User): Promise<LoanView[]> {
    const loans = await this.store.loans.list({ userId: user.id, statuses: ["borrowed", "overdue"], orderBy: "dueDate" });
    return loans.map((loan) => this.view(loan));
  }

  async listOverdue(actor: User): Promise<LoanView[]> {
    await this.promoteOverdueLoans();
    const loans = await this.store.loans.list({
      userId: actor.isLibrarian ? undefined : actor.id,
      statuses: ["overdue"],
      orderBy: "dueDate",
    });
    return loans.map((loan) => this.view(loan));
  }
}
