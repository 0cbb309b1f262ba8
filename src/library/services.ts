import type { Clock } from "../types/core";
import { systemClock } from "../types/core";
import type { Logger } from "../config/logger";
import type { LoanPolicy } from "./model";
import { DEFAULT_LOAN_POLICY } from "./model";
import type { LibraryStore } from "../stores/interfaces";
import { AccountService } from "../accounts/userService";
import { BookCatalog } from "../catalog/bookService";
import { BorrowCoordinator } from "../loans/borrowCoordinator";
import { LoanLifecycle } from "../loans/lifecycle";
import { RatingService } from "../ratings/ratingService";

export type LibraryServices = {
  store: LibraryStore;
  accounts: AccountService;
  catalog: BookCatalog;
  lifecycle: LoanLifecycle;
  borrowing: BorrowCoordinator;
  ratings: RatingService;
};

export type LibraryServiceOptions = {
  logger: Logger;
  policy?: LoanPolicy;
  clock?: Clock;
  conflictAttempts?: number;
  retryBaseDelayMs?: number;
};

export function createLibraryServices(store: LibraryStore, options: LibraryServiceOptions): LibraryServices {
  const { logger, policy = DEFAULT_LOAN_POLICY, clock = systemClock } = options;
  const lifecycle = new LoanLifecycle(store, { policy, clock, logger });
  return {
    store,
    accounts: new AccountService(store, { clock, logger, policy }),
    catalog: new BookCatalog(store, { clock, logger }),
    lifecycle,
    borrowing: new BorrowCoordinator(store, lifecycle, {
      logger,
      conflictAttempts: options.conflictAttempts,
      retryBaseDelayMs: options.retryBaseDelayMs,
    }),
    ratings: new RatingService(store, { clock, logger }),
  };
}
