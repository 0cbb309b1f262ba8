import type { ActorType, IsoDateString, SubjectType } from "../types/core";
import type { Book, BookGenre, BookRating, BookStatus, Loan, LoanStatus, User } from "../library/model";

export type JobRunRecord = {
  id: string;
  jobName: string;
  status: "running" | "succeeded" | "failed";
  startedAt: IsoDateString;
  completedAt: IsoDateString | null;
  summary: string | null;
  errorMessage: string | null;
};

export type AuditEvent = {
  id: string;
  at: IsoDateString;
  actorType: ActorType;
  actorId: string;
  action: string;
  subjectType: SubjectType;
  subjectId: string;
  metadata: Record<string, unknown>;
};

export type UserFilter = {
  isLibrarian?: boolean;
  isActiveMember?: boolean;
  search?: string;
  limit?: number;
  offset?: number;
};

export type BookFilter = {
  genre?: BookGenre;
  status?: BookStatus;
  author?: string;
  search?: string;
  availableOnly?: boolean;
  borrowedOnly?: boolean;
  ratedOnly?: boolean;
  orderBy?: "title" | "timesBorrowed" | "averageRating";
  limit?: number;
  offset?: number;
};

export type LoanFilter = {
  userId?: string;
  bookId?: string;
  statuses?: LoanStatus[];
  dueBefore?: IsoDateString;
  orderBy?: "loanDate" | "dueDate";
  limit?: number;
  offset?: number;
};

export type RatingFilter = {
  userId?: string;
  bookId?: string;
  limit?: number;
  offset?: number;
};

export type LoanStatistics = {
  totalLoans: number;
  activeLoans: number;
  overdueLoans: number;
  returnedLoans: number;
};

export interface UserRepository {
  get(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  list(filter?: UserFilter): Promise<User[]>;
  insert(user: User): Promise<User>;
  update(user: User): Promise<User>;
}

export interface BookRepository {
  get(id: string): Promise<Book | null>;
  findByIsbn(isbn: string): Promise<Book | null>;
  list(filter?: BookFilter): Promise<Book[]>;
  insert(book: Book): Promise<Book>;
  update(book: Book): Promise<Book>;
  delete(id: string): Promise<boolean>;
}

export interface LoanRepository {
  get(id: string): Promise<Loan | null>;
  list(filter?: LoanFilter): Promise<Loan[]>;
  findActive(userId: string, bookId: string): Promise<Loan | null>;
  countActiveForUser(userId: string): Promise<number>;
  countForBook(bookId: string): Promise<number>;
  statistics(): Promise<LoanStatistics>;
  insert(loan: Loan): Promise<Loan>;
  update(loan: Loan): Promise<Loan>;
}

export interface RatingRepository {
  get(id: string): Promise<BookRating | null>;
  findByUserAndBook(userId: string, bookId: string): Promise<BookRating | null>;
  list(filter?: RatingFilter): Promise<BookRating[]>;
  insert(rating: BookRating): Promise<BookRating>;
  update(rating: BookRating): Promise<BookRating>;
  delete(id: string): Promise<boolean>;
}

export interface EventStore {
  append(event: Omit<AuditEvent, "id" | "at">): Promise<AuditEvent>;
  listRecent(limit: number): Promise<AuditEvent[]>;
}

export interface JobRunStore {
  listRecentJobRuns(limit: number): Promise<JobRunRecord[]>;
  startJobRun(jobName: string): Promise<JobRunRecord>;
  completeJobRun(id: string, summary: string): Promise<void>;
  failJobRun(id: string, errorMessage: string): Promise<void>;
}

export type LibraryRepositories = {
  users: UserRepository;
  books: BookRepository;
  loans: LoanRepository;
  ratings: RatingRepository;
  events: EventStore;
};

/**
 * Repositories bound to one unit of work. The `lock*` methods take an exclusive
 * row lock held until the transaction ends, and return the row as of that moment.
 * They throw `NotFound` for a missing row and `Conflict` when the lock cannot be
 * taken within the store's lock timeout.
 */
export type LibraryTransaction = LibraryRepositories & {
  lockUser(id: string): Promise<User>;
  lockBook(id: string): Promise<Book>;
  lockLoan(id: string): Promise<Loan>;
};

export type StoreHealth = {
  ok: boolean;
  latencyMs: number;
  error?: string;
};

export type LibraryStore = LibraryRepositories & {
  readonly kind: "memory" | "postgres";
  jobRuns: JobRunStore;
  /** All writes made through `tx` commit together or not at all. */
  transaction<T>(work: (tx: LibraryTransaction) => Promise<T>): Promise<T>;
  healthcheck(): Promise<StoreHealth>;
};
