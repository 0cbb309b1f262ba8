import crypto from "node:crypto";
import type {
  AuditEvent,
  BookFilter,
  BookRepository,
  EventStore,
  JobRunRecord,
  JobRunStore,
  LibraryRepositories,
  LibraryStore,
  LibraryTransaction,
  LoanFilter,
  LoanRepository,
  LoanStatistics,
  RatingFilter,
  RatingRepository,
  StoreHealth,
  UserFilter,
  UserRepository,
} from "./interfaces";
import type { Book, BookRating, Loan, User } from "../library/model";
import { isBookAvailable } from "../library/model";
import { LibraryError, notFound } from "../library/errors";
import { assertCopyBounds } from "../availability/engine";
import { KeyedLock, type ReleaseLock } from "./rowLocks";

type Tables = {
  users: Map<string, User>;
  books: Map<string, Book>;
  loans: Map<string, Loan>;
  ratings: Map<string, BookRating>;
  events: AuditEvent[];
};

/** Undo entries recorded by writes inside a transaction, replayed newest first on rollback. */
class Journal {
  private readonly undo: Array<() => void> = [];

  record(step: () => void): void {
    this.undo.push(step);
  }

  rollback(): void {
    for (let index = this.undo.length - 1; index >= 0; index -= 1) {
      this.undo[index]?.();
    }
    this.undo.length = 0;
  }
}

function putRow<T extends { id: string }>(table: Map<string, T>, row: T, journal: Journal | null): T {
  const previous = table.get(row.id);
  table.set(row.id, { ...row });
  journal?.record(() => {
    if (previous) table.set(row.id, previous);
    else table.delete(row.id);
  });
  return { ...row };
}

function removeRow<T extends { id: string }>(table: Map<string, T>, id: string, journal: Journal | null): boolean {
  const previous = table.get(id);
  if (!previous) return false;
  table.delete(id);
  journal?.record(() => table.set(id, previous));
  return true;
}

function page<T>(rows: T[], limit?: number, offset?: number): T[] {
  const start = Math.max(0, offset ?? 0);
  return limit === undefined ? rows.slice(start) : rows.slice(start, start + Math.max(0, limit));
}

function contains(haystack: string | null, needle: string): boolean {
  return (haystack ?? "").toLowerCase().includes(needle.toLowerCase());
}

class MemoryUserRepository implements UserRepository {
  constructor(
    private readonly tables: Tables,
    private readonly journal: Journal | null
  ) {}

  async get(id: string): Promise<User | null> {
    const row = this.tables.users.get(id);
    return row ? { ...row } : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const wanted = email.toLowerCase();
    const row = [...this.tables.users.values()].find((user) => user.email.toLowerCase() === wanted);
    return row ? { ...row } : null;
  }

  async list(filter: UserFilter = {}): Promise<User[]> {
    const rows = [...this.tables.users.values()]
      .filter((user) => filter.isLibrarian === undefined || user.isLibrarian === filter.isLibrarian)
      .filter((user) => filter.isActiveMember === undefined || user.isActiveMember === filter.isActiveMember)
      .filter((user) => {
        const search = filter.search;
        if (!search) return true;
        return [user.username, user.email, user.firstName, user.lastName].some((field) => contains(field, search));
      })
      .sort((a, b) => a.username.localeCompare(b.username));
    return page(rows, filter.limit, filter.offset).map((user) => ({ ...user }));
  }

  private assertUnique(user: User): void {
    for (const other of this.tables.users.values()) {
      if (other.id === user.id) continue;
      if (other.email.toLowerCase() === user.email.toLowerCase()) {
        throw new LibraryError("AlreadyExists", "A user with this email already exists.", { field: "email" });
      }
      if (other.username === user.username) {
        throw new LibraryError("AlreadyExists", "A user with this username already exists.", { field: "username" });
      }
    }
  }

  async insert(user: User): Promise<User> {
    if (this.tables.users.has(user.id)) {
      throw new LibraryError("AlreadyExists", `user ${user.id} already exists.`, { field: "id" });
    }
    this.assertUnique(user);
    return putRow(this.tables.users, user, this.journal);
  }

  async update(user: User): Promise<User> {
    if (!this.tables.users.has(user.id)) throw notFound("user", user.id);
    this.assertUnique(user);
    return putRow(this.tables.users, user, this.journal);
  }
}

class MemoryBookRepository implements BookRepository {
  constructor(
    private readonly tables: Tables,
    private readonly journal: Journal | null
  ) {}

  async get(id: string): Promise<Book | null> {
    const row = this.tables.books.get(id);
    return row ? { ...row } : null;
  }

  async findByIsbn(isbn: string): Promise<Book | null> {
    const row = [...this.tables.books.values()].find((book) => book.isbn === isbn);
    return row ? { ...row } : null;
  }

  async list(filter: BookFilter = {}): Promise<Book[]> {
    const rows = [...this.tables.books.values()]
      .filter((book) => !filter.genre || book.genre === filter.genre)
      .filter((book) => !filter.status || book.status === filter.status)
      .filter((book) => !filter.author || contains(book.author, filter.author))
      .filter((book) => !filter.availableOnly || isBookAvailable(book))
      .filter((book) => !filter.borrowedOnly || book.timesBorrowed > 0)
      .filter((book) => !filter.ratedOnly || book.totalRatings > 0)
      .filter((book) => {
        const search = filter.search;
        if (!search) return true;
        return [book.title, book.author, book.isbn, book.description].some((field) => contains(field, search));
      });

    switch (filter.orderBy ?? "title") {
      case "title":
        rows.sort((a, b) => a.title.localeCompare(b.title) || a.author.localeCompare(b.author));
        break;
      case "timesBorrowed":
        rows.sort((a, b) => b.timesBorrowed - a.timesBorrowed || a.title.localeCompare(b.title));
        break;
      case "averageRating":
        rows.sort(
          (a, b) =>
            b.averageRating - a.averageRating || b.totalRatings - a.totalRatings || a.title.localeCompare(b.title)
        );
        break;
    }
    return page(rows, filter.limit, filter.offset).map((book) => ({ ...book }));
  }

  private assertWritable(book: Book): void {
    assertCopyBounds(book);
    for (const other of this.tables.books.values()) {
      if (other.id !== book.id && other.isbn === book.isbn) {
        throw new LibraryError("AlreadyExists", "A book with this ISBN already exists.", { field: "isbn" });
      }
    }
  }

  async insert(book: Book): Promise<Book> {
    if (this.tables.books.has(book.id)) {
      throw new LibraryError("AlreadyExists", `book ${book.id} already exists.`, { field: "id" });
    }
    this.assertWritable(book);
    return putRow(this.tables.books, book, this.journal);
  }

  async update(book: Book): Promise<Book> {
    if (!this.tables.books.has(book.id)) throw notFound("book", book.id);
    this.assertWritable(book);
    return putRow(this.tables.books, book, this.journal);
  }

  async delete(id: string): Promise<boolean> {
    if (!this.tables.books.has(id)) return false;
    const referenced = [...this.tables.loans.values()].some((loan) => loan.bookId === id);
    if (referenced) {
      throw new LibraryError("ProtectedRecord", "Books with loan history cannot be deleted.", { bookId: id });
    }
    for (const rating of [...this.tables.ratings.values()]) {
      if (rating.bookId === id) removeRow(this.tables.ratings, rating.id, this.journal);
    }
    return removeRow(this.tables.books, id, this.journal);
  }
}

class MemoryLoanRepository implements LoanRepository {
  constructor(
    private readonly tables: Tables,
    private readonly journal: Journal | null
  ) {}

  async get(id: string): Promise<Loan | null> {
    const row = this.tables.loans.get(id);
    return row ? { ...row } : null;
  }

  async list(filter: LoanFilter = {}): Promise<Loan[]> {
    const statuses = filter.statuses;
    const rows = [...this.tables.loans.values()]
      .filter((loan) => !filter.userId || loan.userId === filter.userId)
      .filter((loan) => !filter.bookId || loan.bookId === filter.bookId)
      .filter((loan) => !statuses || statuses.includes(loan.status))
      .filter((loan) => !filter.dueBefore || Date.parse(loan.dueDate) < Date.parse(filter.dueBefore));

    if ((filter.orderBy ?? "loanDate") === "dueDate") {
      rows.sort((a, b) => Date.parse(a.dueDate) - Date.parse(b.dueDate));
    } else {
      rows.sort((a, b) => Date.parse(b.loanDate) - Date.parse(a.loanDate));
    }
    return page(rows, filter.limit, filter.offset).map((loan) => ({ ...loan }));
  }

  async findActive(userId: string, bookId: string): Promise<Loan | null> {
    const row = [...this.tables.loans.values()].find(
      (loan) => loan.userId === userId && loan.bookId === bookId && loan.status === "borrowed"
    );
    return row ? { ...row } : null;
  }

  async countActiveForUser(userId: string): Promise<number> {
    return [...this.tables.loans.values()].filter((loan) => loan.userId === userId && loan.status === "borrowed").length;
  }

  async countForBook(bookId: string): Promise<number> {
    return [...this.tables.loans.values()].filter((loan) => loan.bookId === bookId).length;
  }

  async statistics(): Promise<LoanStatistics> {
    const loans = [...this.tables.loans.values()];
    return {
      totalLoans: loans.length,
      activeLoans: loans.filter((loan) => loan.status === "borrowed").length,
      overdueLoans: loans.filter((loan) => loan.status === "overdue").length,
      returnedLoans: loans.filter((loan) => loan.status === "returned").length,
    };
  }

  private assertWritable(loan: Loan): void {
    if (!this.tables.users.has(loan.userId)) throw notFound("user", loan.userId);
    if (!this.tables.books.has(loan.bookId)) throw notFound("book", loan.bookId);
    if (loan.status !== "borrowed") return;
    for (const other of this.tables.loans.values()) {
      if (other.id !== loan.id && other.status === "borrowed" && other.userId === loan.userId && other.bookId === loan.bookId) {
        throw new LibraryError("DuplicateActiveLoan", "This book is already on loan to this user.", {
          userId: loan.userId,
          bookId: loan.bookId,
        });
      }
    }
  }

  async insert(loan: Loan): Promise<Loan> {
    if (this.tables.loans.has(loan.id)) {
      throw new LibraryError("AlreadyExists", `loan ${loan.id} already exists.`, { field: "id" });
    }
    this.assertWritable(loan);
    return putRow(this.tables.loans, loan, this.journal);
  }

  async update(loan: Loan): Promise<Loan> {
    if (!this.tables.loans.has(loan.id)) throw notFound("loan", loan.id);
    this.assertWritable(loan);
    return putRow(this.tables.loans, loan, this.journal);
  }
}

class MemoryRatingRepository implements RatingRepository {
  constructor(
    private readonly tables: Tables,
    private readonly journal: Journal | null
  ) {}

  async get(id: string): Promise<BookRating | null> {
    const row = this.tables.ratings.get(id);
    return row ? { ...row } : null;
  }

  async findByUserAndBook(userId: string, bookId: string): Promise<BookRating | null> {
    const row = [...this.tables.ratings.values()].find((rating) => rating.userId === userId && rating.bookId === bookId);
    return row ? { ...row } : null;
  }

  async list(filter: RatingFilter = {}): Promise<BookRating[]> {
    const rows = [...this.tables.ratings.values()]
      .filter((rating) => !filter.userId || rating.userId === filter.userId)
      .filter((rating) => !filter.bookId || rating.bookId === filter.bookId)
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
    return page(rows, filter.limit, filter.offset).map((rating) => ({ ...rating }));
  }

  private assertWritable(rating: BookRating): void {
    if (!Number.isInteger(rating.rating) || rating.rating < 1 || rating.rating > 5) {
      throw new LibraryError("ValidationFailed", "rating must be an integer between 1 and 5.", { rating: rating.rating });
    }
    if (!this.tables.users.has(rating.userId)) throw notFound("user", rating.userId);
    if (!this.tables.books.has(rating.bookId)) throw notFound("book", rating.bookId);
    for (const other of this.tables.ratings.values()) {
      if (other.id !== rating.id && other.userId === rating.userId && other.bookId === rating.bookId) {
        throw new LibraryError("AlreadyExists", "You have already rated this book.", { field: "rating" });
      }
    }
  }

  async insert(rating: BookRating): Promise<BookRating> {
    if (this.tables.ratings.has(rating.id)) {
      throw new LibraryError("AlreadyExists", `rating ${rating.id} already exists.`, { field: "id" });
    }
    this.assertWritable(rating);
    return putRow(this.tables.ratings, rating, this.journal);
  }

  async update(rating: BookRating): Promise<BookRating> {
    if (!this.tables.ratings.has(rating.id)) throw notFound("rating", rating.id);
    this.assertWritable(rating);
    return putRow(this.tables.ratings, rating, this.journal);
  }

  async delete(id: string): Promise<boolean> {
    return removeRow(this.tables.ratings, id, this.journal);
  }
}

class MemoryEventStore implements EventStore {
  constructor(
    private readonly tables: Tables,
    private readonly journal: Journal | null
  ) {}

  async append(event: Omit<AuditEvent, "id" | "at">): Promise<AuditEvent> {
    const created: AuditEvent = {
      ...event,
      id: crypto.randomUUID(),
      at: new Date().toISOString(),
    };
    this.tables.events.push(created);
    this.journal?.record(() => {
      const index = this.tables.events.indexOf(created);
      if (index >= 0) this.tables.events.splice(index, 1);
    });
    return created;
  }

  async listRecent(limit: number): Promise<AuditEvent[]> {
    const bounded = Math.max(1, limit);
    return this.tables.events.slice(-bounded).reverse();
  }
}

export class MemoryJobRunStore implements JobRunStore {
  private jobRuns = new Map<string, JobRunRecord>();

  async listRecentJobRuns(limit: number): Promise<JobRunRecord[]> {
    const bounded = Math.max(1, limit);
    return [...this.jobRuns.values()].sort((a, b) => b.startedAt.localeCompare(a.startedAt)).slice(0, bounded);
  }

  async startJobRun(jobName: string): Promise<JobRunRecord> {
    const job: JobRunRecord = {
      id: crypto.randomUUID(),
      jobName,
      status: "running",
      startedAt: new Date().toISOString(),
      completedAt: null,
      summary: null,
      errorMessage: null,
    };
    this.jobRuns.set(job.id, job);
    return job;
  }

  async completeJobRun(id: string, summary: string): Promise<void> {
    const current = this.jobRuns.get(id);
    if (!current) return;
    this.jobRuns.set(id, { ...current, status: "succeeded", completedAt: new Date().toISOString(), summary, errorMessage: null });
  }

  async failJobRun(id: string, errorMessage: string): Promise<void> {
    const current = this.jobRuns.get(id);
    if (!current) return;
    this.jobRuns.set(id, { ...current, status: "failed", completedAt: new Date().toISOString(), errorMessage });
  }
}

function repositories(tables: Tables, journal: Journal | null): LibraryRepositories {
  return {
    users: new MemoryUserRepository(tables, journal),
    books: new MemoryBookRepository(tables, journal),
    loans: new MemoryLoanRepository(tables, journal),
    ratings: new MemoryRatingRepository(tables, journal),
    events: new MemoryEventStore(tables, journal),
  };
}

export type MemoryLibraryStoreOptions = {
  lockTimeoutMs?: number;
};

export class MemoryLibraryStore implements LibraryStore {
  readonly kind = "memory" as const;
  readonly users: UserRepository;
  readonly books: BookRepository;
  readonly loans: LoanRepository;
  readonly ratings: RatingRepository;
  readonly events: EventStore;
  readonly jobRuns = new MemoryJobRunStore();

  private readonly tables: Tables = {
    users: new Map(),
    books: new Map(),
    loans: new Map(),
    ratings: new Map(),
    events: [],
  };
  private readonly locks: KeyedLock;

  constructor(options: MemoryLibraryStoreOptions = {}) {
    this.locks = new KeyedLock(options.lockTimeoutMs ?? 2_000);
    const base = repositories(this.tables, null);
    this.users = base.users;
    this.books = base.books;
    this.loans = base.loans;
    this.ratings = base.ratings;
    this.events = base.events;
  }

  async transaction<T>(work: (tx: LibraryTransaction) => Promise<T>): Promise<T> {
    const journal = new Journal();
    const held = new Map<string, ReleaseLock>();
    const tables = this.tables;

    const lock = async <R extends object>(entity: "user" | "book" | "loan", id: string, table: Map<string, R>): Promise<R> => {
      const key = `${entity}:${id}`;
      if (!held.has(key)) {
        held.set(key, await this.locks.acquire(key));
      }
      const row = table.get(id);
      if (!row) throw notFound(entity, id);
      return { ...row };
    };

    const tx: LibraryTransaction = {
      ...repositories(tables, journal),
      lockUser: (id) => lock("user", id, tables.users),
      lockBook: (id) => lock("book", id, tables.books),
      lockLoan: (id) => lock("loan", id, tables.loans),
    };

    try {
      return await work(tx);
    } catch (error) {
      journal.rollback();
      throw error;
    } finally {
      for (const release of held.values()) release();
    }
  }

  async healthcheck(): Promise<StoreHealth> {
    return { ok: true, latencyMs: 0 };
  }
}
