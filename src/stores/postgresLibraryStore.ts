import crypto from "node:crypto";
import type { Pool, QueryResult } from "pg";
import type {
  AuditEvent,
  BookFilter,
  BookRepository,
  EventStore,
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
import { BOOK_GENRES, BOOK_STATUSES, LOAN_STATUSES } from "../library/model";
import { notFound } from "../library/errors";
import { translatePgError } from "../db/pgErrors";
import { checkPgConnection } from "../db/postgres";
import { PostgresJobRunStore } from "./postgresJobRunStore";

export type Sql = (text: string, values?: unknown[]) => Promise<QueryResult>;

type Row = Record<string, unknown>;

/** Wraps a pool or client so every driver error leaves as a library error where one applies. */
export function sqlRunner(query: (text: string, values?: unknown[]) => Promise<QueryResult>): Sql {
  return async (text, values) => {
    try {
      return await query(text, values);
    } catch (error) {
      throw translatePgError(error);
    }
  };
}

export function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return new Date(String(value)).toISOString();
}

function optionalIso(value: unknown): string | null {
  return value === null || value === undefined ? null : toIso(value);
}

function optionalText(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown, column: string): T {
  const found = allowed.find((candidate) => candidate === value);
  if (found === undefined) throw new Error(`unexpected ${column} value: ${String(value)}`);
  return found;
}

function likePattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, "\\$&")}%`;
}

class SqlFilter {
  readonly values: unknown[] = [];
  private readonly clauses: string[] = [];

  param(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }

  where(clause: string): void {
    this.clauses.push(clause);
  }

  whereSql(): string {
    return this.clauses.length ? `WHERE ${this.clauses.join(" AND ")}` : "";
  }

  pageSql(limit?: number, offset?: number): string {
    const parts: string[] = [];
    if (limit !== undefined) parts.push(`LIMIT ${this.param(Math.max(0, Math.floor(limit)))}`);
    if (offset !== undefined) parts.push(`OFFSET ${this.param(Math.max(0, Math.floor(offset)))}`);
    return parts.join(" ");
  }
}

const USER_COLUMNS = `id, email, username, first_name, last_name, phone_number, address,
  to_char(date_of_birth, 'YYYY-MM-DD') AS date_of_birth, is_librarian, is_active_member, membership_date`;

const BOOK_COLUMNS = `id, title, author, isbn, publisher, to_char(publication_date, 'YYYY-MM-DD') AS publication_date,
  genre, pages, language, edition, description, shelf_location, status, total_copies, available_copies,
  average_rating, total_ratings, times_borrowed, added_by, date_added, last_updated`;

const LOAN_COLUMNS = `id, user_id, book_id, loan_date, due_date, return_date, status, renewal_count, max_renewals,
  issued_by, returned_to, notes, fine_amount, fine_paid, created_at, updated_at`;

const RATING_COLUMNS = "id, user_id, book_id, rating, review, created_at, updated_at";

function rowToUser(row: Row): User {
  return {
    id: String(row.id),
    email: String(row.email),
    username: String(row.username),
    firstName: String(row.first_name),
    lastName: String(row.last_name),
    phoneNumber: optionalText(row.phone_number),
    address: optionalText(row.address),
    dateOfBirth: optionalText(row.date_of_birth),
    isLibrarian: row.is_librarian === true,
    isActiveMember: row.is_active_member === true,
    membershipDate: toIso(row.membership_date),
  };
}

function rowToBook(row: Row): Book {
  return {
    id: String(row.id),
    title: String(row.title),
    author: String(row.author),
    isbn: String(row.isbn),
    publisher: String(row.publisher),
    publicationDate: String(row.publication_date),
    genre: oneOf(BOOK_GENRES, row.genre, "books.genre"),
    pages: Number(row.pages),
    language: String(row.language),
    edition: optionalText(row.edition),
    description: optionalText(row.description),
    shelfLocation: optionalText(row.shelf_location),
    status: oneOf(BOOK_STATUSES, row.status, "books.status"),
    totalCopies: Number(row.total_copies),
    availableCopies: Number(row.available_copies),
    averageRating: Number(row.average_rating),
    totalRatings: Number(row.total_ratings),
    timesBorrowed: Number(row.times_borrowed),
    addedBy: optionalText(row.added_by),
    dateAdded: toIso(row.date_added),
    lastUpdated: toIso(row.last_updated),
  };
}

function rowToLoan(row: Row): Loan {
  return {
    id: String(row.id),
    userId: String(row.user_id),
    bookId: String(row.book_id),
    loanDate: toIso(row.loan_date),
    dueDate: toIso(row.due_date),
    returnDate: optionalIso(row.return_date),
    status: oneOf(LOAN_STATUSES, row.status, "loans.status"),
    renewalCount: Number(row.renewal_count),
    maxRenewals: Number(row.max_renewals),
    issuedBy: optionalText(row.issued_by),
    returnedTo: optionalText(row.returned_to),
    notes: optionalText(row.notes),
    fineAmount: Number(row.fine_amount),
    finePaid: row.fine_paid === true,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

function rowToRating(row: Row): BookRating {
  return {
    id: String(row.id),
    userId: String(row.user_id),
    bookId: String(row.book_id),
    rating: Number(row.rating),
    review: optionalText(row.review),
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

function first<T>(result: QueryResult, map: (row: Row) => T): T | null {
  const row: Row | undefined = result.rows[0];
  return row ? map(row) : null;
}

class PostgresUserRepository implements UserRepository {
  constructor(private readonly sql: Sql) {}

  async get(id: string): Promise<User | null> {
    return first(await this.sql(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]), rowToUser);
  }

  async findByEmail(email: string): Promise<User | null> {
    return first(await this.sql(`SELECT ${USER_COLUMNS} FROM users WHERE lower(email) = lower($1)`, [email]), rowToUser);
  }

  async list(filter: UserFilter = {}): Promise<User[]> {
    const q = new SqlFilter();
    if (filter.isLibrarian !== undefined) q.where(`is_librarian = ${q.param(filter.isLibrarian)}`);
    if (filter.isActiveMember !== undefined) q.where(`is_active_member = ${q.param(filter.isActiveMember)}`);
    if (filter.search) {
      const p = q.param(likePattern(filter.search));
      q.where(`(username ILIKE ${p} OR email ILIKE ${p} OR first_name ILIKE ${p} OR last_name ILIKE ${p})`);
    }
    const result = await this.sql(
      `SELECT ${USER_COLUMNS} FROM users ${q.whereSql()} ORDER BY username ${q.pageSql(filter.limit, filter.offset)}`,
      q.values
    );
    return result.rows.map(rowToUser);
  }

  async insert(user: User): Promise<User> {
    const result = await this.sql(
      `
      INSERT INTO users (
        id, email, username, first_name, last_name, phone_number, address, date_of_birth,
        is_librarian, is_active_member, membership_date
      ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8::date,$9,$10,$11::timestamptz)
      RETURNING ${USER_COLUMNS}
      `,
      [
        user.id,
        user.email,
        user.username,
        user.firstName,
        user.lastName,
        user.phoneNumber,
        user.address,
        user.dateOfBirth,
        user.isLibrarian,
        user.isActiveMember,
        user.membershipDate,
      ]
    );
    return rowToUser(result.rows[0]);
  }

  async update(user: User): Promise<User> {
    const result = await this.sql(
      `
      UPDATE users SET
        email = $2, username = $3, first_name = $4, last_name = $5, phone_number = $6, address = $7,
        date_of_birth = $8::date, is_librarian = $9, is_active_member = $10
      WHERE id = $1
      RETURNING ${USER_COLUMNS}
      `,
      [
        user.id,
        user.email,
        user.username,
        user.firstName,
        user.lastName,
        user.phoneNumber,
        user.address,
        user.dateOfBirth,
        user.isLibrarian,
        user.isActiveMember,
      ]
    );
    const updated = first(result, rowToUser);
    if (!updated) throw notFound("user", user.id);
    return updated;
  }
}

class PostgresBookRepository implements BookRepository {
  constructor(private readonly sql: Sql) {}

  async get(id: string): Promise<Book | null> {
    return first(await this.sql(`SELECT ${BOOK_COLUMNS} FROM books WHERE id = $1`, [id]), rowToBook);
  }

  async findByIsbn(isbn: string): Promise<Book | null> {
    return first(await this.sql(`SELECT ${BOOK_COLUMNS} FROM books WHERE isbn = $1`, [isbn]), rowToBook);
  }

  async list(filter: BookFilter = {}): Promise<Book[]> {
    const q = new SqlFilter();
    if (filter.genre) q.where(`genre = ${q.param(filter.genre)}`);
    if (filter.status) q.where(`status = ${q.param(filter.status)}`);
    if (filter.author) q.where(`author ILIKE ${q.param(likePattern(filter.author))}`);
    if (filter.availableOnly) q.where("status = 'available' AND available_copies > 0");
    if (filter.borrowedOnly) q.where("times_borrowed > 0");
    if (filter.ratedOnly) q.where("total_ratings > 0");
    if (filter.search) {
      const p = q.param(likePattern(filter.search));
      q.where(`(title ILIKE ${p} OR author ILIKE ${p} OR isbn ILIKE ${p} OR description ILIKE ${p})`);
    }
    const orderBy = {
      title: "title, author",
      timesBorrowed: "times_borrowed DESC, title",
      averageRating: "average_rating DESC, total_ratings DESC, title",
    }[filter.orderBy ?? "title"];
    const result = await this.sql(
      `SELECT ${BOOK_COLUMNS} FROM books ${q.whereSql()} ORDER BY ${orderBy} ${q.pageSql(filter.limit, filter.offset)}`,
      q.values
    );
    return result.rows.map(rowToBook);
  }

  private values(book: Book): unknown[] {
    return [
      book.id,
      book.title,
      book.author,
      book.isbn,
      book.publisher,
      book.publicationDate,
      book.genre,
      book.pages,
      book.language,
      book.edition,
      book.description,
      book.shelfLocation,
      book.status,
      book.totalCopies,
      book.availableCopies,
      book.averageRating,
      book.totalRatings,
      book.timesBorrowed,
      book.addedBy,
      book.dateAdded,
      book.lastUpdated,
    ];
  }

  async insert(book: Book): Promise<Book> {
    const result = await this.sql(
      `
      INSERT INTO books (
        id, title, author, isbn, publisher, publication_date, genre, pages, language, edition, description,
        shelf_location, status, total_copies, available_copies, average_rating, total_ratings, times_borrowed,
        added_by, date_added, last_updated
      ) VALUES ($1,$2,$3,$4,$5,$6::date,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19,$20::timestamptz,$21::timestamptz)
      RETURNING ${BOOK_COLUMNS}
      `,
      this.values(book)
    );
    return rowToBook(result.rows[0]);
  }

  async update(book: Book): Promise<Book> {
    const result = await this.sql(
      `
      UPDATE books SET
        title = $2, author = $3, isbn = $4, publisher = $5, publication_date = $6::date, genre = $7, pages = $8,
        language = $9, edition = $10, description = $11, shelf_location = $12, status = $13, total_copies = $14,
        available_copies = $15, average_rating = $16, total_ratings = $17, times_borrowed = $18, added_by = $19,
        date_added = $20::timestamptz, last_updated = $21::timestamptz
      WHERE id = $1
      RETURNING ${BOOK_COLUMNS}
      `,
      this.values(book)
    );
    const updated = first(result, rowToBook);
    if (!updated) throw notFound("book", book.id);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.sql("DELETE FROM books WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

class PostgresLoanRepository implements LoanRepository {
  constructor(private readonly sql: Sql) {}

  async get(id: string): Promise<Loan | null> {
    return first(await this.sql(`SELECT ${LOAN_COLUMNS} FROM loans WHERE id = $1`, [id]), rowToLoan);
  }

  async list(filter: LoanFilter = {}): Promise<Loan[]> {
    const q = new SqlFilter();
    if (filter.userId) q.where(`user_id = ${q.param(filter.userId)}`);
    if (filter.bookId) q.where(`book_id = ${q.param(filter.bookId)}`);
    if (filter.statuses) q.where(`status = ANY(${q.param(filter.statuses)}::text[])`);
    if (filter.dueBefore) q.where(`due_date < ${q.param(filter.dueBefore)}::timestamptz`);
    const orderBy = (filter.orderBy ?? "loanDate") === "dueDate" ? "due_date ASC" : "loan_date DESC";
    const result = await this.sql(
      `SELECT ${LOAN_COLUMNS} FROM loans ${q.whereSql()} ORDER BY ${orderBy} ${q.pageSql(filter.limit, filter.offset)}`,
      q.values
    );
    return result.rows.map(rowToLoan);
  }

  async findActive(userId: string, bookId: string): Promise<Loan | null> {
    return first(
      await this.sql(`SELECT ${LOAN_COLUMNS} FROM loans WHERE user_id = $1 AND book_id = $2 AND status = 'borrowed'`, [
        userId,
        bookId,
      ]),
      rowToLoan
    );
  }

  async countActiveForUser(userId: string): Promise<number> {
    const result = await this.sql("SELECT count(*)::int AS n FROM loans WHERE user_id = $1 AND status = 'borrowed'", [userId]);
    return Number(result.rows[0]?.n ?? 0);
  }

  async countForBook(bookId: string): Promise<number> {
    const result = await this.sql("SELECT count(*)::int AS n FROM loans WHERE book_id = $1", [bookId]);
    return Number(result.rows[0]?.n ?? 0);
  }

  async statistics(): Promise<LoanStatistics> {
    const result = await this.sql(`
      SELECT
        count(*)::int AS total,
        count(*) FILTER (WHERE status = 'borrowed')::int AS active,
        count(*) FILTER (WHERE status = 'overdue')::int AS overdue,
        count(*) FILTER (WHERE status = 'returned')::int AS returned
      FROM loans
    `);
    const row: Row = result.rows[0] ?? {};
    return {
      totalLoans: Number(row.total ?? 0),
      activeLoans: Number(row.active ?? 0),
      overdueLoans: Number(row.overdue ?? 0),
      returnedLoans: Number(row.returned ?? 0),
    };
  }

  private values(loan: Loan): unknown[] {
    return [
      loan.id,
      loan.userId,
      loan.bookId,
      loan.loanDate,
      loan.dueDate,
      loan.returnDate,
      loan.status,
      loan.renewalCount,
      loan.maxRenewals,
      loan.issuedBy,
      loan.returnedTo,
      loan.notes,
      loan.fineAmount,
      loan.finePaid,
      loan.createdAt,
      loan.updatedAt,
    ];
  }

  async insert(loan: Loan): Promise<Loan> {
    const result = await this.sql(
      `
      INSERT INTO loans (
        id, user_id, book_id, loan_date, due_date, return_date, status, renewal_count, max_renewals,
        issued_by, returned_to, notes, fine_amount, fine_paid, created_at, updated_at
      ) VALUES ($1,$2,$3,$4::timestamptz,$5::timestamptz,$6::timestamptz,$7,$8,$9,$10,$11,$12,$13,$14,$15::timestamptz,$16::timestamptz)
      RETURNING ${LOAN_COLUMNS}
      `,
      this.values(loan)
    );
    return rowToLoan(result.rows[0]);
  }

  async update(loan: Loan): Promise<Loan> {
    const result = await this.sql(
      `
      UPDATE loans SET
        user_id = $2, book_id = $3, loan_date = $4::timestamptz, due_date = $5::timestamptz,
        return_date = $6::timestamptz, status = $7, renewal_count = $8, max_renewals = $9, issued_by = $10,
        returned_to = $11, notes = $12, fine_amount = $13, fine_paid = $14, created_at = $15::timestamptz,
        updated_at = $16::timestamptz
      WHERE id = $1
      RETURNING ${LOAN_COLUMNS}
      `,
      this.values(loan)
    );
    const updated = first(result, rowToLoan);
    if (!updated) throw notFound("loan", loan.id);
    return updated;
  }
}

class PostgresRatingRepository implements RatingRepository {
  constructor(private readonly sql: Sql) {}

  async get(id: string): Promise<BookRating | null> {
    return first(await this.sql(`SELECT ${RATING_COLUMNS} FROM book_ratings WHERE id = $1`, [id]), rowToRating);
  }

  async findByUserAndBook(userId: string, bookId: string): Promise<BookRating | null> {
    return first(
      await this.sql(`SELECT ${RATING_COLUMNS} FROM book_ratings WHERE user_id = $1 AND book_id = $2`, [userId, bookId]),
      rowToRating
    );
  }

  async list(filter: RatingFilter = {}): Promise<BookRating[]> {
    const q = new SqlFilter();
    if (filter.userId) q.where(`user_id = ${q.param(filter.userId)}`);
    if (filter.bookId) q.where(`book_id = ${q.param(filter.bookId)}`);
    const result = await this.sql(
      `SELECT ${RATING_COLUMNS} FROM book_ratings ${q.whereSql()} ORDER BY created_at DESC ${q.pageSql(filter.limit, filter.offset)}`,
      q.values
    );
    return result.rows.map(rowToRating);
  }

  async insert(rating: BookRating): Promise<BookRating> {
    const result = await this.sql(
      `
      INSERT INTO book_ratings (id, user_id, book_id, rating, review, created_at, updated_at)
      VALUES ($1,$2,$3,$4,$5,$6::timestamptz,$7::timestamptz)
      RETURNING ${RATING_COLUMNS}
      `,
      [rating.id, rating.userId, rating.bookId, rating.rating, rating.review, rating.createdAt, rating.updatedAt]
    );
    return rowToRating(result.rows[0]);
  }

  async update(rating: BookRating): Promise<BookRating> {
    const result = await this.sql(
      `
      UPDATE book_ratings SET rating = $2, review = $3, updated_at = $4::timestamptz
      WHERE id = $1
      RETURNING ${RATING_COLUMNS}
      `,
      [rating.id, rating.rating, rating.review, rating.updatedAt]
    );
    const updated = first(result, rowToRating);
    if (!updated) throw notFound("rating", rating.id);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.sql("DELETE FROM book_ratings WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

const ACTOR_TYPES = ["member", "librarian", "system"] as const;
const SUBJECT_TYPES = ["book", "loan", "user", "rating", "job"] as const;

export class PostgresEventStore implements EventStore {
  constructor(private readonly sql: Sql) {}

  async append(event: Omit<AuditEvent, "id" | "at">): Promise<AuditEvent> {
    const full: AuditEvent = {
      id: crypto.randomUUID(),
      at: new Date().toISOString(),
      ...event,
    };
    await this.sql(
      `
      INSERT INTO library_event_log (id, at, actor_type, actor_id, action, subject_type, subject_id, metadata)
      VALUES ($1,$2::timestamptz,$3,$4,$5,$6,$7,$8::jsonb)
      `,
      [full.id, full.at, full.actorType, full.actorId, full.action, full.subjectType, full.subjectId, JSON.stringify(full.metadata)]
    );
    return full;
  }

  async listRecent(limit: number): Promise<AuditEvent[]> {
    const bounded = Math.max(1, Math.min(limit, 200));
    const result = await this.sql(
      "SELECT id, at, actor_type, actor_id, action, subject_type, subject_id, metadata FROM library_event_log ORDER BY at DESC LIMIT $1",
      [bounded]
    );
    return result.rows.map((row: Row) => ({
      id: String(row.id),
      at: toIso(row.at),
      actorType: oneOf(ACTOR_TYPES, row.actor_type, "library_event_log.actor_type"),
      actorId: String(row.actor_id),
      action: String(row.action),
      subjectType: oneOf(SUBJECT_TYPES, row.subject_type, "library_event_log.subject_type"),
      subjectId: String(row.subject_id),
      metadata: isRecord(row.metadata) ? row.metadata : {},
    }));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createPostgresRepositories(sql: Sql): LibraryRepositories {
  return {
    users: new PostgresUserRepository(sql),
    books: new PostgresBookRepository(sql),
    loans: new PostgresLoanRepository(sql),
    ratings: new PostgresRatingRepository(sql),
    events: new PostgresEventStore(sql),
  };
}

export type PostgresLibraryStoreOptions = {
  lockTimeoutMs?: number;
};

export class PostgresLibraryStore implements LibraryStore {
  readonly kind = "postgres" as const;
  readonly users: UserRepository;
  readonly books: BookRepository;
  readonly loans: LoanRepository;
  readonly ratings: RatingRepository;
  readonly events: EventStore;
  readonly jobRuns: PostgresJobRunStore;
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly pool: Pool,
    options: PostgresLibraryStoreOptions = {}
  ) {
    this.lockTimeoutMs = Math.max(1, Math.floor(options.lockTimeoutMs ?? 2_000));
    const sql = sqlRunner((text, values) => pool.query(text, values));
    const base = createPostgresRepositories(sql);
    this.users = base.users;
    this.books = base.books;
    this.loans = base.loans;
    this.ratings = base.ratings;
    this.events = base.events;
    this.jobRuns = new PostgresJobRunStore(sql);
  }

  async transaction<T>(work: (tx: LibraryTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const sql = sqlRunner((text, values) => client.query(text, values));
    const lock = async <R>(table: string, columns: string, id: string, map: (row: Row) => R, entity: "user" | "book" | "loan") => {
      const row = first(await sql(`SELECT ${columns} FROM ${table} WHERE id = $1 FOR UPDATE`, [id]), map);
      if (!row) throw notFound(entity, id);
      return row;
    };
    const tx: LibraryTransaction = {
      ...createPostgresRepositories(sql),
      lockUser: (id) => lock("users", USER_COLUMNS, id, rowToUser, "user"),
      lockBook: (id) => lock("books", BOOK_COLUMNS, id, rowToBook, "book"),
      lockLoan: (id) => lock("loans", LOAN_COLUMNS, id, rowToLoan, "loan"),
    };

    try {
      await client.query("BEGIN");
      await client.query("SELECT set_config('lock_timeout', $1, true)", [`${this.lockTimeoutMs}ms`]);
      const result = await work(tx);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw translatePgError(error);
    } finally {
      client.release();
    }
  }

  async healthcheck(): Promise<StoreHealth> {
    const result = await checkPgConnection(this.pool);
    return { ok: result.ok, latencyMs: result.latencyMs, ...(result.error ? { error: result.error } : {}) };
  }
}
