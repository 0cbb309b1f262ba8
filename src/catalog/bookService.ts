import crypto from "node:crypto";
import type { Clock } from "../types/core";
import { systemClock } from "../types/core";
import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import type { Book, BookGenre, BookStatus, User } from "../library/model";
import { isBookAvailable } from "../library/model";
import { LibraryError, notFound } from "../library/errors";
import { actorOf, requireLibrarian } from "../library/actors";
import { adjustForCapacityChange, assertCopyBounds, reconcileStatus } from "../availability/engine";
import type { BookFilter, LibraryStore } from "../stores/interfaces";

export type BookInput = {
  title: string;
  author: string;
  isbn: string;
  publisher: string;
  publicationDate: string;
  genre: BookGenre;
  pages: number;
  language?: string;
  edition?: string | null;
  description?: string | null;
  shelfLocation?: string | null;
  status?: BookStatus;
  totalCopies?: number;
  availableCopies?: number;
};

export type BookPatch = Partial<BookInput>;

export type BookView = Book & { isAvailable: boolean };

export const FEATURED_LIST_SIZE = 10;

export function describeBook(book: Book): BookView {
  return { ...book, isAvailable: isBookAvailable(book) };
}

function assertCatalogFields(book: Pick<Book, "isbn" | "pages" | "title" | "author">): void {
  if (book.isbn.length !== 10 && book.isbn.length !== 13) {
    throw new LibraryError("ValidationFailed", "isbn must be 10 or 13 characters.", { isbn: book.isbn });
  }
  if (!Number.isInteger(book.pages) || book.pages < 1) {
    throw new LibraryError("ValidationFailed", "pages must be a positive integer.", { pages: book.pages });
  }
  if (!book.title.trim() || !book.author.trim()) {
    throw new LibraryError("ValidationFailed", "title and author are required.");
  }
}

function pick<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

export class BookCatalog {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly store: LibraryStore,
    options: { clock?: Clock; logger?: Logger } = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async createBook(actor: User, input: BookInput): Promise<Book> {
    requireLibrarian(actor, "add books");
    const at = this.clock().toISOString();
    const totalCopies = input.totalCopies ?? 1;
    const draft: Book = {
      id: crypto.randomUUID(),
      title: input.title.trim(),
      author: input.author.trim(),
      isbn: input.isbn.trim(),
      publisher: input.publisher,
      publicationDate: input.publicationDate,
      genre: input.genre,
      pages: input.pages,
      language: input.language ?? "English",
      edition: input.edition ?? null,
      description: input.description ?? null,
      shelfLocation: input.shelfLocation ?? null,
      status: input.status ?? "available",
      totalCopies,
      availableCopies: input.availableCopies ?? totalCopies,
      averageRating: 0,
      totalRatings: 0,
      timesBorrowed: 0,
      addedBy: actor.id,
      dateAdded: at,
      lastUpdated: at,
    };
    assertCatalogFields(draft);
    assertCopyBounds(draft);

    const book = await this.store.transaction(async (tx) => {
      const created = await tx.books.insert(reconcileStatus(draft));
      await tx.events.append({
        ...actorOf(actor),
        action: "book.created",
        subjectType: "book",
        subjectId: created.id,
        metadata: { isbn: created.isbn, totalCopies: created.totalCopies },
      });
      return created;
    });
    this.logger.info("book_created", { bookId: book.id, isbn: book.isbn });
    return book;
  }

  async getBook(id: string): Promise<Book> {
    const book = await this.store.books.get(id);
    if (!book) throw notFound("book", id);
    return book;
  }

  listBooks(filter: BookFilter = {}): Promise<Book[]> {
    return this.store.books.list(filter);
  }

  popularBooks(limit = FEATURED_LIST_SIZE): Promise<Book[]> {
    return this.store.books.list({ borrowedOnly: true, orderBy: "timesBorrowed", limit });
  }

  topRatedBooks(limit = FEATURED_LIST_SIZE): Promise<Book[]> {
    return this.store.books.list({ ratedOnly: true, orderBy: "averageRating", limit });
  }

  /**
   * A new `totalCopies` shifts `availableCopies` by the same delta; an explicit
   * `availableCopies` in the same patch wins over the shifted value.
   */
  async updateBook(actor: User, id: string, patch: BookPatch): Promise<Book> {
    requireLibrarian(actor, "edit books");
    return this.store.transaction(async (tx) => {
      const book = await tx.lockBook(id);
      let next: Book = {
        ...book,
        title: pick(patch.title?.trim(), book.title),
        author: pick(patch.author?.trim(), book.author),
        isbn: pick(patch.isbn?.trim(), book.isbn),
        publisher: pick(patch.publisher, book.publisher),
        publicationDate: pick(patch.publicationDate, book.publicationDate),
        genre: pick(patch.genre, book.genre),
        pages: pick(patch.pages, book.pages),
        language: pick(patch.language, book.language),
        edition: pick(patch.edition, book.edition),
        description: pick(patch.description, book.description),
        shelfLocation: pick(patch.shelfLocation, book.shelfLocation),
        status: pick(patch.status, book.status),
        lastUpdated: this.clock().toISOString(),
      };
      assertCatalogFields(next);
      if (patch.totalCopies !== undefined && patch.totalCopies !== book.totalCopies) {
        next = adjustForCapacityChange(next, book.totalCopies, patch.totalCopies);
      }
      if (patch.availableCopies !== undefined) {
        next = { ...next, availableCopies: patch.availableCopies };
      }
      assertCopyBounds(next);
      const updated = await tx.books.update(reconcileStatus(next));
      await tx.events.append({
        ...actorOf(actor),
        action: "book.updated",
        subjectType: "book",
        subjectId: id,
        metadata: {
          fields: Object.keys(patch),
          totalCopies: updated.totalCopies,
          availableCopies: updated.availableCopies,
          status: updated.status,
        },
      });
      return updated;
    });
  }

  async deleteBook(actor: User, id: string): Promise<void> {
    requireLibrarian(actor, "delete books");
    await this.store.transaction(async (tx) => {
      await tx.lockBook(id);
      const loans = await tx.loans.countForBook(id);
      if (loans > 0) {
        throw new LibraryError("ProtectedRecord", "Books with loan history cannot be deleted.", { bookId: id, loans });
      }
      await tx.books.delete(id);
      await tx.events.append({
        ...actorOf(actor),
        action: "book.deleted",
        subjectType: "book",
        subjectId: id,
        metadata: {},
      });
    });
    this.logger.info("book_deleted", { bookId: id });
  }
}
