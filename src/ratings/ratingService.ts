import crypto from "node:crypto";
import type { Clock } from "../types/core";
import { systemClock } from "../types/core";
import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import type { Book, BookRating, User } from "../library/model";
import { LibraryError, notFound } from "../library/errors";
import { actorOf, requireOwnerOrLibrarian } from "../library/actors";
import type { LibraryStore } from "../stores/interfaces";
import { recomputeAverage } from "./aggregator";

export type RatingInput = {
  rating: number;
  review?: string | null;
};

export type RatingWriteResult = {
  rating: BookRating;
  book: Book;
  created: boolean;
};

function assertRatingValue(rating: number): void {
  if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
    throw new LibraryError("ValidationFailed", "rating must be an integer between 1 and 5.", { rating });
  }
}

export class RatingService {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly store: LibraryStore,
    options: { clock?: Clock; logger?: Logger } = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /** Creates the caller's rating for the book, or replaces it if one exists. */
  async rateBook(actor: User, bookId: string, input: RatingInput): Promise<RatingWriteResult> {
    assertRatingValue(input.rating);
    const result = await this.store.transaction(async (tx) => {
      const book = await tx.lockBook(bookId);
      const at = this.clock().toISOString();
      const existing = await tx.ratings.findByUserAndBook(actor.id, bookId);
      const rating = existing
        ? await tx.ratings.update({
            ...existing,
            rating: input.rating,
            review: input.review === undefined ? existing.review : input.review,
            updatedAt: at,
          })
        : await tx.ratings.insert({
            id: crypto.randomUUID(),
            userId: actor.id,
            bookId,
            rating: input.rating,
            review: input.review ?? null,
            createdAt: at,
            updatedAt: at,
          });
      const updatedBook = await recomputeAverage(tx, book, at);
      await tx.events.append({
        ...actorOf(actor),
        action: existing ? "rating.updated" : "rating.created",
        subjectType: "rating",
        subjectId: rating.id,
        metadata: { bookId, rating: rating.rating },
      });
      return { rating, book: updatedBook, created: !existing };
    });
    this.logger.info("book_rated", {
      bookId,
      ratingId: result.rating.id,
      averageRating: result.book.averageRating,
      totalRatings: result.book.totalRatings,
    });
    return result;
  }

  async updateRating(actor: User, ratingId: string, patch: Partial<RatingInput>): Promise<RatingWriteResult> {
    if (patch.rating !== undefined) assertRatingValue(patch.rating);
    const current = await this.store.ratings.get(ratingId);
    if (!current) throw notFound("rating", ratingId);
    requireOwnerOrLibrarian(actor, current.userId, "edit");

    return this.store.transaction(async (tx) => {
      const book = await tx.lockBook(current.bookId);
      const existing = await tx.ratings.get(ratingId);
      if (!existing) throw notFound("rating", ratingId);
      const at = this.clock().toISOString();
      const rating = await tx.ratings.update({
        ...existing,
        rating: patch.rating ?? existing.rating,
        review: patch.review === undefined ? existing.review : patch.review,
        updatedAt: at,
      });
      const updatedBook = await recomputeAverage(tx, book, at);
      await tx.events.append({
        ...actorOf(actor),
        action: "rating.updated",
        subjectType: "rating",
        subjectId: rating.id,
        metadata: { bookId: book.id, rating: rating.rating },
      });
      return { rating, book: updatedBook, created: false };
    });
  }

  async deleteRating(actor: User, ratingId: string): Promise<Book> {
    const current = await this.store.ratings.get(ratingId);
    if (!current) throw notFound("rating", ratingId);
    requireOwnerOrLibrarian(actor, current.userId, "delete");

    return this.store.transaction(async (tx) => {
      const book = await tx.lockBook(current.bookId);
      if (!(await tx.ratings.delete(ratingId))) throw notFound("rating", ratingId);
      const updatedBook = await recomputeAverage(tx, book, this.clock().toISOString());
      await tx.events.append({
        ...actorOf(actor),
        action: "rating.deleted",
        subjectType: "rating",
        subjectId: ratingId,
        metadata: { bookId: book.id },
      });
      return updatedBook;
    });
  }

  async listRatings(bookId: string, page: { limit?: number; offset?: number } = {}): Promise<BookRating[]> {
    if (!(await this.store.books.get(bookId))) throw notFound("book", bookId);
    return this.store.ratings.list({ bookId, ...page });
  }
}
