import type { Book } from "../library/model";
import { roundCurrency } from "../library/model";
import type { LibraryTransaction } from "../stores/interfaces";

export type RatingSummary = Pick<Book, "averageRating" | "totalRatings">;

export function summarizeRatings(values: number[]): RatingSummary {
  if (values.length === 0) return { averageRating: 0, totalRatings: 0 };
  const total = values.reduce((sum, value) => sum + value, 0);
  return { averageRating: roundCurrency(total / values.length), totalRatings: values.length };
}

/**
 * Recomputes the cached rating fields from the book's current rating rows.
 * Call after the rating write, inside the same transaction, with the book locked.
 */
export async function recomputeAverage(tx: LibraryTransaction, book: Book, at: string): Promise<Book> {
  const ratings = await tx.ratings.list({ bookId: book.id });
  const summary = summarizeRatings(ratings.map((rating) => rating.rating));
  if (summary.averageRating === book.averageRating && summary.totalRatings === book.totalRatings) {
    return book;
  }
  return tx.books.update({ ...book, ...summary, lastUpdated: at });
}
