import { LibraryError } from "../library/errors";

type PgErrorFields = {
  code: string;
  message: string;
  constraint?: string;
  detail?: string;
};

export const ACTIVE_LOAN_CONSTRAINT = "loans_one_borrowed_per_user_book";

const CONFLICT_CODES = new Set([
  "55P03", // lock_not_available
  "40001", // serialization_failure
  "40P01", // deadlock_detected
]);

function asPgError(error: unknown): PgErrorFields | null {
  if (!(error instanceof Error)) return null;
  if (!("code" in error) || typeof error.code !== "string") return null;
  const constraint = "constraint" in error && typeof error.constraint === "string" ? error.constraint : undefined;
  const detail = "detail" in error && typeof error.detail === "string" ? error.detail : undefined;
  return { code: error.code, message: error.message, constraint, detail };
}

/** Maps driver errors onto library error codes; anything unrecognized is returned as is. */
export function translatePgError(error: unknown): unknown {
  if (error instanceof LibraryError) return error;
  const pg = asPgError(error);
  if (!pg) return error;
  const meta = { pgCode: pg.code, constraint: pg.constraint ?? null };

  if (CONFLICT_CODES.has(pg.code)) {
    return new LibraryError("Conflict", "The record is locked by another request; try again.", meta);
  }
  switch (pg.code) {
    case "23505":
      if (pg.constraint === ACTIVE_LOAN_CONSTRAINT) {
        return new LibraryError("DuplicateActiveLoan", "This book is already on loan to this user.", meta);
      }
      return new LibraryError("AlreadyExists", "A record with the same unique value already exists.", meta);
    case "23503":
      if (pg.message.startsWith("update or delete")) {
        return new LibraryError("ProtectedRecord", "The record is still referenced by other records.", meta);
      }
      return new LibraryError("NotFound", "A referenced record does not exist.", meta);
    case "23514":
      if (pg.constraint?.startsWith("books_copies")) {
        return new LibraryError("CapacityViolation", "availableCopies must be between 0 and totalCopies.", meta);
      }
      return new LibraryError("ValidationFailed", "A value is outside its allowed range.", meta);
    default:
      return error;
  }
}
