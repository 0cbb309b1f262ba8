export type LibraryErrorCode =
  | "BorrowLimitExceeded"
  | "BookUnavailable"
  | "DuplicateActiveLoan"
  | "NotRenewable"
  | "InvalidState"
  | "CapacityViolation"
  | "NotFound"
  | "Conflict"
  | "ValidationFailed"
  | "AlreadyExists"
  | "ProtectedRecord"
  | "Forbidden"
  | "Unauthenticated";

export class LibraryError extends Error {
  constructor(
    readonly code: LibraryErrorCode,
    message: string,
    readonly meta: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "LibraryError";
  }

  get retryable(): boolean {
    return this.code === "Conflict";
  }
}

export function isLibraryError(error: unknown, code?: LibraryErrorCode): error is LibraryError {
  if (!(error instanceof LibraryError)) return false;
  return code === undefined || error.code === code;
}

export function notFound(entity: "user" | "book" | "loan" | "rating", id: string): LibraryError {
  return new LibraryError("NotFound", `${entity} ${id} not found.`, { entity, id });
}

const HTTP_STATUS: Record<LibraryErrorCode, number> = {
  BorrowLimitExceeded: 400,
  BookUnavailable: 400,
  DuplicateActiveLoan: 400,
  NotRenewable: 400,
  InvalidState: 400,
  CapacityViolation: 422,
  ValidationFailed: 400,
  NotFound: 404,
  Conflict: 409,
  AlreadyExists: 409,
  ProtectedRecord: 409,
  Forbidden: 403,
  Unauthenticated: 401,
};

export function httpStatusFor(code: LibraryErrorCode): number {
  return HTTP_STATUS[code];
}
