import { z } from "zod";
import { BOOK_GENRES, BOOK_STATUSES, LOAN_STATUSES, RETURN_CONDITIONS } from "../library/model";
import { MAX_RENEWAL_DAYS } from "../loans/lifecycle";
import { LibraryError } from "../library/errors";

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
const IsoDateTime = z.string().refine((value) => Number.isFinite(Date.parse(value)), "expected an ISO timestamp");
const OptionalText = (max: number) => z.string().max(max).nullable().optional();

const BookFields = {
  title: z.string().trim().min(1).max(200),
  author: z.string().trim().min(1).max(200),
  isbn: z.string().trim().min(10).max(13),
  publisher: z.string().trim().min(1).max(200),
  publicationDate: IsoDate,
  genre: z.enum(BOOK_GENRES),
  pages: z.number().int().min(1),
  language: z.string().trim().min(1).max(50).optional(),
  edition: OptionalText(50),
  description: OptionalText(5000),
  shelfLocation: OptionalText(50),
  status: z.enum(BOOK_STATUSES).optional(),
  totalCopies: z.number().int().min(0).optional(),
  availableCopies: z.number().int().min(0).optional(),
};

export const CreateBookBodySchema = z.object(BookFields);

export const UpdateBookBodySchema = z.object(BookFields).partial();

export const BorrowBodySchema = z.object({
  borrowerId: z.string().min(1).optional(),
  dueDate: IsoDateTime.optional(),
  notes: OptionalText(2000),
});

export const RateBodySchema = z.object({
  rating: z.number().int().min(1).max(5),
  review: OptionalText(5000),
});

export const UpdateRatingBodySchema = RateBodySchema.partial();

export const ReturnBodySchema = z.object({
  condition: z.enum(RETURN_CONDITIONS).optional(),
  notes: OptionalText(2000),
});

export const RenewBodySchema = z.object({
  days: z.number().int().min(1).max(MAX_RENEWAL_DAYS).optional(),
});

export const FineBodySchema = z.object({
  dailyRate: z.number().min(0).optional(),
});

export const RegisterBodySchema = z.object({
  username: z.string().trim().min(1).max(150),
  firstName: z.string().trim().min(1).max(150),
  lastName: z.string().trim().min(1).max(150),
  phoneNumber: OptionalText(20),
  address: OptionalText(500),
  dateOfBirth: IsoDate.nullable().optional(),
});

export const ProfileBodySchema = RegisterBodySchema.omit({ username: true }).partial();

const QueryFlag = z
  .enum(["true", "false"])
  .transform((value) => value === "true")
  .optional();

const Paging = {
  limit: z.coerce.number().int().min(1).max(200).optional(),
  offset: z.coerce.number().int().min(0).optional(),
};

export const BookQuerySchema = z.object({
  genre: z.enum(BOOK_GENRES).optional(),
  status: z.enum(BOOK_STATUSES).optional(),
  author: z.string().min(1).optional(),
  search: z.string().min(1).optional(),
  available: QueryFlag,
  ...Paging,
});

export const LoanQuerySchema = z.object({
  userId: z.string().min(1).optional(),
  status: z
    .string()
    .transform((value) => value.split(",").map((part) => part.trim()))
    .pipe(z.array(z.enum(LOAN_STATUSES)))
    .optional(),
  ...Paging,
});

export const UserQuerySchema = z.object({
  isLibrarian: QueryFlag,
  isActiveMember: QueryFlag,
  search: z.string().min(1).optional(),
  ...Paging,
});

export const PageQuerySchema = z.object(Paging);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Parses a request body or query object, reporting every issue as one `ValidationFailed`. */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new LibraryError("ValidationFailed", describeIssues(parsed.error), {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
  }
  return parsed.data;
}
