import type { IsoDateString } from "../types/core";

export const BOOK_GENRES = [
  "fiction",
  "non_fiction",
  "mystery",
  "romance",
  "science_fiction",
  "fantasy",
  "biography",
  "history",
  "science",
  "technology",
  "self_help",
  "children",
  "young_adult",
  "poetry",
  "drama",
  "other",
] as const;

export type BookGenre = (typeof BOOK_GENRES)[number];

export const BOOK_STATUSES = ["available", "borrowed", "reserved", "maintenance", "lost", "damaged"] as const;

export type BookStatus = (typeof BOOK_STATUSES)[number];

export const LOAN_STATUSES = ["borrowed", "returned", "overdue", "lost", "damaged"] as const;

export type LoanStatus = (typeof LOAN_STATUSES)[number];

export const RETURN_CONDITIONS = ["good", "damaged", "lost"] as const;

export type ReturnCondition = (typeof RETURN_CONDITIONS)[number];

export type User = {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  phoneNumber: string | null;
  address: string | null;
  dateOfBirth: string | null;
  isLibrarian: boolean;
  isActiveMember: boolean;
  membershipDate: IsoDateString;
};

export type NewUser = Omit<User, "id" | "membershipDate" | "isLibrarian" | "isActiveMember"> & {
  isLibrarian?: boolean;
  isActiveMember?: boolean;
};

export type Book = {
  id: string;
  title: string;
  author: string;
  isbn: string;
  publisher: string;
  publicationDate: string;
  genre: BookGenre;
  pages: number;
  language: string;
  edition: string | null;
  description: string | null;
  shelfLocation: string | null;
  status: BookStatus;
  totalCopies: number;
  availableCopies: number;
  averageRating: number;
  totalRatings: number;
  timesBorrowed: number;
  addedBy: string | null;
  dateAdded: IsoDateString;
  lastUpdated: IsoDateString;
};

export type NewBook = Omit<Book, "id" | "dateAdded" | "lastUpdated">;

export type Loan = {
  id: string;
  userId: string;
  bookId: string;
  loanDate: IsoDateString;
  dueDate: IsoDateString;
  returnDate: IsoDateString | null;
  status: LoanStatus;
  renewalCount: number;
  maxRenewals: number;
  issuedBy: string | null;
  returnedTo: string | null;
  notes: string | null;
  fineAmount: number;
  finePaid: boolean;
  createdAt: IsoDateString;
  updatedAt: IsoDateString;
};

export type NewLoan = Omit<Loan, "id" | "createdAt" | "updatedAt">;

export type BookRating = {
  id: string;
  userId: string;
  bookId: string;
  rating: number;
  review: string | null;
  createdAt: IsoDateString;
  updatedAt: IsoDateString;
};

export type NewBookRating = Omit<BookRating, "id" | "createdAt" | "updatedAt">;

export type LoanPolicy = {
  loanPeriodDays: number;
  maxRenewals: number;
  renewalDays: number;
  maxActiveLoans: number;
  dailyFineRate: number;
};

export const DEFAULT_LOAN_POLICY: LoanPolicy = {
  loanPeriodDays: 14,
  maxRenewals: 2,
  renewalDays: 14,
  maxActiveLoans: 5,
  dailyFineRate: 1,
};

export const DAY_MS = 24 * 60 * 60 * 1000;

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

export function fullName(user: Pick<User, "firstName" | "lastName">): string {
  return `${user.firstName} ${user.lastName}`.trim();
}

export function isBookAvailable(book: Pick<Book, "status" | "availableCopies">): boolean {
  return book.status === "available" && book.availableCopies > 0;
}

export function canBorrowBooks(
  user: Pick<User, "isActiveMember">,
  activeLoansCount: number,
  maxActiveLoans: number = DEFAULT_LOAN_POLICY.maxActiveLoans
): boolean {
  return user.isActiveMember && activeLoansCount < maxActiveLoans;
}
