import crypto from "node:crypto";
import type { Clock } from "../types/core";
import { systemClock } from "../types/core";
import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import type { LoanPolicy, NewUser, User } from "../library/model";
import { DEFAULT_LOAN_POLICY, canBorrowBooks, fullName, roundCurrency } from "../library/model";
import { LibraryError, notFound } from "../library/errors";
import { actorOf, requireLibrarian } from "../library/actors";
import type { LibraryStore, LoanStatistics, UserFilter } from "../stores/interfaces";

export type UserView = User & {
  fullName: string;
  activeLoansCount: number;
  canBorrowBooks: boolean;
};

export type RegistrationInput = Pick<NewUser, "email" | "username" | "firstName" | "lastName"> &
  Partial<Pick<NewUser, "phoneNumber" | "address" | "dateOfBirth">>;

export type ProfilePatch = Partial<Pick<User, "firstName" | "lastName" | "phoneNumber" | "address" | "dateOfBirth">>;

export type LoanStatisticsReport = LoanStatistics & {
  /** Percentage of all loans that have been returned, two decimals. */
  returnRate: number;
};

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const USERNAME_PATTERN = /^[\w.@+-]{1,150}$/;

export class AccountService {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly policy: LoanPolicy;

  constructor(
    private readonly store: LibraryStore,
    options: { clock?: Clock; logger?: Logger; policy?: LoanPolicy } = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.policy = options.policy ?? DEFAULT_LOAN_POLICY;
  }

  /** Self-registration; librarian rights are only ever granted through `toggleLibrarian`. */
  async registerUser(input: RegistrationInput): Promise<User> {
    const email = input.email.trim().toLowerCase();
    const username = input.username.trim();
    if (!EMAIL_PATTERN.test(email)) {
      throw new LibraryError("ValidationFailed", "email must be a valid address.", { field: "email" });
    }
    if (!USERNAME_PATTERN.test(username)) {
      throw new LibraryError("ValidationFailed", "username may only contain letters, digits and @/./+/-/_.", {
        field: "username",
      });
    }
    const user = await this.store.transaction(async (tx) => {
      const created = await tx.users.insert({
        id: crypto.randomUUID(),
        email,
        username,
        firstName: input.firstName.trim(),
        lastName: input.lastName.trim(),
        phoneNumber: input.phoneNumber ?? null,
        address: input.address ?? null,
        dateOfBirth: input.dateOfBirth ?? null,
        isLibrarian: false,
        isActiveMember: true,
        membershipDate: this.clock().toISOString(),
      });
      await tx.events.append({
        ...actorOf(created),
        action: "user.registered",
        subjectType: "user",
        subjectId: created.id,
        metadata: { username },
      });
      return created;
    });
    this.logger.info("user_registered", { userId: user.id });
    return user;
  }

  async getUser(id: string): Promise<User> {
    const user = await this.store.users.get(id);
    if (!user) throw notFound("user", id);
    return user;
  }

  findByEmail(email: string): Promise<User | null> {
    return this.store.users.findByEmail(email.trim().toLowerCase());
  }

  async describeUser(user: User): Promise<UserView> {
    const activeLoansCount = await this.store.loans.countActiveForUser(user.id);
    return {
      ...user,
      fullName: fullName(user),
      activeLoansCount,
      canBorrowBooks: canBorrowBooks(user, activeLoansCount, this.policy.maxActiveLoans),
    };
  }

  async listUsers(actor: User, filter: UserFilter = {}): Promise<User[]> {
    requireLibrarian(actor, "list members");
    return this.store.users.list(filter);
  }

  async updateProfile(actor: User, patch: ProfilePatch): Promise<User> {
    return this.store.transaction(async (tx) => {
      const user = await tx.lockUser(actor.id);
      const updated = await tx.users.update({
        ...user,
        firstName: patch.firstName?.trim() ?? user.firstName,
        lastName: patch.lastName?.trim() ?? user.lastName,
        phoneNumber: patch.phoneNumber === undefined ? user.phoneNumber : patch.phoneNumber,
        address: patch.address === undefined ? user.address : patch.address,
        dateOfBirth: patch.dateOfBirth === undefined ? user.dateOfBirth : patch.dateOfBirth,
      });
      await tx.events.append({
        ...actorOf(user),
        action: "user.profile_updated",
        subjectType: "user",
        subjectId: user.id,
        metadata: { fields: Object.keys(patch) },
      });
      return updated;
    });
  }

  toggleLibrarian(actor: User, userId: string): Promise<User> {
    return this.toggle(actor, userId, "isLibrarian");
  }

  toggleActiveMember(actor: User, userId: string): Promise<User> {
    return this.toggle(actor, userId, "isActiveMember");
  }

  private async toggle(actor: User, userId: string, field: "isLibrarian" | "isActiveMember"): Promise<User> {
    requireLibrarian(actor, "change member flags");
    const updated = await this.store.transaction(async (tx) => {
      const user = await tx.lockUser(userId);
      const next = await tx.users.update(
        field === "isLibrarian"
          ? { ...user, isLibrarian: !user.isLibrarian }
          : { ...user, isActiveMember: !user.isActiveMember }
      );
      await tx.events.append({
        ...actorOf(actor),
        action: field === "isLibrarian" ? "user.librarian_toggled" : "user.membership_toggled",
        subjectType: "user",
        subjectId: userId,
        metadata: { [field]: next[field] },
      });
      return next;
    });
    this.logger.info("user_flag_toggled", { userId, field, value: updated[field] });
    return updated;
  }

  async loanStatistics(actor: User): Promise<LoanStatisticsReport> {
    requireLibrarian(actor, "view loan statistics");
    const stats = await this.store.loans.statistics();
    return {
      ...stats,
      returnRate: stats.totalLoans === 0 ? 0 : roundCurrency((stats.returnedLoans / stats.totalLoans) * 100),
    };
  }
}
