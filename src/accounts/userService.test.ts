import test from "node:test";
import assert from "node:assert/strict";
import { AccountService } from "./userService";
import { BorrowCoordinator } from "../loans/borrowCoordinator";
import { LoanLifecycle } from "../loans/lifecycle";
import { MemoryLibraryStore } from "../stores/memoryStores";
import { isLibraryError } from "../library/errors";
import { ManualClock, T0, makeLoan, seedBook, seedUser } from "../testing/fixtures";

function setup() {
  const store = new MemoryLibraryStore();
  const accounts = new AccountService(store, { clock: new ManualClock().now });
  return { store, accounts };
}

test("registerUser normalizes the email and never grants librarian rights", async () => {
  const { accounts } = setup();
  const user = await accounts.registerUser({
    email: "  June.Reader@Library.TEST ",
    username: "june",
    firstName: "June",
    lastName: "Reader",
  });
  assert.equal(user.email, "june.reader@library.test");
  assert.equal(user.isLibrarian, false);
  assert.equal(user.isActiveMember, true);
  assert.equal(user.membershipDate, T0);
  assert.equal(user.phoneNumber, null);
  assert.equal((await accounts.findByEmail("JUNE.READER@library.test"))?.id, user.id);
});

test("registerUser rejects malformed and duplicate identities", async () => {
  const { accounts } = setup();
  const base = { email: "sam@library.test", username: "sam", firstName: "Sam", lastName: "Lee" };
  await accounts.registerUser(base);
  await assert.rejects(accounts.registerUser({ ...base, username: "sam2" }), (error) => isLibraryError(error, "AlreadyExists"));
  await assert.rejects(
    accounts.registerUser({ ...base, email: "not-an-email", username: "sam3" }),
    (error) => isLibraryError(error, "ValidationFailed")
  );
  await assert.rejects(
    accounts.registerUser({ ...base, email: "sam4@library.test", username: "has space" }),
    (error) => isLibraryError(error, "ValidationFailed")
  );
});

test("describeUser reports borrowing eligibility at the loan limit", async () => {
  const { store, accounts } = setup();
  const member = await seedUser(store, { firstName: "Ada", lastName: "Reader" });
  for (let i = 0; i < 4; i += 1) {
    const book = await seedBook(store);
    await store.loans.insert(makeLoan({ userId: member.id, bookId: book.id }));
  }
  const four = await accounts.describeUser(member);
  assert.equal(four.activeLoansCount, 4);
  assert.equal(four.canBorrowBooks, true);
  assert.equal(four.fullName, "Ada Reader");

  const fifth = await seedBook(store);
  await store.loans.insert(makeLoan({ userId: member.id, bookId: fifth.id }));
  const five = await accounts.describeUser(member);
  assert.equal(five.activeLoansCount, 5);
  assert.equal(five.canBorrowBooks, false);
});

test("returning a loan at the limit restores borrowing eligibility", async () => {
  const store = new MemoryLibraryStore();
  const clock = new ManualClock();
  const accounts = new AccountService(store, { clock: clock.now });
  const lifecycle = new LoanLifecycle(store, { clock: clock.now });
  const coordinator = new BorrowCoordinator(store, lifecycle, { retryBaseDelayMs: 5 });
  const member = await seedUser(store);

  const loanIds: string[] = [];
  for (let i = 0; i < 5; i += 1) {
    const book = await seedBook(store);
    loanIds.push((await coordinator.borrow(member, book.id)).loan.id);
  }
  assert.equal((await accounts.describeUser(member)).canBorrowBooks, false);
  const sixth = await seedBook(store);
  await assert.rejects(coordinator.borrow(member, sixth.id), (error) => isLibraryError(error, "BorrowLimitExceeded"));

  await lifecycle.returnLoan(member, loanIds[0]);
  const after = await accounts.describeUser(member);
  assert.equal(after.activeLoansCount, 4);
  assert.equal(after.canBorrowBooks, true);
  const borrowed = await coordinator.borrow(member, sixth.id);
  assert.equal(borrowed.loan.status, "borrowed");
  assert.equal((await accounts.describeUser(member)).canBorrowBooks, false);
});

test("overdue and returned loans do not count as active", async () => {
  const { store, accounts } = setup();
  const member = await seedUser(store);
  const a = await seedBook(store);
  const b = await seedBook(store);
  await store.loans.insert(makeLoan({ userId: member.id, bookId: a.id, status: "overdue" }));
  await store.loans.insert(makeLoan({ userId: member.id, bookId: b.id, status: "returned" }));
  assert.equal((await accounts.describeUser(member)).activeLoansCount, 0);
});

test("updateProfile changes contact fields but not the membership date", async () => {
  const { store, accounts } = setup();
  const member = await seedUser(store, { phoneNumber: "555-0100" });
  const updated = await accounts.updateProfile(member, { lastName: "Writer", address: "12 Shelf Lane" });
  assert.equal(updated.lastName, "Writer");
  assert.equal(updated.address, "12 Shelf Lane");
  assert.equal(updated.phoneNumber, "555-0100");
  assert.equal(updated.membershipDate, member.membershipDate);
});

test("librarians toggle member flags; members cannot", async () => {
  const { store, accounts } = setup();
  const librarian = await seedUser(store, { isLibrarian: true });
  const member = await seedUser(store);

  assert.equal((await accounts.toggleActiveMember(librarian, member.id)).isActiveMember, false);
  assert.equal((await accounts.toggleActiveMember(librarian, member.id)).isActiveMember, true);
  assert.equal((await accounts.toggleLibrarian(librarian, member.id)).isLibrarian, true);
  await assert.rejects(accounts.toggleLibrarian(member, librarian.id), (error) => isLibraryError(error, "Forbidden"));
  await assert.rejects(accounts.toggleActiveMember(librarian, "ghost"), (error) => isLibraryError(error, "NotFound"));
});

test("loanStatistics counts loans by status with a return rate", async () => {
  const { store, accounts } = setup();
  const librarian = await seedUser(store, { isLibrarian: true });
  const member = await seedUser(store);
  const statuses = ["borrowed", "overdue", "returned"] as const;
  for (const status of statuses) {
    const book = await seedBook(store);
    await store.loans.insert(makeLoan({ userId: member.id, bookId: book.id, status }));
  }

  assert.deepEqual(await accounts.loanStatistics(librarian), {
    totalLoans: 3,
    activeLoans: 1,
    overdueLoans: 1,
    returnedLoans: 1,
    returnRate: 33.33,
  });
  await assert.rejects(accounts.loanStatistics(member), (error) => isLibraryError(error, "Forbidden"));
});
