import test from "node:test";
import assert from "node:assert/strict";
import { BorrowCoordinator } from "./borrowCoordinator";
import { LoanLifecycle } from "./lifecycle";
import { MemoryLibraryStore } from "../stores/memoryStores";
import { isLibraryError } from "../library/errors";
import { ManualClock, seedBook, seedUser } from "../testing/fixtures";

function setup(options: { lockTimeoutMs?: number; conflictAttempts?: number } = {}) {
  const store = new MemoryLibraryStore({ lockTimeoutMs: options.lockTimeoutMs ?? 1_000 });
  const clock = new ManualClock();
  const lifecycle = new LoanLifecycle(store, { clock: clock.now });
  const coordinator = new BorrowCoordinator(store, lifecycle, {
    conflictAttempts: options.conflictAttempts ?? 3,
    retryBaseDelayMs: 5,
  });
  return { store, coordinator };
}

/** Holds the row lock on `bookId` until the returned release function is called. */
async function holdBookLock(store: MemoryLibraryStore, bookId: string) {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  let locked: () => void = () => {};
  const acquired = new Promise<void>((resolve) => {
    locked = resolve;
  });
  const done = store.transaction(async (tx) => {
    await tx.lockBook(bookId);
    locked();
    await gate;
  });
  await acquired;
  return {
    release: async () => {
      release();
      await done;
    },
  };
}

test("borrow takes one copy and counts the borrow", async () => {
  const { store, coordinator } = setup();
  const member = await seedUser(store);
  const book = await seedBook(store, { totalCopies: 3, availableCopies: 3, timesBorrowed: 7 });

  const { loan, book: after } = await coordinator.borrow(member, book.id);
  assert.equal(loan.userId, member.id);
  assert.equal(after.availableCopies, 2);
  assert.equal(after.timesBorrowed, 8);
  assert.equal((await store.books.get(book.id))?.availableCopies, 2);
});

test("two simultaneous borrows of the last copy produce exactly one loan", async () => {
  const { store, coordinator } = setup();
  const first = await seedUser(store);
  const second = await seedUser(store);
  const book = await seedBook(store, { totalCopies: 1, availableCopies: 1 });

  const outcomes = await Promise.allSettled([coordinator.borrow(first, book.id), coordinator.borrow(second, book.id)]);

  const fulfilled = outcomes.filter((outcome) => outcome.status === "fulfilled");
  const rejected = outcomes.flatMap((outcome) => (outcome.status === "rejected" ? [outcome.reason] : []));
  assert.equal(fulfilled.length, 1);
  assert.equal(rejected.length, 1);
  assert.ok(isLibraryError(rejected[0], "BookUnavailable"));

  const stored = await store.books.get(book.id);
  assert.equal(stored?.availableCopies, 0);
  assert.equal(stored?.status, "borrowed");
  assert.equal(stored?.timesBorrowed, 1);
  assert.equal((await store.loans.list({ bookId: book.id })).length, 1);
});

test("borrow surfaces Conflict once lock retries are exhausted", async () => {
  const { store, coordinator } = setup({ lockTimeoutMs: 20, conflictAttempts: 1 });
  const member = await seedUser(store);
  const book = await seedBook(store);
  const holder = await holdBookLock(store, book.id);

  await assert.rejects(
    coordinator.borrow(member, book.id),
    (error) => isLibraryError(error, "Conflict") && error.retryable
  );
  await holder.release();
  assert.equal((await store.loans.list()).length, 0);
  assert.equal((await store.books.get(book.id))?.availableCopies, 1);
});

test("borrow retries a lock timeout and succeeds once the lock frees up", async () => {
  const { store, coordinator } = setup({ lockTimeoutMs: 40, conflictAttempts: 3 });
  const member = await seedUser(store);
  const book = await seedBook(store);
  const holder = await holdBookLock(store, book.id);
  const released = new Promise<void>((resolve) => {
    setTimeout(() => {
      void holder.release().then(resolve);
    }, 60);
  });

  const { book: after } = await coordinator.borrow(member, book.id);
  await released;
  assert.equal(after.availableCopies, 0);
});

test("borrows of different books do not contend", async () => {
  const { store, coordinator } = setup({ lockTimeoutMs: 20, conflictAttempts: 1 });
  const member = await seedUser(store);
  const busy = await seedBook(store);
  const free = await seedBook(store);
  const holder = await holdBookLock(store, busy.id);

  const { loan } = await coordinator.borrow(member, free.id);
  assert.equal(loan.bookId, free.id);
  await holder.release();
});

test("librarians can lend on behalf of a member; members cannot", async () => {
  const { store, coordinator } = setup();
  const member = await seedUser(store);
  const other = await seedUser(store);
  const librarian = await seedUser(store, { isLibrarian: true });
  const book = await seedBook(store, { totalCopies: 2, availableCopies: 2 });

  const { loan } = await coordinator.borrow(librarian, book.id, { borrowerId: member.id });
  assert.equal(loan.userId, member.id);
  assert.equal(loan.issuedBy, librarian.id);

  await assert.rejects(
    coordinator.borrow(other, book.id, { borrowerId: member.id }),
    (error) => isLibraryError(error, "Forbidden")
  );
  await assert.rejects(
    coordinator.borrow(librarian, book.id, { borrowerId: "ghost" }),
    (error) => isLibraryError(error, "NotFound")
  );
});

test("borrowing a missing book reports NotFound without retrying", async () => {
  const { store, coordinator } = setup();
  const member = await seedUser(store);
  await assert.rejects(coordinator.borrow(member, "missing"), (error) => isLibraryError(error, "NotFound"));
});
