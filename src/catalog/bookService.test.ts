import test from "node:test";
import assert from "node:assert/strict";
import { BookCatalog, describeBook, type BookInput } from "./bookService";
import { MemoryLibraryStore } from "../stores/memoryStores";
import { isLibraryError } from "../library/errors";
import { ManualClock, T0, makeLoan, seedBook, seedUser } from "../testing/fixtures";

function setup() {
  const store = new MemoryLibraryStore();
  const catalog = new BookCatalog(store, { clock: new ManualClock().now });
  return { store, catalog };
}

const input: BookInput = {
  title: "  Tidewater Almanac ",
  author: "R. Marsh",
  isbn: "9781234567897",
  publisher: "Lowland Books",
  publicationDate: "2021-09-14",
  genre: "non_fiction",
  pages: 212,
};

test("createBook defaults copies, language and status", async () => {
  const { store, catalog } = setup();
  const librarian = await seedUser(store, { isLibrarian: true });
  const book = await catalog.createBook(librarian, { ...input, totalCopies: 4 });

  assert.equal(book.title, "Tidewater Almanac");
  assert.equal(book.language, "English");
  assert.equal(book.totalCopies, 4);
  assert.equal(book.availableCopies, 4);
  assert.equal(book.status, "available");
  assert.equal(book.addedBy, librarian.id);
  assert.equal(book.dateAdded, T0);
  assert.equal(describeBook(book).isAvailable, true);
});

test("createBook accepts explicit counters within range and reconciles status", async () => {
  const { store, catalog } = setup();
  const librarian = await seedUser(store, { isLibrarian: true });
  const book = await catalog.createBook(librarian, { ...input, totalCopies: 2, availableCopies: 0 });
  assert.equal(book.status, "borrowed");
  await assert.rejects(
    catalog.createBook(librarian, { ...input, isbn: "1234567890", totalCopies: 2, availableCopies: 3 }),
    (error) => isLibraryError(error, "CapacityViolation")
  );
});

test("createBook validates fields and requires a librarian", async () => {
  const { store, catalog } = setup();
  const member = await seedUser(store);
  const librarian = await seedUser(store, { isLibrarian: true });
  await assert.rejects(catalog.createBook(member, input), (error) => isLibraryError(error, "Forbidden"));
  await assert.rejects(
    catalog.createBook(librarian, { ...input, isbn: "12345" }),
    (error) => isLibraryError(error, "ValidationFailed")
  );
  await catalog.createBook(librarian, input);
  await assert.rejects(catalog.createBook(librarian, input), (error) => isLibraryError(error, "AlreadyExists"));
});

test("updateBook shifts available copies with capacity changes", async () => {
  const { store, catalog } = setup();
  const librarian = await seedUser(store, { isLibrarian: true });
  const book = await seedBook(store, { totalCopies: 5, availableCopies: 2 });

  const grown = await catalog.updateBook(librarian, book.id, { totalCopies: 10 });
  assert.equal(grown.availableCopies, 7);
  const shrunk = await catalog.updateBook(librarian, book.id, { totalCopies: 4 });
  assert.equal(shrunk.availableCopies, 1);
  const explicit = await catalog.updateBook(librarian, book.id, { availableCopies: 0, shelfLocation: "B-12" });
  assert.equal(explicit.availableCopies, 0);
  assert.equal(explicit.status, "borrowed");
  assert.equal(explicit.shelfLocation, "B-12");

  await assert.rejects(
    catalog.updateBook(librarian, book.id, { totalCopies: 0 }),
    (error) => isLibraryError(error, "CapacityViolation")
  );
  await assert.rejects(
    catalog.updateBook(librarian, book.id, { availableCopies: 9 }),
    (error) => isLibraryError(error, "CapacityViolation")
  );
  assert.equal((await store.books.get(book.id))?.totalCopies, 4);
});

test("librarian statuses survive copy reconciliation", async () => {
  const { store, catalog } = setup();
  const librarian = await seedUser(store, { isLibrarian: true });
  const book = await seedBook(store, { totalCopies: 3, availableCopies: 3 });
  const held = await catalog.updateBook(librarian, book.id, { status: "maintenance" });
  assert.equal(held.status, "maintenance");
  const changed = await catalog.updateBook(librarian, book.id, { totalCopies: 1 });
  assert.equal(changed.status, "maintenance");
  assert.equal(describeBook(changed).isAvailable, false);
});

test("deleteBook refuses books with loan history", async () => {
  const { store, catalog } = setup();
  const librarian = await seedUser(store, { isLibrarian: true });
  const member = await seedUser(store);
  const lent = await seedBook(store);
  const spare = await seedBook(store);
  await store.loans.insert(makeLoan({ userId: member.id, bookId: lent.id, status: "returned" }));

  await assert.rejects(catalog.deleteBook(librarian, lent.id), (error) => isLibraryError(error, "ProtectedRecord"));
  await catalog.deleteBook(librarian, spare.id);
  await assert.rejects(catalog.getBook(spare.id), (error) => isLibraryError(error, "NotFound"));
  await assert.rejects(catalog.deleteBook(member, lent.id), (error) => isLibraryError(error, "Forbidden"));
});

test("popular and top-rated lists skip untouched books", async () => {
  const { store, catalog } = setup();
  await seedBook(store, { title: "Never Borrowed" });
  await seedBook(store, { title: "Often Borrowed", timesBorrowed: 9 });
  await seedBook(store, { title: "Sometimes Borrowed", timesBorrowed: 2, averageRating: 4.8, totalRatings: 5 });
  await seedBook(store, { title: "Well Liked", averageRating: 3.1, totalRatings: 2 });

  assert.deepEqual(
    (await catalog.popularBooks()).map((book) => book.title),
    ["Often Borrowed", "Sometimes Borrowed"]
  );
  assert.deepEqual(
    (await catalog.topRatedBooks()).map((book) => book.title),
    ["Sometimes Borrowed", "Well Liked"]
  );
});
