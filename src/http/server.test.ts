import test from "node:test";
import assert from "node:assert/strict";
import http from "node:http";
import type { AddressInfo } from "node:net";
import { startHttpServer } from "./server";
import { MemoryLibraryStore } from "../stores/memoryStores";
import { createLibraryServices, type LibraryServices } from "../library/services";
import { silentLogger } from "../config/logger";
import { ManualClock, T0, daysAfter, seedUser } from "../testing/fixtures";

type Harness = {
  baseUrl: string;
  services: LibraryServices;
  call: (method: string, path: string, options?: { as?: string; body?: unknown; raw?: string; headers?: Record<string, string> }) => Promise<Response>;
};

async function withServer(
  options: Partial<Parameters<typeof startHttpServer>[0]>,
  run: (harness: Harness) => Promise<void>
): Promise<void> {
  const store = new MemoryLibraryStore();
  const clock = new ManualClock();
  const services = createLibraryServices(store, { logger: silentLogger, clock: clock.now, retryBaseDelayMs: 0 });
  await seedUser(store, { email: "librarian@library.test", isLibrarian: true });
  await seedUser(store, { email: "member@library.test" });
  await seedUser(store, { email: "second@library.test" });

  const server = startHttpServer({
    host: "127.0.0.1",
    port: 0,
    logger: silentLogger,
    services,
    verifyAuth: async (authorizationHeader) => {
      const match = authorizationHeader?.match(/^Bearer (.+@library\.test)$/);
      if (!match?.[1]) throw new Error("Missing Authorization header.");
      return { uid: `uid-${match[1]}`, email: match[1] };
    },
    ...options,
  });

  await new Promise<void>((resolve) => server.on("listening", () => resolve()));
  const address = server.address() as AddressInfo;
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const call: Harness["call"] = (method, path, callOptions = {}) => {
    const headers: Record<string, string> = { ...callOptions.headers };
    if (callOptions.as) headers.authorization = `Bearer ${callOptions.as}@library.test`;
    let payload: string | undefined = callOptions.raw;
    if (callOptions.body !== undefined) {
      headers["content-type"] = "application/json";
      payload = JSON.stringify(callOptions.body);
    }
    return fetch(`${baseUrl}${path}`, { method, headers, body: payload });
  };

  try {
    await run({ baseUrl, services, call });
  } finally {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}

type ErrorPayload = { ok: false; code: string; message: string };
type BookPayload = { ok: true; book: { id: string; availableCopies: number; averageRating: number; totalRatings: number; isAvailable: boolean } };
type LoanPayload = { ok: true; loan: { id: string; status: string; dueDate: string; renewalCount: number } };

const NEW_BOOK = {
  title: "Harbour Lights",
  author: "P. Lindqvist",
  isbn: "9780000000001",
  publisher: "Shelfmark Press",
  publicationDate: "2020-01-01",
  genre: "fiction",
  pages: 210,
};

async function createBook(call: Harness["call"], totalCopies = 1): Promise<string> {
  const response = await call("POST", "/api/books", { as: "librarian", body: { ...NEW_BOOK, totalCopies } });
  assert.equal(response.status, 201);
  const payload = (await response.json()) as BookPayload;
  return payload.book.id;
}

test("health endpoint returns ok with security headers", async () => {
  await withServer({}, async ({ call }) => {
    const response = await call("GET", "/healthz");
    const payload = (await response.json()) as { ok: boolean; service: string };
    assert.equal(response.status, 200);
    assert.equal(payload.service, "library-circulation");
    assert.equal(response.headers.get("x-content-type-options"), "nosniff");
    assert.ok(response.headers.get("x-request-id"));
  });
});

test("readyz reports the store health", async () => {
  await withServer({}, async ({ call }) => {
    const response = await call("GET", "/readyz");
    const payload = (await response.json()) as { ok: boolean; checks: { store: { kind: string; ok: boolean } } };
    assert.equal(response.status, 200);
    assert.equal(payload.checks.store.kind, "memory");
    assert.equal(payload.checks.store.ok, true);
  });
});

test("protected endpoints reject missing credentials and unknown identities", async () => {
  await withServer({}, async ({ call }) => {
    const anonymous = await call("GET", "/api/loans");
    assert.equal(anonymous.status, 401);
    assert.deepEqual(await anonymous.json(), {
      ok: false,
      code: "Unauthenticated",
      message: "Missing Authorization header.",
    });

    const ghost = await call("GET", "/api/users/me", { as: "ghost" });
    const payload = (await ghost.json()) as ErrorPayload;
    assert.equal(ghost.status, 401);
    assert.equal(payload.message, "No library account is registered for this identity.");
  });
});

test("only librarians can add books", async () => {
  await withServer({}, async ({ call }) => {
    const denied = await call("POST", "/api/books", { as: "member", body: NEW_BOOK });
    const payload = (await denied.json()) as ErrorPayload;
    assert.equal(denied.status, 403);
    assert.equal(payload.code, "Forbidden");

    const bookId = await createBook(call, 3);
    const fetched = await call("GET", `/api/books/${bookId}`);
    const book = (await fetched.json()) as BookPayload;
    assert.equal(book.book.availableCopies, 3);
    assert.equal(book.book.isAvailable, true);
  });
});

test("invalid bodies are reported as validation failures", async () => {
  await withServer({}, async ({ call }) => {
    const invalid = await call("POST", "/api/books", { as: "librarian", body: { ...NEW_BOOK, pages: 0 } });
    const payload = (await invalid.json()) as ErrorPayload;
    assert.equal(invalid.status, 400);
    assert.equal(payload.code, "ValidationFailed");
    assert.match(payload.message, /^pages: /);

    const malformed = await call("POST", "/api/books", {
      as: "librarian",
      raw: "{",
      headers: { "content-type": "application/json" },
    });
    assert.equal(malformed.status, 400);
    assert.equal(((await malformed.json()) as ErrorPayload).message, "Request body must be valid JSON.");
  });
});

test("borrow and return move the last copy out and back", async () => {
  await withServer({}, async ({ call }) => {
    const bookId = await createBook(call);

    const borrowed = await call("POST", `/api/books/${bookId}/borrow`, { as: "member", body: {} });
    assert.equal(borrowed.status, 201);
    const loan = (await borrowed.json()) as LoanPayload & BookPayload;
    assert.equal(loan.loan.status, "borrowed");
    assert.equal(loan.loan.dueDate, daysAfter(T0, 14));
    assert.equal(loan.book.availableCopies, 0);

    const second = await call("POST", `/api/books/${bookId}/borrow`, { as: "second", body: {} });
    assert.equal(second.status, 400);
    assert.equal(((await second.json()) as ErrorPayload).code, "BookUnavailable");

    const returned = await call("POST", `/api/loans/${loan.loan.id}/return`, { as: "member", body: {} });
    const after = (await returned.json()) as LoanPayload & BookPayload;
    assert.equal(returned.status, 200);
    assert.equal(after.loan.status, "returned");
    assert.equal(after.book.availableCopies, 1);
    assert.equal(after.book.isAvailable, true);
  });
});

test("renew extends the due date by the requested days", async () => {
  await withServer({}, async ({ call }) => {
    const bookId = await createBook(call);
    const borrowed = (await (await call("POST", `/api/books/${bookId}/borrow`, { as: "member", body: {} })).json()) as LoanPayload;

    const renewed = await call("POST", `/api/loans/${borrowed.loan.id}/renew`, { as: "member", body: { days: 7 } });
    const payload = (await renewed.json()) as LoanPayload;
    assert.equal(renewed.status, 200);
    assert.equal(payload.loan.dueDate, daysAfter(T0, 21));
    assert.equal(payload.loan.renewalCount, 1);

    const tooLong = await call("POST", `/api/loans/${borrowed.loan.id}/renew`, { as: "member", body: { days: 45 } });
    assert.equal(tooLong.status, 400);
  });
});

test("other members cannot see someone else's loan", async () => {
  await withServer({}, async ({ call }) => {
    const bookId = await createBook(call);
    const borrowed = (await (await call("POST", `/api/books/${bookId}/borrow`, { as: "member", body: {} })).json()) as LoanPayload;

    const peek = await call("GET", `/api/loans/${borrowed.loan.id}`, { as: "second" });
    assert.equal(peek.status, 403);
    const librarian = await call("GET", `/api/loans/${borrowed.loan.id}`, { as: "librarian" });
    assert.equal(librarian.status, 200);
  });
});

test("rating a book twice replaces the first rating", async () => {
  await withServer({}, async ({ call }) => {
    const bookId = await createBook(call);

    const first = await call("POST", `/api/books/${bookId}/rate`, { as: "member", body: { rating: 4 } });
    assert.equal(first.status, 201);
    assert.equal(((await first.json()) as BookPayload).book.averageRating, 4);

    const second = await call("POST", `/api/books/${bookId}/rate`, { as: "member", body: { rating: 2, review: "Slow middle." } });
    const payload = (await second.json()) as BookPayload;
    assert.equal(second.status, 200);
    assert.equal(payload.book.averageRating, 2);
    assert.equal(payload.book.totalRatings, 1);

    const listed = (await (await call("GET", `/api/books/${bookId}/ratings`)).json()) as { ratings: Array<{ review: string | null }> };
    assert.deepEqual(
      listed.ratings.map((rating) => rating.review),
      ["Slow middle."]
    );
  });
});

test("registration takes the email from the verified identity", async () => {
  await withServer({}, async ({ call }) => {
    const body = { username: "newcomer", firstName: "Nia", lastName: "Okafor" };
    const created = await call("POST", "/api/users", { as: "newcomer", body });
    const payload = (await created.json()) as {
      user: { email: string; isLibrarian: boolean; canBorrowBooks: boolean; fullName: string };
    };
    assert.equal(created.status, 201);
    assert.equal(payload.user.email, "newcomer@library.test");
    assert.equal(payload.user.isLibrarian, false);
    assert.equal(payload.user.canBorrowBooks, true);
    assert.equal(payload.user.fullName, "Nia Okafor");

    const again = await call("POST", "/api/users", { as: "newcomer", body: { ...body, username: "newcomer2" } });
    assert.equal(again.status, 409);
    assert.equal(((await again.json()) as ErrorPayload).code, "AlreadyExists");
  });
});

test("loan statistics are restricted to librarians", async () => {
  await withServer({}, async ({ call }) => {
    const member = await call("GET", "/api/loans/statistics", { as: "member" });
    assert.equal(member.status, 403);
    assert.equal(((await member.json()) as ErrorPayload).message, "Only librarians may view loan statistics.");

    const librarian = await call("GET", "/api/loans/statistics", { as: "librarian" });
    const payload = (await librarian.json()) as { statistics: { totalLoans: number; returnRate: number } };
    assert.equal(librarian.status, 200);
    assert.deepEqual(payload.statistics, {
      totalLoans: 0,
      activeLoans: 0,
      overdueLoans: 0,
      returnedLoans: 0,
      returnRate: 0,
    });
  });
});

function preflight(baseUrl: string, origin: string): Promise<{ status: number; allowOrigin: string | undefined }> {
  return new Promise((resolve, reject) => {
    const request = http.request(`${baseUrl}/api/books`, { method: "OPTIONS", headers: { origin } }, (response) => {
      response.resume();
      const header = response.headers["access-control-allow-origin"];
      resolve({ status: response.statusCode ?? 0, allowOrigin: typeof header === "string" ? header : undefined });
    });
    request.on("error", reject);
    request.end();
  });
}

test("preflight honours the origin allow-list", async () => {
  await withServer({ allowedOrigins: ["https://catalog.library.test"] }, async ({ baseUrl }) => {
    const allowed = await preflight(baseUrl, "https://catalog.library.test");
    assert.equal(allowed.status, 204);
    assert.equal(allowed.allowOrigin, "https://catalog.library.test");

    const denied = await preflight(baseUrl, "https://elsewhere.test");
    assert.equal(denied.status, 403);
    assert.equal(denied.allowOrigin, undefined);
  });
});

test("unknown routes return 404", async () => {
  await withServer({}, async ({ call }) => {
    const response = await call("GET", "/api/nope");
    assert.equal(response.status, 404);
    assert.equal(((await response.json()) as ErrorPayload).code, "NotFound");
  });
});

test("malformed path parameters are rejected as bad requests", async () => {
  await withServer({}, async ({ call }) => {
    const response = await call("GET", "/api/books/%E0%A4%A");
    assert.equal(response.status, 400);
    const payload = (await response.json()) as ErrorPayload;
    assert.equal(payload.code, "ValidationFailed");
    assert.equal(payload.message, "Malformed path parameter.");
  });
});
