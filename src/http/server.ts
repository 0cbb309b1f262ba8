import http from "node:http";
import { URL } from "node:url";
import crypto from "node:crypto";
import { getAuth } from "firebase-admin/auth";
import { getApps, initializeApp } from "firebase-admin/app";
import type { Logger } from "../config/logger";
import type { User } from "../library/model";
import { LibraryError, httpStatusFor, isLibraryError } from "../library/errors";
import { requireLibrarian } from "../library/actors";
import type { LibraryServices } from "../library/services";
import { describeBook } from "../catalog/bookService";
import {
  BookQuerySchema,
  BorrowBodySchema,
  CreateBookBodySchema,
  FineBodySchema,
  LoanQuerySchema,
  PageQuerySchema,
  ProfileBodySchema,
  RateBodySchema,
  RegisterBodySchema,
  RenewBodySchema,
  ReturnBodySchema,
  UpdateBookBodySchema,
  UpdateRatingBodySchema,
  UserQuerySchema,
  parseRequest,
} from "./requestSchemas";

function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return {
    "x-content-type-options": "nosniff",
    "x-frame-options": "DENY",
    "cache-control": "no-store",
    ...headers,
  };
}

export type AuthPrincipal = {
  uid: string;
  email: string;
};

export type VerifyAuth = (authorizationHeader: string | undefined) => Promise<AuthPrincipal>;

export type RuntimeStatusProvider = () => Record<string, unknown> | Promise<Record<string, unknown>>;

const DEFAULT_MAX_BODY_BYTES = 256 * 1024;

async function readJsonBody(req: http.IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buffer.length;
    if (size > maxBytes) {
      throw new LibraryError("ValidationFailed", "Request body is too large.", { maxBytes });
    }
    chunks.push(buffer);
  }
  if (!chunks.length) return {};
  const raw = Buffer.concat(chunks).toString("utf8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new LibraryError("ValidationFailed", "Request body must be valid JSON.");
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value[0]) return value[0];
  return undefined;
}

function ensureFirebaseAdminForAuth(projectId?: string): void {
  if (getApps().length > 0) return;
  initializeApp(projectId ? { projectId } : undefined);
}

/** Verifies a Firebase ID token from a `Bearer` header; the library account is keyed by its email claim. */
export function createFirebaseAuthVerifier(projectId?: string): VerifyAuth {
  return async (authorizationHeader) => {
    if (!authorizationHeader) {
      throw new Error("Missing Authorization header.");
    }
    const match = authorizationHeader.match(/^Bearer\s+(.+)$/i);
    if (!match || !match[1]) {
      throw new Error("Invalid Authorization header format.");
    }
    ensureFirebaseAdminForAuth(projectId);
    const decoded = await getAuth().verifyIdToken(match[1]);
    if (!decoded.email) {
      throw new Error("Token carries no email claim.");
    }
    return { uid: decoded.uid, email: decoded.email };
  };
}

function queryObject(url: URL): Record<string, string> {
  return Object.fromEntries(url.searchParams);
}

function pathParam(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new LibraryError("ValidationFailed", "Malformed path parameter.", { segment });
  }
}

export function startHttpServer(params: {
  host: string;
  port: number;
  logger: Logger;
  services: LibraryServices;
  allowedOrigins?: string[];
  verifyAuth?: VerifyAuth;
  getRuntimeStatus?: RuntimeStatusProvider;
  maxBodyBytes?: number;
}): http.Server {
  const {
    host,
    port,
    logger,
    services,
    allowedOrigins = [],
    verifyAuth = createFirebaseAuthVerifier(),
    getRuntimeStatus,
    maxBodyBytes = DEFAULT_MAX_BODY_BYTES,
  } = params;
  const { accounts, catalog, lifecycle, borrowing, ratings, store } = services;

  const isOriginAllowed = (origin: string | null): boolean => {
    if (!origin) return true;
    return allowedOrigins.includes(origin);
  };

  const corsHeadersFor = (origin: string | null): Record<string, string> => {
    if (!origin || !isOriginAllowed(origin)) return {};
    return {
      "access-control-allow-origin": origin,
      "access-control-allow-headers": "content-type, authorization",
      "access-control-allow-methods": "GET,POST,PATCH,DELETE,OPTIONS",
      "access-control-max-age": "600",
      vary: "Origin",
    };
  };

  const server = http.createServer(async (req, res) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", `http://${host}:${port}`);
    const originHeader = req.headers.origin ?? null;
    const corsHeaders = corsHeadersFor(originHeader);
    let statusCode = 500;

    const send = (status: number, payload: unknown): void => {
      statusCode = status;
      res.writeHead(status, withSecurityHeaders({ "content-type": "application/json", ...corsHeaders, "x-request-id": requestId }));
      res.end(JSON.stringify(payload));
    };

    const principal = async (): Promise<AuthPrincipal> => {
      try {
        return await verifyAuth(firstHeader(req.headers.authorization));
      } catch (error) {
        throw new LibraryError("Unauthenticated", error instanceof Error ? error.message : String(error));
      }
    };

    const authenticate = async (): Promise<User> => {
      const { email } = await principal();
      const user = await accounts.findByEmail(email);
      if (!user) {
        throw new LibraryError("Unauthenticated", "No library account is registered for this identity.");
      }
      return user;
    };

    const body = () => readJsonBody(req, maxBodyBytes);

    try {
      if (method === "OPTIONS") {
        statusCode = isOriginAllowed(originHeader) ? 204 : 403;
        res.writeHead(statusCode, withSecurityHeaders({ ...corsHeaders, "x-request-id": requestId }));
        res.end();
        return;
      }

      if (method === "GET" && url.pathname === "/healthz") {
        send(200, { ok: true, service: "library-circulation", at: new Date().toISOString() });
        return;
      }

      if (method === "GET" && url.pathname === "/readyz") {
        const health = await store.healthcheck();
        send(health.ok ? 200 : 503, {
          ok: health.ok,
          checks: { store: { kind: store.kind, ...health } },
          at: new Date().toISOString(),
        });
        return;
      }

      // Catalog
      if (method === "GET" && url.pathname === "/api/books") {
        const query = parseRequest(BookQuerySchema, queryObject(url));
        const books = await catalog.listBooks({
          genre: query.genre,
          status: query.status,
          author: query.author,
          search: query.search,
          availableOnly: query.available,
          limit: query.limit ?? 50,
          offset: query.offset,
        });
        send(200, { ok: true, books: books.map(describeBook) });
        return;
      }

      if (method === "POST" && url.pathname === "/api/books") {
        const actor = await authenticate();
        const input = parseRequest(CreateBookBodySchema, await body());
        const book = await catalog.createBook(actor, input);
        send(201, { ok: true, book: describeBook(book) });
        return;
      }

      if (method === "GET" && url.pathname === "/api/books/popular") {
        send(200, { ok: true, books: (await catalog.popularBooks()).map(describeBook) });
        return;
      }

      if (method === "GET" && url.pathname === "/api/books/top-rated") {
        send(200, { ok: true, books: (await catalog.topRatedBooks()).map(describeBook) });
        return;
      }

      const bookMatch = url.pathname.match(/^\/api\/books\/([^/]+)$/);
      if (bookMatch?.[1]) {
        const bookId = pathParam(bookMatch[1]);
        if (method === "GET") {
          send(200, { ok: true, book: describeBook(await catalog.getBook(bookId)) });
          return;
        }
        if (method === "PATCH") {
          const actor = await authenticate();
          const patch = parseRequest(UpdateBookBodySchema, await body());
          send(200, { ok: true, book: describeBook(await catalog.updateBook(actor, bookId, patch)) });
          return;
        }
        if (method === "DELETE") {
          const actor = await authenticate();
          await catalog.deleteBook(actor, bookId);
          send(200, { ok: true, deleted: bookId });
          return;
        }
      }

      const borrowMatch = url.pathname.match(/^\/api\/books\/([^/]+)\/borrow$/);
      if (method === "POST" && borrowMatch?.[1]) {
        const actor = await authenticate();
        const input = parseRequest(BorrowBodySchema, await body());
        const result = await borrowing.borrow(actor, pathParam(borrowMatch[1]), input);
        send(201, { ok: true, loan: lifecycle.view(result.loan), book: describeBook(result.book) });
        return;
      }

      const bookRatingsMatch = url.pathname.match(/^\/api\/books\/([^/]+)\/ratings$/);
      if (method === "GET" && bookRatingsMatch?.[1]) {
        const page = parseRequest(PageQuerySchema, queryObject(url));
        const rows = await ratings.listRatings(pathParam(bookRatingsMatch[1]), page);
        send(200, { ok: true, ratings: rows });
        return;
      }

      const rateMatch = url.pathname.match(/^\/api\/books\/([^/]+)\/rate$/);
      if (method === "POST" && rateMatch?.[1]) {
        const actor = await authenticate();
        const input = parseRequest(RateBodySchema, await body());
        const result = await ratings.rateBook(actor, pathParam(rateMatch[1]), input);
        send(result.created ? 201 : 200, { ok: true, rating: result.rating, book: describeBook(result.book) });
        return;
      }

      // Loans
      if (method === "GET" && url.pathname === "/api/loans") {
        const actor = await authenticate();
        const query = parseRequest(LoanQuerySchema, queryObject(url));
        const loans = await lifecycle.listLoans(actor, {
          userId: query.userId,
          statuses: query.status,
          limit: query.limit ?? 50,
          offset: query.offset,
        });
        send(200, { ok: true, loans });
        return;
      }

      if (method === "GET" && url.pathname === "/api/loans/current") {
        const actor = await authenticate();
        send(200, { ok: true, loans: await lifecycle.currentLoans(actor) });
        return;
      }

      if (method === "GET" && url.pathname === "/api/loans/overdue") {
        const actor = await authenticate();
        send(200, { ok: true, loans: await lifecycle.listOverdue(actor) });
        return;
      }

      if (method === "GET" && url.pathname === "/api/loans/statistics") {
        const actor = await authenticate();
        send(200, { ok: true, statistics: await accounts.loanStatistics(actor) });
        return;
      }

      const loanMatch = url.pathname.match(/^\/api\/loans\/([^/]+)$/);
      if (method === "GET" && loanMatch?.[1]) {
        const actor = await authenticate();
        send(200, { ok: true, loan: await lifecycle.getLoan(actor, pathParam(loanMatch[1])) });
        return;
      }

      const loanActionMatch = url.pathname.match(/^\/api\/loans\/([^/]+)\/(return|renew|fine|fine-paid)$/);
      if (method === "POST" && loanActionMatch?.[1] && loanActionMatch[2]) {
        const actor = await authenticate();
        const loanId = pathParam(loanActionMatch[1]);
        switch (loanActionMatch[2]) {
          case "return": {
            const input = parseRequest(ReturnBodySchema, await body());
            const result = await lifecycle.returnLoan(actor, loanId, input);
            send(200, {
              ok: true,
              loan: lifecycle.view(result.loan),
              book: result.book ? describeBook(result.book) : null,
            });
            return;
          }
          case "renew": {
            const input = parseRequest(RenewBodySchema, await body());
            const loan = await lifecycle.renew(actor, loanId, input.days);
            send(200, { ok: true, loan: lifecycle.view(loan) });
            return;
          }
          case "fine": {
            const input = parseRequest(FineBodySchema, await body());
            const result = await lifecycle.calculateFine(actor, loanId, input.dailyRate);
            send(200, { ok: true, fine: result.fine, loan: lifecycle.view(result.loan) });
            return;
          }
          default: {
            const loan = await lifecycle.settleFine(actor, loanId);
            send(200, { ok: true, loan: lifecycle.view(loan) });
            return;
          }
        }
      }

      // Members
      if (method === "POST" && url.pathname === "/api/users") {
        const identity = await principal();
        const input = parseRequest(RegisterBodySchema, await body());
        const user = await accounts.registerUser({ ...input, email: identity.email });
        send(201, { ok: true, user: await accounts.describeUser(user) });
        return;
      }

      if (url.pathname === "/api/users/me" && (method === "GET" || method === "PATCH")) {
        const actor = await authenticate();
        if (method === "GET") {
          send(200, { ok: true, user: await accounts.describeUser(actor) });
          return;
        }
        const patch = parseRequest(ProfileBodySchema, await body());
        const updated = await accounts.updateProfile(actor, patch);
        send(200, { ok: true, user: await accounts.describeUser(updated) });
        return;
      }

      if (method === "GET" && url.pathname === "/api/users") {
        const actor = await authenticate();
        const query = parseRequest(UserQuerySchema, queryObject(url));
        const users = await accounts.listUsers(actor, { ...query, limit: query.limit ?? 50 });
        send(200, { ok: true, users });
        return;
      }

      const toggleMatch = url.pathname.match(/^\/api\/users\/([^/]+)\/(toggle-librarian|toggle-active)$/);
      if (method === "POST" && toggleMatch?.[1] && toggleMatch[2]) {
        const actor = await authenticate();
        const userId = pathParam(toggleMatch[1]);
        const user =
          toggleMatch[2] === "toggle-librarian"
            ? await accounts.toggleLibrarian(actor, userId)
            : await accounts.toggleActiveMember(actor, userId);
        send(200, { ok: true, user });
        return;
      }

      // Ratings
      const ratingMatch = url.pathname.match(/^\/api\/ratings\/([^/]+)$/);
      if (ratingMatch?.[1] && (method === "PATCH" || method === "DELETE")) {
        const actor = await authenticate();
        const ratingId = pathParam(ratingMatch[1]);
        if (method === "PATCH") {
          const patch = parseRequest(UpdateRatingBodySchema, await body());
          const result = await ratings.updateRating(actor, ratingId, patch);
          send(200, { ok: true, rating: result.rating, book: describeBook(result.book) });
          return;
        }
        const book = await ratings.deleteRating(actor, ratingId);
        send(200, { ok: true, deleted: ratingId, book: describeBook(book) });
        return;
      }

      // Operations
      if (method === "GET" && url.pathname === "/api/events") {
        const actor = await authenticate();
        requireLibrarian(actor, "view the audit log");
        const page = parseRequest(PageQuerySchema, queryObject(url));
        send(200, { ok: true, events: await store.events.listRecent(page.limit ?? 50) });
        return;
      }

      if (method === "GET" && url.pathname === "/api/status") {
        const actor = await authenticate();
        requireLibrarian(actor, "view service status");
        const [health, jobRuns] = await Promise.all([store.healthcheck(), store.jobRuns.listRecentJobRuns(20)]);
        const runtime = getRuntimeStatus ? await getRuntimeStatus() : {};
        send(200, {
          ok: true,
          at: new Date().toISOString(),
          store: { kind: store.kind, ...health },
          jobRuns,
          runtime,
        });
        return;
      }

      send(404, { ok: false, code: "NotFound", message: "Not found" });
    } catch (error) {
      if (isLibraryError(error)) {
        send(httpStatusFor(error.code), { ok: false, code: error.code, message: error.message });
        if (error.code === "Conflict") {
          logger.warn("http_request_conflict", { requestId, method, path: url.pathname, message: error.message });
        }
        return;
      }
      logger.error("http_handler_error", {
        requestId,
        method,
        path: url.pathname,
        message: error instanceof Error ? error.message : String(error),
      });
      send(500, { ok: false, code: "Internal", message: "Internal server error" });
    } finally {
      logger.info("http_request", {
        requestId,
        method,
        path: url.pathname,
        statusCode,
        durationMs: Date.now() - startedAt,
      });
    }
  });

  server.listen(port, host, () => {
    logger.info("http_listening", { host, port });
  });

  return server;
}
