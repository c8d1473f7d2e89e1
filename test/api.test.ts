import type { Server } from "http";
import jwt from "jsonwebtoken";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/server/app";
import { closeServer, startServer } from "../src/server/startServer";
import { createMemoryPositionStore } from "../src/state/positionStore";
import { createMemoryStore } from "../src/store/memoryStore";
import { addChallenge, createClock } from "./helpers";

const SECRET = "test-secret";

function tokenFor(userId: number) {
  return jwt.sign({ userId }, SECRET);
}

// reads a nested field out of an untyped JSON body
function pick(body: unknown, ...keys: string[]): unknown {
  let current = body;
  for (const key of keys) {
    if (typeof current !== "object" || current === null || !(key in current)) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

describe("HTTP API", () => {
  const store = createMemoryStore();
  const clock = createClock();
  let server: Server;
  let baseUrl = "";

  async function call(method: string, path: string, opts: { userId?: number; body?: unknown; raw?: string } = {}) {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (opts.userId !== undefined) headers.authorization = `Bearer ${tokenFor(opts.userId)}`;
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: opts.raw ?? (opts.body === undefined ? undefined : JSON.stringify(opts.body)),
    });
    const text = await res.text();
    const isJson = (res.headers.get("content-type") ?? "").includes("application/json");
    const body: unknown = isJson ? JSON.parse(text) : text;
    return { status: res.status, body };
  }

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const app = createApp({
      store,
      positions: createMemoryPositionStore(),
      jwtSecret: SECRET,
      defaultTimezone: "UTC",
      now: clock.now,
      logRequests: false,
    });
    server = await startServer(app, 0);
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await closeServer(server);
    vi.restoreAllMocks();
  });

  it("answers the health check without a token", async () => {
    expect(await call("GET", "/health")).toEqual({ status: 200, body: "OK" });
  });

  it("rejects requests without a valid token", async () => {
    expect(await call("GET", "/api/readers/me")).toEqual({ status: 401, body: { error: "Missing token" } });

    const res = await fetch(`${baseUrl}/api/readers/me`, {
      headers: { authorization: `Bearer ${jwt.sign({ userId: 42 }, "other-secret")}` },
    });
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "Invalid token" });
  });

  it("registers a reader and reads the profile back", async () => {
    const created = await call("POST", "/api/readers", { userId: 42, body: { username: "api_reader" } });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ reader: { userId: 42, username: "api_reader", timezone: "UTC" } });

    const again = await call("POST", "/api/readers", { userId: 42, body: { username: "api_reader" } });
    expect(again).toEqual({ status: 409, body: { error: "User already registered" } });

    const me = await call("GET", "/api/readers/me", { userId: 42 });
    expect(me.body).toMatchObject({ reader: { userId: 42, currentStreak: 0 } });
  });

  it("changes the timezone and validates it", async () => {
    const ok = await call("PATCH", "/api/readers/me", { userId: 42, body: { timezone: "Europe/Paris" } });
    expect(ok.body).toMatchObject({ reader: { timezone: "Europe/Paris" } });

    const missing = await call("PATCH", "/api/readers/me", { userId: 42, body: {} });
    expect(missing).toEqual({ status: 400, body: { error: "timezone is required" } });

    const bad = await call("PATCH", "/api/readers/me", { userId: 42, body: { timezone: "Nowhere/Place" } });
    expect(bad).toEqual({ status: 400, body: { error: "Unknown timezone: Nowhere/Place" } });

    await call("PATCH", "/api/readers/me", { userId: 42, body: { timezone: "UTC" } });
  });

  it("records a reading event and reports the streak", async () => {
    const res = await call("POST", "/api/reading/events", {
      userId: 42,
      body: { pagesRead: 3, durationMinutes: 10 },
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      reading: {
        readingDate: "2026-01-01",
        newReadingDay: true,
        streakAdvanced: true,
        streak: { currentStreak: 1, longestStreak: 1 },
        ledger: { readingSeconds: 600, pageCount: 3 },
      },
    });

    const streak = await call("GET", "/api/readers/me/streak", { userId: 42 });
    expect(streak.body).toMatchObject({ streak: { currentStreak: 1, readToday: true, todayKey: "2026-01-01" } });
  });

  it("rejects reading events with negative amounts or from unknown readers", async () => {
    expect(await call("POST", "/api/reading/events", { userId: 42, body: { pagesRead: -2 } })).toEqual({
      status: 400,
      body: { error: "pageCount must be a non-negative integer" },
    });
    expect(await call("POST", "/api/reading/events", { userId: 7, body: { pagesRead: 1 } })).toEqual({
      status: 404,
      body: { error: "User not found" },
    });
  });

  it("rejects fractional amounts instead of rounding them", async () => {
    await call("POST", "/api/readers", { userId: 43, body: { username: "fraction_reader" } });

    expect(await call("POST", "/api/reading/events", { userId: 43, body: { pagesRead: 2.5 } })).toEqual({
      status: 400,
      body: { error: "pageCount must be a non-negative integer" },
    });
    expect(
      await call("POST", "/api/reading/events", { userId: 43, body: { pagesRead: 2, durationMinutes: 1.5 } })
    ).toEqual({
      status: 400,
      body: { error: "readingSeconds must be a non-negative integer" },
    });
    expect(await store.repos.ledger.find(43, "2026-01-01")).toBeNull();
    expect((await store.repos.readers.findByUserId(43))?.currentStreak).toBe(0);

    const book = await call("POST", "/api/books", { userId: 43, body: { title: "Fractions", totalChars: 10.5 } });
    expect(book).toEqual({ status: 400, body: { error: "totalChars must be a non-negative integer" } });
  });

  it("answers an oversized body with 413", async () => {
    const raw = JSON.stringify({ pagesRead: 1, note: "x".repeat(200 * 1024) });

    expect(await call("POST", "/api/reading/events", { userId: 43, raw })).toEqual({
      status: 413,
      body: { error: "Payload too large" },
    });
    expect(await store.repos.ledger.find(43, "2026-01-01")).toBeNull();
  });

  it("starts, lists and abandons challenges", async () => {
    const week = await addChallenge(store, { name: "Week", type: "streak", targetValue: 7 });

    const catalog = await call("GET", "/api/challenges", { userId: 42 });
    expect(pick(catalog.body, "challenges", "0", "name")).toBe("Week");

    const started = await call("POST", `/api/challenges/${week.id}/start`, { userId: 42 });
    expect(started.status).toBe(201);
    expect(started.body).toMatchObject({
      message: "Challenge started successfully",
      enrollment: { challengeId: week.id, progress: 0 },
    });

    const twice = await call("POST", `/api/challenges/${week.id}/start`, { userId: 42 });
    expect(twice).toEqual({ status: 409, body: { error: "Already enrolled in this challenge" } });

    const progress = await call("GET", "/api/challenges/progress", { userId: 42 });
    expect(progress.body).toMatchObject({ challenges: [{ challengeId: week.id, challenge: { name: "Week" } }] });

    const abandoned = await call("POST", `/api/challenges/${week.id}/abandon`, { userId: 42 });
    expect(abandoned).toEqual({ status: 200, body: { message: "Challenge abandoned successfully" } });

    expect(await call("POST", "/api/challenges/not-an-id/start", { userId: 42 })).toEqual({
      status: 404,
      body: { error: "Challenge not found" },
    });
  });

  it("runs a reading session against a book", async () => {
    const created = await call("POST", "/api/books", {
      userId: 42,
      body: { title: "Harbor Lights", authors: "B. Author", totalChars: 18000 },
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ book: { title: "Harbor Lights", estimatedPages: 10 } });
    const bookId = String(pick(created.body, "book", "id"));

    const fetched = await call("GET", `/api/books/${bookId}`, { userId: 42 });
    expect(fetched.body).toMatchObject({ book: { id: bookId } });

    const started = await call("POST", `/api/reading/books/${bookId}/sessions`, {
      userId: 42,
      body: { currentPosition: 0 },
    });
    expect(started.status).toBe(201);
    const sessionId = String(pick(started.body, "session", "id"));

    const ended = await call("POST", `/api/reading/sessions/${sessionId}/end`, {
      userId: 42,
      body: { durationMinutes: 20, finalPosition: 3600 },
    });
    expect(ended.status).toBe(200);
    expect(ended.body).toMatchObject({
      success: true,
      session: { pagesRead: 2, durationMinutes: 20 },
      reading: { newReadingDay: false, ledger: { readingSeconds: 1800, pageCount: 5 } },
      totals: { sessionCount: 1, totalMinutes: 20, totalPages: 2 },
    });

    const moved = await call("PUT", `/api/reading/books/${bookId}/position`, { userId: 42, body: { position: 9000 } });
    expect(moved.body).toEqual({ success: true, currentPosition: 9000, progressPercentage: 50 });

    const stats = await call("GET", `/api/reading/books/${bookId}/stats`, { userId: 42 });
    expect(stats.body).toMatchObject({ stats: { bookId, currentPosition: 9000, sessionCount: 1, totalPages: 2 } });

    const sessions = await call("GET", `/api/reading/books/${bookId}/sessions`, { userId: 42 });
    expect(pick(sessions.body, "sessions", "0", "id")).toBe(sessionId);
  });

  it("answers malformed input and unknown routes with JSON errors", async () => {
    expect(await call("POST", "/api/readers", { userId: 42, raw: "{not json" })).toEqual({
      status: 400,
      body: { error: "Invalid JSON" },
    });
    expect(await call("GET", "/api/books/123", { userId: 42 })).toEqual({
      status: 404,
      body: { error: "Book not found" },
    });
    expect(await call("GET", "/api/nothing-here", { userId: 42 })).toEqual({
      status: 404,
      body: { error: "Not found" },
    });
  });
});
