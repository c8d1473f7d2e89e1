import { ConflictError, NotFoundError, ValidationError } from "../errors";
import type { PositionStore } from "../state/positionStore";
import {
  readerKey,
  type BookRecord,
  type BookSessionTotals,
  type DataStore,
  type ReadingSessionRecord,
} from "../store/types";
import { CHARS_PER_PAGE } from "./book.service";
import type { ProgressEngine, ReadingOutcome } from "./progressEngine";

/**
 * Reading sessions are the main source of reading events: ending a session
 * feeds its pages and duration to the progress engine in the same transaction
 * that closes the session.
 */

export type EndSessionInput = {
  durationMinutes: number;
  finalPosition: number;
  pagesRead?: number; // derived from the position delta when omitted
};

export type BookStats = BookSessionTotals & {
  bookId: string;
  currentPosition: number;
  progressPercentage: number;
};

type ReadingSessionServiceOptions = {
  store: DataStore;
  engine: ProgressEngine;
  positions: PositionStore;
  now?: () => Date;
};

function assertCount(value: number, name: string) {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer`);
  }
}

export function progressPercentage(position: number, totalChars: number | null): number {
  if (!totalChars) return 0;
  const pct = Math.min(100, (position / totalChars) * 100);
  return Math.round(pct * 100) / 100;
}

export function pagesBetween(startPosition: number, endPosition: number): number {
  return Math.floor(Math.max(0, endPosition - startPosition) / CHARS_PER_PAGE);
}

export function createReadingSessionService(opts: ReadingSessionServiceOptions) {
  const { store, engine, positions } = opts;
  const clock = opts.now ?? (() => new Date());

  async function requireBook(bookId: string): Promise<BookRecord> {
    const book = await store.repos.books.findById(bookId);
    if (!book) throw new NotFoundError("Book not found");
    return book;
  }

  async function startSession(userId: number, bookId: string, currentPosition: number) {
    assertCount(currentPosition, "currentPosition");

    const book = await requireBook(bookId);
    const reader = await store.repos.readers.findByUserId(userId);
    if (!reader) throw new NotFoundError("User not found");

    const session = await store.repos.sessions.create({
      userId,
      bookId: book.id,
      startPosition: currentPosition,
      pagesRead: 0,
      durationMinutes: 0,
      sessionDate: clock(),
      endedAt: null,
    });
    await positions.set(userId, book.id, currentPosition);

    return {
      session,
      currentPosition,
      progressPercentage: progressPercentage(currentPosition, book.totalChars),
    };
  }

  async function endSession(
    userId: number,
    sessionId: string,
    input: EndSessionInput
  ): Promise<{ session: ReadingSessionRecord; reading: ReadingOutcome; totals: BookSessionTotals }> {
    assertCount(input.durationMinutes, "durationMinutes");
    assertCount(input.finalPosition, "finalPosition");
    if (input.pagesRead !== undefined) assertCount(input.pagesRead, "pagesRead");

    const result = await store.transaction(readerKey(userId), async (repos) => {
      const session = await repos.sessions.findForUser(userId, sessionId);
      if (!session) throw new NotFoundError("Reading session not found");
      if (session.endedAt) throw new ConflictError("Reading session already ended");

      const pagesRead = input.pagesRead ?? pagesBetween(session.startPosition, input.finalPosition);
      const patch = { pagesRead, durationMinutes: input.durationMinutes, endedAt: clock() };
      await repos.sessions.close(session.id, patch);

      const reading = await engine.applyReading(repos, {
        userId,
        readingSeconds: input.durationMinutes * 60,
        pageCount: pagesRead,
      });
      const totals = await repos.sessions.totalsForBook(userId, session.bookId);

      return { session: { ...session, ...patch }, reading, totals };
    });

    await positions.set(userId, result.session.bookId, input.finalPosition);
    return result;
  }

  async function updatePosition(userId: number, bookId: string, position: number) {
    assertCount(position, "position");
    const book = await requireBook(bookId);
    await positions.set(userId, book.id, position);
    return { currentPosition: position, progressPercentage: progressPercentage(position, book.totalChars) };
  }

  async function getBookStats(userId: number, bookId: string): Promise<BookStats> {
    const book = await requireBook(bookId);
    const currentPosition = (await positions.get(userId, book.id)) ?? 0;
    const totals = await store.repos.sessions.totalsForBook(userId, book.id);

    return {
      bookId: book.id,
      currentPosition,
      progressPercentage: progressPercentage(currentPosition, book.totalChars),
      ...totals,
    };
  }

  async function listSessions(userId: number, bookId: string): Promise<ReadingSessionRecord[]> {
    const book = await requireBook(bookId);
    return store.repos.sessions.listForBook(userId, book.id);
  }

  return { startSession, endSession, updatePosition, getBookStats, listSessions };
}

export type ReadingSessionService = ReturnType<typeof createReadingSessionService>;
