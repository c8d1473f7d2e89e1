import { Types } from "mongoose";
import { createKeyedMutex } from "../utils/keyedMutex";
import type {
  BookRecord,
  ChallengeRecord,
  DailyReadingRecord,
  DataStore,
  EnrollmentWithChallenge,
  ReaderRecord,
  ReadingSessionRecord,
  Repositories,
  UserChallengeRecord,
} from "./types";

/**
 * In-process store with the same repository surface as the mongoose one.
 * Used by the tests and for running the API without a database. Nothing is
 * durable; a failed transaction is undone from its journal.
 */

type Tables = {
  readers: Map<number, ReaderRecord>;
  ledger: Map<string, DailyReadingRecord>;
  challenges: Map<string, ChallengeRecord>;
  enrollments: Map<string, UserChallengeRecord>;
  sessions: Map<string, ReadingSessionRecord>;
  books: Map<string, BookRecord>;
};

type Journal = Array<() => void>;

function newId() {
  return new Types.ObjectId().toString();
}

function ledgerKey(userId: number, readingDate: string) {
  return `${userId}:${readingDate}`;
}

function put<K, V>(map: Map<K, V>, key: K, value: V, journal: Journal | null) {
  if (journal) {
    const previous = map.get(key);
    journal.push(() => {
      if (previous === undefined) map.delete(key);
      else map.set(key, previous);
    });
  }
  map.set(key, value);
}

function remove<K, V>(map: Map<K, V>, key: K, journal: Journal | null) {
  const previous = map.get(key);
  if (previous === undefined) return;
  if (journal) journal.push(() => map.set(key, previous));
  map.delete(key);
}

function createRepositories(tables: Tables, journal: Journal | null): Repositories {
  function withChallenge(row: UserChallengeRecord): EnrollmentWithChallenge[] {
    const challenge = tables.challenges.get(row.challengeId);
    return challenge ? [{ ...row, challenge: { ...challenge } }] : [];
  }

  function enrollmentsOf(userId: number) {
    return Array.from(tables.enrollments.values())
      .filter((e) => e.userId === userId)
      .sort((a, b) => a.startedDate.getTime() - b.startedDate.getTime());
  }

  return {
    readers: {
      async findByUserId(userId) {
        const r = tables.readers.get(userId);
        return r ? { ...r } : null;
      },

      async findByUsername(username) {
        const r = Array.from(tables.readers.values()).find((x) => x.username === username);
        return r ? { ...r } : null;
      },

      async create(input) {
        if (tables.readers.has(input.userId)) throw new Error(`Duplicate user ${input.userId}`);
        const record: ReaderRecord = {
          ...input,
          currentStreak: 0,
          longestStreak: 0,
          lastReadingDate: null,
          streakUpdatedAt: null,
          createdAt: new Date(),
        };
        put(tables.readers, input.userId, record, journal);
        return { ...record };
      },

      async updateStreak(userId, patch) {
        const r = tables.readers.get(userId);
        if (!r) return;
        put(tables.readers, userId, { ...r, ...patch }, journal);
      },

      async updateTimezone(userId, timezone) {
        const r = tables.readers.get(userId);
        if (!r) return null;
        const next = { ...r, timezone };
        put(tables.readers, userId, next, journal);
        return { ...next };
      },
    },

    ledger: {
      async accumulate(userId, readingDate, readingSeconds, pageCount) {
        const key = ledgerKey(userId, readingDate);
        const existing = tables.ledger.get(key);

        if (existing) {
          put(
            tables.ledger,
            key,
            {
              ...existing,
              readingSeconds: existing.readingSeconds + readingSeconds,
              pageCount: existing.pageCount + pageCount,
            },
            journal
          );
          return { created: false };
        }

        put(tables.ledger, key, { userId, readingDate, readingSeconds, pageCount }, journal);
        return { created: true };
      },

      async find(userId, readingDate) {
        const row = tables.ledger.get(ledgerKey(userId, readingDate));
        return row ? { ...row } : null;
      },

      async countQualifyingDays(userId, fromDate, toDate) {
        let count = 0;
        for (const row of tables.ledger.values()) {
          if (row.userId !== userId) continue;
          // YYYY-MM-DD keys order the same as the days they name
          if (row.readingDate < fromDate || row.readingDate > toDate) continue;
          if (row.pageCount > 0) count += 1;
        }
        return count;
      },
    },

    challenges: {
      async findById(id) {
        const c = tables.challenges.get(id);
        return c ? { ...c } : null;
      },

      async findByName(name) {
        const c = Array.from(tables.challenges.values()).find((x) => x.name === name);
        return c ? { ...c } : null;
      },

      async listActive() {
        return Array.from(tables.challenges.values())
          .filter((c) => c.isActive)
          .map((c) => ({ ...c }));
      },

      async findStreakMilestone(targetValue) {
        const c = Array.from(tables.challenges.values()).find(
          (x) => x.type === "streak" && x.targetValue === targetValue
        );
        return c ? { ...c } : null;
      },

      async createIfMissing(input) {
        const exists = Array.from(tables.challenges.values()).some((c) => c.name === input.name);
        if (exists) return false;
        const id = newId();
        put(tables.challenges, id, { ...input, id, createdAt: new Date() }, journal);
        return true;
      },
    },

    enrollments: {
      async find(userId, challengeId) {
        const e = Array.from(tables.enrollments.values()).find(
          (x) => x.userId === userId && x.challengeId === challengeId
        );
        return e ? { ...e } : null;
      },

      async create(input) {
        const duplicate = Array.from(tables.enrollments.values()).some(
          (x) => x.userId === input.userId && x.challengeId === input.challengeId
        );
        if (duplicate) throw new Error(`Duplicate enrollment ${input.userId}/${input.challengeId}`);
        const record: UserChallengeRecord = { ...input, id: newId() };
        put(tables.enrollments, record.id, record, journal);
        return { ...record };
      },

      async listOpen(userId) {
        return enrollmentsOf(userId)
          .filter((e) => !e.isCompleted)
          .flatMap(withChallenge);
      },

      async listForUser(userId) {
        return enrollmentsOf(userId).flatMap(withChallenge);
      },

      async updateProgress(id, patch) {
        const e = tables.enrollments.get(id);
        if (!e) return;
        put(tables.enrollments, id, { ...e, ...patch }, journal);
      },

      async deleteOpen(userId, challengeId) {
        const e = Array.from(tables.enrollments.values()).find(
          (x) => x.userId === userId && x.challengeId === challengeId && !x.isCompleted
        );
        if (!e) return false;
        remove(tables.enrollments, e.id, journal);
        return true;
      },
    },

    sessions: {
      async create(input) {
        const record: ReadingSessionRecord = { ...input, id: newId() };
        put(tables.sessions, record.id, record, journal);
        return { ...record };
      },

      async findForUser(userId, sessionId) {
        const s = tables.sessions.get(sessionId);
        return s && s.userId === userId ? { ...s } : null;
      },

      async close(sessionId, patch) {
        const s = tables.sessions.get(sessionId);
        if (!s) return;
        put(tables.sessions, sessionId, { ...s, ...patch }, journal);
      },

      async listForBook(userId, bookId) {
        return Array.from(tables.sessions.values())
          .filter((s) => s.userId === userId && s.bookId === bookId)
          .sort((a, b) => b.sessionDate.getTime() - a.sessionDate.getTime())
          .map((s) => ({ ...s }));
      },

      async totalsForBook(userId, bookId) {
        const rows = Array.from(tables.sessions.values()).filter(
          (s) => s.userId === userId && s.bookId === bookId
        );
        let lastRead: Date | null = null;
        for (const s of rows) {
          if (!lastRead || s.sessionDate > lastRead) lastRead = s.sessionDate;
        }
        return {
          sessionCount: rows.length,
          totalMinutes: rows.reduce((sum, s) => sum + s.durationMinutes, 0),
          totalPages: rows.reduce((sum, s) => sum + s.pagesRead, 0),
          lastRead,
        };
      },
    },

    books: {
      async findById(id) {
        const b = tables.books.get(id);
        return b ? { ...b } : null;
      },

      async create(input) {
        const record: BookRecord = { ...input, id: newId(), createdAt: new Date() };
        put(tables.books, record.id, record, journal);
        return { ...record };
      },
    },
  };
}

export function createMemoryStore(): DataStore {
  const tables: Tables = {
    readers: new Map(),
    ledger: new Map(),
    challenges: new Map(),
    enrollments: new Map(),
    sessions: new Map(),
    books: new Map(),
  };
  const mutex = createKeyedMutex();

  async function transaction<T>(key: string, work: (repos: Repositories) => Promise<T>): Promise<T> {
    return mutex.runExclusive(key, async () => {
      const journal: Journal = [];
      try {
        return await work(createRepositories(tables, journal));
      } catch (err) {
        for (const undo of journal.reverse()) undo();
        throw err;
      }
    });
  }

  return {
    repos: createRepositories(tables, null),
    transaction,
  };
}
