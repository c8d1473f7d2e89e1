import mongoose, { ClientSession, Types } from "mongoose";
import { User, UserDoc } from "../models/User";
import { DailyReading } from "../models/DailyReading";
import { Challenge, ChallengeDoc } from "../models/Challenge";
import { UserChallenge, UserChallengeDoc } from "../models/UserChallenge";
import { ReadingSession, ReadingSessionDoc } from "../models/ReadingSession";
import { Book, BookDoc } from "../models/Book";
import { createKeyedMutex } from "../utils/keyedMutex";
import type {
  BookRecord,
  ChallengeRecord,
  DataStore,
  EnrollmentWithChallenge,
  ReaderRecord,
  ReadingSessionRecord,
  Repositories,
  UserChallengeRecord,
} from "./types";

type WithId<T> = T & { _id: Types.ObjectId };

function toReader(doc: UserDoc): ReaderRecord {
  return {
    userId: doc.userId,
    username: doc.username,
    timezone: doc.timezone,
    currentStreak: doc.currentStreak || 0,
    longestStreak: doc.longestStreak || 0,
    lastReadingDate: doc.lastReadingDate ?? null,
    streakUpdatedAt: doc.streakUpdatedAt ?? null,
    createdAt: doc.createdAt,
  };
}

function toChallenge(doc: WithId<ChallengeDoc>): ChallengeRecord {
  return {
    id: String(doc._id),
    name: doc.name,
    description: doc.description || "",
    type: doc.type,
    targetValue: doc.targetValue,
    rewardPoints: doc.rewardPoints || 0,
    isActive: doc.isActive,
    createdAt: doc.createdAt,
  };
}

function toEnrollment(doc: WithId<UserChallengeDoc>): UserChallengeRecord {
  return {
    id: String(doc._id),
    userId: doc.userId,
    challengeId: String(doc.challengeId),
    progress: doc.progress || 0,
    isCompleted: doc.isCompleted,
    completedDate: doc.completedDate ?? null,
    startedDate: doc.startedDate,
  };
}

function toSession(doc: ReadingSessionDoc): ReadingSessionRecord {
  return {
    id: String(doc._id),
    userId: doc.userId,
    bookId: String(doc.bookId),
    startPosition: doc.startPosition || 0,
    pagesRead: doc.pagesRead || 0,
    durationMinutes: doc.durationMinutes || 0,
    sessionDate: doc.sessionDate,
    endedAt: doc.endedAt ?? null,
  };
}

function toBook(doc: WithId<BookDoc>): BookRecord {
  return {
    id: String(doc._id),
    title: doc.title,
    authors: doc.authors || "",
    archiveId: doc.archiveId ?? null,
    totalChars: doc.totalChars ?? null,
    createdAt: doc.createdAt,
  };
}

export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}

/**
 * Repositories bound to an optional session. Every query passes the session
 * through so that writes made inside `transaction()` commit or abort together.
 */
function createRepositories(session: ClientSession | null): Repositories {
  const opts = session ? { session } : {};

  async function joinChallenges(rows: WithId<UserChallengeDoc>[]): Promise<EnrollmentWithChallenge[]> {
    if (rows.length === 0) return [];

    const ids = Array.from(new Set(rows.map((r) => String(r.challengeId))));
    const challenges = await Challenge.find({ _id: { $in: ids } }).session(session).lean();
    const byId = new Map(challenges.map((c) => [String(c._id), toChallenge(c)]));

    return rows.flatMap((r) => {
      const challenge = byId.get(String(r.challengeId));
      return challenge ? [{ ...toEnrollment(r), challenge }] : [];
    });
  }

  return {
    readers: {
      async findByUserId(userId) {
        const doc = await User.findOne({ userId }).session(session).lean();
        return doc ? toReader(doc) : null;
      },

      async findByUsername(username) {
        const doc = await User.findOne({ username }).session(session).lean();
        return doc ? toReader(doc) : null;
      },

      async create(input) {
        const doc = await new User({ ...input, currentStreak: 0, longestStreak: 0 }).save(opts);
        return toReader(doc.toObject());
      },

      async updateStreak(userId, patch) {
        await User.updateOne({ userId }, { $set: patch }, opts);
      },

      async updateTimezone(userId, timezone) {
        const doc = await User.findOneAndUpdate({ userId }, { $set: { timezone } }, { new: true, ...opts }).lean();
        return doc ? toReader(doc) : null;
      },
    },

    ledger: {
      async accumulate(userId, readingDate, readingSeconds, pageCount) {
        // Returns the document as it was before the update: null means this call inserted it.
        const before = await DailyReading.findOneAndUpdate(
          { userId, readingDate },
          { $inc: { readingSeconds, pageCount } },
          { upsert: true, new: false, ...opts }
        ).lean();

        return { created: before === null };
      },

      async find(userId, readingDate) {
        const doc = await DailyReading.findOne({ userId, readingDate }).session(session).lean();
        if (!doc) return null;
        return {
          userId: doc.userId,
          readingDate: doc.readingDate,
          readingSeconds: doc.readingSeconds || 0,
          pageCount: doc.pageCount || 0,
        };
      },

      async countQualifyingDays(userId, fromDate, toDate) {
        return DailyReading.countDocuments({
          userId,
          readingDate: { $gte: fromDate, $lte: toDate },
          pageCount: { $gt: 0 },
        }).session(session);
      },
    },

    challenges: {
      async findById(id) {
        const doc = await Challenge.findById(id).session(session).lean();
        return doc ? toChallenge(doc) : null;
      },

      async findByName(name) {
        const doc = await Challenge.findOne({ name }).session(session).lean();
        return doc ? toChallenge(doc) : null;
      },

      async listActive() {
        const docs = await Challenge.find({ isActive: true })
          .sort({ type: 1, targetValue: 1 })
          .session(session)
          .lean();
        return docs.map(toChallenge);
      },

      async findStreakMilestone(targetValue) {
        const doc = await Challenge.findOne({ type: "streak", targetValue })
          .sort({ createdAt: 1 })
          .session(session)
          .lean();
        return doc ? toChallenge(doc) : null;
      },

      async createIfMissing(input) {
        const { name, ...rest } = input;
        const res = await Challenge.updateOne({ name }, { $setOnInsert: rest }, { upsert: true, ...opts });
        return res.upsertedCount === 1;
      },
    },

    enrollments: {
      async find(userId, challengeId) {
        const doc = await UserChallenge.findOne({ userId, challengeId }).session(session).lean();
        return doc ? toEnrollment(doc) : null;
      },

      async create(input) {
        const doc = await new UserChallenge(input).save(opts);
        return toEnrollment(doc.toObject());
      },

      async listOpen(userId) {
        const rows = await UserChallenge.find({ userId, isCompleted: false })
          .sort({ startedDate: 1 })
          .session(session)
          .lean();
        return joinChallenges(rows);
      },

      async listForUser(userId) {
        const rows = await UserChallenge.find({ userId }).sort({ startedDate: 1 }).session(session).lean();
        return joinChallenges(rows);
      },

      async updateProgress(id, patch) {
        await UserChallenge.updateOne({ _id: id }, { $set: patch }, opts);
      },

      async deleteOpen(userId, challengeId) {
        const res = await UserChallenge.deleteOne({ userId, challengeId, isCompleted: false }, opts);
        return res.deletedCount === 1;
      },
    },

    sessions: {
      async create(input) {
        const doc = await new ReadingSession(input).save(opts);
        return toSession(doc.toObject());
      },

      async findForUser(userId, sessionId) {
        const doc = await ReadingSession.findOne({ _id: sessionId, userId }).session(session).lean();
        return doc ? toSession(doc) : null;
      },

      async close(sessionId, patch) {
        await ReadingSession.updateOne({ _id: sessionId }, { $set: patch }, opts);
      },

      async listForBook(userId, bookId) {
        const docs = await ReadingSession.find({ userId, bookId })
          .sort({ sessionDate: -1 })
          .limit(500)
          .session(session)
          .lean();
        return docs.map(toSession);
      },

      async totalsForBook(userId, bookId) {
        const docs = await ReadingSession.find({ userId, bookId }).session(session).lean();
        let lastRead: Date | null = null;
        for (const s of docs) {
          if (!lastRead || s.sessionDate > lastRead) lastRead = s.sessionDate;
        }
        return {
          sessionCount: docs.length,
          totalMinutes: docs.reduce((sum, s) => sum + (s.durationMinutes || 0), 0),
          totalPages: docs.reduce((sum, s) => sum + (s.pagesRead || 0), 0),
          lastRead,
        };
      },
    },

    books: {
      async findById(id) {
        const doc = await Book.findById(id).session(session).lean();
        return doc ? toBook(doc) : null;
      },

      async create(input) {
        const doc = await new Book(input).save(opts);
        return toBook(doc.toObject());
      },
    },
  };
}

type MongoStoreOptions = {
  maxAttempts?: number; // default 3
};

/**
 * Transactions need a replica set (a single-node one is enough).
 * Concurrent first events of the day for one user can both try to insert the
 * ledger row from different processes; the loser hits the unique index and the
 * whole unit is re-run, at which point it sees the row and only accumulates.
 */
export function createMongoStore(opts: MongoStoreOptions = {}): DataStore {
  const maxAttempts = opts.maxAttempts ?? 3;
  const mutex = createKeyedMutex();

  async function transaction<T>(key: string, work: (repos: Repositories) => Promise<T>): Promise<T> {
    return mutex.runExclusive(key, async () => {
      for (let attempt = 1; ; attempt++) {
        const session = await mongoose.startSession();
        try {
          // withTransaction may invoke the callback more than once; keep the last result
          const results: T[] = [];
          await session.withTransaction(async () => {
            results.push(await work(createRepositories(session)));
          });
          if (results.length === 0) throw new Error(`Transaction ${key} finished without a result`);
          return results[results.length - 1];
        } catch (err) {
          if (isDuplicateKeyError(err) && attempt < maxAttempts) {
            console.warn(`[DB] Duplicate key in ${key}, retrying (attempt ${attempt + 1}/${maxAttempts})`);
            continue;
          }
          throw err;
        } finally {
          await session.endSession();
        }
      }
    });
  }

  return {
    repos: createRepositories(null),
    transaction,
  };
}
