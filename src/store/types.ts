import type { ChallengeType } from "../models/Challenge";

/**
 * Plain records the services work with. The mongoose store maps documents to
 * these; the in-memory store keeps them as-is.
 */

export type ReaderRecord = {
  userId: number;
  username: string;
  timezone: string;
  currentStreak: number;
  longestStreak: number;
  lastReadingDate: Date | null;
  streakUpdatedAt: Date | null;
  createdAt: Date;
};

export type NewReader = {
  userId: number;
  username: string;
  timezone: string;
};

export type StreakPatch = {
  currentStreak: number;
  longestStreak: number;
  lastReadingDate: Date;
  streakUpdatedAt: Date;
};

export type DailyReadingRecord = {
  userId: number;
  readingDate: string; // YYYY-MM-DD
  readingSeconds: number;
  pageCount: number;
};

export type ChallengeRecord = {
  id: string;
  name: string;
  description: string;
  type: ChallengeType;
  targetValue: number;
  rewardPoints: number;
  isActive: boolean;
  createdAt: Date;
};

export type NewChallenge = Omit<ChallengeRecord, "id" | "createdAt">;

export type UserChallengeRecord = {
  id: string;
  userId: number;
  challengeId: string;
  progress: number;
  isCompleted: boolean;
  completedDate: Date | null;
  startedDate: Date;
};

export type NewUserChallenge = Omit<UserChallengeRecord, "id">;

export type EnrollmentWithChallenge = UserChallengeRecord & { challenge: ChallengeRecord };

export type ProgressPatch = {
  progress: number;
  isCompleted: boolean;
  completedDate: Date | null;
};

export type ReadingSessionRecord = {
  id: string;
  userId: number;
  bookId: string;
  startPosition: number;
  pagesRead: number;
  durationMinutes: number;
  sessionDate: Date;
  endedAt: Date | null;
};

export type NewReadingSession = Omit<ReadingSessionRecord, "id">;

export type SessionPatch = {
  pagesRead: number;
  durationMinutes: number;
  endedAt: Date;
};

export type BookSessionTotals = {
  sessionCount: number;
  totalMinutes: number;
  totalPages: number;
  lastRead: Date | null;
};

export type BookRecord = {
  id: string;
  title: string;
  authors: string;
  archiveId: string | null;
  totalChars: number | null;
  createdAt: Date;
};

export type NewBook = Omit<BookRecord, "id" | "createdAt">;

export interface ReaderRepository {
  findByUserId(userId: number): Promise<ReaderRecord | null>;
  findByUsername(username: string): Promise<ReaderRecord | null>;
  create(input: NewReader): Promise<ReaderRecord>;
  updateStreak(userId: number, patch: StreakPatch): Promise<void>;
  updateTimezone(userId: number, timezone: string): Promise<ReaderRecord | null>;
}

export interface LedgerRepository {
  /** Adds to the day's row, creating it when missing. `created` is true only for the insert. */
  accumulate(
    userId: number,
    readingDate: string,
    readingSeconds: number,
    pageCount: number
  ): Promise<{ created: boolean }>;
  find(userId: number, readingDate: string): Promise<DailyReadingRecord | null>;
  /** Rows in the inclusive range with pageCount > 0. */
  countQualifyingDays(userId: number, fromDate: string, toDate: string): Promise<number>;
}

export interface ChallengeRepository {
  findById(id: string): Promise<ChallengeRecord | null>;
  findByName(name: string): Promise<ChallengeRecord | null>;
  listActive(): Promise<ChallengeRecord[]>;
  findStreakMilestone(targetValue: number): Promise<ChallengeRecord | null>;
  /** Inserts unless a challenge with the same name exists. */
  createIfMissing(input: NewChallenge): Promise<boolean>;
}

export interface EnrollmentRepository {
  find(userId: number, challengeId: string): Promise<UserChallengeRecord | null>;
  create(input: NewUserChallenge): Promise<UserChallengeRecord>;
  listOpen(userId: number): Promise<EnrollmentWithChallenge[]>;
  listForUser(userId: number): Promise<EnrollmentWithChallenge[]>;
  updateProgress(id: string, patch: ProgressPatch): Promise<void>;
  /** Removes a not-yet-completed enrollment; false when there was none. */
  deleteOpen(userId: number, challengeId: string): Promise<boolean>;
}

export interface SessionRepository {
  create(input: NewReadingSession): Promise<ReadingSessionRecord>;
  findForUser(userId: number, sessionId: string): Promise<ReadingSessionRecord | null>;
  close(sessionId: string, patch: SessionPatch): Promise<void>;
  listForBook(userId: number, bookId: string): Promise<ReadingSessionRecord[]>;
  totalsForBook(userId: number, bookId: string): Promise<BookSessionTotals>;
}

export interface BookRepository {
  findById(id: string): Promise<BookRecord | null>;
  create(input: NewBook): Promise<BookRecord>;
}

export type Repositories = {
  readers: ReaderRepository;
  ledger: LedgerRepository;
  challenges: ChallengeRepository;
  enrollments: EnrollmentRepository;
  sessions: SessionRepository;
  books: BookRepository;
};

export interface DataStore {
  /** Repositories outside any transaction, for reads and single writes. */
  readonly repos: Repositories;
  /**
   * Runs `work` atomically: every write it makes through `repos` persists, or
   * none does. Work sharing a `key` never overlaps.
   */
  transaction<T>(key: string, work: (repos: Repositories) => Promise<T>): Promise<T>;
}

export function readerKey(userId: number) {
  return `reader:${userId}`;
}
