import { NotFoundError, ValidationError } from "../errors";
import {
  readerKey,
  type DailyReadingRecord,
  type DataStore,
  type EnrollmentWithChallenge,
  type ReaderRecord,
  type Repositories,
} from "../store/types";
import { dateKeyInTz, shiftDateKey } from "../utils/dateKey";
import { defaultEvaluators, type EvaluatorRegistry } from "./challengeEvaluators";

/**
 * Streak & challenge progress engine.
 *
 * One reading event = one unit of work:
 *   1. add the event to today's ledger row (today = the reader's local day)
 *   2. on the first row of the day, advance the streak and award milestones
 *   3. on the first row of the day, re-evaluate every open enrollment
 * The streak moves at most once per reader per day because only the insert of
 * the ledger row triggers steps 2 and 3.
 */

export const STREAK_MILESTONES: readonly number[] = [3, 7, 14, 30, 90, 365];

export type ReadingEvent = {
  userId: number;
  readingSeconds: number;
  pageCount: number;
};

export type StreakState = Pick<ReaderRecord, "currentStreak" | "longestStreak" | "lastReadingDate">;

export type StreakStep =
  | { kind: "first"; currentStreak: number; longestStreak: number }
  | { kind: "continued"; currentStreak: number; longestStreak: number }
  | { kind: "reset"; currentStreak: number; longestStreak: number }
  | { kind: "same_day" };

export type ReadingOutcome = {
  readingDate: string;
  newReadingDay: boolean;
  streakAdvanced: boolean;
  streak: StreakState;
  ledger: DailyReadingRecord;
  awarded: EnrollmentWithChallenge[]; // milestone awards created by this event
  completed: EnrollmentWithChallenge[]; // opted-in enrollments completed by this event
};

type ProgressEngineOptions = {
  store: DataStore;
  evaluators?: EvaluatorRegistry;
  now?: () => Date;
};

/**
 * Pure streak transition for a new reading day. `lastReadingDate` is compared
 * by the calendar day it falls on in `timezone`.
 */
export function nextStreak(state: StreakState, today: string, timezone: string): StreakStep {
  const longest = (current: number) => Math.max(state.longestStreak, current);

  if (!state.lastReadingDate) {
    return { kind: "first", currentStreak: 1, longestStreak: longest(1) };
  }

  const lastDay = dateKeyInTz(timezone, state.lastReadingDate);
  if (lastDay === today) return { kind: "same_day" };

  if (lastDay === shiftDateKey(today, -1)) {
    const current = state.currentStreak + 1;
    return { kind: "continued", currentStreak: current, longestStreak: longest(current) };
  }

  return { kind: "reset", currentStreak: 1, longestStreak: longest(1) };
}

function assertCount(value: number, name: string) {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer`);
  }
}

export function createProgressEngine(opts: ProgressEngineOptions) {
  const evaluators = opts.evaluators ?? defaultEvaluators;
  const clock = opts.now ?? (() => new Date());

  async function recordReading(repos: Repositories, event: ReadingEvent, asOfDate: string) {
    return repos.ledger.accumulate(event.userId, asOfDate, event.readingSeconds, event.pageCount);
  }

  async function checkStreakMilestones(
    repos: Repositories,
    reader: ReaderRecord,
    now: Date
  ): Promise<EnrollmentWithChallenge | null> {
    const milestone = reader.currentStreak;
    if (!STREAK_MILESTONES.includes(milestone)) return null;

    // A missing catalog entry is a configuration gap, not a failure of the event.
    const challenge = await repos.challenges.findStreakMilestone(milestone);
    if (!challenge) return null;

    const existing = await repos.enrollments.find(reader.userId, challenge.id);
    if (existing) return null;

    const created = await repos.enrollments.create({
      userId: reader.userId,
      challengeId: challenge.id,
      progress: milestone,
      isCompleted: true,
      completedDate: now,
      startedDate: now,
    });

    console.log(`[ENGINE] user=${reader.userId} reached ${milestone}-day streak, awarded "${challenge.name}"`);
    return { ...created, challenge };
  }

  async function advanceStreak(repos: Repositories, reader: ReaderRecord, today: string, now: Date) {
    const step = nextStreak(reader, today, reader.timezone);
    if (step.kind === "same_day") {
      return { reader, advanced: false, awarded: null };
    }

    const patch = {
      currentStreak: step.currentStreak,
      longestStreak: step.longestStreak,
      lastReadingDate: now,
      streakUpdatedAt: now,
    };
    await repos.readers.updateStreak(reader.userId, patch);

    const updated: ReaderRecord = { ...reader, ...patch };
    const awarded = await checkStreakMilestones(repos, updated, now);

    return { reader: updated, advanced: true, awarded };
  }

  async function refreshChallengeProgress(
    repos: Repositories,
    reader: ReaderRecord,
    today: string,
    now: Date
  ): Promise<EnrollmentWithChallenge[]> {
    const open = await repos.enrollments.listOpen(reader.userId);
    const completed: EnrollmentWithChallenge[] = [];

    for (const enrollment of open) {
      const evaluate = evaluators[enrollment.challenge.type];
      const progress = await evaluate({ reader, enrollment, today, ledger: repos.ledger });
      if (progress === null) continue;

      const isCompleted = progress >= enrollment.challenge.targetValue;
      if (!isCompleted && progress === enrollment.progress) continue;

      const patch = { progress, isCompleted, completedDate: isCompleted ? now : null };
      await repos.enrollments.updateProgress(enrollment.id, patch);

      if (isCompleted) {
        console.log(`[ENGINE] user=${reader.userId} completed "${enrollment.challenge.name}"`);
        completed.push({ ...enrollment, ...patch });
      }
    }

    return completed;
  }

  /** The whole event against `repos`; the caller owns the transaction. */
  async function applyReading(repos: Repositories, event: ReadingEvent): Promise<ReadingOutcome> {
    assertCount(event.readingSeconds, "readingSeconds");
    assertCount(event.pageCount, "pageCount");

    const reader = await repos.readers.findByUserId(event.userId);
    if (!reader) throw new NotFoundError("User not found");

    const now = clock();
    const today = dateKeyInTz(reader.timezone, now);

    const { created } = await recordReading(repos, event, today);

    let current = reader;
    let streakAdvanced = false;
    const awarded: EnrollmentWithChallenge[] = [];
    let completed: EnrollmentWithChallenge[] = [];

    if (created) {
      const advanced = await advanceStreak(repos, reader, today, now);
      current = advanced.reader;
      streakAdvanced = advanced.advanced;
      if (advanced.awarded) awarded.push(advanced.awarded);

      completed = await refreshChallengeProgress(repos, current, today, now);
    }

    const ledger = await repos.ledger.find(event.userId, today);
    if (!ledger) throw new Error(`Ledger row missing after update: user=${event.userId} date=${today}`);

    return {
      readingDate: today,
      newReadingDay: created,
      streakAdvanced,
      streak: {
        currentStreak: current.currentStreak,
        longestStreak: current.longestStreak,
        lastReadingDate: current.lastReadingDate,
      },
      ledger,
      awarded,
      completed,
    };
  }

  /** Records one reading event in its own transaction, serialized per reader. */
  async function handleReadingEvent(event: ReadingEvent): Promise<ReadingOutcome> {
    return opts.store.transaction(readerKey(event.userId), (repos) => applyReading(repos, event));
  }

  return {
    handleReadingEvent,
    applyReading,
    recordReading,
    advanceStreak,
    checkStreakMilestones,
    refreshChallengeProgress,
  };
}

export type ProgressEngine = ReturnType<typeof createProgressEngine>;
