import type { ChallengeType } from "../models/Challenge";
import type { EnrollmentWithChallenge, LedgerRepository, ReaderRecord } from "../store/types";
import { shiftDateKey } from "../utils/dateKey";

export type EvaluationContext = {
  reader: ReaderRecord; // streak fields already advanced for this event
  enrollment: EnrollmentWithChallenge;
  today: string; // YYYY-MM-DD in the reader's timezone
  ledger: LedgerRepository;
};

/**
 * Computes an enrollment's new progress, or returns null when this challenge
 * type is not driven by reading events. Completion is decided by the engine.
 */
export type ChallengeEvaluator = (ctx: EvaluationContext) => Promise<number | null>;

export type EvaluatorRegistry = Record<ChallengeType, ChallengeEvaluator>;

export const evaluateStreak: ChallengeEvaluator = async ({ reader }) => reader.currentStreak;

// Inclusive window of `days` calendar days ending on `today`
export function consistencyWindow(today: string, days: number) {
  return { from: shiftDateKey(today, -(days - 1)), to: today };
}

export const evaluateConsistency: ChallengeEvaluator = async ({ reader, enrollment, today, ledger }) => {
  const { from, to } = consistencyWindow(today, enrollment.challenge.targetValue);
  return ledger.countQualifyingDays(reader.userId, from, to);
};

// Pages, completion and time challenges have no reading-event trigger yet.
export const notTrackedPerEvent: ChallengeEvaluator = async () => null;

export const defaultEvaluators: EvaluatorRegistry = {
  streak: evaluateStreak,
  consistency: evaluateConsistency,
  pages: notTrackedPerEvent,
  completion: notTrackedPerEvent,
  time: notTrackedPerEvent,
};

export function withEvaluators(overrides: Partial<EvaluatorRegistry>): EvaluatorRegistry {
  return { ...defaultEvaluators, ...overrides };
}
