import { createMemoryStore } from "../src/store/memoryStore";
import type { ChallengeRecord, DataStore, NewChallenge } from "../src/store/types";
import { createProgressEngine, type ReadingOutcome } from "../src/services/progressEngine";
import { createReaderService } from "../src/services/reader.service";
import type { EvaluatorRegistry } from "../src/services/challengeEvaluators";

export const DAY_MS = 24 * 60 * 60 * 1000;

// A clock the tests move by hand; starts at noon UTC so whole-day moves never cross midnight.
export function createClock(startIso = "2026-01-01T12:00:00.000Z") {
  let current = new Date(startIso).getTime();

  return {
    now: () => new Date(current),
    set(iso: string) {
      current = new Date(iso).getTime();
    },
    advanceDays(days: number) {
      current += days * DAY_MS;
    },
  };
}

export async function addChallenge(
  store: DataStore,
  input: Partial<NewChallenge> & Pick<NewChallenge, "name" | "type" | "targetValue">
): Promise<ChallengeRecord> {
  await store.repos.challenges.createIfMissing({
    description: "",
    rewardPoints: 0,
    isActive: true,
    ...input,
  });
  const created = await store.repos.challenges.findByName(input.name);
  if (!created) throw new Error(`challenge ${input.name} was not stored`);
  return created;
}

export async function setupEngine(opts: { timezone?: string; evaluators?: EvaluatorRegistry } = {}) {
  const store = createMemoryStore();
  const clock = createClock();
  const engine = createProgressEngine({ store, now: clock.now, evaluators: opts.evaluators });
  const readers = createReaderService({ store, defaultTimezone: "UTC", now: clock.now });

  await readers.registerReader(1, { username: "reader_one", timezone: opts.timezone ?? "UTC" });

  // one event per listed day offset from the clock's current day, in ascending order
  async function readOnDays(offsets: number[], pageCount = 5) {
    const start = clock.now().getTime();
    const outcomes: ReadingOutcome[] = [];
    for (const offset of offsets) {
      clock.set(new Date(start + offset * DAY_MS).toISOString());
      outcomes.push(await engine.handleReadingEvent({ userId: 1, readingSeconds: 600, pageCount }));
    }
    return outcomes;
  }

  return { store, clock, engine, readers, readOnDays };
}
