import { ConflictError, NotFoundError } from "../errors";
import {
  readerKey,
  type ChallengeRecord,
  type DataStore,
  type EnrollmentWithChallenge,
  type UserChallengeRecord,
} from "../store/types";

/**
 * Challenge catalog and user-initiated participation (start / abandon).
 * Progress itself is only ever written by the progress engine.
 */

type ChallengeServiceOptions = {
  store: DataStore;
  now?: () => Date;
};

export function createChallengeService(opts: ChallengeServiceOptions) {
  const { store } = opts;
  const clock = opts.now ?? (() => new Date());

  async function assertReader(userId: number) {
    const reader = await store.repos.readers.findByUserId(userId);
    if (!reader) throw new NotFoundError("User not found");
  }

  async function listCatalog(): Promise<ChallengeRecord[]> {
    return store.repos.challenges.listActive();
  }

  async function listUserChallenges(userId: number): Promise<EnrollmentWithChallenge[]> {
    await assertReader(userId);
    return store.repos.enrollments.listForUser(userId);
  }

  async function startChallenge(userId: number, challengeId: string): Promise<UserChallengeRecord> {
    return store.transaction(readerKey(userId), async (repos) => {
      const reader = await repos.readers.findByUserId(userId);
      if (!reader) throw new NotFoundError("User not found");

      const challenge = await repos.challenges.findById(challengeId);
      if (!challenge || !challenge.isActive) throw new NotFoundError("Challenge not found");

      const existing = await repos.enrollments.find(userId, challengeId);
      if (existing) throw new ConflictError("Already enrolled in this challenge");

      return repos.enrollments.create({
        userId,
        challengeId,
        progress: 0,
        isCompleted: false,
        completedDate: null,
        startedDate: clock(),
      });
    });
  }

  async function abandonChallenge(userId: number, challengeId: string): Promise<void> {
    const removed = await store.transaction(readerKey(userId), (repos) =>
      repos.enrollments.deleteOpen(userId, challengeId)
    );
    if (!removed) throw new NotFoundError("Active challenge not found");
  }

  return { listCatalog, listUserChallenges, startChallenge, abandonChallenge };
}

export type ChallengeService = ReturnType<typeof createChallengeService>;
