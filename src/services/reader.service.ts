import { ConflictError, NotFoundError, ValidationError } from "../errors";
import { readerKey, type DataStore, type ReaderRecord } from "../store/types";
import { dateKeyInTz, isValidTimezone, shiftDateKey } from "../utils/dateKey";

/**
 * Reader profiles and the streak query surface.
 * - Identity comes from the caller (a verified token); this only stores the profile
 * - Does NOT assume any UI (no HTTP req/res objects)
 */

export type RegisterReaderInput = {
  username: string;
  timezone?: string;
};

export type StreakView = {
  currentStreak: number;
  longestStreak: number;
  lastReadingDate: Date | null;
  todayKey: string;
  readToday: boolean;
  // false once a whole calendar day has passed without reading
  isAlive: boolean;
};

type ReaderServiceOptions = {
  store: DataStore;
  defaultTimezone: string;
  now?: () => Date;
};

export function normalizeUsername(input: string): string {
  const v = input.trim();
  if (v.length < 3) throw new ValidationError("Username must be at least 3 characters");
  if (v.length > 30) throw new ValidationError("Username cannot exceed 30 characters");
  if (!/^[a-zA-Z0-9_]+$/.test(v)) {
    throw new ValidationError("Username can only contain letters, numbers, and underscores");
  }
  return v;
}

function assertTimezone(tz: string) {
  if (!isValidTimezone(tz)) throw new ValidationError(`Unknown timezone: ${tz}`);
}

export function createReaderService(opts: ReaderServiceOptions) {
  const { store } = opts;
  const clock = opts.now ?? (() => new Date());

  async function registerReader(userId: number, input: RegisterReaderInput): Promise<ReaderRecord> {
    const username = normalizeUsername(input.username);
    const timezone = input.timezone?.trim() || opts.defaultTimezone;
    assertTimezone(timezone);

    return store.transaction(readerKey(userId), async (repos) => {
      if (await repos.readers.findByUserId(userId)) throw new ConflictError("User already registered");
      if (await repos.readers.findByUsername(username)) throw new ConflictError("Username already taken");
      return repos.readers.create({ userId, username, timezone });
    });
  }

  async function getReader(userId: number): Promise<ReaderRecord> {
    const reader = await store.repos.readers.findByUserId(userId);
    if (!reader) throw new NotFoundError("User not found");
    return reader;
  }

  async function updateTimezone(userId: number, timezone: string): Promise<ReaderRecord> {
    const tz = timezone.trim();
    assertTimezone(tz);

    const updated = await store.transaction(readerKey(userId), (repos) =>
      repos.readers.updateTimezone(userId, tz)
    );
    if (!updated) throw new NotFoundError("User not found");
    return updated;
  }

  async function getStreak(userId: number): Promise<StreakView> {
    const reader = await getReader(userId);
    const todayKey = dateKeyInTz(reader.timezone, clock());
    const lastKey = reader.lastReadingDate ? dateKeyInTz(reader.timezone, reader.lastReadingDate) : null;
    const readToday = lastKey === todayKey;

    return {
      currentStreak: reader.currentStreak,
      longestStreak: reader.longestStreak,
      lastReadingDate: reader.lastReadingDate,
      todayKey,
      readToday,
      isAlive: readToday || lastKey === shiftDateKey(todayKey, -1),
    };
  }

  return { registerReader, getReader, updateTimezone, getStreak };
}

export type ReaderService = ReturnType<typeof createReaderService>;
