// src/state/positionStore.ts

/**
 * Where a reader currently is inside a book (character offset). UI convenience
 * state only: nothing in the streak or challenge logic reads it, and losing it
 * just puts the reader back at the start of the book.
 */
export interface PositionStore {
  get(userId: number, bookId: string): Promise<number | null>;
  set(userId: number, bookId: string, position: number): Promise<void>;
}

function positionKey(userId: number, bookId: string) {
  return `${userId}_${bookId}`;
}

export function createMemoryPositionStore(): PositionStore {
  const store = new Map<string, number>();

  return {
    async get(userId, bookId) {
      return store.get(positionKey(userId, bookId)) ?? null;
    },

    async set(userId, bookId, position) {
      store.set(positionKey(userId, bookId), position);
    },
  };
}
