// Runs work for the same key one after another; different keys never wait on each other.
export function createKeyedMutex() {
  const tails = new Map<string, Promise<void>>();

  async function runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = tails.get(key) ?? Promise.resolve();
    const run = previous.then(work);

    // The queue only needs to know when `run` settles; its outcome goes to the caller.
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (tails.get(key) === tail) tails.delete(key);
    }
  }

  function pending() {
    return tails.size;
  }

  return { runExclusive, pending };
}
