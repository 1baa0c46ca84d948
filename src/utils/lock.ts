const locks = new Map<string, Promise<void>>();

/**
 * Run `fn` after every earlier call with the same key has settled.
 */
export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const last = locks.get(key) ?? Promise.resolve();
  const run = last.then(fn);
  const tail = run.then(() => undefined, () => undefined);
  locks.set(key, tail);
  try {
    return await run;
  } finally {
    if (locks.get(key) === tail) locks.delete(key);
  }
}

export function pendingLocks(): number {
  return locks.size;
}
