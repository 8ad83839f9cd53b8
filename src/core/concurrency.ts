export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Run `task` over `inputs` with at most `limit` tasks in flight. Results come
 * back in input order whatever order tasks finish in. A rejected task is
 * captured as `{ ok: false }` and never stops the others.
 */
export async function mapBounded<T, R>(
  inputs: readonly T[],
  limit: number,
  task: (input: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  const results: Settled<R>[] = new Array(inputs.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < inputs.length) {
      const index = next++;
      try {
        results[index] = { ok: true, value: await task(inputs[index], index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };

  const width = Math.max(1, Math.min(Math.floor(limit) || 1, inputs.length));
  await Promise.all(Array.from({ length: width }, () => worker()));
  return results;
}

export type Limiter = <R>(task: () => Promise<R>) => Promise<R>;

/**
 * Shared slots for work started from several places at once. At most `limit`
 * tasks run at a time across every caller; waiting tasks start in call order.
 */
export function createLimiter(limit: number): Limiter {
  const width = Math.max(1, Math.floor(limit) || 1);
  const waiting: Array<() => void> = [];
  let active = 0;

  const release = (): void => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active--;
    }
  };

  return async <R>(task: () => Promise<R>): Promise<R> => {
    if (active < width) {
      active++;
    } else {
      // The releasing task hands its slot straight over.
      await new Promise<void>((resolve) => waiting.push(resolve));
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}
