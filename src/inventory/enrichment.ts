import pLimit from "p-limit";

export interface ResolveOptions {
  concurrency: number;
}

/**
 * Runs `task` for every item with at most `concurrency` tasks in flight and
 * returns the results in input order. The first rejection rejects the batch
 * and drops the tasks still waiting for a slot.
 */
export async function resolveInOrder<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: ResolveOptions,
): Promise<R[]> {
  const limit = pLimit(Math.max(1, options.concurrency));
  const slots = new Array<R>(items.length);

  try {
    await Promise.all(
      items.map((item, index) =>
        limit(async () => {
          slots[index] = await task(item, index);
        }),
      ),
    );
  } catch (error) {
    // Queued tasks would otherwise keep fetching after the batch has failed.
    limit.clearQueue();
    throw error;
  }

  return slots;
}
