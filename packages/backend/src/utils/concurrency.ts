export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  if (items.length === 0) {
    return;
  }

  const safeConcurrency = Math.max(1, concurrency);
  let current = 0;
  let failed = false;

  const runners = Array.from({ length: Math.min(safeConcurrency, items.length) }, async () => {
    while (!failed) {
      const index = current;
      current += 1;
      if (index >= items.length) {
        break;
      }

      const item = items[index];
      if (item === undefined) {
        break;
      }
      try {
        await worker(item, index);
      } catch (error) {
        // stop the other runners from picking up new items
        failed = true;
        throw error;
      }
    }
  });

  await Promise.all(runners);
}
