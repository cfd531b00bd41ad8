/**
 * Runs `fn` over `items` with at most `limit` calls pending at once. Items are
 * started in order; a rejection rejects the whole run once in-flight calls settle.
 */
export async function forEachLimited<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<void>
): Promise<void> {
  const width = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;

  const lanes = Array.from({ length: width }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      await fn(items[index], index);
    }
  });

  const results = await Promise.allSettled(lanes);
  const failed = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (failed) throw failed.reason;
}
