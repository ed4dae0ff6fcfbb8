export const chunkArray = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  const step = Math.max(1, Math.trunc(size));

  for (let index = 0; index < items.length; index += step) {
    batches.push(items.slice(index, index + step));
  }

  return batches;
};

/**
 * Runs `task` over `items` in groups of `concurrency` and settles every task.
 * Results come back in input order regardless of completion order.
 */
export const settleInGroups = async <T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> => {
  const settled: PromiseSettledResult<R>[] = [];
  let offset = 0;

  for (const group of chunkArray(items, concurrency)) {
    const base = offset;
    const results = await Promise.allSettled(group.map((item, index) => task(item, base + index)));
    settled.push(...results);
    offset += group.length;
  }

  return settled;
};
