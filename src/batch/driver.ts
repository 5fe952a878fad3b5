export interface BatchOptions<TItem, TOutcome> {
  // 1 runs items strictly one after another.
  concurrency?: number;
  // Outcome recorded for an item whose processor threw.
  sentinel(item: TItem, error: unknown, position: number): TOutcome;
  // Called once per item, in work-list order, whatever order items finish in.
  onOutcome?(outcome: TOutcome, position: number): Promise<void> | void;
}

/**
 * Runs `processor` over every item with per-item failure isolation. Returns the
 * outcomes in work-list order. Only a failing `onOutcome` aborts the batch.
 */
export async function runBatch<TItem, TOutcome>(
  items: readonly TItem[],
  processor: (item: TItem, position: number) => Promise<TOutcome>,
  options: BatchOptions<TItem, TOutcome>
): Promise<TOutcome[]> {
  const concurrency = Math.max(1, Math.min(Math.floor(options.concurrency ?? 1), items.length || 1));
  const settled: Array<{ outcome: TOutcome } | undefined> = new Array(items.length);
  const queue = items.entries();
  let emitted = 0;
  let emission: Promise<void> = Promise.resolve();
  let aborted = false;

  const flush = async (): Promise<void> => {
    for (let slot = settled[emitted]; slot; slot = settled[emitted]) {
      const position = emitted++;
      await options.onOutcome?.(slot.outcome, position);
    }
  };

  const worker = async (): Promise<void> => {
    for (const [position, item] of queue) {
      if (aborted) return;
      let outcome: TOutcome;
      try {
        outcome = await processor(item, position);
      } catch (e) {
        outcome = options.sentinel(item, e, position);
      }
      settled[position] = { outcome };
      emission = emission.then(flush);
      try {
        await emission;
      } catch (e) {
        aborted = true;
        throw e;
      }
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  const outcomes: TOutcome[] = [];
  for (const slot of settled) {
    if (slot) outcomes.push(slot.outcome);
  }
  return outcomes;
}
