/**
 * KeyedSerializer - one-at-a-time execution per key
 *
 * Tasks that share a key run strictly in submission order; tasks with
 * different keys run concurrently. Used to give each trip a single writer
 * and each subscription a single in-flight delivery.
 *
 * A failing task rejects its own promise only; the next task for the same
 * key still runs.
 */
export class KeyedSerializer {
  private tails: Map<string, Promise<void>> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    // Drop the entry once nothing else has queued behind this task
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }
}
