/**
 * Runs the work for one document at a time, in arrival order. Work for
 * different documents is not ordered.
 */
export class DocumentQueue {
  // Tail of each document's queue.
  private readonly pending = new Map<string, Promise<unknown>>();

  async run<T>(uri: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(uri) ?? Promise.resolve();
    // A failed earlier task has already been reported to its own caller.
    const run = previous.catch(() => undefined).then(task);
    this.pending.set(uri, run);

    try {
      return await run;
    } finally {
      if (this.pending.get(uri) === run) {
        this.pending.delete(uri);
      }
    }
  }
}
