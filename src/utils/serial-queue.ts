/**
 * Single-writer queue
 *
 * Tasks run one at a time in submission order. A failing task rejects its
 * own promise only; later tasks still run.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled */
  async drain(): Promise<void> {
    await this.tail;
  }

  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
