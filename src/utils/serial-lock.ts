/**
 * Runs async critical sections one at a time, in call order.
 *
 * A failing section releases the lock and rejects only its own caller.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await section();
    } finally {
      release();
    }
  }
}
