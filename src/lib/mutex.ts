/**
 * Async mutual exclusion for per-session state.
 *
 * Callers queue behind a promise chain, so async sections never interleave
 * with each other even though every individual step yields to the event loop.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.holders++;

    try {
      await previous;
      return await section();
    } finally {
      this.holders--;
      release();
    }
  }
}
