/**
 * Pause, resume and cancellation signals for one asynchronous run.
 *
 * The run loop only suspends in `sleep`, `yield` and `waitForResume`; each
 * of them returns early once the run is cancelled, and the loop checks
 * `cancelled` afterwards. An event that has started always finishes.
 *
 * @example
 * ```typescript
 * const control = new RunControl();
 * control.pause();
 * setTimeout(() => control.resume(), 100);
 * await control.waitForResume(); // resolves after ~100ms
 * ```
 */
export class RunControl {
  private readonly abortController = new AbortController();
  private pausedFlag = false;
  private resumeWaiters: Array<() => void> = [];

  get cancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  get paused(): boolean {
    return this.pausedFlag;
  }

  /**
   * @returns false when the run was already paused or cancelled
   */
  pause(): boolean {
    if (this.pausedFlag || this.cancelled) {
      return false;
    }
    this.pausedFlag = true;
    return true;
  }

  /**
   * @returns false when the run was not paused
   */
  resume(): boolean {
    if (!this.pausedFlag) {
      return false;
    }
    this.pausedFlag = false;
    this.releaseWaiters();
    return true;
  }

  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.pausedFlag = false;
    this.abortController.abort();
    this.releaseWaiters();
  }

  /**
   * Resolve once the run is resumed or cancelled. Resolves immediately when
   * not paused.
   */
  waitForResume(): Promise<void> {
    if (!this.pausedFlag || this.cancelled) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.resumeWaiters.push(resolve);
    });
  }

  /**
   * Wait `ms` milliseconds, or less if the run is cancelled meanwhile.
   */
  sleep(ms: number): Promise<void> {
    const signal = this.abortController.signal;
    if (signal.aborted) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Let the host run pending I/O and timers before continuing.
   */
  yield(): Promise<void> {
    return new Promise<void>((resolve) => setImmediate(() => resolve()));
  }

  private releaseWaiters(): void {
    const waiters = this.resumeWaiters;
    this.resumeWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
