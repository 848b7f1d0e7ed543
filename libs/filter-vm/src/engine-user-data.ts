import type { CallbackLogEntry } from '@filter-vm/types';

/**
 * Per-engine host context handed to every callback.
 *
 * Reset at the start of each run; a filter that runs with the callback log
 * enabled finds every callback invocation of that run here, in call order.
 */
export class FilterEngineUserData<THost = undefined> {
  private recording = false;
  private readonly entries: CallbackLogEntry[] = [];

  constructor(
    /** Host state callbacks may read */
    public readonly hostContext: THost | undefined = undefined,
  ) {}

  /**
   * Clear the log and choose whether this run records callbacks.
   */
  reset(withCallbackLog: boolean): void {
    this.recording = withCallbackLog;
    this.entries.length = 0;
  }

  get withCallbackLog(): boolean {
    return this.recording;
  }

  /**
   * Append an entry when recording is enabled.
   */
  record(entry: CallbackLogEntry): void {
    if (this.recording) {
      this.entries.push(entry);
    }
  }

  /**
   * Snapshot of the current run's log.
   */
  get callbacks(): CallbackLogEntry[] {
    return [...this.entries];
  }
}
