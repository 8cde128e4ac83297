/**
 * One-shot timeout handles for the transfer state machine.
 */

export type TimerKind = 'session' | 'control' | 'transfer' | 'healthCheck';

/**
 * Restartable one-shot timer.
 *
 * Clears its own handle before invoking the callback, so a fired timer is
 * no longer armed.
 */
export class TransferTimer {
  private handle: ReturnType<typeof setTimeout> | null = null;

  constructor(
    readonly kind: TimerKind,
    readonly durationMs: number,
    private readonly onElapsed: (timer: TransferTimer) => void
  ) {}

  get armed(): boolean {
    return this.handle !== null;
  }

  /**
   * Arm the timer, restarting it if already armed.
   */
  start(): void {
    this.stop();
    this.handle = setTimeout(() => {
      this.handle = null;
      this.onElapsed(this);
    }, this.durationMs);
  }

  stop(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }
}
