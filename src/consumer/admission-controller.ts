/**
 * Admission Controller
 *
 * Tracks how many handlers are in flight against a configured maximum
 * (0 = unbounded). The in-flight counter is the only state shared between
 * concurrently running handlers; every mutation happens synchronously on the
 * event loop, so increments and decrements never interleave.
 */
export class AdmissionController {
  private inFlightCount = 0;

  constructor(
    private readonly maximum: number,
    readonly busyDelayMs: number,
  ) {
    if (!Number.isInteger(maximum) || maximum < 0) {
      throw new Error('Admission maximum must be a non-negative integer');
    }
    if (busyDelayMs < 0) {
      throw new Error('Busy delay cannot be negative');
    }
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  get max(): number {
    return this.maximum;
  }

  isCapped(): boolean {
    return this.maximum > 0;
  }

  isAtCapacity(): boolean {
    return this.isCapped() && this.inFlightCount >= this.maximum;
  }

  /**
   * How many messages may be fetched now. Recomputed from `max - inFlight`
   * before every fetch; never more than requested.
   */
  reserve(requestedMax: number): number {
    if (!this.isCapped()) {
      return requestedMax;
    }
    return Math.min(requestedMax, Math.max(0, this.maximum - this.inFlightCount));
  }

  /**
   * Take one slot for a message about to be dispatched
   */
  tryAcquire(): boolean {
    if (this.isAtCapacity()) {
      return false;
    }
    this.inFlightCount++;
    return true;
  }

  release(n = 1): void {
    this.inFlightCount = Math.max(0, this.inFlightCount - n);
  }
}
