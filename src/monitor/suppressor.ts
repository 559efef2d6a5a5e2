/**
 * Short-lived allow-list for the engine's own writes
 */

/**
 * Default suppression window. Long enough to swallow the notification for
 * a file the engine has just written, short enough that a real edit made
 * right after a rollback is still recorded.
 */
export const DEFAULT_SUPPRESSION_MS = 3000;

/**
 * Tracks root-relative paths whose filesystem events should be dropped
 * until an expiry time. Expired entries are pruned lazily on lookup.
 *
 * Best-effort only: a missed suppression produces a spurious change
 * record, never a lost file.
 */
export class EventSuppressor {
  private readonly expiries = new Map<string, number>();

  constructor(
    private readonly defaultDurationMs: number = DEFAULT_SUPPRESSION_MS,
    private readonly clock: () => number = () => performance.now(),
  ) {}

  /**
   * Drop events for `relativePath` for the next `durationMs`
   */
  suppress(relativePath: string, durationMs: number = this.defaultDurationMs): void {
    this.expiries.set(relativePath, this.clock() + durationMs);
  }

  isSuppressed(relativePath: string): boolean {
    const expiry = this.expiries.get(relativePath);
    if (expiry === undefined) {
      return false;
    }
    if (this.clock() < expiry) {
      return true;
    }
    this.expiries.delete(relativePath);
    return false;
  }

  /**
   * Check and use up a suppression: returns true and removes the entry
   * when it is still live
   */
  consume(relativePath: string): boolean {
    if (!this.isSuppressed(relativePath)) {
      return false;
    }
    this.expiries.delete(relativePath);
    return true;
  }

  /**
   * Number of entries, live or not yet pruned
   */
  get size(): number {
    return this.expiries.size;
  }

  clear(): void {
    this.expiries.clear();
  }
}
