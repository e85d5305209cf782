export interface DrainStats {
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
}

export type ProgressListener = (stats: DrainStats) => void;

/**
 * Counters owned by one drain. Workers call record() after their last await,
 * so each update runs to completion before another worker resumes.
 * `onRecord` sees every completion; `report` only every `interval` and at finish.
 */
export class DrainProgress {
  private succeeded = 0;
  private failed = 0;

  constructor(
    readonly total: number,
    private readonly interval: number,
    private readonly report: ProgressListener,
    private readonly onRecord?: ProgressListener
  ) {}

  record(success: boolean): void {
    if (success) {
      this.succeeded++;
    } else {
      this.failed++;
    }
    const stats = this.snapshot();
    this.onRecord?.(stats);
    if (stats.processed % this.interval === 0) {
      this.report(stats);
    }
  }

  finish(): DrainStats {
    const stats = this.snapshot();
    this.report(stats);
    return stats;
  }

  snapshot(): DrainStats {
    return {
      total: this.total,
      processed: this.succeeded + this.failed,
      succeeded: this.succeeded,
      failed: this.failed
    };
  }
}
