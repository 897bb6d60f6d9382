/**
 * Time estimation for extraction progress
 * Uses a rolling window of completed games to estimate remaining time
 */

/**
 * Sample for progress tracking
 */
interface ProgressSample {
  timestamp: number;
  completed: number;
}

/**
 * Time estimator for extraction progress
 */
export class TimeEstimator {
  private samples: ProgressSample[] = [];
  private readonly windowSize: number;

  /**
   * @param windowSize - Number of samples kept for the rolling rate (default: 10)
   */
  constructor(windowSize: number = 10) {
    this.windowSize = windowSize;
  }

  /**
   * Record the number of games completed so far
   */
  record(completed: number): void {
    this.samples.push({ timestamp: Date.now(), completed });

    if (this.samples.length > this.windowSize) {
      this.samples.shift();
    }
  }

  /**
   * Estimate remaining time in milliseconds
   * @returns null until two samples show progress over time
   */
  estimateRemaining(completed: number, total: number): number | null {
    const first = this.samples[0];
    const last = this.samples[this.samples.length - 1];
    if (!first || !last || first === last) {
      return null;
    }

    const timeDelta = last.timestamp - first.timestamp;
    const progressDelta = last.completed - first.completed;
    if (progressDelta <= 0 || timeDelta <= 0) {
      return null;
    }

    const remaining = total - completed;
    if (remaining <= 0) {
      return 0;
    }

    return Math.round(remaining / (progressDelta / timeDelta));
  }

  reset(): void {
    this.samples = [];
  }

  getSampleCount(): number {
    return this.samples.length;
  }
}
