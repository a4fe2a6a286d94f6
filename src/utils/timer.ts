/**
 * Simple performance timer for measuring operation durations
 */
export class Timer {
  private startTime: number;
  private endTime?: number;

  constructor() {
    this.startTime = performance.now();
  }

  /**
   * Stop the timer and return total elapsed time
   */
  stop(): number {
    this.endTime = performance.now();
    return this.elapsed;
  }

  /**
   * Get elapsed time in milliseconds
   */
  get elapsed(): number {
    const end = this.endTime ?? performance.now();
    return end - this.startTime;
  }

  get formatted(): string {
    return formatDuration(this.elapsed);
  }
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}
