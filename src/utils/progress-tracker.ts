/**
 * Progress Tracker
 *
 * Percent tracker that never moves backwards and stays inside [0, ceiling].
 */

export class ProgressTracker {
  private progress: number = 0;

  constructor(private readonly ceiling: number = 100) {}

  /**
   * Update progress (0-100). Returns true when the stored value changed.
   */
  update(progress: number): boolean {
    if (!Number.isFinite(progress)) {
      return false;
    }
    const next = Math.max(0, Math.min(this.ceiling, Math.floor(progress)));
    if (next <= this.progress) {
      return false;
    }
    this.progress = next;
    return true;
  }

  /**
   * Mark as finished (100 regardless of the running ceiling)
   */
  complete(): void {
    this.progress = 100;
  }

  /**
   * Get current progress
   */
  getProgress(): number {
    return this.progress;
  }
}
