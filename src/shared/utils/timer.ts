// Session clocks for trigger and acquisition timestamps

export interface Clock {
  reset(): void;
  /** Seconds since the last reset. */
  getTime(): number;
}

export class MonotonicClock implements Clock {
  private resetAt: number = 0;

  constructor() {
    this.reset();
  }

  reset(): void {
    this.resetAt = performance.now();
  }

  getTime(): number {
    return (performance.now() - this.resetAt) / 1000;
  }
}

// Measures a session's wall duration in milliseconds
export class Stopwatch {
  private startTime: number = 0;
  private finalElapsed: number = 0;
  private isRunning: boolean = false;

  start(): void {
    if (this.isRunning) return;
    this.startTime = performance.now();
    this.finalElapsed = 0;
    this.isRunning = true;
  }

  stop(): number {
    if (!this.isRunning) return this.finalElapsed;
    this.finalElapsed = performance.now() - this.startTime;
    this.isRunning = false;
    return this.finalElapsed;
  }

  elapsed(): number {
    if (!this.isRunning) return this.finalElapsed;
    return performance.now() - this.startTime;
  }
}

// Format milliseconds to human-readable string
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(1);
  return `${minutes}m ${seconds}s`;
}
