export type ProgressListener = (message: string, percent: number) => void;

export const PROGRESS = {
  lookup: 5,
  enumerate: 10,
  processStart: 20,
  processEnd: 80,
  aggregate: 85,
  cache: 90,
  done: 100,
} as const;

/** Linear position of `done` of `total` inside the [from, to] band. */
export function bandPercent(done: number, total: number, from: number, to: number): number {
  if (total <= 0) return to;
  return Math.floor(from + (Math.min(done, total) / total) * (to - from));
}

/** Forwards progress with the percentage clamped to 0–100 and never going backwards. */
export class ProgressTracker {
  private last = 0;

  constructor(private readonly listener?: ProgressListener) {}

  get percent(): number {
    return this.last;
  }

  report(message: string, percent: number): void {
    const bounded = Math.min(100, Math.max(0, Math.round(percent)));
    this.last = Math.max(this.last, bounded);
    this.listener?.(message, this.last);
  }
}
