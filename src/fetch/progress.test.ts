import { describe, expect, it } from "vitest";
import { ProgressTracker, bandPercent } from "./progress.js";

describe("bandPercent", () => {
  it("interpolates linearly inside the band", () => {
    expect(bandPercent(0, 4, 20, 80)).toBe(20);
    expect(bandPercent(1, 4, 20, 80)).toBe(35);
    expect(bandPercent(3, 4, 20, 80)).toBe(65);
    expect(bandPercent(4, 4, 20, 80)).toBe(80);
  });

  it("lands on the band end when there is nothing to do", () => {
    expect(bandPercent(0, 0, 20, 80)).toBe(80);
  });
});

describe("ProgressTracker", () => {
  it("never reports a lower percentage than before", () => {
    const seen: [string, number][] = [];
    const tracker = new ProgressTracker((message, percent) => seen.push([message, percent]));

    tracker.report("a", 40);
    tracker.report("b", 30);
    tracker.report("c", 120);

    expect(seen).toEqual([
      ["a", 40],
      ["b", 40],
      ["c", 100],
    ]);
    expect(tracker.percent).toBe(100);
  });
});
