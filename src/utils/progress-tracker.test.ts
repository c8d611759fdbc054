import { describe, expect, it } from "vitest";
import { ProgressTracker } from "./progress-tracker";
import type { PhaseProgress } from "./progress-tracker";
import type { TrainingState } from "../types";

describe("ProgressTracker", () => {
  it("starts in init and notifies state listeners", () => {
    const tracker = new ProgressTracker();
    const states: TrainingState[] = [];
    tracker.onStateChange((state) => states.push(state));

    expect(tracker.getState()).toBe("init");
    tracker.setState("phase-i");
    tracker.setState("phase-up");

    expect(states).toEqual(["phase-i", "phase-up"]);
    expect(tracker.getState()).toBe("phase-up");
  });

  it("counts completed units per batch", () => {
    const tracker = new ProgressTracker();
    const seen: number[] = [];
    tracker.onProgress((progress: PhaseProgress) => seen.push(progress.completed));

    const batch = tracker.start("phase-i", "Rendering exposure 0", 2);
    tracker.increment(batch);
    tracker.increment(batch);
    tracker.finish(batch);

    expect(seen).toEqual([0, 1, 2, 2]);
    const [phase] = tracker.getStats().phases;
    expect(phase.label).toBe("Rendering exposure 0");
    expect(phase.completed).toBe(2);
    expect(phase.total).toBe(2);
    expect(phase.endTime).toBeInstanceOf(Date);
  });

  it("hands out copies of the phase records", () => {
    const tracker = new ProgressTracker();
    const batch = tracker.start("phase-e", "Extracting lstmf files", 1);
    const snapshot = tracker.getStats();

    tracker.increment(batch);

    expect(snapshot.phases[0].completed).toBe(0);
  });
});
