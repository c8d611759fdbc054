/**
 * Progress Tracker
 * Per-phase unit counters and timings, plus the driver's current state
 */

import type { TrainingState } from "../types";

export interface PhaseProgress {
  phase: TrainingState;
  label: string;
  total: number;
  completed: number;
  startTime: Date;
  endTime?: Date;
}

export interface TrainingStats {
  state: TrainingState;
  phases: PhaseProgress[];
  duration: number;
}

export type ProgressListener = (progress: PhaseProgress) => void;
export type StateListener = (state: TrainingState) => void;

export class ProgressTracker {
  private state: TrainingState = "init";
  private phases: PhaseProgress[] = [];
  private progressListeners: ProgressListener[] = [];
  private stateListeners: StateListener[] = [];
  private startTime = new Date();

  // ============================================================================
  // Driver state
  // ============================================================================

  setState(state: TrainingState): void {
    this.state = state;
    for (const listener of this.stateListeners) {
      listener(state);
    }
  }

  getState(): TrainingState {
    return this.state;
  }

  onStateChange(listener: StateListener): void {
    this.stateListeners.push(listener);
  }

  // ============================================================================
  // Unit counters
  // ============================================================================

  /**
   * Start counting a batch of units; a phase may run several batches (one per exposure)
   */
  start(phase: TrainingState, label: string, total: number): PhaseProgress {
    const progress: PhaseProgress = {
      phase,
      label,
      total,
      completed: 0,
      startTime: new Date(),
    };
    this.phases.push(progress);
    this.emit(progress);
    return progress;
  }

  increment(progress: PhaseProgress): void {
    progress.completed++;
    this.emit(progress);
  }

  finish(progress: PhaseProgress): void {
    progress.endTime = new Date();
    this.emit(progress);
  }

  onProgress(listener: ProgressListener): void {
    this.progressListeners.push(listener);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): TrainingStats {
    return {
      state: this.state,
      phases: this.phases.map((p) => ({ ...p })),
      duration: new Date().getTime() - this.startTime.getTime(),
    };
  }

  private emit(progress: PhaseProgress): void {
    for (const listener of this.progressListeners) {
      listener(progress);
    }
  }
}
