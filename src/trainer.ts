/**
 * Trainer - Pipeline orchestrator
 * Walks the phases in order; the modules hold all the logic
 */

import type { TrainingContext, TrainingState } from "./types";
import type { TrainingStats } from "./utils/progress-tracker";
import * as modules from "./modules";

export class Trainer {
  constructor(private ctx: TrainingContext) {}

  /**
   * Run every phase once, aborting on the first error
   * Cleanup is left to the caller
   */
  async run(): Promise<TrainingStats> {
    const ctx = this.ctx;

    try {
      this.enter("resolve-params");
      modules.applyLanguageParameters(ctx);

      this.enter("fontconfig");
      await modules.initializeFontconfig(ctx);

      this.enter("phase-i");
      await modules.generateImages(ctx);

      this.enter("phase-up");
      await modules.generateUnicharset(ctx);

      this.enter("phase-e");
      await modules.extractFeatures(ctx);

      this.enter("assembly");
      await modules.makeLstmData(ctx);
    } catch (error) {
      ctx.progress.setState("failed");
      throw error;
    }

    return ctx.progress.getStats();
  }

  /**
   * Copy the log into the output directory and remove the scratch directory
   */
  async cleanup(): Promise<void> {
    const { progress } = this.ctx;
    const failed = progress.getState() === "failed";

    progress.setState("cleanup");
    await modules.cleanup(this.ctx);
    progress.setState(failed ? "failed" : "done");
  }

  private enter(state: TrainingState): void {
    this.ctx.logger.debug(`State: ${state}`);
    this.ctx.progress.setState(state);
  }
}
