import type { ArenaLevel } from "@arena/shared";
import type { LevelOutcome } from "./types";

/**
 * Counts deliveries and losses against the level's targets.
 */
export class LevelProgress {
  private deliveredCount = 0;
  private lostCount = 0;
  private currentOutcome: LevelOutcome = "in-progress";

  constructor(private readonly level: ArenaLevel) {}

  get delivered(): number {
    return this.deliveredCount;
  }

  get lost(): number {
    return this.lostCount;
  }

  get outcome(): LevelOutcome {
    return this.currentOutcome;
  }

  get isComplete(): boolean {
    return this.currentOutcome !== "in-progress";
  }

  recordDelivery(): void {
    this.deliveredCount += 1;
  }

  recordLoss(): void {
    this.lostCount += 1;
  }

  /**
   * Settles the outcome once targets are met. A win takes precedence over a
   * failure reached on the same tick.
   *
   * @returns the outcome if the level completed on this call, otherwise null.
   */
  evaluate(): Exclude<LevelOutcome, "in-progress"> | null {
    if (this.currentOutcome !== "in-progress") {
      return null;
    }

    if (this.deliveredCount >= this.level.deliveriesRequired) {
      this.currentOutcome = "won";
      return "won";
    }

    const maxLosses = this.level.maxLosses;
    if (maxLosses !== undefined && this.lostCount > maxLosses) {
      this.currentOutcome = "failed";
      return "failed";
    }

    return null;
  }
}
