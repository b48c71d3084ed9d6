export type ConfidenceGateDecision = {
  allowUpdate: boolean;
  reason: "LOW_CONFIDENCE" | "NO_CONFIDENCE" | null;
};

export class ConfidenceGate {
  private readonly threshold: number;

  private droppedCount = 0;

  constructor(threshold: number) {
    this.threshold = threshold;
  }

  getThreshold(): number {
    return this.threshold;
  }

  evaluate(
    confidence: number | null,
    threshold = this.threshold,
  ): ConfidenceGateDecision {
    if (this.shouldAllow(confidence, threshold)) {
      return {
        allowUpdate: true,
        reason: null,
      };
    }

    this.droppedCount += 1;

    return {
      allowUpdate: false,
      reason: confidence === null ? "NO_CONFIDENCE" : "LOW_CONFIDENCE",
    };
  }

  /** Keeps the entries whose confidence clears the floor. */
  filter<T extends { confidence: number }>(
    entries: readonly T[],
    threshold = this.threshold,
  ): T[] {
    return entries.filter(
      (entry) => this.evaluate(entry.confidence, threshold).allowUpdate,
    );
  }

  getDroppedCount(): number {
    return this.droppedCount;
  }

  private shouldAllow(confidence: number | null, threshold: number): boolean {
    if (confidence === null) {
      return false;
    }
    if (!Number.isFinite(confidence)) {
      return false;
    }
    if (confidence <= 0) {
      return false;
    }
    return confidence >= threshold;
  }
}
