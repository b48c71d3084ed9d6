import type { ItemStatus } from "../../shared/types/compliance";

/** Sliding window of presence observations for one item on one track. */
export class ItemWindow {
  private readonly size: number;

  private readonly samples: boolean[] = [];

  private positives = 0;

  private lastDetectedAt: number | null = null;

  constructor(size: number) {
    this.size = Math.max(1, Math.floor(size));
  }

  push(present: boolean, timestamp: number): void {
    this.samples.push(present);
    if (present) {
      this.positives += 1;
      this.lastDetectedAt = timestamp;
    }
    this.trim();
  }

  get length(): number {
    return this.samples.length;
  }

  isFull(): boolean {
    return this.samples.length >= this.size;
  }

  ratio(): number | null {
    return this.samples.length > 0 ? this.positives / this.samples.length : null;
  }

  getLastDetectedAt(): number | null {
    return this.lastDetectedAt;
  }

  status(confirmationRatio: number): ItemStatus {
    const ratio = this.ratio();
    if (!this.isFull() || ratio === null) {
      return "partial";
    }
    return ratio >= confirmationRatio ? "compliant" : "nonCompliant";
  }

  private trim(): void {
    while (this.samples.length > this.size) {
      if (this.samples.shift()) {
        this.positives -= 1;
      }
    }
  }
}
