import { describe, expect, it } from "vitest";
import { ConfidenceGate } from "../confidence-gate";

describe("ConfidenceGate", () => {
  it("keeps entries at or above the floor", () => {
    const gate = new ConfidenceGate(0.5);
    const kept = gate.filter([
      { id: "a", confidence: 0.5 },
      { id: "b", confidence: 0.4 },
      { id: "c", confidence: 0.91 },
    ]);

    expect(kept.map((entry) => entry.id)).toEqual(["a", "c"]);
    expect(gate.getDroppedCount()).toBe(1);
  });

  it("explains why an entry was dropped", () => {
    const gate = new ConfidenceGate(0.5);

    expect(gate.evaluate(null)).toEqual({ allowUpdate: false, reason: "NO_CONFIDENCE" });
    expect(gate.evaluate(0.2)).toEqual({ allowUpdate: false, reason: "LOW_CONFIDENCE" });
    expect(gate.evaluate(0, 0)).toEqual({ allowUpdate: false, reason: "LOW_CONFIDENCE" });
    expect(gate.evaluate(Number.NaN)).toEqual({ allowUpdate: false, reason: "LOW_CONFIDENCE" });
  });

  it("accepts a per-call floor without changing its own", () => {
    const gate = new ConfidenceGate(0.5);

    expect(gate.filter([{ confidence: 0.3 }], 0.25)).toHaveLength(1);
    expect(gate.getThreshold()).toBe(0.5);
  });
});
