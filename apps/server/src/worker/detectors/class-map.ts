import type { PpeLabel } from "../../shared/types/detector";

/** Model class index to label. The order is fixed by the trained model. */
export const PPE_CLASS_MAP: Readonly<Record<number, PpeLabel>> = Object.freeze({
  0: "gloves",
  1: "helmet",
  2: "person",
  3: "shoes",
  4: "vest",
});

export const labelForClass = (classId: number): PpeLabel | null => {
  if (!Number.isInteger(classId)) {
    return null;
  }
  return PPE_CLASS_MAP[classId] ?? null;
};
