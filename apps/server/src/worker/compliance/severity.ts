import type { Severity } from "../../shared/types/violation";

export const assessSeverity = (
  missingCount: number,
  requiredCount: number,
  highSeverityMissingShare: number,
): Severity => {
  if (requiredCount <= 0 || missingCount <= 0) {
    return "low";
  }
  return missingCount / requiredCount >= highSeverityMissingShare ? "high" : "low";
};
