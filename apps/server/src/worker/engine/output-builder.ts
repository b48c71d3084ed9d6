import {
  type DetectionResult,
  type PersonDetection,
  emptyDetectionResult,
} from "../../shared/detection/result-schema";
import { toOverallStatus } from "../../shared/types/compliance";
import { toIsoString } from "../../shared/time";
import type { TrackView } from "./types";

const roundConfidence = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Number(Math.max(0, Math.min(1, value)).toFixed(4));
};

export const toPersonDetection = (track: TrackView): PersonDetection => {
  return {
    workerId: track.workerId,
    boundingBox: { ...track.box },
    ppeStatus: track.snapshot.items.map((item) => ({
      type: item.type,
      status: item.status,
      lastDetected:
        item.lastDetectedAt === null ? null : toIsoString(item.lastDetectedAt),
    })),
    overallStatus: toOverallStatus(track.state),
    confidence: roundConfidence(track.confidence),
  };
};

/**
 * Builds the per-frame wire result. `nonCompliant` counts every detected
 * person that is not compliant, partial included.
 */
export const buildDetectionResult = (
  frameId: string,
  tracks: readonly TrackView[],
): DetectionResult => {
  if (tracks.length === 0) {
    return emptyDetectionResult(frameId);
  }

  const detections = tracks.map(toPersonDetection);
  const compliant = detections.filter(
    (detection) => detection.overallStatus === "compliant",
  ).length;

  return {
    frameId,
    detected: detections.length,
    compliant,
    nonCompliant: detections.length - compliant,
    detections,
  };
};
