import { z } from "zod";

export const BoundingBoxSchema = z.object({
  x: z.number().min(0).max(1),
  y: z.number().min(0).max(1),
  width: z.number().min(0).max(1),
  height: z.number().min(0).max(1),
});

export const PpeItemSchema = z.enum(["helmet", "vest", "shoes", "gloves"]);

export const StatusSchema = z.enum(["compliant", "partial", "nonCompliant"]);

export const PpeStatusSchema = z.object({
  type: PpeItemSchema,
  status: StatusSchema,
  lastDetected: z.string().datetime().nullable(),
});

export const PersonDetectionSchema = z.object({
  workerId: z.string().nullable(),
  boundingBox: BoundingBoxSchema,
  ppeStatus: z.array(PpeStatusSchema),
  overallStatus: StatusSchema,
  confidence: z.number().min(0).max(1),
});

export const DetectionResultSchema = z.object({
  frameId: z.string().min(1),
  detected: z.number().int().nonnegative(),
  compliant: z.number().int().nonnegative(),
  nonCompliant: z.number().int().nonnegative(),
  detections: z.array(PersonDetectionSchema),
});

export type PpeStatusEntry = z.infer<typeof PpeStatusSchema>;
export type PersonDetection = z.infer<typeof PersonDetectionSchema>;
export type DetectionResult = z.infer<typeof DetectionResultSchema>;

export const serializeDetectionResult = (result: DetectionResult): string => {
  return JSON.stringify(DetectionResultSchema.parse(result));
};

export const parseDetectionResult = (payload: string): DetectionResult => {
  const raw: unknown = JSON.parse(payload);
  return DetectionResultSchema.parse(raw);
};

export const emptyDetectionResult = (frameId: string): DetectionResult => ({
  frameId,
  detected: 0,
  compliant: 0,
  nonCompliant: 0,
  detections: [],
});
