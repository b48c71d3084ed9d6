import { z } from "zod";

export const ModelBoxSchema = z.object({
  classId: z.number().int().nonnegative(),
  confidence: z.number(),
  x1: z.number(),
  y1: z.number(),
  x2: z.number(),
  y2: z.number(),
});

export const ModelOutputSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
  boxes: z.array(ModelBoxSchema),
});

export const ReplayRecordingSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
  frames: z.array(
    z.object({
      boxes: z.array(ModelBoxSchema),
    }),
  ),
});

export type ReplayRecording = z.infer<typeof ReplayRecordingSchema>;
