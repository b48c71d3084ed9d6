import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { formatCompactUtc } from "../../shared/time";

export type EvidenceDescriptor = {
  workerId: string | null;
  frameId: string;
  capturedAt: number;
};

export interface EvidenceStore {
  /** Persists the frame and returns a reference relative to the store root. */
  save: (image: Buffer, descriptor: EvidenceDescriptor) => Promise<string>;
}

const EVIDENCE_SUBDIR = "violations";

const startsWith = (image: Buffer, signature: readonly number[], offset = 0): boolean => {
  if (image.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, index) => image[offset + index] === byte);
};

/** Picks a file extension from the image's magic bytes. */
export const sniffImageExtension = (image: Buffer): string => {
  if (startsWith(image, [0xff, 0xd8, 0xff])) {
    return "jpg";
  }
  if (startsWith(image, [0x89, 0x50, 0x4e, 0x47])) {
    return "png";
  }
  if (startsWith(image, [0x52, 0x49, 0x46, 0x46]) && startsWith(image, [0x57, 0x45, 0x42, 0x50], 8)) {
    return "webp";
  }
  if (startsWith(image, [0x47, 0x49, 0x46, 0x38])) {
    return "gif";
  }
  if (startsWith(image, [0x42, 0x4d])) {
    return "bmp";
  }
  return "bin";
};

const safeSegment = (value: string): string => {
  const cleaned = value.replace(/[^A-Za-z0-9_-]+/g, "-").replace(/^-+|-+$/g, "");
  return cleaned.length > 0 ? cleaned : "frame";
};

export const buildEvidenceName = (image: Buffer, descriptor: EvidenceDescriptor): string => {
  const worker = descriptor.workerId ? safeSegment(descriptor.workerId) : "unknown";
  const stamp = formatCompactUtc(descriptor.capturedAt);
  const frame = safeSegment(descriptor.frameId);
  return `${worker}_${stamp}_${frame}.${sniffImageExtension(image)}`;
};

export class FileEvidenceStore implements EvidenceStore {
  constructor(private readonly rootDir: string) {}

  async save(image: Buffer, descriptor: EvidenceDescriptor): Promise<string> {
    const name = buildEvidenceName(image, descriptor);
    const directory = path.join(this.rootDir, EVIDENCE_SUBDIR);
    await mkdir(directory, { recursive: true });
    await writeFile(path.join(directory, name), image);
    return `${EVIDENCE_SUBDIR}/${name}`;
  }
}
