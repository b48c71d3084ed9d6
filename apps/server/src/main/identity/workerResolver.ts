import { readFile } from "node:fs/promises";
import { z } from "zod";
import { PpeItemSchema } from "../../shared/detection/result-schema";
import type {
  WorkerIdentity,
  WorkerLookup,
  WorkerResolver,
} from "../../shared/types/identity";

/** Default resolver: identity stays unknown. */
export class NullWorkerResolver implements WorkerResolver {
  async resolveWorker(): Promise<WorkerIdentity | null> {
    return null;
  }
}

const WorkerDirectorySchema = z.object({
  workers: z
    .record(
      z.string().min(1),
      z.object({
        role: z.string().min(1).nullable().default(null),
        name: z.string().optional(),
      }),
    )
    .default({}),
  /** Role name to the PPE items that role must wear. */
  roles: z.record(z.string().min(1), z.array(PpeItemSchema).min(1)).default({}),
  /** Cameras watching a single known worker, such as a fixed workstation. */
  cameras: z.record(z.string().min(1), z.string().min(1)).default({}),
});

export type WorkerDirectory = z.infer<typeof WorkerDirectorySchema>;

export type StaticWorkerDirectoryOptions = {
  directory: WorkerDirectory;
  /** Optional upstream matcher; its worker id wins over the camera mapping. */
  matcher?: WorkerResolver;
};

/**
 * Attaches roles from a static directory to resolved workers, falling back to
 * the camera assignment when no matcher recognises the person.
 */
export class StaticWorkerDirectory implements WorkerResolver {
  private readonly directory: WorkerDirectory;

  private readonly matcher: WorkerResolver | null;

  constructor(options: StaticWorkerDirectoryOptions) {
    this.directory = options.directory;
    this.matcher = options.matcher ?? null;
  }

  roleOf(workerId: string): string | null {
    return this.directory.workers[workerId]?.role ?? null;
  }

  async resolveWorker(lookup: WorkerLookup, signal: AbortSignal): Promise<WorkerIdentity | null> {
    const matched = this.matcher ? await this.matcher.resolveWorker(lookup, signal) : null;
    const workerId =
      matched?.workerId ??
      (lookup.cameraId !== null ? this.directory.cameras[lookup.cameraId] : undefined);
    if (!workerId) {
      return null;
    }
    return {
      workerId,
      role: this.roleOf(workerId) ?? matched?.role ?? null,
    };
  }
}

export const parseWorkerDirectory = (raw: unknown): WorkerDirectory => {
  return WorkerDirectorySchema.parse(raw);
};

export const loadWorkerDirectory = async (filePath: string): Promise<WorkerDirectory> => {
  const contents = await readFile(filePath, "utf8");
  return parseWorkerDirectory(JSON.parse(contents));
};
