import { readFile, stat } from "node:fs/promises";
import { z } from "zod";
import { getLogger, toErrorPayload } from "../../shared/logger";
import type { AlertConfig, AlertConfigProvider } from "../../shared/types/alert";

const logger = getLogger("alert-config", "server");

const AlertConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  channel: z.object({
    kind: z.enum(["log", "webhook"]),
    destination: z.string().min(1),
  }),
  minSeverity: z.enum(["low", "medium", "high", "critical"]).default("low"),
  violationThreshold: z.number().int().positive().default(1),
  timeWindowMinutes: z.number().positive().default(10),
  cooldownMinutes: z.number().nonnegative().default(30),
  violationTypes: z
    .array(z.enum(["helmet", "vest", "shoes", "gloves"]))
    .nullable()
    .default(null),
  enabled: z.boolean().default(true),
});

const AlertConfigFileSchema = z.union([
  z.object({ alerts: z.array(AlertConfigSchema) }),
  z.array(AlertConfigSchema).transform((alerts) => ({ alerts })),
]);

export const parseAlertConfigs = (raw: unknown): AlertConfig[] => {
  const parsed = AlertConfigFileSchema.parse(raw);
  const seen = new Set<string>();
  return parsed.alerts.filter((config) => {
    if (seen.has(config.id)) {
      logger.warn("Duplicate alert config ignored", { configId: config.id });
      return false;
    }
    seen.add(config.id);
    return true;
  });
};

export class StaticAlertConfigProvider implements AlertConfigProvider {
  constructor(private readonly configs: AlertConfig[]) {}

  async loadConfigs(): Promise<AlertConfig[]> {
    return this.configs.map((config) => ({
      ...config,
      channel: { ...config.channel },
      violationTypes: config.violationTypes ? [...config.violationTypes] : null,
    }));
  }
}

/**
 * Reads alert rules from a JSON file, re-reading it when its modification
 * time changes. A missing or invalid file yields the last good rules.
 */
export class JsonFileAlertConfigProvider implements AlertConfigProvider {
  private cached: AlertConfig[] = [];

  private loadedMtimeMs: number | null = null;

  constructor(private readonly filePath: string) {}

  async loadConfigs(): Promise<AlertConfig[]> {
    try {
      const { mtimeMs } = await stat(this.filePath);
      if (this.loadedMtimeMs !== mtimeMs) {
        const contents = await readFile(this.filePath, "utf8");
        this.cached = parseAlertConfigs(JSON.parse(contents));
        this.loadedMtimeMs = mtimeMs;
        logger.info("Alert configs loaded", {
          path: this.filePath,
          count: this.cached.length,
        });
      }
    } catch (error) {
      logger.warn("Alert configs could not be read", {
        path: this.filePath,
        error: toErrorPayload(error),
      });
    }
    return this.cached;
  }
}
