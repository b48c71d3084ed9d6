/* eslint-disable no-console */
// Console output is intentional here to mirror structured logs locally while shipping them to Better Stack.
import { monitoringConfig } from "./config/monitoring";

export type LoggerProcessType = "server" | "pipeline";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  processType: LoggerProcessType;
};

const createLogtailAdapter = (client: object) => {
  const log = async (
    message: string,
    level: string,
    metadata?: LoggerMetadata,
  ) => {
    const method: unknown = Reflect.get(client, "log");
    if (typeof method !== "function") {
      return;
    }

    await Reflect.apply(method, client, [message, level, metadata]);
  };

  const flushMethod: unknown = Reflect.get(client, "flush");
  const flush =
    typeof flushMethod === "function"
      ? async () => {
          await Reflect.apply(flushMethod, client, []);
        }
      : undefined;

  return { log, flush };
};

let logtailInstance: Promise<ReturnType<typeof createLogtailAdapter> | null> | null =
  null;

const consoleWriters = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
} as const;

type LogLevel = keyof typeof consoleWriters;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const loadLogtail = async (): Promise<ReturnType<
  typeof createLogtailAdapter
> | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return null;
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail } = await import("@logtail/node");
      const client = new Logtail(monitoringConfig.logtail.token);
      return createLogtailAdapter(client);
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

const formatConsolePayload = (
  level: LogLevel,
  message: string,
  metadata?: LoggerMetadata,
) => {
  const timestamp = new Date().toISOString();
  return [
    `[${timestamp}] [${level.toUpperCase()}] ${message}`,
    metadata ?? {},
  ] as const;
};

const emitLogtail = async (
  message: string,
  level: LogLevel,
  metadata: LoggerMetadata,
) => {
  try {
    const instance = await loadLogtail();
    if (!instance) {
      return;
    }

    await instance.log(message, level === "fatal" ? "error" : level, metadata);
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  ({ module, processType }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[monitoringConfig.logLevel]) {
      return;
    }

    const enrichedMetadata = {
      ...metadata,
      module,
      processType,
      environment: monitoringConfig.environment,
      timestamp: new Date().toISOString(),
      level,
    };

    const [consoleMessage, consoleMetadata] = formatConsolePayload(
      level,
      message,
      enrichedMetadata,
    );

    consoleWriters[level](consoleMessage, consoleMetadata);

    if (monitoringConfig.logtail.enabled) {
      emitLogtail(message, level, enrichedMetadata).catch(() => undefined);
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const debug = createEmitter(options, "debug");
  const info = createEmitter(options, "info");
  const warn = createEmitter(options, "warn");
  const error = createEmitter(options, "error");
  const fatal = createEmitter(options, "fatal");

  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush?.();
  };

  return {
    debug,
    info,
    warn,
    error,
    fatal,
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (
  module: string,
  processType: LoggerProcessType,
): Logger => {
  const cacheKey = `${processType}:${module}`;

  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, processType });
  loggerCache.set(cacheKey, logger);
  return logger;
};

export type ErrorPayload = {
  name: string;
  message: string;
  code?: string;
  stack?: string;
};

export const toErrorPayload = (error: unknown): ErrorPayload => {
  if (error instanceof Error) {
    const code = Reflect.get(error, "code");
    return {
      name: error.name,
      message: error.message,
      code: typeof code === "string" ? code : undefined,
      stack: error.stack,
    };
  }
  if (typeof error === "string") {
    return { name: "Error", message: error };
  }
  try {
    return { name: "Error", message: JSON.stringify(error) };
  } catch {
    return { name: "Error", message: "unknown" };
  }
};
