type Environment = string;
type RuntimeEnv = Record<string, string | undefined>;

export type SanitizableSentryEvent = Record<string, unknown>;

const resolveEnvironment = (env: RuntimeEnv): Environment => {
  const explicitEnv = env.APP_ENV ?? env.SITEWATCH_ENV;

  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv;
  }

  const nodeEnv = env.NODE_ENV ?? 'development';
  if (nodeEnv && nodeEnv.trim().length > 0) {
    return nodeEnv;
  }

  return 'development';
};

const normalizeBoolean = (value: string | undefined, fallback = false) => {
  if (!value) {
    return fallback;
  }

  switch (value.toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false;
    default:
      return fallback;
  }
};

const SENSITIVE_KEYS = [
  'password',
  'token',
  'secret',
  'authorization',
  'auth',
  'email',
  'phone',
];

const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const scrubValue = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (isPlainRecord(value)) {
    const result: Record<string, unknown> = {};

    Object.entries(value).forEach(([key, nestedValue]) => {
      const lowerKey = key.toLowerCase();
      if (
        SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey))
      ) {
        result[key] = '[redacted]';
        return;
      }

      result[key] = scrubValue(nestedValue);
    });

    return result;
  }

  return value;
};

export const sanitizeSentryEvent = <T>(event: T): T => {
  if (!isPlainRecord(event)) {
    return event;
  }

  if (isPlainRecord(event.extra)) {
    Reflect.set(event, 'extra', scrubValue(event.extra));
  }

  if (isPlainRecord(event.contexts)) {
    Reflect.set(event, 'contexts', scrubValue(event.contexts));
  }

  // Frame bytes and headers never leave the process.
  Reflect.deleteProperty(event, 'request');

  return event;
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
  };
  logtail: {
    token: string;
    enabled: boolean;
  };
  logLevel: LogLevel;
};

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string): value is LogLevel => {
  return LOG_LEVELS.some((level) => level === value);
};

const resolveLogLevel = (value: string | undefined): LogLevel => {
  const normalised = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalised) ? normalised : 'info';
};

export const createMonitoringConfig = (
  runtimeEnv: RuntimeEnv,
): MonitoringConfig => {
  const environment = resolveEnvironment(runtimeEnv);
  const isProductionLike =
    environment === 'production' || environment === 'staging';

  const sentryDsn = runtimeEnv.SENTRY_DSN ?? '';
  const logtailToken = runtimeEnv.BETTER_STACK_TOKEN ?? '';

  return {
    environment,
    release: runtimeEnv.npm_package_version,
    sentry: {
      dsn: sentryDsn,
      enabled:
        Boolean(sentryDsn) &&
        (isProductionLike ||
          normalizeBoolean(runtimeEnv.ENABLE_SENTRY_IN_DEV, false)),
      tracesSampleRate: (() => {
        const parsedValue = parseFloat(
          runtimeEnv.SENTRY_TRACES_SAMPLE_RATE ?? '0.1',
        );
        return Number.isNaN(parsedValue) ? 0.1 : parsedValue;
      })(),
    },
    logtail: {
      token: logtailToken,
      enabled:
        Boolean(logtailToken) &&
        (isProductionLike ||
          normalizeBoolean(runtimeEnv.ENABLE_BETTER_STACK_IN_DEV, false)),
    },
    logLevel: resolveLogLevel(
      runtimeEnv.SITEWATCH_LOG_LEVEL ??
        (environment === 'test' ? 'error' : undefined),
    ),
  };
};

export const monitoringConfig: MonitoringConfig = createMonitoringConfig(
  process.env,
);
