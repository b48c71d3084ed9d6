import { describe, expect, it } from "vitest";
import {
  type SanitizableSentryEvent,
  createMonitoringConfig,
  sanitizeSentryEvent,
} from "../shared/config/monitoring";

describe("monitoring configuration", () => {
  it("disables Sentry when DSN is absent", () => {
    const config = createMonitoringConfig({ NODE_ENV: "production", SENTRY_DSN: "" });

    expect(config.sentry.enabled).toBe(false);
  });

  it("enables Sentry and Better Stack in production when tokens are present", () => {
    const config = createMonitoringConfig({
      NODE_ENV: "production",
      SENTRY_DSN: "https://public@sentry.example.test/1",
      BETTER_STACK_TOKEN: "test-secret",
    });

    expect(config.sentry.enabled).toBe(true);
    expect(config.logtail.enabled).toBe(true);
    expect(config.environment).toBe("production");
  });

  it("keeps reporting off in development unless opted in", () => {
    const env = {
      NODE_ENV: "development",
      SENTRY_DSN: "https://public@sentry.example.test/1",
    };

    expect(createMonitoringConfig(env).sentry.enabled).toBe(false);
    expect(createMonitoringConfig({ ...env, ENABLE_SENTRY_IN_DEV: "yes" }).sentry.enabled).toBe(true);
  });

  it("prefers the explicit environment and quiets logs under test", () => {
    expect(createMonitoringConfig({ SITEWATCH_ENV: "staging", NODE_ENV: "test" }).environment).toBe(
      "staging",
    );
    expect(createMonitoringConfig({ NODE_ENV: "test" }).logLevel).toBe("error");
    expect(createMonitoringConfig({ SITEWATCH_LOG_LEVEL: "DEBUG" }).logLevel).toBe("debug");
    expect(createMonitoringConfig({ SITEWATCH_LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });

  it("scrubs sensitive fields and drops request data", () => {
    const event: SanitizableSentryEvent = {
      extra: {
        password: "test-secret",
        nested: { token: "test-secret", frameId: "f-1" },
      },
      contexts: { webhook: { Authorization: "Bearer test-secret" } },
      request: { headers: { "x-frame-id": "f-1" } },
    };

    const sanitised = sanitizeSentryEvent(event);

    expect(sanitised.extra).toEqual({
      password: "[redacted]",
      nested: { token: "[redacted]", frameId: "f-1" },
    });
    expect(sanitised.contexts).toEqual({ webhook: { Authorization: "[redacted]" } });
    expect(sanitised.request).toBeUndefined();
  });
});
