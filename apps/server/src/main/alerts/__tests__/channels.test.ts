import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebhookAlertChannel } from "../channels";
import { JsonFileAlertConfigProvider, parseAlertConfigs } from "../configProvider";

const draft = {
  id: "alert-1",
  configId: "cfg-1",
  violationIds: ["v-1"],
  channel: "webhook" as const,
  destination: "http://127.0.0.1:9/hooks/ppe",
  severity: "high" as const,
  subject: "PPE alert: Dock",
  message: "1 violation(s)",
  dispatchedAt: Date.UTC(2024, 4, 1, 12, 0, 0),
};

describe("WebhookAlertChannel", () => {
  it("posts the alert as JSON", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(null, { status: 204 }));
    const channel = new WebhookAlertChannel({ fetchImpl });

    const result = await channel.send(draft, new AbortController().signal);

    expect(result).toEqual({ ok: true });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://127.0.0.1:9/hooks/ppe");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      id: "alert-1",
      configId: "cfg-1",
      severity: "high",
      subject: "PPE alert: Dock",
      message: "1 violation(s)",
      violationIds: ["v-1"],
      dispatchedAt: "2024-05-01T12:00:00.000Z",
    });
  });

  it("reports non-2xx responses as failures", async () => {
    const channel = new WebhookAlertChannel({
      fetchImpl: async () => new Response("nope", { status: 502 }),
    });
    expect(await channel.send(draft, new AbortController().signal)).toEqual({
      ok: false,
      error: "HTTP 502",
    });
  });
});

describe("alert config loading", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "sitewatch-alerts-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies defaults and drops duplicate ids", () => {
    const configs = parseAlertConfigs({
      alerts: [
        { id: "a", name: "First", channel: { kind: "log", destination: "desk" } },
        { id: "a", name: "Again", channel: { kind: "log", destination: "desk" } },
      ],
    });

    expect(configs).toEqual([
      {
        id: "a",
        name: "First",
        channel: { kind: "log", destination: "desk" },
        minSeverity: "low",
        violationThreshold: 1,
        timeWindowMinutes: 10,
        cooldownMinutes: 30,
        violationTypes: null,
        enabled: true,
      },
    ]);
  });

  it("keeps the last good rules when the file turns invalid", async () => {
    const file = path.join(dir, "alerts.json");
    await writeFile(
      file,
      JSON.stringify([{ id: "b", name: "B", channel: { kind: "webhook", destination: "http://127.0.0.1:9" } }]),
    );
    const provider = new JsonFileAlertConfigProvider(file);

    expect((await provider.loadConfigs()).map((config) => config.id)).toEqual(["b"]);

    await writeFile(file, "{ not json");
    expect((await provider.loadConfigs()).map((config) => config.id)).toEqual(["b"]);
  });

  it("returns no rules when the file is missing", async () => {
    const provider = new JsonFileAlertConfigProvider(path.join(dir, "absent.json"));
    expect(await provider.loadConfigs()).toEqual([]);
  });
});
