import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { Command } from "commander";
import {
  downloadMeasurements,
  exitCodeFor,
  parseDeviceSelection,
  registerDownloadCommand,
} from "./download.js";
import type { ApiClient, Session } from "../lib/api-client.js";
import type { CommandDeps } from "../lib/runtime.js";
import { CONFIG_DEFAULTS, type ResolvedConfig } from "../lib/config.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import type { DateRange } from "../lib/date-range.js";
import type { DownloadSummary } from "../lib/downloader.js";
import { createNoopLogger } from "../lib/logger.js";
import type { Device, JsonObject, Measurement } from "../lib/models.js";

// Mock fs/promises module
vi.mock("fs/promises", () => ({
  mkdir: vi.fn(),
  writeFile: vi.fn(),
}));

import { mkdir, writeFile } from "fs/promises";

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

const device: Device = { id: "dev-1", serialNumber: "SN1", name: "Reactor A" };

const measurement: Measurement = {
  id: "m-1",
  deviceId: "dev-1",
  timestamp: "2024-01-15T10:30:00Z",
  name: "Run 1",
  fileId: "file-1",
  record: { _id: "m-1", name: "Run 1" },
};

const config: ResolvedConfig = {
  ...CONFIG_DEFAULTS,
  retryAttempts: 0,
  logLevel: "warn",
  logJson: false,
};

function createFakeApi() {
  return {
    authenticate: vi.fn(
      async (apiKey: string): Promise<Session> => ({ apiKey, authenticatedAt: new Date(0) })
    ),
    listDevices: vi.fn(async (_session: Session): Promise<Device[]> => [device]),
    listMeasurements: vi.fn(
      async (_session: Session, _device: Device, _range: DateRange): Promise<Measurement[]> => [
        measurement,
      ]
    ),
    fetchMetadata: vi.fn(
      async (_session: Session, m: Measurement): Promise<JsonObject> => m.record
    ),
    fetchBinary: vi.fn(
      async (_session: Session, _m: Measurement): Promise<Uint8Array> => new Uint8Array([1, 2])
    ),
  } satisfies ApiClient;
}

function createDeps(api: ApiClient, env: NodeJS.ProcessEnv = {}) {
  let interrupt: (() => void) | undefined;
  const deps = {
    runtime: vi.fn((overrides?: Partial<ResolvedConfig>) => ({
      config: { ...config, outputDir: overrides?.outputDir ?? config.outputDir },
      sources: [],
      logger: createNoopLogger(),
      api,
    })),
    credentials: {
      getApiKey: vi.fn((): string | undefined => "stored-key"),
      setApiKey: vi.fn(),
      clearApiKey: vi.fn(),
    },
    prompts: { secret: vi.fn(async (): Promise<string | undefined> => undefined) },
    signals: {
      onInterrupt: vi.fn((callback: () => void) => {
        interrupt = callback;
      }),
      removeAll: vi.fn(),
    },
    clock: {
      now: () => Date.UTC(2024, 0, 20, 8, 0, 0),
      newDate: () => new Date(Date.UTC(2024, 0, 20, 8, 0, 0)),
    },
    env,
  } satisfies CommandDeps;
  return { deps, interrupt: () => interrupt?.() };
}

function summary(overrides: Partial<DownloadSummary> = {}): DownloadSummary {
  return {
    total: 1,
    succeeded: 1,
    failed: 0,
    skipped: 0,
    cancelled: false,
    failures: [],
    outputDir: "/out",
    durationMs: 10,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("download", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    vi.resetAllMocks();
    initContext(["node", "bactocloud", "--quiet", "--no-input"], {});
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
  });

  describe("parseDeviceSelection", () => {
    it("returns trimmed serials", () => {
      expect(parseDeviceSelection({ device: [" SN1", "SN2 ", ""] })).toEqual(["SN1", "SN2"]);
    });

    it("returns 'all' for --all", () => {
      expect(parseDeviceSelection({ all: true })).toBe("all");
    });

    it("rejects --all together with --device", () => {
      expect(() => parseDeviceSelection({ all: true, device: ["SN1"] })).toThrow(
        expect.objectContaining({
          code: "VALIDATION_INVALID_OPTION",
          message: "Invalid --all: cannot be combined with --device",
        })
      );
    });

    it("requires a selection", () => {
      expect(() => parseDeviceSelection({})).toThrow(
        expect.objectContaining({
          code: "VALIDATION_MISSING_ARG",
          message: "Missing --device or --all",
        })
      );
    });
  });

  describe("exitCodeFor", () => {
    it("is 0 for a clean run", () => {
      expect(exitCodeFor(summary())).toBe(0);
    });

    it("is 1 when a measurement failed", () => {
      expect(exitCodeFor(summary({ succeeded: 0, failed: 1 }))).toBe(1);
    });

    it("is 130 when cancelled", () => {
      expect(exitCodeFor(summary({ cancelled: true, failed: 1 }))).toBe(130);
    });
  });

  describe("downloadMeasurements", () => {
    it("requires --from before touching the API", async () => {
      const { deps } = createDeps(createFakeApi());

      await expect(downloadMeasurements(deps, { device: ["SN1"] })).rejects.toMatchObject({
        code: "VALIDATION_MISSING_ARG",
        message: "Missing --from",
      });
      expect(deps.runtime).not.toHaveBeenCalled();
    });

    it("writes into the requested output directory", async () => {
      const { deps } = createDeps(createFakeApi());

      const result = await downloadMeasurements(deps, {
        from: "2024-01-15",
        to: "2024-01-15",
        device: ["SN1"],
        outputDir: "/data/out",
      });

      expect(result).toMatchObject({ total: 1, succeeded: 1, outputDir: "/data/out" });
      expect(mkdir).toHaveBeenCalledWith("/data/out/SN1/2024-01-15_10-30-00_Run 1", {
        recursive: true,
      });
      expect(writeFile).toHaveBeenCalledWith(
        "/data/out/SN1/2024-01-15_10-30-00_Run 1/data.fcs",
        new Uint8Array([1, 2])
      );
      expect(consoleLogSpy).toHaveBeenCalledWith("Output:     /data/out");
      expect(deps.signals.removeAll).toHaveBeenCalled();
    });

    it("uses --from as the last day when --to is omitted", async () => {
      const api = createFakeApi();
      const { deps } = createDeps(api);

      await downloadMeasurements(deps, { from: "2024-01-15", all: true, outputDir: "/out" });

      const range = api.listMeasurements.mock.calls[0][2];
      expect(range.start.toISOString()).toBe("2024-01-15T00:00:00.000Z");
      expect(range.end.toISOString()).toBe("2024-01-15T23:59:59.000Z");
    });

    it("uses the key from the environment over the stored one", async () => {
      const api = createFakeApi();
      const { deps } = createDeps(api, { BACTOCLOUD_API_KEY: "env-key" });

      await downloadMeasurements(deps, { from: "2024-01-15", all: true, outputDir: "/out" });

      expect(api.authenticate).toHaveBeenCalledWith("env-key");
    });

    it("fails without any API key in non-interactive mode", async () => {
      const { deps } = createDeps(createFakeApi());
      deps.credentials.getApiKey.mockReturnValue(undefined);

      await expect(
        downloadMeasurements(deps, { from: "2024-01-15", all: true })
      ).rejects.toMatchObject({ code: "AUTH_MISSING_KEY" });
    });

    it("stops after an interrupt and reports the run as cancelled", async () => {
      const api = createFakeApi();
      const { deps, interrupt } = createDeps(api);
      api.listMeasurements.mockImplementation(async () => {
        interrupt();
        return [measurement];
      });

      const result = await downloadMeasurements(deps, {
        from: "2024-01-15",
        all: true,
        outputDir: "/out",
      });

      expect(result).toMatchObject({ cancelled: true, skipped: 1, succeeded: 0 });
      expect(api.fetchBinary).not.toHaveBeenCalled();
      expect(exitCodeFor(result)).toBe(130);
    });

    it("streams NDJSON events in JSON mode", async () => {
      initContext(["node", "bactocloud", "--json", "--no-input"], {});
      const { deps } = createDeps(createFakeApi());

      await downloadMeasurements(deps, { from: "2024-01-15", device: ["SN1"], outputDir: "/out" });

      expect(consoleLogSpy.mock.calls[0][0]).toBe(
        '{"type":"state","timestamp":"2024-01-20T08:00:00.000Z","state":"listing"}'
      );
      const lastLine = consoleLogSpy.mock.calls[consoleLogSpy.mock.calls.length - 1][0];
      expect(JSON.parse(String(lastLine))).toMatchObject({
        type: "complete",
        summary: { total: 1, succeeded: 1, failed: 0 },
      });
    });
  });

  describe("download command", () => {
    function createProgram(deps: CommandDeps): Command {
      const program = new Command();
      program.exitOverride();
      registerDownloadCommand(program, deps);
      return program;
    }

    it("exits 0 after a clean run", async () => {
      const { deps } = createDeps(createFakeApi());

      await createProgram(deps).parseAsync([
        "node",
        "test",
        "download",
        "-f",
        "2024-01-15",
        "-d",
        "SN1",
        "-o",
        "/data/out",
      ]);

      expect(process.exitCode).toBe(0);
    });

    it("exits 1 when a measurement fails", async () => {
      const api = createFakeApi();
      api.fetchBinary.mockRejectedValue(new Error("socket hang up"));
      const { deps } = createDeps(api);

      await createProgram(deps).parseAsync(["node", "test", "download", "-f", "2024-01-15", "--all"]);

      expect(process.exitCode).toBe(1);
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining("socket hang up"));
    });

    it("renders argument errors", async () => {
      const { deps } = createDeps(createFakeApi());

      await createProgram(deps).parseAsync(["node", "test", "download", "--all"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Missing --from"));
      expect(process.exitCode).toBe(1);
    });
  });
});
