import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import {
  runDownload,
  selectDevices,
  withRetry,
  type DownloadEvent,
  type DownloadRequest,
} from "./downloader.js";
import type { ApiClient, Session } from "./api-client.js";
import { createDateRange, type DateRange } from "./date-range.js";
import {
  apiNotFound,
  invalidApiKey,
  networkOffline,
  networkTimeout,
  permissionDenied,
  writeFailed,
} from "./errors/catalog.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { Device, JsonObject, Measurement } from "./models.js";
import type { Clock } from "./ports/clock.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const devices: Device[] = [
  { id: "dev-1", serialNumber: "SN1", name: "Reactor A" },
  { id: "dev-2", serialNumber: "SN2", name: "Reactor B" },
];

function measurement(id: string, timestamp: string, deviceId = "dev-1", fileId?: string): Measurement {
  return {
    id,
    deviceId,
    timestamp,
    name: `Run ${id}`,
    fileId: fileId ?? `file-${id}`,
    record: { _id: id },
  };
}

let measurementsByDevice: Record<string, Measurement[]>;

function createFakeApi() {
  return {
    authenticate: vi.fn(
      async (apiKey: string): Promise<Session> => ({ apiKey, authenticatedAt: new Date(0) })
    ),
    listDevices: vi.fn(async (_session: Session): Promise<Device[]> => devices),
    listMeasurements: vi.fn(
      async (_session: Session, device: Device, _range: DateRange): Promise<Measurement[]> =>
        measurementsByDevice[device.id] ?? []
    ),
    fetchMetadata: vi.fn(
      async (_session: Session, m: Measurement): Promise<JsonObject> => m.record
    ),
    fetchBinary: vi.fn(
      async (_session: Session, _m: Measurement): Promise<Uint8Array> => new Uint8Array([1, 2, 3])
    ),
  } satisfies ApiClient;
}

function createFakeWriter() {
  return vi.fn(
    async (
      root: string,
      device: Device,
      m: Measurement,
      _metadata: JsonObject,
      binary?: Uint8Array
    ) => {
      const directory = `${root}/${device.serialNumber}/${m.id}`;
      return {
        directory,
        metadataPath: `${directory}/measurement.json`,
        binaryPath: binary ? `${directory}/data.fcs` : undefined,
      };
    }
  );
}

function steppingClock(stepMs: number): Clock {
  let t = 1_000;
  return {
    now: () => (t += stepMs),
    newDate: () => new Date(t),
  };
}

const range = createDateRange("2024-01-15", "2024-01-16");

function request(overrides: Partial<DownloadRequest> = {}): DownloadRequest {
  return { apiKey: "test-key", devices: ["SN1"], range, outputDir: "/out", ...overrides };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("downloader", () => {
  let api: ReturnType<typeof createFakeApi>;
  let write: ReturnType<typeof createFakeWriter>;
  let delay: Mock<(ms: number) => Promise<void>>;
  let events: DownloadEvent[];

  beforeEach(() => {
    measurementsByDevice = {
      "dev-1": [
        measurement("m-1", "2024-01-15T08:00:00Z"),
        measurement("m-2", "2024-01-15T09:00:00Z"),
        measurement("m-3", "2024-01-16T10:00:00Z"),
      ],
      "dev-2": [measurement("m-4", "2024-01-15T12:00:00Z", "dev-2")],
    };
    api = createFakeApi();
    write = createFakeWriter();
    delay = vi.fn(async (_ms: number) => {});
    events = [];
  });

  function deps() {
    return {
      api,
      write,
      delay,
      clock: steppingClock(250),
      logger: createNoopLogger(),
      onEvent: (event: DownloadEvent) => events.push(event),
    };
  }

  function states(): string[] {
    return events.flatMap((event) => (event.type === "state" ? [event.state] : []));
  }

  describe("selectDevices", () => {
    it("returns every device for 'all'", () => {
      expect(selectDevices(devices, "all")).toEqual(devices);
    });

    it("keeps the requested order and drops duplicates", () => {
      const selected = selectDevices(devices, ["SN2", " SN1 ", "SN2"]);

      expect(selected.map((d) => d.serialNumber)).toEqual(["SN2", "SN1"]);
    });

    it("rejects unknown serials", () => {
      expect(() => selectDevices(devices, ["SN1", "SN9", "SN8"])).toThrow(
        expect.objectContaining({
          code: "VALIDATION_UNKNOWN_DEVICE",
          message: "Unknown device serials: SN9, SN8",
        })
      );
    });
  });

  describe("withRetry", () => {
    it("backs off exponentially on retryable errors", async () => {
      const operation = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(networkOffline("reset"))
        .mockRejectedValueOnce(networkTimeout(1000))
        .mockResolvedValueOnce("ok");

      await expect(
        withRetry(operation, { attempts: 3, baseDelayMs: 100, delay, logger: createNoopLogger() })
      ).resolves.toBe("ok");

      expect(operation).toHaveBeenCalledTimes(3);
      expect(delay.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    });

    it("makes no further attempt once the signal aborts during the backoff", async () => {
      const controller = new AbortController();
      delay.mockImplementation(async () => controller.abort());
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(networkOffline("reset"));

      await expect(
        withRetry(operation, {
          attempts: 3,
          baseDelayMs: 100,
          delay,
          logger: createNoopLogger(),
          signal: controller.signal,
        })
      ).rejects.toMatchObject({ code: "NETWORK_OFFLINE" });

      expect(operation).toHaveBeenCalledTimes(1);
      expect(delay).toHaveBeenCalledTimes(1);
    });

    it("does not back off when already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(networkOffline("reset"));

      await expect(
        withRetry(operation, {
          attempts: 3,
          baseDelayMs: 100,
          delay,
          logger: createNoopLogger(),
          signal: controller.signal,
        })
      ).rejects.toMatchObject({ code: "NETWORK_OFFLINE" });

      expect(delay).not.toHaveBeenCalled();
    });

    it("gives up after the configured attempts", async () => {
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(networkOffline("reset"));

      await expect(
        withRetry(operation, { attempts: 1, baseDelayMs: 100, delay, logger: createNoopLogger() })
      ).rejects.toMatchObject({ code: "NETWORK_OFFLINE" });

      expect(operation).toHaveBeenCalledTimes(2);
    });

    it("does not retry other errors", async () => {
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(apiNotFound("file"));

      await expect(
        withRetry(operation, { attempts: 3, baseDelayMs: 100, delay, logger: createNoopLogger() })
      ).rejects.toMatchObject({ code: "API_NOT_FOUND" });

      expect(operation).toHaveBeenCalledTimes(1);
      expect(delay).not.toHaveBeenCalled();
    });
  });

  describe("runDownload", () => {
    it("downloads every measurement in range, in order", async () => {
      measurementsByDevice["dev-1"].push(measurement("m-old", "2024-01-10T08:00:00Z"));

      const summary = await runDownload(request(), deps());

      expect(write.mock.calls.map(([, , m]) => m.id)).toEqual(["m-1", "m-2", "m-3"]);
      expect(summary).toEqual({
        total: 3,
        succeeded: 3,
        failed: 0,
        skipped: 0,
        cancelled: false,
        failures: [],
        outputDir: "/out",
        durationMs: 250,
      });
      expect(states()).toEqual(["listing", "filtering", "downloading", "done"]);
    });

    it("reports listing counts and progress events", async () => {
      await runDownload(request(), deps());

      expect(events).toContainEqual({ type: "device", device: devices[0], listed: 3, inRange: 3 });
      const progress = events.flatMap((event) =>
        event.type === "progress" ? [[event.index, event.total, event.name, event.status]] : []
      );
      expect(progress).toEqual([
        [1, 3, "Run m-1", "downloaded"],
        [2, 3, "Run m-2", "downloaded"],
        [3, 3, "Run m-3", "downloaded"],
      ]);
      expect(events[events.length - 1]).toMatchObject({ type: "complete" });
    });

    it("records a failed measurement and carries on", async () => {
      api.fetchBinary.mockImplementation(async (_session, m) => {
        if (m.id === "m-2") throw networkOffline("connection reset");
        return new Uint8Array([1]);
      });

      const summary = await runDownload(request(), deps());

      expect(write).toHaveBeenCalledTimes(2);
      expect(summary.succeeded).toBe(2);
      expect(summary.failed).toBe(1);
      expect(summary.failures).toEqual([
        {
          measurementId: "m-2",
          name: "Run m-2",
          serial: "SN1",
          code: "NETWORK_OFFLINE",
          message: "Can't connect to BactoCloud",
        },
      ]);
    });

    it("records write failures", async () => {
      write.mockRejectedValueOnce(writeFailed("/out/SN1/m-1/measurement.json", new Error("EACCES")));

      const summary = await runDownload(request(), deps());

      expect(summary.succeeded).toBe(2);
      expect(summary.failures[0]).toMatchObject({ measurementId: "m-1", code: "FILE_WRITE_FAILED" });
    });

    it("retries a measurement before recording it", async () => {
      api.fetchBinary
        .mockRejectedValueOnce(networkTimeout(30000))
        .mockResolvedValue(new Uint8Array([1]));

      const summary = await runDownload(
        request({ retryAttempts: 2, retryDelayMs: 500 }),
        deps()
      );

      expect(summary.succeeded).toBe(3);
      expect(summary.failed).toBe(0);
      expect(delay.mock.calls.map(([ms]) => ms)).toEqual([500]);
    });

    it("cancels during a retry backoff without another attempt", async () => {
      const controller = new AbortController();
      delay.mockImplementation(async () => controller.abort());
      api.fetchBinary.mockRejectedValue(networkTimeout(30000));

      const summary = await runDownload(
        request({ retryAttempts: 3, retryDelayMs: 60000, signal: controller.signal }),
        deps()
      );

      expect(api.fetchBinary).toHaveBeenCalledTimes(1);
      expect(summary).toMatchObject({ total: 3, failed: 1, skipped: 2, cancelled: true });
    });

    it("leaves item failures and retries to the progress events, below warn level", async () => {
      const logger: Logger & Record<"info" | "warn" | "error", Mock> = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        child: () => logger,
      };
      api.fetchBinary
        .mockRejectedValueOnce(networkTimeout(30000))
        .mockRejectedValueOnce(networkOffline("reset"));

      await runDownload(request({ retryAttempts: 1 }), { ...deps(), logger });

      expect(logger.info).toHaveBeenCalledWith("Attempt failed, retrying", expect.anything());
      expect(logger.info).toHaveBeenCalledWith("Measurement failed", expect.anything());
      expect(logger.warn).not.toHaveBeenCalled();
      expect(logger.error).not.toHaveBeenCalled();
    });

    it("saves metadata only when a measurement has no file", async () => {
      measurementsByDevice["dev-1"] = [{ ...measurement("m-1", "2024-01-15T08:00:00Z"), fileId: undefined }];

      const summary = await runDownload(request(), deps());

      expect(api.fetchBinary).not.toHaveBeenCalled();
      expect(write.mock.calls[0][4]).toBeUndefined();
      expect(summary.succeeded).toBe(1);
      expect(events).toContainEqual(expect.objectContaining({ type: "progress", status: "metadata-only" }));
    });

    it("rejects before listing when authentication fails", async () => {
      api.authenticate.mockRejectedValue(invalidApiKey());

      await expect(runDownload(request(), deps())).rejects.toMatchObject({
        code: "AUTH_INVALID_KEY",
      });

      expect(api.listMeasurements).not.toHaveBeenCalled();
      expect(write).not.toHaveBeenCalled();
      expect(states()).toEqual(["listing", "failed"]);
    });

    it("fails on an unknown serial without downloading", async () => {
      await expect(runDownload(request({ devices: ["SN9"] }), deps())).rejects.toMatchObject({
        code: "VALIDATION_UNKNOWN_DEVICE",
        message: "Unknown device serial: SN9",
      });

      expect(api.listMeasurements).not.toHaveBeenCalled();
    });

    it("fails when a listing request fails", async () => {
      api.listMeasurements.mockRejectedValue(networkOffline("connection refused"));

      await expect(runDownload(request(), deps())).rejects.toMatchObject({
        code: "NETWORK_OFFLINE",
      });

      expect(write).not.toHaveBeenCalled();
    });

    it("stops the batch on an authorization error", async () => {
      api.fetchBinary.mockRejectedValue(permissionDenied("missing PermDataView"));

      await expect(runDownload(request(), deps())).rejects.toMatchObject({
        code: "AUTH_PERMISSION_DENIED",
      });

      expect(api.fetchBinary).toHaveBeenCalledTimes(1);
      expect(write).not.toHaveBeenCalled();
      expect(states()).toEqual(["listing", "filtering", "downloading", "failed"]);
    });

    it("stops between measurements when cancelled", async () => {
      const controller = new AbortController();
      const base = deps();

      const summary = await runDownload(request({ signal: controller.signal }), {
        ...base,
        onEvent: (event) => {
          base.onEvent(event);
          if (event.type === "progress") controller.abort();
        },
      });

      expect(write).toHaveBeenCalledTimes(1);
      expect(summary).toMatchObject({ succeeded: 1, skipped: 2, cancelled: true, total: 3 });
      expect(states()).toEqual(["listing", "filtering", "downloading", "done"]);
    });

    it("downloads every device for 'all'", async () => {
      const summary = await runDownload(request({ devices: "all" }), deps());

      expect(api.listMeasurements).toHaveBeenCalledTimes(2);
      expect(summary.total).toBe(4);
      expect(write.mock.calls.map(([, device]) => device.serialNumber)).toEqual([
        "SN1",
        "SN1",
        "SN1",
        "SN2",
      ]);
    });

    it("downloads a measurement listed twice only once", async () => {
      measurementsByDevice["dev-1"].push(measurement("m-1", "2024-01-15T08:00:00Z"));

      const summary = await runDownload(request(), deps());

      expect(summary.total).toBe(3);
    });

    it("writes below the requested output directory", async () => {
      await runDownload(request({ outputDir: "/data/fcs" }), deps());

      expect(write.mock.calls[0][0]).toBe("/data/fcs");
    });
  });
});
