import type { ApiClient, Session } from "./api-client.js";
import { filterByDateRange, type DateRange } from "./date-range.js";
import { unknownDevices, unknownError } from "./errors/catalog.js";
import {
  isCLIError,
  isFatalError,
  isRetryableError,
  type CLIError,
  type ErrorCode,
} from "./errors/types.js";
import { writeMeasurement, type WrittenPaths } from "./file-writer.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { Device, Measurement } from "./models.js";
import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";
import { systemClock } from "./adapters/system-clock.js";
import { realDelay } from "./adapters/real-timers.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DownloadState =
  | "idle"
  | "listing"
  | "filtering"
  | "downloading"
  | "done"
  | "failed";

export type DeviceSelection = readonly string[] | "all";

export interface DownloadRequest {
  apiKey: string;
  /** Serial numbers to download, or every device the key can see */
  devices: DeviceSelection;
  range: DateRange;
  outputDir: string;
  /** Extra attempts for a measurement after a network or server error */
  retryAttempts?: number;
  /** Base delay between attempts (exponential backoff applied) */
  retryDelayMs?: number;
  /** Checked between measurements; the request in flight is not interrupted */
  signal?: AbortSignal;
}

export type ItemStatus = "downloaded" | "metadata-only" | "failed";

export interface DownloadFailure {
  measurementId: string;
  name: string;
  serial: string;
  code: ErrorCode;
  message: string;
}

export interface DownloadSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** Measurements never attempted because the run was cancelled */
  skipped: number;
  cancelled: boolean;
  failures: DownloadFailure[];
  outputDir: string;
  durationMs: number;
}

export type DownloadEvent =
  | { type: "state"; state: DownloadState }
  | { type: "device"; device: Device; listed: number; inRange: number }
  | {
      type: "progress";
      index: number;
      total: number;
      name: string;
      serial: string;
      status: ItemStatus;
      paths?: WrittenPaths;
      error?: CLIError;
    }
  | { type: "complete"; summary: DownloadSummary };

export type MeasurementWriter = typeof writeMeasurement;

export interface DownloadDeps {
  api: ApiClient;
  logger?: Logger;
  clock?: Clock;
  delay?: DelayFn;
  write?: MeasurementWriter;
  onEvent?: (event: DownloadEvent) => void;
}

interface WorkItem {
  device: Device;
  measurement: Measurement;
}

interface DownloadPlan {
  session: Session;
  work: WorkItem[];
}

// ---------------------------------------------------------------------------
// Selection & retry
// ---------------------------------------------------------------------------

/**
 * Pick the requested devices, in the order given, without duplicates.
 * Unknown serials fail the whole selection.
 */
export function selectDevices(devices: readonly Device[], selection: DeviceSelection): Device[] {
  if (selection === "all") return [...devices];

  const bySerial = new Map(devices.map((device) => [device.serialNumber, device]));
  const serials = [...new Set(selection.map((serial) => serial.trim()))];
  const missing = serials.filter((serial) => !bySerial.has(serial));
  if (missing.length > 0) {
    throw unknownDevices(missing);
  }

  return serials.flatMap((serial) => {
    const device = bySerial.get(serial);
    return device ? [device] : [];
  });
}

function toCLIError(error: unknown): CLIError {
  return isCLIError(error) ? error : unknownError(error);
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: {
    attempts: number;
    baseDelayMs: number;
    delay: DelayFn;
    logger: Logger;
    /** No further attempt starts once this aborts; the last error is rethrown */
    signal?: AbortSignal;
  }
): Promise<T> {
  const { signal } = options;
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= options.attempts || !isRetryableError(error) || signal?.aborted) {
        throw error;
      }
      const waitMs = options.baseDelayMs * Math.pow(2, attempt);
      options.logger.info("Attempt failed, retrying", {
        attempt: attempt + 1,
        maxRetries: options.attempts,
        retryDelayMs: waitMs,
        error: toCLIError(error).message,
      });
      await options.delay(waitMs, signal);
      if (signal?.aborted) throw error;
    }
  }
}

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

/**
 * Authenticate, list and filter, then download every measurement in turn.
 *
 * Listing failures and authentication errors reject the run before any file
 * is written. Failures of a single measurement are recorded in the summary
 * and the loop moves on.
 */
export async function runDownload(
  request: DownloadRequest,
  deps: DownloadDeps
): Promise<DownloadSummary> {
  const {
    api,
    logger = createNoopLogger(),
    clock = systemClock,
    delay = realDelay,
    write = writeMeasurement,
    onEvent,
  } = deps;
  const log = logger.child({ component: "downloader" });
  const startedAt = clock.now();

  let state: DownloadState = "idle";
  const transition = (next: DownloadState) => {
    log.debug("State change", { from: state, to: next });
    state = next;
    onEvent?.({ type: "state", state });
  };

  const fail = (error: unknown): never => {
    const cliError = toCLIError(error);
    transition("failed");
    log.info("Download failed", { code: cliError.code, error: cliError.message });
    throw cliError;
  };

  async function plan(): Promise<DownloadPlan> {
    transition("listing");
    const session = await api.authenticate(request.apiKey);
    const devices = selectDevices(await api.listDevices(session), request.devices);

    const listed: Array<{ device: Device; measurements: Measurement[] }> = [];
    for (const device of devices) {
      const measurements = await api.listMeasurements(session, device, request.range);
      log.info("Listed measurements", { serial: device.serialNumber, count: measurements.length });
      listed.push({ device, measurements });
    }

    transition("filtering");
    const seen = new Set<string>();
    const work: WorkItem[] = [];
    for (const { device, measurements } of listed) {
      const inRange = filterByDateRange(measurements, request.range);
      onEvent?.({ type: "device", device, listed: measurements.length, inRange: inRange.length });
      for (const measurement of inRange) {
        if (seen.has(measurement.id)) continue;
        seen.add(measurement.id);
        work.push({ device, measurement });
      }
    }

    return { session, work };
  }

  async function downloadOne(session: Session, item: WorkItem): Promise<WrittenPaths> {
    const { device, measurement } = item;
    const metadata = await api.fetchMetadata(session, measurement);

    let binary: Uint8Array | undefined;
    if (measurement.fileId) {
      binary = await api.fetchBinary(session, measurement);
    } else {
      log.info("Measurement has no binary file", {
        measurementId: measurement.id,
        serial: device.serialNumber,
      });
    }

    return write(request.outputDir, device, measurement, metadata, binary);
  }

  const { session, work } = await plan().catch(fail);

  transition("downloading");
  const total = work.length;
  const failures: DownloadFailure[] = [];
  let succeeded = 0;
  let skipped = 0;
  let cancelled = false;

  for (let i = 0; i < total; i++) {
    if (request.signal?.aborted) {
      cancelled = true;
      skipped = total - i;
      log.info("Download cancelled", { completed: i, skipped });
      break;
    }

    const item = work[i];
    const progress = {
      index: i + 1,
      total,
      name: item.measurement.name,
      serial: item.device.serialNumber,
    };

    try {
      const paths = await withRetry(() => downloadOne(session, item), {
        attempts: request.retryAttempts ?? 0,
        baseDelayMs: request.retryDelayMs ?? 0,
        delay,
        logger: log,
        signal: request.signal,
      });
      succeeded++;
      log.info("Measurement saved", { ...progress, directory: paths.directory });
      onEvent?.({
        type: "progress",
        ...progress,
        status: paths.binaryPath ? "downloaded" : "metadata-only",
        paths,
      });
    } catch (error) {
      const cliError = toCLIError(error);
      if (isFatalError(cliError)) {
        fail(cliError);
      }
      failures.push({
        measurementId: item.measurement.id,
        name: item.measurement.name,
        serial: item.device.serialNumber,
        code: cliError.code,
        message: cliError.message,
      });
      log.info("Measurement failed", { ...progress, code: cliError.code, error: cliError.message });
      onEvent?.({ type: "progress", ...progress, status: "failed", error: cliError });
    }
  }

  transition("done");

  const summary: DownloadSummary = {
    total,
    succeeded,
    failed: failures.length,
    skipped,
    cancelled,
    failures,
    outputDir: request.outputDir,
    durationMs: clock.now() - startedAt,
  };
  onEvent?.({ type: "complete", summary });
  return summary;
}
