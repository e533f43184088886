import fetch from "node-fetch";
import type { RequestInit } from "node-fetch";
import Conf from "conf";
import { z } from "zod";
import {
  apiNotFound,
  fromHttpStatus,
  invalidResponse,
  missingApiKey,
  networkOffline,
  networkTimeout,
} from "./errors/catalog.js";
import { isCLIError } from "./errors/types.js";
import { formatApiDate, type DateRange } from "./date-range.js";
import {
  DeviceRecordSchema,
  JsonObjectSchema,
  MeasurementPageSchema,
  MeasurementRecordSchema,
  toDevice,
  toMeasurement,
  type Device,
  type JsonObject,
  type Measurement,
} from "./models.js";
import type { Clock } from "./ports/clock.js";
import { systemClock } from "./adapters/system-clock.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { CONFIG_DEFAULTS } from "./config.js";

// ---------------------------------------------------------------------------
// Credential storage
// ---------------------------------------------------------------------------

interface StoredCredentials {
  apiKey?: string;
}

export interface CredentialStore {
  getApiKey(): string | undefined;
  setApiKey(apiKey: string): void;
  clearApiKey(): void;
}

export class ConfCredentialStore implements CredentialStore {
  private readonly conf = new Conf<StoredCredentials>({ projectName: "bactocloud-downloader" });

  getApiKey(): string | undefined {
    return this.conf.get("apiKey");
  }

  setApiKey(apiKey: string): void {
    if (!apiKey.trim()) {
      throw missingApiKey();
    }
    this.conf.set("apiKey", apiKey.trim());
  }

  clearApiKey(): void {
    this.conf.delete("apiKey");
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/** The parts of a fetch response the client reads */
export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (url: URL, init: RequestInit) => Promise<FetchResponse>;

export interface ApiClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Measurements requested per page of `/api/v1/data/list` */
  pageSize?: number;
  fetchImpl?: FetchLike;
  clock?: Clock;
  logger?: Logger;
}

/** Proof that an API key was accepted */
export interface Session {
  apiKey: string;
  authenticatedAt: Date;
}

export interface ApiClient {
  authenticate(apiKey: string): Promise<Session>;
  listDevices(session: Session): Promise<Device[]>;
  listMeasurements(session: Session, device: Device, range: DateRange): Promise<Measurement[]>;
  fetchMetadata(session: Session, measurement: Measurement): Promise<JsonObject>;
  fetchBinary(session: Session, measurement: Measurement): Promise<Uint8Array>;
}

const DEVICES_PATH = "/api/v1/device";
const DATA_LIST_PATH = "/api/v1/data/list";
const DATA_FILE_PATH = "/api/v1/data/file";

/** Upper bound on pages fetched for one device, in case a server ignores `page` */
const MAX_PAGES = 1000;

interface SendOptions {
  method: "GET" | "POST";
  query?: Record<string, string>;
  body?: unknown;
}

export function createApiClient({
  baseUrl = CONFIG_DEFAULTS.baseUrl,
  timeoutMs = CONFIG_DEFAULTS.timeoutMs,
  pageSize = CONFIG_DEFAULTS.pageSize,
  fetchImpl = fetch,
  clock = systemClock,
  logger = createNoopLogger(),
}: ApiClientOptions = {}): ApiClient {
  const log = logger.child({ component: "api" });

  function toTransportError(error: unknown): Error {
    if (isCLIError(error)) return error;
    if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
      return networkTimeout(timeoutMs, error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return networkOffline(message, error);
  }

  /**
   * Run one request and read its body. Transport failures become
   * NETWORK_* errors, HTTP failures the matching catalog error.
   */
  async function send<T>(
    apiKey: string,
    path: string,
    options: SendOptions,
    read: (response: FetchResponse) => Promise<T>
  ): Promise<T> {
    const url = new URL(path, baseUrl);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    log.debug("API request", { method: options.method, path });

    try {
      const response = await fetchImpl(url, {
        method: options.method,
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        const text = await response.text();
        log.debug("API request failed", { method: options.method, path, status: response.status });
        throw fromHttpStatus(response.status, response.statusText, parsePayload(text));
      }

      return await read(response);
    } catch (error) {
      throw toTransportError(error);
    }
  }

  async function readJson(response: FetchResponse): Promise<unknown> {
    const text = await response.text();
    return text ? parsePayload(text) : undefined;
  }

  function validate<S extends z.ZodTypeAny>(schema: S, payload: unknown, path: string): z.infer<S> {
    const result = schema.safeParse(payload);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw invalidResponse(path, issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : undefined);
    }
    return result.data;
  }

  function fetchDeviceList(apiKey: string): Promise<unknown> {
    return send(apiKey, DEVICES_PATH, { method: "GET", query: { no_virtual: "true" } }, readJson);
  }

  async function authenticate(apiKey: string): Promise<Session> {
    const key = apiKey.trim();
    if (!key) throw missingApiKey();

    await fetchDeviceList(key);
    log.debug("API key accepted");
    return { apiKey: key, authenticatedAt: clock.newDate() };
  }

  async function listDevices(session: Session): Promise<Device[]> {
    const payload = await fetchDeviceList(session.apiKey);
    return validate(z.array(DeviceRecordSchema), payload, DEVICES_PATH).map(toDevice);
  }

  async function listMeasurements(
    session: Session,
    device: Device,
    range: DateRange
  ): Promise<Measurement[]> {
    const measurements: Measurement[] = [];
    let received = 0;

    for (let page = 1; page <= MAX_PAGES; page++) {
      const payload = await send(
        session.apiKey,
        DATA_LIST_PATH,
        {
          method: "POST",
          body: {
            deviceIDs: [device.id],
            startDate: formatApiDate(range.start),
            endDate: formatApiDate(range.end),
            pageSize,
            page,
          },
        },
        readJson
      );

      const { data, total } = validate(MeasurementPageSchema, payload, DATA_LIST_PATH);
      received += data.length;
      for (const item of data) {
        const record = MeasurementRecordSchema.safeParse(item);
        const raw = JsonObjectSchema.safeParse(item);
        if (!record.success || !raw.success) {
          log.warn("Skipping malformed measurement record", {
            serial: device.serialNumber,
            page,
            issue: record.success ? "not a JSON object" : record.error.issues[0]?.message,
          });
          continue;
        }
        measurements.push(toMeasurement(record.data, raw.data, device));
      }

      log.debug("Fetched measurement page", {
        serial: device.serialNumber,
        page,
        count: data.length,
      });

      if (data.length < pageSize) break;
      if (total !== undefined && received >= total) break;
    }

    return measurements;
  }

  // Metadata arrives inline with the listing; the record is the document.
  async function fetchMetadata(_session: Session, measurement: Measurement): Promise<JsonObject> {
    return measurement.record;
  }

  async function fetchBinary(session: Session, measurement: Measurement): Promise<Uint8Array> {
    if (!measurement.fileId) {
      throw apiNotFound(`binary file for measurement ${measurement.id}`);
    }

    const path = `${DATA_FILE_PATH}/${encodeURIComponent(measurement.fileId)}`;
    const buffer = await send(session.apiKey, path, { method: "GET" }, (response) =>
      response.arrayBuffer()
    );
    return new Uint8Array(buffer);
  }

  return {
    authenticate,
    listDevices,
    listMeasurements,
    fetchMetadata,
    fetchBinary,
  };
}

function parsePayload(text: string): unknown {
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
