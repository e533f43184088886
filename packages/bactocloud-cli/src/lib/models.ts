import { z } from "zod";

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema = z.record(JsonValueSchema);

// ---------------------------------------------------------------------------
// Remote records
// ---------------------------------------------------------------------------

/** Device as returned by `GET /api/v1/device` */
export const DeviceRecordSchema = z
  .object({
    _id: z.string(),
    serial_number: z.string().optional(),
    name: z.string().optional(),
    organization: z.string().optional(),
    organization_id: z.string().optional(),
  })
  .passthrough();

/** Measurement as returned inside `POST /api/v1/data/list` */
export const MeasurementRecordSchema = z
  .object({
    _id: z.string(),
    timestamp: z.string().nullable().optional(),
    name: z.string().nullable().optional(),
    file_id: z.string().nullable().optional(),
    device_id: z.union([z.string(), z.number()]).nullable().optional(),
  })
  .passthrough();

export const MeasurementPageSchema = z
  .object({
    data: z.array(z.unknown()).default([]),
    total: z.number().int().nonnegative().optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Domain types
// ---------------------------------------------------------------------------

export interface Device {
  id: string;
  serialNumber: string;
  name: string;
  organizationId?: string;
}

export interface Measurement {
  id: string;
  deviceId: string;
  /** ISO-8601 timestamp exactly as the API sent it */
  timestamp: string;
  name: string;
  /** Reference to the binary payload; absent when the device uploaded none */
  fileId?: string;
  /** Full remote document, computation metadata included */
  record: JsonObject;
}

export function toDevice(record: z.infer<typeof DeviceRecordSchema>): Device {
  return {
    id: record._id,
    serialNumber: record.serial_number ?? "Unknown",
    name: record.name ?? "Unnamed",
    organizationId: record.organization ?? record.organization_id,
  };
}

export function toMeasurement(
  record: z.infer<typeof MeasurementRecordSchema>,
  raw: JsonObject,
  device: Device
): Measurement {
  return {
    id: record._id,
    deviceId: record.device_id != null ? String(record.device_id) : device.id,
    timestamp: record.timestamp ?? "",
    name: record.name ?? "unnamed",
    fileId: record.file_id ?? undefined,
    record: raw,
  };
}

// ---------------------------------------------------------------------------
// Timestamps
// ---------------------------------------------------------------------------

const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_TIME_SEPARATOR = /^(\d{4}-\d{2}-\d{2})[T ]/i;

/**
 * Parse an API timestamp. Date-times without an offset are read as UTC;
 * `T` and a space are both accepted between date and time.
 */
export function parseTimestamp(value: string): Date | undefined {
  if (!value) return undefined;
  let normalized = value.trim().replace(DATE_TIME_SEPARATOR, "$1T");
  if (normalized.includes("T") && !HAS_OFFSET.test(normalized)) normalized += "Z";
  const ms = Date.parse(normalized);
  return isNaN(ms) ? undefined : new Date(ms);
}
