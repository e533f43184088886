import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { writeFailed } from "./errors/catalog.js";
import { parseTimestamp, type Device, type JsonObject, type Measurement } from "./models.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadTarget {
  /** `{root}/{serial}/{timestamp}_{name}` */
  directory: string;
  metadataPath: string;
  binaryPath: string;
}

export interface WrittenPaths {
  directory: string;
  metadataPath: string;
  /** Absent when the measurement had no binary payload */
  binaryPath?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const METADATA_FILENAME = "measurement.json";
export const BINARY_FILENAME = "data.fcs";
export const UNKNOWN_DATE = "unknown_date";

// ---------------------------------------------------------------------------
// Path derivation
// ---------------------------------------------------------------------------

/**
 * Reduce a string to letters, digits, spaces, underscores and hyphens.
 * Anything else is dropped; an empty result falls back to `fallback`.
 */
export function sanitizePathComponent(value: string, fallback: string): string {
  const cleaned = value.replace(/[^\p{L}\p{N} _-]/gu, "").trim();
  return cleaned || fallback;
}

const WALL_CLOCK = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?/i;

/**
 * `2024-01-15T10:30:00+02:00` → `2024-01-15_10-30-00`. The date and time are
 * taken as written; an offset is not applied.
 */
export function formatFolderTimestamp(timestamp: string): string {
  const match = WALL_CLOCK.exec(timestamp.trim());
  if (!match || !parseTimestamp(timestamp)) return UNKNOWN_DATE;
  const [, date, hours = "00", minutes = "00", seconds = "00"] = match;
  return `${date}_${hours}-${minutes}-${seconds}`;
}

export function measurementFolderName(measurement: Measurement): string {
  const date = formatFolderTimestamp(measurement.timestamp);
  return `${date}_${sanitizePathComponent(measurement.name, "unnamed")}`;
}

export function resolveDownloadTarget(
  root: string,
  device: Device,
  measurement: Measurement
): DownloadTarget {
  const directory = join(
    root,
    sanitizePathComponent(device.serialNumber, "unknown"),
    measurementFolderName(measurement)
  );
  return {
    directory,
    metadataPath: join(directory, METADATA_FILENAME),
    binaryPath: join(directory, BINARY_FILENAME),
  };
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

async function writeOrFail(path: string, data: string | Uint8Array): Promise<void> {
  try {
    if (typeof data === "string") {
      await writeFile(path, data, "utf-8");
    } else {
      await writeFile(path, data);
    }
  } catch (error) {
    throw writeFailed(path, error);
  }
}

/**
 * Write a measurement's metadata and binary payload below `root`.
 * Directories are created as needed and existing files are overwritten.
 */
export async function writeMeasurement(
  root: string,
  device: Device,
  measurement: Measurement,
  metadata: JsonObject,
  binary?: Uint8Array
): Promise<WrittenPaths> {
  const target = resolveDownloadTarget(root, device, measurement);

  try {
    await mkdir(target.directory, { recursive: true });
  } catch (error) {
    throw writeFailed(target.directory, error);
  }

  await writeOrFail(target.metadataPath, JSON.stringify(metadata, null, 2));

  if (binary === undefined) {
    return { directory: target.directory, metadataPath: target.metadataPath };
  }

  await writeOrFail(target.binaryPath, binary);
  return target;
}
