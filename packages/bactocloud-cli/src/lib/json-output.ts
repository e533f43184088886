/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import type { DownloadEvent, DownloadSummary, ItemStatus } from "./downloader.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface DevicesResultJson {
  devices: Array<{
    id: string;
    serialNumber: string;
    name: string;
    organizationId?: string;
  }>;
}

/** One line of the NDJSON stream written while a download runs */
export type DownloadEventJson =
  | { type: "state"; timestamp: string; state: string }
  | { type: "device"; timestamp: string; serial: string; listed: number; inRange: number }
  | {
      type: "progress";
      timestamp: string;
      index: number;
      total: number;
      name: string;
      serial: string;
      status: ItemStatus;
      directory?: string;
      error?: { code: string; message: string };
    }
  | { type: "complete"; timestamp: string; summary: DownloadSummary };

export interface AuthStatusJson {
  stored: boolean;
  source?: "flag" | "env" | "store";
  valid?: boolean;
  error?: { code: string; message: string };
}

export interface ConfigCheckJson {
  path: string;
  status: "valid" | "invalid" | "missing";
  error?: string;
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Convert a downloader event to its NDJSON form.
 */
export function toEventJson(event: DownloadEvent, timestamp: string): DownloadEventJson {
  switch (event.type) {
    case "state":
      return { type: "state", timestamp, state: event.state };
    case "device":
      return {
        type: "device",
        timestamp,
        serial: event.device.serialNumber,
        listed: event.listed,
        inRange: event.inRange,
      };
    case "progress":
      return {
        type: "progress",
        timestamp,
        index: event.index,
        total: event.total,
        name: event.name,
        serial: event.serial,
        status: event.status,
        ...(event.paths && { directory: event.paths.directory }),
        ...(event.error && { error: { code: event.error.code, message: event.error.message } }),
      };
    case "complete":
      return { type: "complete", timestamp, summary: event.summary };
  }
}

/**
 * Output an NDJSON event (for streaming download progress).
 */
export function outputNdjson(event: DownloadEventJson): void {
  console.log(JSON.stringify(event));
}
