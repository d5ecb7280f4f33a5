/**
 * Run ID for the current process.
 * Tags every log line of one cipher session so interleaved logs can be told apart.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID: date prefix + random suffix (e.g. "20240115-a1b2c3").
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Set the run ID for this process, generating one unless given.
 * Call once at startup.
 */
export function initRunId(runId: string = generateRunId()): string {
  currentRunId = runId;
  return currentRunId;
}

/**
 * Current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
