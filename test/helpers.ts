import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { AppLogger, LogEntry } from "../core/logging/createLogger.js";

export async function makeTempDir(prefix = "plotvault-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function captureLogger(): { logger: AppLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: (entry) => entries.push(entry), entries };
}

export function manualClock(start = Date.parse("2026-01-31T00:00:00.000Z")) {
  let now = start;
  return {
    clock: () => now,
    advance(ms: number) {
      now += ms;
    },
    set(ms: number) {
      now = ms;
    },
  };
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export const GUID_A = "11111111-1111-4111-8111-111111111111";
export const GUID_B = "22222222-2222-4222-8222-222222222222";
export const GUID_C = "33333333-3333-4333-8333-333333333333";
export const GUID_D = "44444444-4444-4444-8444-444444444444";
