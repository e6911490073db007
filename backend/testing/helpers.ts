import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import type { Clock } from "../shared/date-utils";

export async function makeDataDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "hr-store-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export interface ManualClock {
  clock: Clock;
  set(iso: string): void;
  advance(ms: number): void;
}

export function manualClock(startIso: string): ManualClock {
  let current = new Date(startIso).getTime();
  return {
    clock: () => new Date(current),
    set: (iso) => {
      current = new Date(iso).getTime();
    },
    advance: (ms) => {
      current += ms;
    },
  };
}
