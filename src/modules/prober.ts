/**
 * Capability Prober
 * Detects compute acceleration and sizes the worker pool from it
 */

import { availableParallelism } from "node:os";
import { runCommand, type CommandRunner } from "../utils/run-command";
import type { DeviceClass, WorkersConfig } from "../types";

const PROBE_TIMEOUT_MS = 5000;

export interface ProbeOptions {
  run?: CommandRunner;
  platform?: NodeJS.Platform;
  arch?: string;
}

/**
 * Detect the acceleration class of this host
 *
 * - cuda: `nvidia-smi -L` succeeds and lists at least one GPU
 * - mps: macOS on Apple silicon
 * - none: anything else, including any failure to ask
 */
export async function probe(options: ProbeOptions = {}): Promise<DeviceClass> {
  const {
    run = runCommand,
    platform = process.platform,
    arch = process.arch,
  } = options;

  if (await hasCudaDevice(run)) {
    return "cuda";
  }
  if (platform === "darwin" && arch === "arm64") {
    return "mps";
  }
  return "none";
}

async function hasCudaDevice(run: CommandRunner): Promise<boolean> {
  try {
    const { stdout } = await run("nvidia-smi", ["-L"], {
      signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
    });
    return /^GPU \d+/m.test(stdout);
  } catch {
    return false;
  }
}

/**
 * Resolve how many conversions run at once
 *
 * The device ceiling (or the `max` override) is clamped to host
 * parallelism and never drops below 1.
 */
export function resolveWorkerCount(
  device: DeviceClass,
  workers: WorkersConfig,
  parallelism: number = availableParallelism(),
): number {
  const ceiling = workers.max ?? workers[device];
  const count = Math.min(toPositiveInt(ceiling), toPositiveInt(parallelism));
  return Math.max(1, count);
}

function toPositiveInt(value: number): number {
  return Number.isFinite(value) && value >= 1 ? Math.floor(value) : 1;
}

/**
 * Device name the engines' torch runtime understands
 */
export function torchDevice(device: DeviceClass): "cpu" | "cuda" | "mps" {
  return device === "none" ? "cpu" : device;
}
