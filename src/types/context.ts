/**
 * Run context - flows through the orchestrator and into every worker
 */

import type { ConversionConfig } from "./config";
import type { ConverterFactory } from "./converter";
import type { ConversionOutcome, ItemResult, WorkItem } from "./files";
import type { Logger } from "../utils/logger";

export type DeviceClass = "none" | "cuda" | "mps";

export type ProgressEvent =
  | { type: "plan"; total: number; device: DeviceClass; workers: number }
  | { type: "start"; index: number; total: number; item: WorkItem }
  | {
      type: "complete";
      completed: number;
      total: number;
      item: WorkItem;
      outcome: ConversionOutcome;
    };

export type ProgressListener = (event: ProgressEvent) => void;

export interface BatchContext {
  config: ConversionConfig;
  logger: Logger;

  // Input extensions of the selected backend (e.g., [".pdf"])
  extensions: readonly string[];
  createConverter: ConverterFactory;

  // Injection points for tests; default to host detection
  probe?: () => Promise<DeviceClass>;
  parallelism?: number;
  onProgress?: ProgressListener;
}

export type RunResult =
  | { status: "no-work"; results: [] }
  | {
      status: "completed";
      results: ItemResult[];
      device: DeviceClass;
      workers: number;
      totalSeconds: number;
    };

export interface RunSummary {
  total: number;
  successCount: number;
  failureCount: number;
  meanElapsedSeconds: number;
}
