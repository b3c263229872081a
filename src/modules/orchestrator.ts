/**
 * Batch Orchestrator
 * Enumerates work, sizes the pool and dispatches every item to a worker
 */

import { mkdir } from "fs/promises";
import path from "node:path";
import { performance } from "node:perf_hooks";
import { describeError } from "../errors";
import { scan } from "./scanner";
import { probe, resolveWorkerCount } from "./prober";
import { runPool } from "./pool";
import { convertItem, type WorkerOptions } from "./worker";
import { formatOutcome } from "./stats";
import type { Logger } from "../utils/logger";
import type {
  BatchContext,
  ItemResult,
  ProgressListener,
  RunResult,
  WorkItem,
} from "../types";

/**
 * Run one batch
 *
 * With a single worker items are converted strictly in enumeration order.
 * With more, results arrive in completion order: each ItemResult pairs an
 * item with its outcome, and callers that need input order re-sort by item.
 *
 * @throws DiscoveryError when the input directory cannot be scanned
 */
export async function run(ctx: BatchContext): Promise<RunResult> {
  const { config, logger } = ctx;

  const items = await scan(config.input, config.output, ctx.extensions);
  if (items.length === 0) {
    return { status: "no-work", results: [] };
  }

  await mkdir(path.resolve(config.output), { recursive: true });

  const device = await (ctx.probe ?? probe)();
  const workers = resolveWorkerCount(device, config.workers, ctx.parallelism);
  const total = items.length;
  const notify = guardListener(ctx.onProgress ?? logProgress(logger), logger);

  notify({ type: "plan", total, device, workers });

  const options: WorkerOptions = {
    createConverter: ctx.createConverter,
    device,
    format: config.converter.format,
    metadata: config.metadata,
    timeout: config.converter.timeout,
    logger,
  };

  // Keeps the one-outcome-per-item invariant even if a worker breaks its contract
  const settle = async (item: WorkItem): Promise<ItemResult> => {
    try {
      return { item, outcome: await convertItem(item, options) };
    } catch (error) {
      logger.error(`Worker crashed on ${item.name}`, error);
      return {
        item,
        outcome: {
          status: "failure",
          reason: "convert-error",
          errorMessage: describeError(error),
          elapsedSeconds: 0,
        },
      };
    }
  };

  const startedAt = performance.now();
  let results: ItemResult[];

  if (workers === 1) {
    results = [];
    for (const [index, item] of items.entries()) {
      notify({ type: "start", index: index + 1, total, item });
      const result = await settle(item);
      results.push(result);
      notify({
        type: "complete",
        completed: index + 1,
        total,
        item,
        outcome: result.outcome,
      });
    }
  } else {
    let completed = 0;
    results = await runPool(items, workers, settle, (result) => {
      completed++;
      notify({
        type: "complete",
        completed,
        total,
        item: result.item,
        outcome: result.outcome,
      });
    });
  }

  return {
    status: "completed",
    results,
    device,
    workers,
    totalSeconds: (performance.now() - startedAt) / 1000,
  };
}

// A failing progress listener is logged and never aborts the batch
function guardListener(listener: ProgressListener, logger: Logger): ProgressListener {
  return (event) => {
    try {
      listener(event);
    } catch (error) {
      logger.warn(`Progress listener failed on "${event.type}": ${describeError(error)}`);
    }
  };
}

/**
 * Default progress listener: one log line per event
 */
export function logProgress(logger: Logger): ProgressListener {
  return (event) => {
    switch (event.type) {
      case "plan":
        logger.info(`Found ${event.total} files`);
        logger.info(`Using device: ${event.device}`);
        logger.info(`Using ${event.workers} workers`);
        break;
      case "start":
        logger.info(`Processing ${event.index}/${event.total}: ${event.item.name}`);
        break;
      case "complete": {
        const line = `(${event.completed}/${event.total}) ${formatOutcome(event.item, event.outcome)}`;
        if (event.outcome.status === "success") {
          logger.info(line);
        } else {
          logger.warn(line);
        }
        break;
      }
    }
  };
}
