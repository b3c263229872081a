/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { probe, resolveWorkerCount, torchDevice } from "./prober";
export { convertItem, resolveText } from "./worker";
export type { WorkerOptions } from "./worker";
export { runPool } from "./pool";
export { run, logProgress } from "./orchestrator";
export {
  summarize,
  formatOutcome,
  formatReport,
  displayStats,
  exportStats,
} from "./stats";
