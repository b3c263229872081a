/**
 * Work item and outcome type definitions
 */

/**
 * One input document, enumerated once per run
 * Artifacts land in `destinationDir/<stem>/`
 */
export interface WorkItem {
  readonly name: string; // File name with extension (e.g., "report.pdf")
  readonly stem: string; // File name without extension (e.g., "report")
  readonly sourcePath: string; // Absolute path to the source document
  readonly destinationDir: string; // Run output directory
}

export type FailureReason = "convert-error" | "write-error" | "timeout";

export interface ConversionSuccess {
  status: "success";
  artifactPaths: string[];
  assetCount: number;
  pageCount?: number;
  elapsedSeconds: number;
}

export interface ConversionFailure {
  status: "failure";
  reason: FailureReason;
  errorMessage: string;
  elapsedSeconds: number;
}

// Exactly one outcome per WorkItem, returned by value from the worker
export type ConversionOutcome = ConversionSuccess | ConversionFailure;

export interface ItemResult {
  item: WorkItem;
  outcome: ConversionOutcome;
}
