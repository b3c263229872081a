/**
 * Converter capability - the boundary to conversion engines
 */

import type { BackendName } from "./config";
import type { DeviceClass } from "./context";

export interface PageText {
  page: number; // 1-based
  text: string;
}

export interface DocumentAsset {
  // Path relative to the item's output directory, "/"-separated
  // (e.g., "report_artifacts/image_000001.png")
  path: string;
  data: Uint8Array;
}

export interface ConvertedDocument {
  markdown?: string;
  text?: string;
  pages: PageText[];
  assets: DocumentAsset[];
  pageCount?: number;
}

export interface ConvertOptions {
  signal?: AbortSignal;
}

export interface Converter {
  readonly backend: BackendName;
  convert(
    sourcePath: string,
    options?: ConvertOptions,
  ): Promise<ConvertedDocument>;
}

// Builds a fresh converter for the device the pool was sized for;
// never share one instance across workers
export type ConverterFactory = (device: DeviceClass) => Converter;
