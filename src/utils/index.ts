/**
 * Utility exports
 */

// Markdown post-processing
export { encodeImagePaths, encodeImagePath, IMAGE_MARKER } from "./encode-image-paths";

// Text and path checks
export { isBlankText } from "./is-blank-text";
export { isImageUrl } from "./is-image-url";
export { formatDuration } from "./format-duration";

// Filesystem and processes
export { fileExists } from "./file-exists";
export { withScratchDir } from "./scratch-dir";
export { runCommand } from "./run-command";
export type {
  CommandRunner,
  CommandResult,
  RunCommandOptions,
} from "./run-command";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
  describeConfigError,
} from "./load-config";
export type { LoadConfigResult } from "./load-config";

// Classes
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
