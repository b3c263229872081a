/**
 * Convert command - Loads config and runs the batch
 */

import ora, { type Ora } from "ora";
import { z } from "zod";
import { createConverterFactory } from "../../backends";
import { DocbatchError, describeError } from "../../errors";
import * as modules from "../../modules";
import {
  MAX_TIMEOUT_MS,
  BackendNameSchema,
  ResultFormatSchema,
  type ConversionConfig,
  type ProgressListener,
} from "../../types";
import { Logger, describeConfigError, loadConfig } from "../../utils";

const ConvertOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  backend: BackendNameSchema.optional(),
  format: ResultFormatSchema.optional(),
  workers: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  skipImages: z.boolean().optional(),
  metadata: z.boolean().optional(),
  timeout: z.coerce.number().int().nonnegative().max(MAX_TIMEOUT_MS).optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof ConvertOptionsSchema>;

// Exit codes: 0 all converted (or nothing to do), 1 some items failed, 2 run could not start
const EXIT_PARTIAL_FAILURE = 1;
const EXIT_FATAL = 2;

export async function convertCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);
    applyOverrides(config, options);

    const logger = new Logger(options.verbose ? "debug" : config.logging.level);
    for (const err of errors) {
      spinner.clear();
      logger.warn(`Ignoring config ${err.path}: ${describeConfigError(err.error)}`);
    }

    // Backend prerequisites are checked before any work starts
    const { extensions, createConverter } = createConverterFactory(config);

    spinner.text = "Scanning files...";
    const result = await modules.run({
      config,
      logger,
      extensions,
      createConverter,
      onProgress: spinnerProgress(spinner),
    });

    if (result.status === "no-work") {
      spinner.info(
        `No ${extensions.join("/")} files found in '${config.input}'`,
      );
      return;
    }

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    modules.displayStats(result, options.verbose);
    await modules.exportStats(config.output, result);

    if (modules.summarize(result.results.map((r) => r.outcome)).failureCount > 0) {
      process.exitCode = EXIT_PARTIAL_FAILURE;
    }
  } catch (error) {
    if (error instanceof DocbatchError) {
      spinner.fail(error.message);
    } else {
      spinner.fail("Conversion failed");
      console.error(describeError(error));
    }
    process.exit(EXIT_FATAL);
  }
}

function applyOverrides(
  config: ConversionConfig,
  options: z.infer<typeof ConvertOptionsSchema>,
): void {
  if (options.input) config.input = options.input;
  if (options.output) config.output = options.output;
  if (options.backend) config.converter.backend = options.backend;
  if (options.format) config.converter.format = options.format;
  if (options.workers) config.workers.max = options.workers;
  if (options.skipImages) config.converter.images = false;
  if (options.metadata) config.metadata = true;
  if (options.timeout !== undefined) config.converter.timeout = options.timeout;
}

/**
 * Persist one line per finished item above a running spinner
 */
function spinnerProgress(spinner: Ora): ProgressListener {
  return (event) => {
    switch (event.type) {
      case "plan":
        spinner.info(
          `Found ${event.total} files · device ${event.device} · ${event.workers} workers`,
        );
        spinner.start(`Converting 0/${event.total}...`);
        break;
      case "start":
        spinner.text = `Processing ${event.index}/${event.total}: ${event.item.name}`;
        break;
      case "complete": {
        const line = `(${event.completed}/${event.total}) ${modules.formatOutcome(event.item, event.outcome)}`;
        spinner.stopAndPersist({ text: line });
        if (event.completed < event.total) {
          spinner.start(`Converting ${event.completed}/${event.total}...`);
        }
        break;
      }
    }
  };
}
