/**
 * Config command - Show where settings come from and what a run would use
 */

import chalk from "chalk";
import { describeConfigError, getUserConfigPath, loadConfig } from "../../utils";

export async function configCommand(opts: { config?: string }): Promise<void> {
  const { config, errors } = await loadConfig(opts.config);

  console.log(chalk.bold("User configuration file:"));
  console.log(`  ${getUserConfigPath()}`);
  console.log(chalk.dim("  Create it to override settings from src/config/default.json."));

  for (const err of errors) {
    console.log(chalk.yellow(`\nIgnored ${err.path}: ${describeConfigError(err.error)}`));
  }

  console.log(chalk.bold("\nEffective settings:"));
  console.log(`  input     ${config.input}`);
  console.log(`  output    ${config.output}`);
  console.log(`  backend   ${config.converter.backend} (${config.converter.format})`);
  console.log(
    `  workers   cuda ${config.workers.cuda}, mps ${config.workers.mps}, none ${config.workers.none}` +
      (config.workers.max ? `, max ${config.workers.max}` : ""),
  );
}
