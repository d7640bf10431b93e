/**
 * Config command implementation
 */

import { formatConfig, loadConfig } from '../config/loader.js';
import type { CliOptions } from '../config/schema.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Print the configuration after file, environment and flags are merged
 */
export async function configCommand(
  options: CliOptions,
  json: boolean,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const config = await loadConfig(options, env);
  const reporter = new ProgressReporter({ color: !options.noColor });
  reporter.print(json ? formatConfig(config) : formatConfigDisplay(config, reporter.c));
}
