/**
 * CLI command that shows a published layer version.
 */
import { Command } from 'commander';
import { createFormatter } from '../formatters/index.js';
import {
  createPublisher,
  loadCommandConfig,
  parseTimeoutSeconds,
  processEnvironment,
  toFailurePayload,
  type CommandEnvironment,
} from './shared.js';

export interface InfoCommandOptions {
  json?: boolean;
  timeout?: number;
  config?: string;
}

/**
 * Create the info command.
 */
export function createInfoCommand(): Command {
  return new Command('info')
    .description('Show details of a published layer version')
    .argument('<arn>', 'Layer version ARN (arn:aws:lambda:<region>:<account>:layer:<name>:<version>)')
    .option('--json', 'Output as JSON')
    .option('--timeout <seconds>', 'Deadline for each API attempt', parseTimeoutSeconds)
    .option('-c, --config <path>', 'Path to config file (default: .layersmith.yaml)')
    .action(async (arn: string, options: InfoCommandOptions) => {
      process.exitCode = await runInfo(arn, options);
    });
}

export async function runInfo(
  arn: string,
  options: InfoCommandOptions,
  environment: CommandEnvironment = processEnvironment()
): Promise<number> {
  const formatter = createFormatter(options.json ? 'json' : 'human');

  try {
    const config = await loadCommandConfig(environment, options.config);
    const publisher = await createPublisher(config, environment);
    const info = await publisher.getLayerInfo(arn, {
      timeoutMs: options.timeout ?? config.publish.timeout_seconds * 1000,
    });
    console.log(formatter.formatLayerInfo(info));
    return 0;
  } catch (error) {
    const failure = toFailurePayload(error, 'publish');
    const output = formatter.formatFailure(failure);
    if (options.json) {
      console.log(output);
    } else {
      console.error(output);
    }
    return 1;
  }
}
