/**
 * CLI command that builds and publishes a layer.
 */
import { Command } from 'commander';
import { LayerGenerator } from '../../core/generator/generator.js';
import { isArchitecture, SUPPORTED_ARCHITECTURES, SUPPORTED_RUNTIMES } from '../../core/runtimes.js';
import { InvalidSpecError, ErrorCodes, type Stage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import {
  createBuilder,
  createPublisher,
  loadCommandConfig,
  parseTimeoutSeconds,
  processEnvironment,
  toFailurePayload,
  type CommandEnvironment,
} from './shared.js';

export interface GenerateCommandOptions {
  pythonVersion?: string;
  architecture?: string;
  json?: boolean;
  quiet?: boolean;
  /** Milliseconds, already parsed from seconds */
  timeout?: number;
  config?: string;
}

/** Exit status after SIGINT, as shells report it */
const EXIT_INTERRUPTED = 130;

const EXAMPLES = `
Examples:
  $ layersmith "requests"
  $ layersmith "boto3>=1.26.1,requests==2.28.0"
  $ layersmith "pydantic>=2.5.0" --python-version python3.12
  $ layersmith "requests,pydantic" --json --quiet`;

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Build a Lambda layer from Python packages and publish it')
    .argument('<packages>', 'Comma-separated list of packages (e.g. "requests==2.28.0,pydantic")')
    .option('--python-version <runtime>', `Python runtime (${SUPPORTED_RUNTIMES.join(', ')})`)
    .option('--architecture <arch>', `Target architecture (${SUPPORTED_ARCHITECTURES.join(', ')})`)
    .option('--json', 'Output result as JSON')
    .option('--quiet', 'Suppress progress output')
    .option('--timeout <seconds>', 'Deadline for installation and for each publish attempt', parseTimeoutSeconds)
    .option('-c, --config <path>', 'Path to config file (default: .layersmith.yaml)')
    .addHelpText('after', EXAMPLES)
    .action(async (packages: string, options: GenerateCommandOptions) => {
      process.exitCode = await runGenerate(packages, options);
    });
}

/**
 * Run one generation and print the result. Resolves to the exit code.
 */
export async function runGenerate(
  packages: string,
  options: GenerateCommandOptions,
  environment: CommandEnvironment = processEnvironment()
): Promise<number> {
  const formatter = createFormatter(options.json ? 'json' : 'human');
  if (options.quiet) {
    logger.setLevel('silent');
  }
  logger.resetSteps();

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupted, cleaning up...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  // Failures before the pipeline runs are attributed to the stage they block
  let stage: Stage = 'parse';
  try {
    const config = await loadCommandConfig(environment, options.config);
    const architecture = options.architecture ?? config.architecture;
    if (!isArchitecture(architecture)) {
      throw new InvalidSpecError(
        ErrorCodes.UNSUPPORTED_ARCHITECTURE,
        `Unsupported architecture "${architecture}". Supported: ${SUPPORTED_ARCHITECTURES.join(', ')}`
      );
    }

    stage = 'publish';
    const publisher = await createPublisher(config, environment);
    const generator = new LayerGenerator({
      builder: createBuilder(config, environment),
      publisher,
    });

    const result = await generator.generate(packages, options.pythonVersion ?? config.runtime, {
      architecture,
      signal: controller.signal,
      installTimeoutMs: options.timeout ?? config.install.timeout_seconds * 1000,
      publishTimeoutMs: options.timeout ?? config.publish.timeout_seconds * 1000,
    });

    console.log(formatter.formatGeneration(result));
    return 0;
  } catch (error) {
    const failure = toFailurePayload(error, stage);
    if (options.json) {
      console.log(formatter.formatFailure(failure));
    } else {
      console.error(formatter.formatFailure(failure));
    }
    return failure.kind === 'cancelled' ? EXIT_INTERRUPTED : 1;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
