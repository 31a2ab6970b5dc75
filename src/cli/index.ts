import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createGenerateCommand } from './commands/generate.js';
import { createInfoCommand } from './commands/info.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. `generate` runs when no command is named. */
export function createCli(): Command {
  const program = new Command()
    .name('layersmith')
    .description('Build AWS Lambda layers from Python packages and publish them')
    .version(VERSION);

  program.addCommand(createGenerateCommand(), { isDefault: true });
  program.addCommand(createInfoCommand());
  return program;
}
