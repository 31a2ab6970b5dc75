import chalk from 'chalk';
import type { GenerationResult } from '../../core/generator/types.js';
import type { LayerInfo } from '../../core/publisher/types.js';
import { formatBytes } from '../../utils/format.js';
import type { FailurePayload, FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'green' | 'cyan' | 'dim' | 'bold';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  formatGeneration(result: GenerationResult): string {
    return [
      '',
      this.colorize('✓ Layer created successfully', 'green'),
      `   Layer Name:  ${result.layerName}`,
      `   Layer ARN:   ${this.colorize(result.layerArn, 'bold')}`,
      `   Version:     ${result.version}`,
      `   Description: ${result.description}`,
      `   Runtime:     ${result.runtime} (${result.architecture})`,
      `   Region:      ${result.region}`,
      `   Packages:    ${result.packages.join(', ')}`,
      `   Size:        ${formatBytes(result.archiveBytes)}`,
    ].join('\n');
  }

  formatFailure(failure: FailurePayload): string {
    return [
      this.colorize(`✗ Error: ${failure.message}`, 'red'),
      this.colorize(`   stage: ${failure.stage}, kind: ${failure.kind}`, 'dim'),
    ].join('\n');
  }

  formatLayerInfo(info: LayerInfo): string {
    const lines = [
      this.colorize(info.arn, 'bold'),
      `   Version:       ${info.version}`,
      `   Description:   ${info.description || this.colorize('(none)', 'dim')}`,
      `   Created:       ${info.createdAt}`,
      `   Runtimes:      ${info.compatibleRuntimes.join(', ') || this.colorize('(any)', 'dim')}`,
      `   Architectures: ${info.compatibleArchitectures.join(', ') || this.colorize('(any)', 'dim')}`,
      `   Code size:     ${formatBytes(info.codeSize)}`,
    ];
    return lines.join('\n');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
