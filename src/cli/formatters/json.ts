import type { GenerationResult } from '../../core/generator/types.js';
import type { LayerInfo } from '../../core/publisher/types.js';
import type { FailurePayload, IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 * Keys are snake_case and must stay stable for `--json` consumers.
 */
export class JsonFormatter implements IFormatter {
  formatGeneration(result: GenerationResult): string {
    return JSON.stringify({
      success: true,
      layer_arn: result.layerArn,
      version: result.version,
      layer_name: result.layerName,
      description: result.description,
      runtime: result.runtime,
      architecture: result.architecture,
      region: result.region,
      packages: result.packages,
      created_at: result.createdAt,
      archive_bytes: result.archiveBytes,
    }, null, 2);
  }

  formatFailure(failure: FailurePayload): string {
    return JSON.stringify({
      success: false,
      error: {
        stage: failure.stage,
        kind: failure.kind,
        message: failure.message,
      },
    }, null, 2);
  }

  formatLayerInfo(info: LayerInfo): string {
    return JSON.stringify({
      layer_arn: info.arn,
      version: info.version,
      description: info.description,
      created_at: info.createdAt,
      compatible_runtimes: info.compatibleRuntimes,
      compatible_architectures: info.compatibleArchitectures,
      code_size: info.codeSize,
    }, null, 2);
  }
}
