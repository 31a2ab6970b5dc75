/**
 * Orchestrator: parse → name → build → publish.
 */
import { StageError, type Stage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { LayerBuilder } from '../builder/builder.js';
import type { StagingArtifact } from '../builder/types.js';
import type { LayerPublisher } from '../publisher/types.js';
import { DEFAULT_ARCHITECTURE, parseRuntime } from '../runtimes.js';
import { deriveLayerName, describeLayer } from '../spec-parser/layer-name.js';
import { formatRequirement, parseRequirements } from '../spec-parser/parser.js';
import type { LayerSpec } from '../spec-parser/types.js';
import { logProgress } from './progress.js';
import type {
  GenerateOptions,
  GenerationResult,
  ProgressPhase,
  ProgressSink,
} from './types.js';

export interface LayerGeneratorOptions {
  builder: Pick<LayerBuilder, 'build'>;
  publisher: LayerPublisher;
  onProgress?: ProgressSink;
}

/**
 * Sequences one layer generation. Errors are tagged with the stage they came
 * from and rethrown; nothing is retried here.
 */
export class LayerGenerator {
  private readonly builder: Pick<LayerBuilder, 'build'>;
  private readonly publisher: LayerPublisher;
  private readonly onProgress: ProgressSink;

  constructor(options: LayerGeneratorOptions) {
    this.builder = options.builder;
    this.publisher = options.publisher;
    this.onProgress = options.onProgress ?? logProgress;
  }

  async generate(rawSpec: string, runtime?: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    this.emit('parsing', `Input: ${rawSpec}`);
    const spec = await this.runStage('parse', () => this.toLayerSpec(rawSpec, runtime, options));

    this.emit('building', `${spec.requirements.length} package(s) for ${spec.runtime}`, {
      layerName: spec.layerName,
      packages: spec.requirements.map(formatRequirement),
    });
    const artifact: StagingArtifact = await this.runStage('build', () =>
      this.builder.build(spec, { signal: options.signal, timeoutMs: options.installTimeoutMs })
    );

    try {
      this.emit('uploading', `Publishing ${spec.layerName}`, { archiveBytes: artifact.sizeBytes });
      const published = await this.runStage('publish', () =>
        this.publisher.publish(
          {
            archive: artifact.archivePath,
            layerName: spec.layerName,
            runtime: spec.runtime,
            description: spec.description,
            architecture: spec.architecture,
          },
          { signal: options.signal, timeoutMs: options.publishTimeoutMs }
        )
      );

      this.emit('done', published.layerArn, { version: published.version });
      return {
        ...published,
        description: spec.description,
        runtime: spec.runtime,
        architecture: spec.architecture,
        packages: spec.requirements.map(formatRequirement),
        archiveBytes: artifact.sizeBytes,
      };
    } finally {
      await artifact.release();
    }
  }

  private toLayerSpec(rawSpec: string, runtime: string | undefined, options: GenerateOptions): LayerSpec {
    const requirements = parseRequirements(rawSpec);
    const resolvedRuntime = parseRuntime(runtime);
    return {
      requirements,
      runtime: resolvedRuntime,
      architecture: options.architecture ?? DEFAULT_ARCHITECTURE,
      layerName: deriveLayerName(requirements),
      description: describeLayer(requirements, resolvedRuntime),
    };
  }

  private async runStage<T>(stage: Stage, work: () => Promise<T> | T): Promise<T> {
    try {
      return await work();
    } catch (error) {
      const wrapped = StageError.wrap(stage, error);
      logger.debug(`Stage ${stage} failed`, wrapped.toPayload());
      throw wrapped;
    }
  }

  private emit(phase: ProgressPhase, message: string, data?: Record<string, unknown>): void {
    this.onProgress({ phase, at: new Date().toISOString(), message, data });
  }
}
