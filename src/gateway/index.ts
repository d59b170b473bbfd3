/**
 * Generation Gateway
 *
 * Selects a backend by the caller's choice, runs it through that backend's
 * retry policy, measures latency and wraps the text with the backend's model
 * descriptor. Holds no state across calls.
 */

import type { GenerationBackend } from '../backends/index.js';
import { GenerationFailure, ValidationFailure } from '../errors/index.js';
import { noopMetrics } from '../logging/index.js';
import {
  CLOUD_RETRY_POLICY,
  LOCAL_RETRY_POLICY,
  executeWithRetry,
  type RetryPolicy,
  type SleepFn,
} from '../retry/index.js';
import type {
  BackendChoice,
  GenerationResponse,
  GenerationResult,
  Logger,
  Metrics,
  ModelDescriptor,
} from '../types/index.js';
import { parseBackendChoice } from '../validator/index.js';

export interface GatewayOptions {
  backends: Record<BackendChoice, GenerationBackend>;
  policies?: Partial<Record<BackendChoice, RetryPolicy>>;
  sleep?: SleepFn;
  /** Monotonic clock in milliseconds */
  now?: () => number;
  logger?: Logger;
  metrics?: Metrics;
}

export interface BackendHealth {
  local: boolean;
  cloud: boolean;
}

const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[INFO] [gateway] ${msg}`, meta ? JSON.stringify(meta) : ''),
  warn: (msg, meta) => console.warn(`[WARN] [gateway] ${msg}`, meta ? JSON.stringify(meta) : ''),
  error: (msg, meta) => console.error(`[ERROR] [gateway] ${msg}`, meta ? JSON.stringify(meta) : ''),
  debug: (msg, meta) => console.debug(`[DEBUG] [gateway] ${msg}`, meta ? JSON.stringify(meta) : ''),
};

export class GenerationGateway {
  private readonly backends: Record<BackendChoice, GenerationBackend>;
  private readonly policies: Record<BackendChoice, RetryPolicy>;
  private readonly sleep: SleepFn | undefined;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: GatewayOptions) {
    this.backends = options.backends;
    this.policies = {
      local: options.policies?.local ?? LOCAL_RETRY_POLICY,
      cloud: options.policies?.cloud ?? CLOUD_RETRY_POLICY,
    };
    this.sleep = options.sleep;
    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * `requested` must name a backend ('local' or 'cloud')
   */
  async generate(requested: string, prompt: string): Promise<GenerationResult> {
    const choice = parseBackendChoice(requested);
    if (prompt.trim() === '') {
      throw new ValidationFailure('Prompt must not be empty', [{ path: 'prompt', message: 'Required' }]);
    }

    const backend = this.backends[choice];
    const policy = this.policies[choice];
    const tags = { backend: choice };

    this.logger.info('Generation started', { backend: choice, promptLength: prompt.length });
    this.metrics.increment('gateway.generate.calls', tags);
    const start = this.now();

    let content: string;
    try {
      content = await executeWithRetry(policy, () => backend.generate(prompt), {
        sleep: this.sleep,
        logger: this.logger,
      });
    } catch (error) {
      this.metrics.increment('gateway.generate.failures', tags);
      this.logger.error('Generation failed', {
        backend: choice,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    if (content.trim() === '') {
      this.metrics.increment('gateway.generate.failures', tags);
      throw new GenerationFailure(`Backend '${choice}' returned empty content`, {
        provider: choice,
        code: 'EMPTY_RESPONSE',
      });
    }

    const elapsedMs = Math.max(0, this.now() - start);
    this.metrics.timing('gateway.generate.duration', elapsedMs, tags);
    this.logger.info('Generation complete', { backend: choice, elapsedMs, characters: content.length });

    return {
      content,
      model: backend.describe(),
      elapsedSeconds: elapsedMs / 1000,
    };
  }

  describe(choice: BackendChoice): ModelDescriptor {
    return this.backends[choice].describe();
  }

  async checkHealth(): Promise<BackendHealth> {
    const [local, cloud] = await Promise.all([this.backends.local.isHealthy(), this.backends.cloud.isHealthy()]);
    return { local, cloud };
  }
}

/**
 * Boundary shape of a generation call
 */
export function toGenerationResponse(result: GenerationResult): GenerationResponse {
  return {
    content: result.content,
    model_used: result.model.model,
    generation_time: Math.round(result.elapsedSeconds * 100) / 100,
  };
}
