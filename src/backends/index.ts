/**
 * Generation Backends
 *
 * Two interchangeable text-generation providers behind one interface:
 * - LocalBackend: local inference service (`POST /api/generate`) over axios
 * - CloudBackend: OpenAI-compatible chat-completions API over the openai SDK
 *
 * Backends make a single attempt per call and translate provider errors into
 * the failure taxonomy. Retrying is the gateway's job.
 */

import axios, { type AxiosInstance } from 'axios';
import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  AuthenticationError,
  RateLimitError,
} from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { z } from 'zod';
import type { CloudModelSettings, LocalModelSettings } from '../config/index.js';
import {
  AuthenticationFailure,
  ConnectivityFailure,
  DEFAULT_RETRY_AFTER_SECONDS,
  DocumentServiceError,
  GenerationFailure,
  RateLimitFailure,
  TimeoutFailure,
} from '../errors/index.js';
import type { BackendChoice, Logger, ModelDescriptor } from '../types/index.js';

// ============================================================================
// Interface
// ============================================================================

export interface GenerationBackend {
  readonly kind: BackendChoice;
  /** Single attempt; throws a taxonomy failure */
  generate(prompt: string): Promise<string>;
  describe(): ModelDescriptor;
  /** Lightweight health check, never throws */
  isHealthy(): Promise<boolean>;
}

const LOCAL_HEALTH_TIMEOUT_MS = 5_000;

const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[INFO] [backends] ${msg}`, meta ? JSON.stringify(meta) : ''),
  warn: (msg, meta) => console.warn(`[WARN] [backends] ${msg}`, meta ? JSON.stringify(meta) : ''),
  error: (msg, meta) => console.error(`[ERROR] [backends] ${msg}`, meta ? JSON.stringify(meta) : ''),
  debug: (msg, meta) => console.debug(`[DEBUG] [backends] ${msg}`, meta ? JSON.stringify(meta) : ''),
};

// ============================================================================
// Local Backend
// ============================================================================

const localResponseSchema = z.object({
  response: z.string(),
});

export interface LocalBackendOptions {
  /** Preconfigured client; built from settings when omitted */
  http?: AxiosInstance;
  logger?: Logger;
}

export class LocalBackend implements GenerationBackend {
  readonly kind = 'local' as const;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(
    private readonly settings: LocalModelSettings,
    options: LocalBackendOptions = {}
  ) {
    this.http =
      options.http ??
      axios.create({
        baseURL: settings.baseUrl,
        timeout: settings.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
    this.logger = options.logger ?? defaultLogger;
  }

  async generate(prompt: string): Promise<string> {
    this.logger.info('Generating with local model', { model: this.settings.model });

    let body: unknown;
    try {
      const response = await this.http.post('/api/generate', {
        model: this.settings.model,
        prompt,
        stream: false,
        options: {
          temperature: this.settings.temperature,
          num_predict: this.settings.maxTokens,
        },
      });
      body = response.data;
    } catch (error) {
      throw this.translateError(error);
    }

    const parsed = localResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GenerationFailure('Invalid response format from local model', {
        provider: 'local',
        code: 'MALFORMED_RESPONSE',
      });
    }

    this.logger.info('Local generation complete', { characters: parsed.data.response.length });
    return parsed.data.response;
  }

  describe(): ModelDescriptor {
    return {
      provider: 'Local',
      model: this.settings.model,
      mode: 'local',
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
    };
  }

  async isHealthy(): Promise<boolean> {
    try {
      const response = await this.http.get('/api/tags', { timeout: LOCAL_HEALTH_TIMEOUT_MS });
      return response.status === 200;
    } catch (error) {
      this.logger.warn('Local model health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private translateError(error: unknown): DocumentServiceError {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        this.logger.error('Local model request timed out', { code: error.code });
        return new TimeoutFailure('Local model request timed out', { provider: 'local', cause: error });
      }
      if (error.response) {
        this.logger.error('Local model HTTP error', { status: error.response.status });
        return new GenerationFailure(`HTTP ${error.response.status} error from local model service`, {
          provider: 'local',
          cause: error,
        });
      }
      this.logger.error('Cannot connect to local model', { baseUrl: this.settings.baseUrl, code: error.code });
      return new ConnectivityFailure(
        `Cannot connect to local model service at ${this.settings.baseUrl}. Please ensure it is running.`,
        { provider: 'local', cause: error }
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error('Unexpected local model error', { error: message });
    return new GenerationFailure(message, { provider: 'local', cause: error });
  }
}

// ============================================================================
// Cloud Backend
// ============================================================================

/**
 * The slice of the openai client the cloud backend uses
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export interface CloudBackendOptions {
  /** Injected client; built from settings when omitted */
  client?: ChatCompletionClient;
  logger?: Logger;
}

export class CloudBackend implements GenerationBackend {
  readonly kind = 'cloud' as const;
  private readonly client: ChatCompletionClient | null;
  private readonly logger: Logger;

  constructor(
    private readonly settings: CloudModelSettings,
    options: CloudBackendOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;

    if (options.client) {
      this.client = options.client;
    } else if (settings.apiKey) {
      this.client = new OpenAI({
        apiKey: settings.apiKey,
        baseURL: settings.baseUrl,
        timeout: settings.timeoutMs,
        maxRetries: 0,
      });
    } else {
      this.client = null;
    }
  }

  async generate(prompt: string): Promise<string> {
    const client = this.requireClient();
    this.logger.info('Generating with cloud model', { model: this.settings.model });

    let completion: ChatCompletion;
    try {
      completion = await client.chat.completions.create({
        messages: [{ role: 'user', content: prompt }],
        model: this.settings.model,
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
      });
    } catch (error) {
      throw this.translateError(error);
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw new GenerationFailure('No completion choices returned', { provider: 'cloud', code: 'MALFORMED_RESPONSE' });
    }
    const text = choice.message.content;
    if (!text) {
      throw new GenerationFailure('Empty response from cloud API', { provider: 'cloud', code: 'EMPTY_RESPONSE' });
    }

    this.logger.info('Cloud generation complete', { characters: text.length });
    return text;
  }

  describe(): ModelDescriptor {
    return {
      provider: 'Cloud',
      model: this.settings.model,
      mode: 'cloud',
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
    };
  }

  async isHealthy(): Promise<boolean> {
    if (!this.client) {
      return false;
    }
    try {
      await this.client.chat.completions.create({
        messages: [{ role: 'user', content: 'test' }],
        model: this.settings.model,
        max_tokens: 5,
      });
      return true;
    } catch (error) {
      this.logger.warn('Cloud model health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private requireClient(): ChatCompletionClient {
    if (!this.client) {
      throw new AuthenticationFailure('Cloud API key is not configured', { provider: 'cloud' });
    }
    return this.client;
  }

  private translateError(error: unknown): DocumentServiceError {
    if (error instanceof AuthenticationError) {
      this.logger.error('Cloud authentication error', { status: error.status });
      return new AuthenticationFailure('Invalid cloud API key. Please check CLOUD_API_KEY', {
        provider: 'cloud',
        cause: error,
      });
    }
    if (error instanceof RateLimitError) {
      const retryAfterSeconds = parseRetryAfter(error.headers?.['retry-after']);
      this.logger.error('Cloud rate limit exceeded', { retryAfterSeconds });
      return new RateLimitFailure('Cloud API rate limit exceeded', {
        provider: 'cloud',
        retryAfterSeconds,
        cause: error,
      });
    }
    // Timeout is a subclass of the connection error; check it first
    if (error instanceof APIConnectionTimeoutError) {
      this.logger.error('Cloud request timed out');
      return new TimeoutFailure('Cloud API request timed out', { provider: 'cloud', cause: error });
    }
    if (error instanceof APIConnectionError) {
      this.logger.error('Cloud connection error', { error: error.message });
      return new ConnectivityFailure('Cannot connect to cloud API', { provider: 'cloud', cause: error });
    }
    if (error instanceof APIError) {
      this.logger.error('Cloud API error', { status: error.status });
      return new GenerationFailure(`Cloud API error: HTTP ${error.status ?? 'unknown'}`, {
        provider: 'cloud',
        cause: error,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error('Unexpected cloud error', { error: message });
    return new GenerationFailure(message, { provider: 'cloud', cause: error });
  }
}

/**
 * Seconds from a Retry-After header; falls back to the default hint
 */
export function parseRetryAfter(value: string | null | undefined): number {
  if (value === null || value === undefined) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  const seconds = Number.parseInt(value, 10);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : DEFAULT_RETRY_AFTER_SECONDS;
}

// ============================================================================
// Factory
// ============================================================================

export interface BackendSettings {
  local: LocalModelSettings;
  cloud: CloudModelSettings;
}

export function createBackends(
  settings: BackendSettings,
  logger?: Logger
): Record<BackendChoice, GenerationBackend> {
  return {
    local: new LocalBackend(settings.local, { logger }),
    cloud: new CloudBackend(settings.cloud, { logger }),
  };
}
