/**
 * HR Document Studio - Main Entry Point
 *
 * Generates HR documents through a local or cloud language model and
 * renders them to branded DOCX or PDF.
 *
 * Architecture:
 * - GenerationGateway picks a backend and wraps it in its retry policy
 * - PromptBuilder and the HTML layout read Handlebars templates by key
 * - DocumentRenderer converts markdown to DOCX, or to PDF via a primary
 *   engine with a pdf-lib fallback
 * - DocumentService is the caller-facing facade over all of the above
 */

import { createBackends, type GenerationBackend } from './backends/index.js';
import type { AppConfig } from './config/index.js';
import { DocumentService } from './documents/index.js';
import { GenerationGateway } from './gateway/index.js';
import { createLogger, type LogSink } from './logging/index.js';
import { createPdfStrategy, type PdfRenderStrategy } from './pdf-engines/index.js';
import { PromptBuilder } from './prompts/index.js';
import { CLOUD_RETRY_POLICY, LOCAL_RETRY_POLICY, withMaxAttempts, type SleepFn } from './retry/index.js';
import { createRecordStore, type RecordStore } from './storage/index.js';
import { FileTemplateSource, type TemplateSource } from './templating/index.js';
import type { BackendChoice, Metrics } from './types/index.js';

// Core Types
export type * from './types/index.js';

// Errors
export {
  DocumentServiceError,
  ConnectivityFailure,
  TimeoutFailure,
  AuthenticationFailure,
  RateLimitFailure,
  GenerationFailure,
  ConfigurationFailure,
  ValidationFailure,
  NotFoundFailure,
  DEFAULT_RETRY_AFTER_SECONDS,
  isDocumentServiceError,
  isRetryableFailure,
  toErrorResponse,
  type FailureKind,
  type FailureOptions,
  type ValidationIssue,
  type ErrorResponse,
  type ErrorResponseOptions,
} from './errors/index.js';

// Configuration and Logging
export {
  loadConfig,
  type AppConfig,
  type LocalModelSettings,
  type CloudModelSettings,
  type StorageSettings,
} from './config/index.js';
export {
  createLogger,
  formatRecord,
  withTrace,
  noopMetrics,
  type LogLevel,
  type LogFormat,
  type LogSink,
  type LoggerOptions,
} from './logging/index.js';

// Retry
export {
  CLOUD_RETRY_POLICY,
  LOCAL_RETRY_POLICY,
  createRetryPolicy,
  withMaxAttempts,
  backoffSeconds,
  totalBackoffSeconds,
  executeWithRetry,
  sleep,
  type RetryPolicy,
  type RetryOptions,
  type SleepFn,
} from './retry/index.js';

// Backends and Gateway
export {
  LocalBackend,
  CloudBackend,
  createBackends,
  parseRetryAfter,
  type GenerationBackend,
  type ChatCompletionClient,
  type LocalBackendOptions,
  type CloudBackendOptions,
  type BackendSettings,
} from './backends/index.js';
export {
  GenerationGateway,
  toGenerationResponse,
  type GatewayOptions,
  type BackendHealth,
} from './gateway/index.js';

// Templates and Prompts
export {
  FileTemplateSource,
  MemoryTemplateSource,
  renderTemplate,
  type TemplateSource,
  type RenderTemplateOptions,
} from './templating/index.js';
export { PromptBuilder, BRANDING_DEFAULTS, brandingFields } from './prompts/index.js';

// Rendering
export {
  ChromiumPdfEngine,
  FallbackPdfEngine,
  PdfRenderStrategy,
  createPdfStrategy,
  inlineStyles,
  layoutHtml,
  type PdfEngine,
  type PdfEngines,
  type PdfJob,
  type PdfOutcome,
  type PdfRenderOptions,
  type PdfStrategySettings,
} from './pdf-engines/index.js';
export {
  DocumentRenderer,
  renderArtifact,
  markdownToHtml,
  parseMarkdownBlocks,
  splitBoldRuns,
  titleFromDocType,
  DOCX_MIME_TYPE,
  PDF_MIME_TYPE,
  MIME_TYPES,
  type DocxBlock,
  type DocxRun,
  type DocumentRendererOptions,
  type RenderDependencies,
} from './renderers/index.js';

// Validation and Storage
export * from './validator/index.js';
export {
  MemoryRecordStore,
  S3RecordStore,
  createRecordStore,
  decodeRecord,
  type RecordStore,
  type RecordCollection,
  type CollectionRecords,
  type S3Config,
  type StoreSettings,
} from './storage/index.js';

// Facade
export {
  DocumentService,
  toBranding,
  documentReference,
  exportFilename,
  type DocumentServiceDeps,
  type GenerateOptions,
  type GenerateOutput,
  type DocumentPage,
  type ExportedDocument,
} from './documents/index.js';

// ============================================================================
// Wiring
// ============================================================================

/**
 * Replaceable collaborators, mainly for tests
 */
export interface ServiceOverrides {
  backends?: Record<BackendChoice, GenerationBackend>;
  store?: RecordStore;
  pdf?: PdfRenderStrategy;
  prompts?: TemplateSource;
  htmlTemplates?: TemplateSource;
  sleep?: SleepFn;
  sink?: LogSink;
  metrics?: Metrics;
}

/**
 * Build a DocumentService from loaded configuration
 */
export function createDocumentService(config: AppConfig, overrides: ServiceOverrides = {}): DocumentService {
  const log = (module: string) =>
    createLogger(module, { level: config.logLevel, format: config.logFormat, sink: overrides.sink });

  const gateway = new GenerationGateway({
    backends: overrides.backends ?? createBackends({ local: config.local, cloud: config.cloud }, log('backends')),
    policies: {
      local: withMaxAttempts(LOCAL_RETRY_POLICY, config.retryMaxAttempts),
      cloud: withMaxAttempts(CLOUD_RETRY_POLICY, config.retryMaxAttempts),
    },
    sleep: overrides.sleep,
    logger: log('gateway'),
    metrics: overrides.metrics,
  });

  return new DocumentService({
    gateway,
    prompts: new PromptBuilder(overrides.prompts ?? new FileTemplateSource(config.promptsDir, '.txt'), log('prompts')),
    store: overrides.store ?? createRecordStore(config.storage),
    pdf: overrides.pdf ?? createPdfStrategy(config.pdf, log('pdf')),
    htmlTemplates: overrides.htmlTemplates ?? new FileTemplateSource(config.templatesDir, '.html'),
    version: config.version,
    environment: config.environment,
    debug: config.debug,
    logger: log('documents'),
    metrics: overrides.metrics,
  });
}
