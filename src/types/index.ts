/**
 * Core type definitions for HR Document Studio
 *
 * This module exports all shared types used across the system.
 */

// ============================================================================
// Document Types
// ============================================================================

/**
 * Supported HR document categories. Each one has its own request schema,
 * prompt template and (optionally) HTML template.
 */
export const DOCUMENT_TYPES = [
  'job_description',
  'offer_letter',
  'interview_questions',
  'onboarding_plan',
  'performance_review',
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

/**
 * Caller-facing backend selector
 */
export const BACKEND_CHOICES = ['local', 'cloud'] as const;

export type BackendChoice = (typeof BACKEND_CHOICES)[number];

/**
 * Output formats produced by the renderer
 */
export type ExportFormat = 'docx' | 'pdf';

// ============================================================================
// Branding
// ============================================================================

/**
 * Read-only snapshot of one organization profile, injected into prompts
 * and rendered documents.
 */
export interface BrandingContext {
  readonly name: string;
  readonly industry?: string;
  readonly size?: string;
  readonly location?: string;
  readonly website?: string;
  readonly description?: string;
  readonly values?: string;
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Resolved model description, produced by a backend for display and audit
 */
export interface ModelDescriptor {
  readonly provider: 'Local' | 'Cloud';
  readonly model: string;
  readonly mode: BackendChoice;
  /** 0.0 - 2.0 */
  readonly temperature: number;
  readonly maxTokens: number;
}

/**
 * Output of a single gateway call. `content` is never empty.
 */
export interface GenerationResult {
  readonly content: string;
  readonly model: ModelDescriptor;
  readonly elapsedSeconds: number;
}

/**
 * Boundary shape of a generation call
 */
export interface GenerationResponse {
  content: string;
  model_used: string;
  generation_time: number;
}

// ============================================================================
// Rendering
// ============================================================================

export interface RenderMetadata {
  title?: string;
  /** Display date, YYYY-MM-DD */
  date?: string;
  /** Reference code, e.g. DOC-00042 */
  reference?: string;
}

export interface RenderRequest {
  content: string;
  docType: string;
  metadata: RenderMetadata;
  branding?: BrandingContext;
}

/**
 * Binary output of the renderer. Either fully written or not returned at all.
 */
export interface RenderedArtifact {
  data: Buffer;
  mimeType: string;
}

// ============================================================================
// Records
// ============================================================================

/**
 * Stored company profile. Source of BrandingContext.
 */
export interface CompanyProfileRecord {
  id: number;
  name: string;
  industry: string | null;
  size: string | null;
  location: string | null;
  website: string | null;
  description: string | null;
  values: string | null;
  logo_url: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Stored generated document
 */
export interface GeneratedDocumentRecord {
  id: number;
  doc_type: DocumentType;
  title: string;
  content: string;
  model_used: string;
  generation_time: number;
  company_id: number | null;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Health
// ============================================================================

export interface ServiceHealth {
  available: boolean;
  model: string;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  version: string;
  environment: string;
  services: {
    local: ServiceHealth;
    cloud: ServiceHealth;
  };
}

// ============================================================================
// Module Result Types
// ============================================================================

/**
 * Standard result envelope returned by the documents facade
 */
export interface ModuleResult<T> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    status: number;
    details?: unknown;
    /** Set on rate-limit failures */
    retryAfterSeconds?: number;
  };
  metadata: {
    traceId: string;
    module: string;
    timestamp: string;
    duration?: number;
  };
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger interface for structured logging
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

// ============================================================================
// Metrics Interface
// ============================================================================

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(name: string, tags?: Record<string, string>): void;
  gauge(name: string, value: number, tags?: Record<string, string>): void;
  timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}
