/**
 * Documents Module
 *
 * Caller-facing facade over the core: generate (and optionally persist)
 * documents, export stored documents as DOCX or PDF, manage company
 * profiles, and report backend health.
 *
 * Every operation resolves to a ModuleResult and never rejects. Failures
 * carry the code, message and status of the error response built by
 * toErrorResponse, plus the trace id of the call.
 */

import { randomUUID } from 'crypto';
import { NotFoundFailure, toErrorResponse } from '../errors/index.js';
import { toGenerationResponse, type GenerationGateway } from '../gateway/index.js';
import { noopMetrics, withTrace } from '../logging/index.js';
import type { PdfRenderStrategy } from '../pdf-engines/index.js';
import type { PromptBuilder } from '../prompts/index.js';
import { DocumentRenderer } from '../renderers/index.js';
import type { RecordStore } from '../storage/index.js';
import type { TemplateSource } from '../templating/index.js';
import type {
  BackendChoice,
  BrandingContext,
  CompanyProfileRecord,
  ExportFormat,
  GeneratedDocumentRecord,
  GenerationResponse,
  HealthReport,
  Logger,
  Metrics,
  ModelDescriptor,
  ModuleResult,
} from '../types/index.js';
import {
  parseBackendChoice,
  parseDocumentType,
  validateCompanyProfile,
  validateCompanyProfileUpdate,
  validateDocumentListQuery,
  validateDocumentUpdate,
  validateGenerationRequest,
} from '../validator/index.js';

// ============================================================================
// Types
// ============================================================================

export interface DocumentServiceDeps {
  gateway: GenerationGateway;
  prompts: PromptBuilder;
  store: RecordStore;
  pdf: PdfRenderStrategy;
  htmlTemplates?: TemplateSource;
  version?: string;
  environment?: string;
  /** Append exception text to internal-error messages */
  debug?: boolean;
  now?: () => Date;
  traceId?: () => string;
  logger?: Logger;
  metrics?: Metrics;
}

export interface GenerateOptions {
  /** 'local' (default) or 'cloud' */
  backend?: string;
  /** Persist the generated document */
  save?: boolean;
  /** Profile used for branding and recorded on the saved document */
  companyId?: number;
}

export interface GenerateOutput extends GenerationResponse {
  title: string;
  /** Present when the document was saved */
  document: GeneratedDocumentRecord | null;
}

export interface DocumentPage {
  items: GeneratedDocumentRecord[];
  total: number;
  limit: number;
  offset: number;
}

export interface ExportedDocument {
  data: Buffer;
  mimeType: string;
  filename: string;
}

const MODULE = 'documents';

const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[INFO] [documents] ${msg}`, meta ? JSON.stringify(meta) : ''),
  warn: (msg, meta) => console.warn(`[WARN] [documents] ${msg}`, meta ? JSON.stringify(meta) : ''),
  error: (msg, meta) => console.error(`[ERROR] [documents] ${msg}`, meta ? JSON.stringify(meta) : ''),
  debug: (msg, meta) => console.debug(`[DEBUG] [documents] ${msg}`, meta ? JSON.stringify(meta) : ''),
};

// ============================================================================
// Helpers
// ============================================================================

/**
 * Branding snapshot of a stored profile; null columns are left out
 */
export function toBranding(profile: CompanyProfileRecord): BrandingContext {
  const optional = (value: string | null): string | undefined => value ?? undefined;
  return {
    name: profile.name,
    industry: optional(profile.industry),
    size: optional(profile.size),
    location: optional(profile.location),
    website: optional(profile.website),
    description: optional(profile.description),
    values: optional(profile.values),
  };
}

/**
 * e.g. DOC-00042
 */
export function documentReference(id: number): string {
  return `DOC-${String(id).padStart(5, '0')}`;
}

export function exportFilename(title: string, format: ExportFormat): string {
  return `${title.replace(/ /g, '_')}.${format}`;
}

// ============================================================================
// Service
// ============================================================================

export class DocumentService {
  private readonly gateway: GenerationGateway;
  private readonly prompts: PromptBuilder;
  private readonly store: RecordStore;
  private readonly pdf: PdfRenderStrategy;
  private readonly htmlTemplates: TemplateSource | undefined;
  private readonly version: string;
  private readonly environment: string;
  private readonly debug: boolean;
  private readonly now: () => Date;
  private readonly traceId: () => string;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(deps: DocumentServiceDeps) {
    this.gateway = deps.gateway;
    this.prompts = deps.prompts;
    this.store = deps.store;
    this.pdf = deps.pdf;
    this.htmlTemplates = deps.htmlTemplates;
    this.version = deps.version ?? '1.0.0';
    this.environment = deps.environment ?? 'development';
    this.debug = deps.debug ?? false;
    this.now = deps.now ?? (() => new Date());
    this.traceId = deps.traceId ?? randomUUID;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? noopMetrics;
  }

  // --------------------------------------------------------------------------
  // Generation
  // --------------------------------------------------------------------------

  async generate(docType: string, input: unknown, options: GenerateOptions = {}): Promise<ModuleResult<GenerateOutput>> {
    return this.run('generate', async (logger) => {
      const request = validateGenerationRequest(parseDocumentType(docType), input);
      const backend = parseBackendChoice(options.backend ?? 'local');

      const profile = await this.resolveProfile(options.companyId);
      const prompt = await this.prompts.build(
        request.docType,
        request.fields,
        profile ? toBranding(profile) : undefined
      );

      logger.info('Generating document', {
        docType: request.docType,
        backend,
        hasCompanyProfile: profile !== null,
      });
      const response = toGenerationResponse(await this.gateway.generate(backend, prompt));

      let document: GeneratedDocumentRecord | null = null;
      if (options.save) {
        const timestamp = this.now().toISOString();
        document = {
          id: await this.store.nextId('documents'),
          doc_type: request.docType,
          title: request.title,
          content: response.content,
          model_used: response.model_used,
          generation_time: response.generation_time,
          company_id: options.companyId ?? null,
          created_at: timestamp,
          updated_at: timestamp,
        };
        await this.store.save('documents', document);
        logger.info('Document saved', { documentId: document.id });
      }

      this.metrics.increment('documents.generated', { doc_type: request.docType, backend });
      return { ...response, title: request.title, document };
    });
  }

  // --------------------------------------------------------------------------
  // Documents
  // --------------------------------------------------------------------------

  async getDocument(id: number): Promise<ModuleResult<GeneratedDocumentRecord>> {
    return this.run('getDocument', () => this.requireDocument(id));
  }

  /**
   * Newest first, optionally filtered by document type and company
   */
  async listDocuments(query?: unknown): Promise<ModuleResult<DocumentPage>> {
    return this.run('listDocuments', async () => {
      const { doc_type, company_id, limit, offset } = validateDocumentListQuery(query);

      const matching = (await this.store.list('documents'))
        .filter((doc) => doc_type === undefined || doc.doc_type === doc_type)
        .filter((doc) => company_id === undefined || doc.company_id === company_id)
        .sort((a, b) => b.created_at.localeCompare(a.created_at) || b.id - a.id);

      return { items: matching.slice(offset, offset + limit), total: matching.length, limit, offset };
    });
  }

  async updateDocument(id: number, update: unknown): Promise<ModuleResult<GeneratedDocumentRecord>> {
    return this.run('updateDocument', async (logger) => {
      const changes = validateDocumentUpdate(update);
      const existing = await this.requireDocument(id);

      const updated: GeneratedDocumentRecord = {
        ...existing,
        title: changes.title ?? existing.title,
        content: changes.content ?? existing.content,
        updated_at: this.now().toISOString(),
      };
      await this.store.save('documents', updated);
      logger.info('Document updated', { documentId: id });
      return updated;
    });
  }

  async deleteDocument(id: number): Promise<ModuleResult<{ id: number }>> {
    return this.run('deleteDocument', async (logger) => {
      if (!(await this.store.delete('documents', id))) {
        throw new NotFoundFailure(`Document ${id} not found`);
      }
      logger.info('Document deleted', { documentId: id });
      return { id };
    });
  }

  // --------------------------------------------------------------------------
  // Export
  // --------------------------------------------------------------------------

  /**
   * Render a stored document, branded with its associated company profile
   */
  async exportDocument(format: ExportFormat, id: number): Promise<ModuleResult<ExportedDocument>> {
    return this.run('exportDocument', async (logger) => {
      const document = await this.requireDocument(id);
      const profile =
        document.company_id === null ? null : await this.store.load('companies', document.company_id);

      const renderer = new DocumentRenderer({
        branding: profile ? toBranding(profile) : undefined,
        pdf: this.pdf,
        htmlTemplates: this.htmlTemplates,
        now: this.now,
        logger,
        metrics: this.metrics,
      });

      const artifact = await renderer.render(format, document.content, document.doc_type, {
        title: document.title,
        date: document.created_at.slice(0, 10),
        reference: documentReference(document.id),
      });

      const filename = exportFilename(document.title, format);
      logger.info('Document exported', { documentId: id, format, filename });
      return { ...artifact, filename };
    });
  }

  // --------------------------------------------------------------------------
  // Company Profiles
  // --------------------------------------------------------------------------

  async createCompany(input: unknown): Promise<ModuleResult<CompanyProfileRecord>> {
    return this.run('createCompany', async (logger) => {
      const fields = validateCompanyProfile(input);
      const timestamp = this.now().toISOString();

      const profile: CompanyProfileRecord = {
        id: await this.store.nextId('companies'),
        name: fields.name,
        industry: fields.industry ?? null,
        size: fields.size ?? null,
        location: fields.location ?? null,
        website: fields.website ?? null,
        description: fields.description ?? null,
        values: fields.values ?? null,
        logo_url: fields.logo_url ?? null,
        created_at: timestamp,
        updated_at: timestamp,
      };
      await this.store.save('companies', profile);
      logger.info('Company profile created', { companyId: profile.id });
      return profile;
    });
  }

  async getCompany(id: number): Promise<ModuleResult<CompanyProfileRecord>> {
    return this.run('getCompany', () => this.requireCompany(id));
  }

  async listCompanies(): Promise<ModuleResult<CompanyProfileRecord[]>> {
    return this.run('listCompanies', () => this.store.list('companies'));
  }

  /**
   * Partial update; a field given as null is cleared
   */
  async updateCompany(id: number, update: unknown): Promise<ModuleResult<CompanyProfileRecord>> {
    return this.run('updateCompany', async (logger) => {
      const changes = validateCompanyProfileUpdate(update);
      const existing = await this.requireCompany(id);
      const pick = (value: string | null | undefined, current: string | null): string | null =>
        value === undefined ? current : value;

      const updated: CompanyProfileRecord = {
        ...existing,
        name: changes.name ?? existing.name,
        industry: pick(changes.industry, existing.industry),
        size: pick(changes.size, existing.size),
        location: pick(changes.location, existing.location),
        website: pick(changes.website, existing.website),
        description: pick(changes.description, existing.description),
        values: pick(changes.values, existing.values),
        logo_url: pick(changes.logo_url, existing.logo_url),
        updated_at: this.now().toISOString(),
      };
      await this.store.save('companies', updated);
      logger.info('Company profile updated', { companyId: id });
      return updated;
    });
  }

  async deleteCompany(id: number): Promise<ModuleResult<{ id: number }>> {
    return this.run('deleteCompany', async (logger) => {
      if (!(await this.store.delete('companies', id))) {
        throw new NotFoundFailure(`Company profile ${id} not found`);
      }
      logger.info('Company profile deleted', { companyId: id });
      return { id };
    });
  }

  // --------------------------------------------------------------------------
  // Health
  // --------------------------------------------------------------------------

  /**
   * Healthy while at least one backend answers
   */
  async checkHealth(): Promise<ModuleResult<HealthReport>> {
    return this.run('checkHealth', async (): Promise<HealthReport> => {
      const available = await this.gateway.checkHealth();
      return {
        status: available.local || available.cloud ? 'healthy' : 'degraded',
        version: this.version,
        environment: this.environment,
        services: {
          local: { available: available.local, model: this.gateway.describe('local').model },
          cloud: { available: available.cloud, model: this.gateway.describe('cloud').model },
        },
      };
    });
  }

  async describeModels(): Promise<ModuleResult<Record<BackendChoice, ModelDescriptor>>> {
    return this.run('describeModels', async () => ({
      local: this.gateway.describe('local'),
      cloud: this.gateway.describe('cloud'),
    }));
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async requireDocument(id: number): Promise<GeneratedDocumentRecord> {
    const document = await this.store.load('documents', id);
    if (!document) {
      throw new NotFoundFailure(`Document ${id} not found`);
    }
    return document;
  }

  private async requireCompany(id: number): Promise<CompanyProfileRecord> {
    const profile = await this.store.load('companies', id);
    if (!profile) {
      throw new NotFoundFailure(`Company profile ${id} not found`);
    }
    return profile;
  }

  /**
   * The profile named by `companyId`, else the first stored one
   */
  private async resolveProfile(companyId?: number): Promise<CompanyProfileRecord | null> {
    if (companyId !== undefined) {
      return this.requireCompany(companyId);
    }
    const [first] = await this.store.list('companies');
    return first ?? null;
  }

  private async run<T>(operation: string, fn: (logger: Logger) => Promise<T>): Promise<ModuleResult<T>> {
    const startTime = Date.now();
    const timestamp = this.now().toISOString();
    const traceId = this.traceId();
    const logger = withTrace(this.logger, traceId);
    const metadata = () => ({ traceId, module: MODULE, timestamp, duration: Date.now() - startTime });

    try {
      const data = await fn(logger);
      return { success: true, data, metadata: metadata() };
    } catch (error) {
      const response = toErrorResponse(error, { debug: this.debug, traceId });
      logger.error(`${operation} failed`, {
        code: response.body.error.code,
        status: response.status,
        error: error instanceof Error ? error.message : String(error),
      });
      this.metrics.increment('documents.failures', { operation, code: response.body.error.code });

      const retryAfter = response.headers['Retry-After'];
      return {
        success: false,
        error: {
          ...response.body.error,
          status: response.status,
          ...(retryAfter === undefined ? {} : { retryAfterSeconds: Number(retryAfter) }),
        },
        metadata: metadata(),
      };
    }
  }
}
