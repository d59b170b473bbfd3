/**
 * Integration Tests for the Documents Facade
 *
 * Runs the real validator, prompt templates, gateway, renderer and memory
 * store together. Only the model backends and, where noted, the PDF engines
 * are replaced.
 */

import { join } from 'path';
import { describe, it, expect, beforeEach } from '@jest/globals';
import JSZip from 'jszip';
import { PDFDocument } from 'pdf-lib';
import { ConnectivityFailure, RateLimitFailure } from '../../src/errors/index.js';
import {
  DocumentService,
  GenerationGateway,
  MemoryRecordStore,
  PdfRenderStrategy,
  PromptBuilder,
  FileTemplateSource,
  DocumentRenderer,
  DOCX_MIME_TYPE,
  PDF_MIME_TYPE,
  createDocumentService,
  createPdfStrategy,
  inlineStyles,
  layoutHtml,
  loadConfig,
} from '../../src/index.js';
import { blockText } from '../../src/pdf-engines/index.js';
import { FALLBACK_STYLESHEET } from '../../src/renderers/index.js';
import {
  SAMPLE_REQUESTS,
  createFakeBackend,
  createMockLogger,
  createMockMetrics,
  createRecordingSleep,
  createStubEngine,
  drawnLines,
} from '../helpers.js';

const PROMPTS_DIR = join(__dirname, '../../prompts');
const TEMPLATES_DIR = join(__dirname, '../../templates');
const NOW = '2025-01-20T10:00:00.000Z';
const OFFER_TITLE = 'Offer Letter: Data Analyst - Sam Rivera';

class FailingStore extends MemoryRecordStore {
  override async list(): Promise<never> {
    throw new Error('disk offline');
  }
}

function buildHarness(options: { store?: MemoryRecordStore; debug?: boolean } = {}) {
  const local = createFakeBackend('local', '# Offer\nWelcome aboard **Sam**.\n- Start: 2025-04-01');
  const cloud = createFakeBackend('cloud', 'Cloud text');
  const recording = createRecordingSleep();
  const primary = createStubEngine('primary', true, Buffer.from('%PDF-primary'));
  const fallback = createStubEngine('fallback', true, Buffer.from('%PDF-fallback'));
  const store = options.store ?? new MemoryRecordStore();
  const logger = createMockLogger();
  const metrics = createMockMetrics();

  const service = new DocumentService({
    gateway: new GenerationGateway({
      backends: { local, cloud },
      sleep: recording.sleep,
      logger: createMockLogger(),
    }),
    prompts: new PromptBuilder(new FileTemplateSource(PROMPTS_DIR, '.txt'), createMockLogger()),
    store,
    pdf: new PdfRenderStrategy({ primary, fallback }, createMockLogger()),
    htmlTemplates: new FileTemplateSource(TEMPLATES_DIR, '.html'),
    version: '2.0.0-test',
    environment: 'development',
    debug: options.debug,
    now: () => new Date(NOW),
    traceId: () => 'trace-test',
    logger,
    metrics,
  });

  return { service, local, cloud, primary, fallback, store, logger, metrics, delays: recording.delays };
}

// ============================================================================
// Rendering Pipeline
// ============================================================================

describe('Rendering pipeline end to end', () => {
  it('should render an unbranded review through the fallback PDF engine', async () => {
    const renderer = new DocumentRenderer({
      pdf: createPdfStrategy({ primaryEnabled: false }, createMockLogger()),
      now: () => new Date(NOW),
      logger: createMockLogger(),
    });
    const metadata = { title: 'Q4 Review', reference: 'DOC-00042' };

    const html = await renderer.buildHtml('## Summary\nGreat quarter.', 'performance_review', metadata);
    const artifact = await renderer.render('pdf', '## Summary\nGreat quarter.', 'performance_review', metadata);

    expect(html).not.toContain('company-info');
    expect(artifact.mimeType).toBe(PDF_MIME_TYPE);
    expect(artifact.data.subarray(0, 5).toString()).toBe('%PDF-');

    const pdf = await PDFDocument.load(artifact.data);
    expect(pdf.getTitle()).toBe('Q4 Review');
    expect(pdf.getSubject()).toBe('DOC-00042');
    expect(pdf.getPageCount()).toBe(1);

    const blocks = ['Q4 Review', 'Generated: 2025-01-20', 'Reference: DOC-00042', 'Summary', 'Great quarter.'];
    expect(layoutHtml(inlineStyles(html, FALLBACK_STYLESHEET)).blocks.map(blockText)).toEqual(blocks);
    await expect(drawnLines(artifact.data)).resolves.toEqual([...blocks, 'Page 1 of 1']);
  });
});

// ============================================================================
// Generation
// ============================================================================

describe('DocumentService.generate', () => {
  let harness: ReturnType<typeof buildHarness>;

  beforeEach(() => {
    harness = buildHarness();
  });

  it('should generate on the local backend without saving by default', async () => {
    const result = await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter);

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      title: OFFER_TITLE,
      content: '# Offer\nWelcome aboard **Sam**.\n- Start: 2025-04-01',
      model_used: 'test-local-model',
      document: null,
    });
    expect(result.metadata).toMatchObject({ traceId: 'trace-test', module: 'documents', timestamp: NOW });
    expect(harness.cloud.generate).not.toHaveBeenCalled();
    expect(harness.store.size()).toBe(0);
    expect(harness.metrics.counters).toEqual(['documents.generated']);
  });

  it('should build the prompt from the request with neutral branding', async () => {
    await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter);

    const prompt = harness.local.generate.mock.calls[0]?.[0] ?? '';
    expect(prompt).toContain('You are an HR manager at Our Company (Technology, Growing team)');
    expect(prompt).toContain('Candidate: Sam Rivera');
  });

  it('should use the cloud backend when asked', async () => {
    const result = await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter, { backend: 'cloud' });

    expect(result.data?.model_used).toBe('test-cloud-model');
    expect(harness.local.generate).not.toHaveBeenCalled();
  });

  it('should save the generated document when asked', async () => {
    const result = await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter, { save: true });

    expect(result.data?.document).toMatchObject({
      id: 1,
      doc_type: 'offer_letter',
      title: OFFER_TITLE,
      model_used: 'test-local-model',
      company_id: null,
      created_at: NOW,
      updated_at: NOW,
    });
    await expect(harness.store.load('documents', 1)).resolves.toMatchObject({ title: OFFER_TITLE });
  });

  it('should brand the prompt with the first stored company profile', async () => {
    await harness.service.createCompany({ name: 'Acme Test Co', industry: 'Retail' });

    await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter);

    const prompt = harness.local.generate.mock.calls[0]?.[0] ?? '';
    expect(prompt).toContain('You are an HR manager at Acme Test Co (Retail, Growing team)');
  });

  it('should reject an unknown document type before calling a backend', async () => {
    const result = await harness.service.generate('memo', {});

    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Unknown document type: memo',
      status: 422,
      details: [{ path: 'doc_type', message: expect.any(String) }],
    });
    expect(harness.local.generate).not.toHaveBeenCalled();
    expect(harness.metrics.counters).toEqual(['documents.failures']);
    expect(harness.logger.logs.at(-1)).toMatchObject({
      level: 'error',
      message: 'generate failed',
      meta: { code: 'VALIDATION_ERROR', status: 422, trace_id: 'trace-test' },
    });
  });

  it('should list invalid fields in the error details', async () => {
    const result = await harness.service.generate('performance_review', {
      ...SAMPLE_REQUESTS.performance_review,
      rating: 12,
    });

    expect(result.error?.status).toBe(422);
    expect(result.error?.details).toEqual([{ path: 'rating', message: expect.any(String) }]);
  });

  it('should report a missing company profile as not found', async () => {
    const result = await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter, { companyId: 9 });

    expect(result.error).toEqual({ code: 'RESOURCE_NOT_FOUND', message: 'Company profile 9 not found', status: 404 });
  });

  it('should reject an unknown backend before calling either backend', async () => {
    const result = await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter, { backend: 'mainframe' });

    expect(result.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Unknown backend: mainframe',
      status: 422,
      details: [{ path: 'backend', message: 'Expected one of local, cloud' }],
    });
    expect(harness.local.generate).not.toHaveBeenCalled();
    expect(harness.cloud.generate).not.toHaveBeenCalled();
  });

  it('should pass the rate-limit retry hint through to the caller', async () => {
    harness.cloud.generate.mockRejectedValue(new RateLimitFailure('Quota exhausted', { retryAfterSeconds: 17 }));

    const result = await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter, { backend: 'cloud' });

    expect(result.error).toEqual({
      code: 'BACKEND_RATE_LIMIT',
      message: 'Quota exhausted',
      status: 429,
      retryAfterSeconds: 17,
    });
    expect(harness.cloud.generate).toHaveBeenCalledTimes(1);
  });

  it('should surface backend failures after the retry budget', async () => {
    harness.local.generate.mockRejectedValue(new ConnectivityFailure('Local model unreachable', { provider: 'local' }));

    const result = await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter);

    expect(result.error).toEqual({ code: 'BACKEND_UNAVAILABLE', message: 'Local model unreachable', status: 503 });
    expect(harness.local.generate).toHaveBeenCalledTimes(3);
    expect(harness.delays).toEqual([2000, 4000]);
  });
});

// ============================================================================
// Stored Documents
// ============================================================================

describe('DocumentService documents', () => {
  let harness: ReturnType<typeof buildHarness>;

  beforeEach(async () => {
    harness = buildHarness();
    await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter, { save: true });
    await harness.service.generate('job_description', SAMPLE_REQUESTS.job_description, { save: true });
    await harness.service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter, { save: true });
  });

  it('should list newest first with paging and filters', async () => {
    const all = await harness.service.listDocuments();
    const offers = await harness.service.listDocuments({ doc_type: 'offer_letter' });
    const page = await harness.service.listDocuments({ limit: 1, offset: 1 });

    expect(all.data?.items.map((doc) => doc.id)).toEqual([3, 2, 1]);
    expect(offers.data?.items.map((doc) => doc.id)).toEqual([3, 1]);
    expect(page.data).toMatchObject({ total: 3, limit: 1, offset: 1 });
    expect(page.data?.items.map((doc) => doc.id)).toEqual([2]);
  });

  it('should fetch, update and delete a document', async () => {
    await expect(harness.service.getDocument(2)).resolves.toMatchObject({
      success: true,
      data: { doc_type: 'job_description' },
    });

    const updated = await harness.service.updateDocument(1, { title: 'Renamed offer' });
    expect(updated.data).toMatchObject({ id: 1, title: 'Renamed offer', content: '# Offer\nWelcome aboard **Sam**.\n- Start: 2025-04-01' });

    await expect(harness.service.deleteDocument(1)).resolves.toMatchObject({ success: true, data: { id: 1 } });
    await expect(harness.service.deleteDocument(1)).resolves.toMatchObject({
      success: false,
      error: { code: 'RESOURCE_NOT_FOUND', message: 'Document 1 not found', status: 404 },
    });
  });

  it('should reject an empty update', async () => {
    const result = await harness.service.updateDocument(1, {});

    expect(result.error).toMatchObject({ code: 'VALIDATION_ERROR', status: 422 });
  });

  it('should hide unexpected error text unless debugging', async () => {
    const quiet = buildHarness({ store: new FailingStore() });
    const verbose = buildHarness({ store: new FailingStore(), debug: true });

    await expect(quiet.service.listDocuments()).resolves.toMatchObject({
      error: { code: 'INTERNAL_SERVER_ERROR', message: 'An unexpected error occurred', status: 500 },
    });
    await expect(verbose.service.listDocuments()).resolves.toMatchObject({
      error: { message: 'An unexpected error occurred: disk offline' },
    });
  });
});

// ============================================================================
// Export
// ============================================================================

describe('DocumentService.exportDocument', () => {
  it('should export DOCX with a reference and a filename from the title', async () => {
    const { service } = buildHarness();
    await service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter, { save: true });

    const result = await service.exportDocument('docx', 1);

    expect(result.data?.mimeType).toBe(DOCX_MIME_TYPE);
    expect(result.data?.filename).toBe('Offer_Letter:_Data_Analyst_-_Sam_Rivera.docx');

    const zip = await JSZip.loadAsync(result.data?.data ?? Buffer.alloc(0));
    const xml = (await zip.file('word/document.xml')?.async('string')) ?? '';
    expect(xml).toContain('Reference: DOC-00001');
    expect(xml).toContain('Generated: 2025-01-20');
  });

  it('should brand the PDF with the document company through the per-type layout', async () => {
    const { service, primary } = buildHarness();
    await service.createCompany({ name: 'Acme Test Co', location: 'Denver, CO' });
    await service.generate('offer_letter', SAMPLE_REQUESTS.offer_letter, { save: true, companyId: 1 });

    const result = await service.exportDocument('pdf', 1);

    expect(result.data).toMatchObject({ mimeType: PDF_MIME_TYPE, filename: 'Offer_Letter:_Data_Analyst_-_Sam_Rivera.pdf' });
    expect(result.data?.data.toString()).toBe('%PDF-primary');

    const [html, options] = primary.render.mock.calls[0] ?? [];
    expect(options?.headerText).toBe('Acme Test Co');
    expect(html).toContain('PRIVATE AND CONFIDENTIAL');
    expect(html).toContain('<h1>Acme Test Co</h1>');
    expect(html).toContain('Reference: DOC-00001');
  });

  it('should report a missing document as not found', async () => {
    const { service, primary } = buildHarness();

    const result = await service.exportDocument('pdf', 5);

    expect(result.error).toEqual({ code: 'RESOURCE_NOT_FOUND', message: 'Document 5 not found', status: 404 });
    expect(primary.render).not.toHaveBeenCalled();
  });
});

// ============================================================================
// Company Profiles
// ============================================================================

describe('DocumentService company profiles', () => {
  it('should create, update, list and delete profiles', async () => {
    const { service } = buildHarness();

    const created = await service.createCompany({ name: 'Acme Test Co', website: 'https://acme.test' });
    expect(created.data).toEqual({
      id: 1,
      name: 'Acme Test Co',
      industry: null,
      size: null,
      location: null,
      website: 'https://acme.test',
      description: null,
      values: null,
      logo_url: null,
      created_at: NOW,
      updated_at: NOW,
    });

    const updated = await service.updateCompany(1, { industry: 'Retail', website: null });
    expect(updated.data).toMatchObject({ name: 'Acme Test Co', industry: 'Retail', website: null });

    const listed = await service.listCompanies();
    expect(listed.data?.map((profile) => profile.industry)).toEqual(['Retail']);

    await expect(service.deleteCompany(1)).resolves.toMatchObject({ success: true });
    await expect(service.getCompany(1)).resolves.toMatchObject({
      error: { code: 'RESOURCE_NOT_FOUND', message: 'Company profile 1 not found', status: 404 },
    });
  });

  it('should reject a profile without a name', async () => {
    const { service } = buildHarness();

    const result = await service.createCompany({ industry: 'Retail' });

    expect(result.error).toMatchObject({ code: 'VALIDATION_ERROR', status: 422 });
  });
});

// ============================================================================
// Health
// ============================================================================

describe('DocumentService.checkHealth', () => {
  it('should stay healthy while one backend answers', async () => {
    const { service, local } = buildHarness();
    local.isHealthy.mockResolvedValue(false);

    const result = await service.checkHealth();

    expect(result.data).toEqual({
      status: 'healthy',
      version: '2.0.0-test',
      environment: 'development',
      services: {
        local: { available: false, model: 'test-local-model' },
        cloud: { available: true, model: 'test-cloud-model' },
      },
    });
  });

  it('should degrade when no backend answers', async () => {
    const { service, local, cloud } = buildHarness();
    local.isHealthy.mockResolvedValue(false);
    cloud.isHealthy.mockResolvedValue(false);

    const result = await service.checkHealth();

    expect(result.data?.status).toBe('degraded');
  });

  it('should describe both models', async () => {
    const { service } = buildHarness();

    const result = await service.describeModels();

    expect(result.data?.local).toMatchObject({ provider: 'Local', model: 'test-local-model', mode: 'local' });
    expect(result.data?.cloud).toMatchObject({ provider: 'Cloud', model: 'test-cloud-model', mode: 'cloud' });
  });
});

// ============================================================================
// Wiring
// ============================================================================

describe('createDocumentService', () => {
  it('should wire configuration, overrides and log output', async () => {
    const lines: string[] = [];
    const local = createFakeBackend('local', 'Plan text');
    const config = loadConfig({ PROMPTS_DIR, TEMPLATES_DIR, RETRY_MAX_ATTEMPTS: '1', LOG_FORMAT: 'json' });

    const service = createDocumentService(config, {
      backends: { local, cloud: createFakeBackend('cloud') },
      store: new MemoryRecordStore(),
      pdf: new PdfRenderStrategy({ fallback: createStubEngine('fallback', true) }, createMockLogger()),
      sink: (_level, line) => {
        lines.push(line);
      },
    });

    local.generate.mockRejectedValueOnce(new ConnectivityFailure('Local model unreachable'));
    const failed = await service.generate('onboarding_plan', SAMPLE_REQUESTS.onboarding_plan);
    const saved = await service.generate('onboarding_plan', SAMPLE_REQUESTS.onboarding_plan, { save: true });

    expect(failed.error?.code).toBe('BACKEND_UNAVAILABLE');
    expect(local.generate).toHaveBeenCalledTimes(2);
    expect(saved.data?.document?.title).toBe('Onboarding Plan: Support Lead - 30 days');
    expect(lines.some((line) => line.includes('Document saved'))).toBe(true);
  });
});
