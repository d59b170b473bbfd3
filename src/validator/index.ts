/**
 * Request Validator Module
 *
 * zod schemas for every caller input that reaches the core: generation
 * requests per document type, company profiles, document edits and list
 * queries. Failures become a ValidationFailure carrying one issue per
 * offending field, raised before any backend is called.
 */

import { z } from 'zod';
import { ValidationFailure, type ValidationIssue } from '../errors/index.js';
import { BACKEND_CHOICES, DOCUMENT_TYPES, type BackendChoice, type DocumentType } from '../types/index.js';

// ============================================================================
// Generation Request Schemas
// ============================================================================

const shortText = (max?: number) => {
  const base = z.string().trim().min(2);
  return max === undefined ? base : base.max(max);
};

const itemList = z.array(z.string().trim().min(1)).min(1);

export const jobDescriptionSchema = z.object({
  job_title: shortText(100),
  department: shortText(100),
  exp_level: z.number().int().min(0).max(50),
  qualification: shortText(),
  req_skills: itemList,
  role: shortText(),
  salary: z.string().trim(),
  location: z.string().trim(),
});

export const interviewQuestionsSchema = z.object({
  role: shortText(),
  focus_area: shortText(),
  experience_level: z.number().int().min(0).max(50),
  technical_skills: itemList,
  soft_skills: itemList,
});

export const offerLetterSchema = z.object({
  name: shortText(),
  position: shortText(),
  department: shortText(),
  salary: shortText(),
  start_date: shortText(),
  location: shortText(),
  reporting_to: z.string().trim().default(''),
  benefits: z.string().trim().default(''),
  special_terms: z.string().trim().default(''),
});

export const onboardingPlanSchema = z.object({
  position: shortText(),
  department: shortText(),
  duration: z.number().int().min(1),
  arrangement: shortText(),
  skills: itemList,
  tools: itemList,
  include_culture: z.boolean().default(true),
  include_mentorship: z.boolean().default(true),
});

export const performanceReviewSchema = z.object({
  employee_name: shortText(),
  position: shortText(),
  review_period: shortText(),
  achievements: itemList,
  skills: itemList,
  goals: itemList,
  rating: z.number().min(0).max(10),
});

export type JobDescriptionRequest = z.infer<typeof jobDescriptionSchema>;
export type InterviewQuestionsRequest = z.infer<typeof interviewQuestionsSchema>;
export type OfferLetterRequest = z.infer<typeof offerLetterSchema>;
export type OnboardingPlanRequest = z.infer<typeof onboardingPlanSchema>;
export type PerformanceReviewRequest = z.infer<typeof performanceReviewSchema>;

/**
 * A request that passed validation, with the title its stored record gets
 */
export interface ValidatedRequest {
  docType: DocumentType;
  fields: Record<string, unknown>;
  title: string;
}

// ============================================================================
// Helpers
// ============================================================================

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, raw: unknown, subject: string): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join('; ');
    throw new ValidationFailure(`Invalid ${subject}: ${summary}`, issues);
  }
  return result.data;
}

export function isDocumentType(value: unknown): value is DocumentType {
  return typeof value === 'string' && (DOCUMENT_TYPES as readonly string[]).includes(value);
}

export function parseDocumentType(value: unknown): DocumentType {
  if (!isDocumentType(value)) {
    throw new ValidationFailure(`Unknown document type: ${String(value)}`, [
      { path: 'doc_type', message: `Expected one of ${DOCUMENT_TYPES.join(', ')}` },
    ]);
  }
  return value;
}

export const backendChoiceSchema = z.enum(BACKEND_CHOICES);

export function parseBackendChoice(value: unknown): BackendChoice {
  const result = backendChoiceSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationFailure(`Unknown backend: ${String(value)}`, [
      { path: 'backend', message: `Expected one of ${BACKEND_CHOICES.join(', ')}` },
    ]);
  }
  return result.data;
}

// ============================================================================
// Generation Requests
// ============================================================================

const REQUEST_VALIDATORS: { [K in DocumentType]: (raw: unknown) => ValidatedRequest } = {
  job_description: (raw) => {
    const r = parseOrThrow(jobDescriptionSchema, raw, 'job description request');
    return { docType: 'job_description', fields: r, title: `Job Description: ${r.job_title} - ${r.department}` };
  },
  interview_questions: (raw) => {
    const r = parseOrThrow(interviewQuestionsSchema, raw, 'interview questions request');
    return { docType: 'interview_questions', fields: r, title: `Interview Questions: ${r.role} - ${r.focus_area}` };
  },
  offer_letter: (raw) => {
    const r = parseOrThrow(offerLetterSchema, raw, 'offer letter request');
    return { docType: 'offer_letter', fields: r, title: `Offer Letter: ${r.position} - ${r.name}` };
  },
  onboarding_plan: (raw) => {
    const r = parseOrThrow(onboardingPlanSchema, raw, 'onboarding plan request');
    return { docType: 'onboarding_plan', fields: r, title: `Onboarding Plan: ${r.position} - ${r.duration} days` };
  },
  performance_review: (raw) => {
    const r = parseOrThrow(performanceReviewSchema, raw, 'performance review request');
    return {
      docType: 'performance_review',
      fields: r,
      title: `Performance Review: ${r.employee_name} - ${r.review_period}`,
    };
  },
};

/**
 * Validate a generation request for `docType` and derive its stored title
 */
export function validateGenerationRequest(docType: DocumentType, raw: unknown): ValidatedRequest {
  return REQUEST_VALIDATORS[docType](raw);
}

// ============================================================================
// Company Profiles
// ============================================================================

const optionalText = (max?: number) => {
  const base = z.string().trim();
  return (max === undefined ? base : base.max(max)).nullish();
};

export const companyProfileSchema = z.object({
  name: z.string().trim().min(1).max(200),
  industry: optionalText(100),
  size: optionalText(50),
  location: optionalText(200),
  website: optionalText(500),
  description: optionalText(),
  values: optionalText(),
  logo_url: optionalText(500),
});

export const companyProfileUpdateSchema = companyProfileSchema
  .partial()
  .refine((update) => Object.keys(update).length > 0, { message: 'At least one field must be provided' });

export type CompanyProfileInput = z.infer<typeof companyProfileSchema>;
export type CompanyProfileUpdate = z.infer<typeof companyProfileUpdateSchema>;

export function validateCompanyProfile(raw: unknown): CompanyProfileInput {
  return parseOrThrow(companyProfileSchema, raw, 'company profile');
}

export function validateCompanyProfileUpdate(raw: unknown): CompanyProfileUpdate {
  return parseOrThrow(companyProfileUpdateSchema, raw, 'company profile update');
}

// ============================================================================
// Documents
// ============================================================================

export const documentUpdateSchema = z
  .object({
    title: z.string().trim().min(1).max(255).optional(),
    content: z.string().min(1).optional(),
  })
  .refine((update) => update.title !== undefined || update.content !== undefined, {
    message: 'At least one of title or content must be provided',
  });

export const documentListQuerySchema = z.object({
  doc_type: z.enum(DOCUMENT_TYPES).optional(),
  company_id: z.number().int().positive().optional(),
  limit: z.number().int().min(1).max(1000).default(100),
  offset: z.number().int().min(0).default(0),
});

export type DocumentUpdate = z.infer<typeof documentUpdateSchema>;
export type DocumentListQuery = z.infer<typeof documentListQuerySchema>;

export function validateDocumentUpdate(raw: unknown): DocumentUpdate {
  return parseOrThrow(documentUpdateSchema, raw, 'document update');
}

export function validateDocumentListQuery(raw: unknown): DocumentListQuery {
  return parseOrThrow(documentListQuerySchema, raw ?? {}, 'document list query');
}
