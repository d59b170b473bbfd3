/**
 * Shared test doubles
 */

import { jest } from '@jest/globals';
import { PDFArray, PDFDocument, PDFRawStream, decodePDFRawStream, type PDFObject } from 'pdf-lib';
import type { GenerationBackend } from '../src/backends/index.js';
import type { PdfEngine } from '../src/pdf-engines/index.js';
import type { BackendChoice, DocumentType, Logger, Metrics, ModelDescriptor } from '../src/types/index.js';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta?: Record<string, unknown>;
}

export function createMockLogger(): Logger & { logs: LogEntry[] } {
  const logs: LogEntry[] = [];
  const record =
    (level: LogEntry['level']) =>
    (message: string, meta?: Record<string, unknown>): void => {
      logs.push({ level, message, meta });
    };
  return {
    logs,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

export function createMockMetrics(): Metrics & { counters: string[]; timings: string[] } {
  const counters: string[] = [];
  const timings: string[] = [];
  return {
    counters,
    timings,
    increment: (name) => {
      counters.push(name);
    },
    gauge: () => {},
    timing: (name) => {
      timings.push(name);
    },
  };
}

/**
 * Backend whose calls are jest mocks; `generate` resolves to `reply`
 */
export function createFakeBackend(kind: BackendChoice, reply = 'Generated text') {
  const descriptor: ModelDescriptor = {
    provider: kind === 'local' ? 'Local' : 'Cloud',
    model: kind === 'local' ? 'test-local-model' : 'test-cloud-model',
    mode: kind,
    temperature: 0.7,
    maxTokens: 2000,
  };
  return {
    kind,
    generate: jest.fn<GenerationBackend['generate']>().mockResolvedValue(reply),
    describe: jest.fn<GenerationBackend['describe']>().mockReturnValue(descriptor),
    isHealthy: jest.fn<GenerationBackend['isHealthy']>().mockResolvedValue(true),
  } satisfies GenerationBackend;
}

export function createStubEngine(name: string, available: boolean, output = Buffer.from('%PDF-stub')) {
  return {
    name,
    isAvailable: () => available,
    render: jest.fn<PdfEngine['render']>().mockResolvedValue(output),
  } satisfies PdfEngine;
}

/** Sleep that records requested delays and returns immediately */
export function createRecordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

const SHOW_TEXT = /(-?[\d.]+) (-?[\d.]+) Tm\s*<([0-9A-Fa-f]*)>\s*Tj/g;

/**
 * Text drawn on each page, in drawing order, one entry per baseline
 */
export async function drawnLines(data: Uint8Array): Promise<string[]> {
  const pdf = await PDFDocument.load(data);
  const lines: string[] = [];

  for (const page of pdf.getPages()) {
    const contents = page.node.Contents();
    const parts: PDFObject[] = contents instanceof PDFArray ? contents.asArray() : contents ? [contents] : [];
    let lastY: string | undefined;

    for (const part of parts) {
      const stream = pdf.context.lookup(part);
      if (!(stream instanceof PDFRawStream)) continue;
      const source = Buffer.from(decodePDFRawStream(stream).decode()).toString('latin1');

      for (const [, , y, hex] of source.matchAll(SHOW_TEXT)) {
        const text = Buffer.from(hex ?? '', 'hex').toString('latin1');
        if (y === lastY && lines.length > 0) {
          lines[lines.length - 1] += text;
        } else {
          lines.push(text);
        }
        lastY = y;
      }
    }
  }
  return lines;
}

/** One valid generation request per document type */
export const SAMPLE_REQUESTS: Record<DocumentType, Record<string, unknown>> = {
  job_description: {
    job_title: 'Backend Engineer',
    department: 'Platform',
    exp_level: 3,
    qualification: 'BSc Computer Science',
    req_skills: ['TypeScript', 'PostgreSQL'],
    role: 'Build and run internal APIs',
    salary: '$120k',
    location: 'Remote',
  },
  offer_letter: {
    name: 'Sam Rivera',
    position: 'Data Analyst',
    department: 'Finance',
    salary: '$90,000',
    start_date: '2025-04-01',
    location: 'Austin',
  },
  interview_questions: {
    role: 'Product Designer',
    focus_area: 'Design systems',
    experience_level: 5,
    technical_skills: ['Figma', 'Prototyping'],
    soft_skills: ['Communication'],
  },
  onboarding_plan: {
    position: 'Support Lead',
    department: 'Customer Success',
    duration: 30,
    arrangement: 'Hybrid',
    skills: ['Ticket triage'],
    tools: ['Zendesk', 'Slack'],
  },
  performance_review: {
    employee_name: 'Alex Kim',
    position: 'QA Engineer',
    review_period: 'Q4 2024',
    achievements: ['Cut regression time in half'],
    skills: ['Automation', 'Mentoring'],
    goals: ['Own the release checklist'],
    rating: 8,
  },
};
