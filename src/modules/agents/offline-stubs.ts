import { z } from 'zod';
import stubData from '../../data/offline-stubs.json' with { type: 'json' };
import { citationSchema, examSchema, planSchema } from '../../common/schemas.js';
import type { Citation, Exam, Plan } from '../../common/types.js';

const offlineStubsSchema = z
  .object({
    plan: planSchema,
    exam: examSchema,
    citations: z.record(citationSchema),
    defaultCitationDomain: z.string(),
    lessonPoints: z.array(z.string().min(1)).min(1),
  })
  .refine(stubs => Object.hasOwn(stubs.citations, stubs.defaultCitationDomain), {
    message: 'defaultCitationDomain must name one of the stub citations',
    path: ['defaultCitationDomain'],
  });

const offlineStubs = offlineStubsSchema.parse(stubData);

export function stubPlan(): Plan {
  return structuredClone(offlineStubs.plan);
}

export function stubExam(): Exam {
  return structuredClone(offlineStubs.exam);
}

export function stubCitationFor(domain: string): Citation {
  const citation = offlineStubs.citations[domain] ?? offlineStubs.citations[offlineStubs.defaultCitationDomain];
  if (!citation) {
    throw new Error(`No stub citation for domain "${domain}"`);
  }
  return { ...citation };
}

export function stubLessonPoints(): string[] {
  return [...offlineStubs.lessonPoints];
}
