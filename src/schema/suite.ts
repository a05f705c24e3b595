import { z } from 'zod';

import { locatorSchema } from './locator.js';

// ── Step type discriminator ───────────────────────────────────

export const stepTypeSchema = z.enum([
  'visit',
  'click',
  'type',
  'expect_visible',
  'expect_hidden',
  'expect_text',
]);

export type StepType = z.infer<typeof stepTypeSchema>;

// ── Individual step schemas ───────────────────────────────────

const baseFields = {
  description: z.string().min(1),
};

export const visitStepSchema = z.object({
  ...baseFields,
  type: z.literal('visit'),
  value: z.string().min(1),
});

export const clickStepSchema = z.object({
  ...baseFields,
  type: z.literal('click'),
  locator: locatorSchema,
});

export const typeStepSchema = z.object({
  ...baseFields,
  type: z.literal('type'),
  locator: locatorSchema,
  value: z.string(),
});

export const expectVisibleStepSchema = z.object({
  ...baseFields,
  type: z.literal('expect_visible'),
  locator: locatorSchema,
});

export const expectHiddenStepSchema = z.object({
  ...baseFields,
  type: z.literal('expect_hidden'),
  locator: locatorSchema,
});

export const expectTextStepSchema = z.object({
  ...baseFields,
  type: z.literal('expect_text'),
  locator: locatorSchema,
  value: z.string().min(1),
});

// ── Union schema ──────────────────────────────────────────────

export const stepSchema = z.discriminatedUnion('type', [
  visitStepSchema,
  clickStepSchema,
  typeStepSchema,
  expectVisibleStepSchema,
  expectHiddenStepSchema,
  expectTextStepSchema,
]);

export type Step = z.infer<typeof stepSchema>;

// ── Suite file ────────────────────────────────────────────────

export const suiteTestSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  steps: z.array(stepSchema).min(1),
});

export type SuiteTest = z.infer<typeof suiteTestSchema>;

export const suiteFileSchema = z
  .object({
    name: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    concurrency: z.number().int().positive().optional(),
    seed: z.number().int().nonnegative().optional(),
    tests: z.array(suiteTestSchema).min(1),
  })
  .refine(
    (suite) => new Set(suite.tests.map((t) => t.id)).size === suite.tests.length,
    { message: 'test ids must be unique', path: ['tests'] },
  );

export type SuiteFile = z.infer<typeof suiteFileSchema>;

export function parseSuite(data: unknown): SuiteFile {
  return suiteFileSchema.parse(data);
}
