import { z } from 'zod';
import { DEFAULT_CONTEXT } from './defaults';

const isValidRegex = (source: string) => {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
};

const patternList = z.array(z.string().min(1).refine(isValidRegex, { message: 'Invalid regular expression' }));

const fieldSchema = z.object({
  name: z.string().min(1),
  family: z.string().min(1).optional()
});

const tierSchema = z.object({
  id: z.string().min(1),
  label: z.string().default(''),
  fields: z.array(z.string().min(1)).min(1),
  capabilities: z.array(z.string().min(1)).default([])
});

const contextSchema = z.object({
  domainKnowledge: z.string().min(1),
  keyMetrics: z.array(z.string()).default([]),
  commonChallenges: z.array(z.string()).default([])
});

const questionSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  description: z.string().optional(),
  requiredFields: z.array(z.string()).default([])
});

export const domainSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().optional(),
    keywords: z.array(z.string().min(1)).default([]),
    patterns: z
      .object({
        date: patternList.optional(),
        amount: patternList.optional(),
        customer: patternList.optional(),
        location: patternList.optional()
      })
      .default({}),
    fields: z.array(fieldSchema).min(1),
    tiers: z.array(tierSchema).min(1),
    context: contextSchema.default(DEFAULT_CONTEXT),
    questions: z.array(questionSchema).default([])
  })
  .superRefine((domain, ctx) => {
    const declared = new Set(domain.fields.map(f => f.name));
    if (declared.size !== domain.fields.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Duplicate field names', path: ['fields'] });
    }
    domain.tiers.forEach((tier, index) => {
      const unknown = tier.fields.filter(name => !declared.has(name));
      if (unknown.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Tier ${tier.id} references undeclared fields: ${unknown.join(', ')}`,
          path: ['tiers', index, 'fields']
        });
      }
    });
  });

export const catalogFileSchema = z.object({
  version: z.number().int().positive().default(1),
  settings: z
    .object({
      fuzzyMatchThreshold: z.number().min(0).max(1).optional()
    })
    .default({}),
  keywordFamilies: z.record(z.array(z.string().min(1))).default({}),
  domains: z.array(z.unknown())
});

export const formatZodError = (error: z.ZodError) =>
  error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
