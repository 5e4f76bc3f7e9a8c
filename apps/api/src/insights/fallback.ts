import { DomainProfile } from '../types/schema';
import { InsightPayload } from './prompt';

const MAX_METRICS = 6;

export const humanize = (key: string) =>
  key
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/[_-]+/g, ' ')
    .trim()
    .replace(/^./, c => c.toUpperCase());

const formatValue = (value: number) => value.toLocaleString('en-US', { maximumFractionDigits: 2 });

// Top-level numbers first, then one level into nested objects ("Key metrics total revenue").
const numericFields = (payload: InsightPayload) => {
  const fields: Array<[string, number]> = [];
  for (const [key, value] of Object.entries(payload)) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      fields.push([humanize(key), value]);
    } else if (value && typeof value === 'object' && !Array.isArray(value)) {
      for (const [inner, innerValue] of Object.entries(value)) {
        if (typeof innerValue === 'number' && Number.isFinite(innerValue)) {
          fields.push([`${humanize(key)} ${humanize(inner).toLowerCase()}`, innerValue]);
        }
      }
    }
  }
  return fields.slice(0, MAX_METRICS);
};

/** Deterministic summary built from the payload itself when no model answers. */
export const staticInsight = (payload: InsightPayload, domain: DomainProfile) => {
  const metrics = numericFields(payload);
  const lines = [`Business insights summary for ${domain.name}`, ''];

  if (metrics.length) {
    lines.push('Key metrics:');
    metrics.forEach(([label, value]) => lines.push(`- ${label}: ${formatValue(value)}`));
  } else {
    lines.push(`The analysis covers your ${domain.context.domainKnowledge} data.`);
  }

  lines.push(
    '',
    'Recommendations:',
    `1. Track ${domain.context.keyMetrics.slice(0, 2).join(' and ') || 'these metrics'} regularly`,
    '2. Investigate significant trends or outliers',
    '3. Compare results period over period before acting'
  );
  return lines.join('\n');
};

const GENERIC_QUESTIONS = [
  'What are the top-performing products by revenue?',
  'How have sales changed over time?',
  'What is the average transaction value?',
  'How many customers come back again?',
  'Where are most of my sales coming from?'
];

export const staticQuestions = (domain: DomainProfile) => {
  const fromCatalog = domain.questions.map(q => q.text).slice(0, 5);
  return fromCatalog.length ? fromCatalog : GENERIC_QUESTIONS.slice();
};
