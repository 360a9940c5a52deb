import { z } from 'zod';
import { ConstructionError } from '../errors.js';
import { IsoDateSchema, formatIssues } from './common.js';

export const RegulatoryActivitySchema = z.enum([
  'earnings_report',
  'sec_filing',
  'dividend_announcement',
  'merger',
  'bankruptcy',
  'regulatory_change',
]);
export type RegulatoryActivity = z.infer<typeof RegulatoryActivitySchema>;

export const RegulatoryEventSchema = z.object({
  id: z.string().min(1, 'id must be a non-empty string'),
  assetId: z.string().min(1, 'asset id must be a non-empty string'),
  eventType: RegulatoryActivitySchema,
  date: IsoDateSchema,
  description: z.string().min(1, 'description must be a non-empty string'),
  impactScore: z
    .number()
    .finite()
    .min(-1, 'impact score must be between -1 and 1')
    .max(1, 'impact score must be between -1 and 1'),
  relatedAssets: z.array(z.string().min(1)).default([]),
});

export type RegulatoryEvent = Omit<z.infer<typeof RegulatoryEventSchema>, 'relatedAssets'> & {
  readonly relatedAssets: readonly string[];
};
export type RegulatoryEventInput = z.input<typeof RegulatoryEventSchema>;

/**
 * Validate and freeze a regulatory event.
 * @throws ConstructionError when the score is out of range or a field is malformed
 */
export function createRegulatoryEvent(input: RegulatoryEventInput): RegulatoryEvent {
  const parsed = RegulatoryEventSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error, 'event');
    const label = typeof input.id === 'string' && input.id ? ` '${input.id}'` : '';
    throw new ConstructionError(`Invalid regulatory event${label}: ${issues.join('; ')}`, issues);
  }
  return Object.freeze({ ...parsed.data, relatedAssets: Object.freeze([...parsed.data.relatedAssets]) });
}
