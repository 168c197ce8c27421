import { z } from 'zod';
import { MAX_WORKERS } from '../../shared/config';
import { DOCUMENT_CATEGORIES, isDocumentCategory } from '../../shared/types';

/**
 * Upstream stage output that does not have the expected structure. Fatal:
 * later stages cannot guess the missing pieces.
 */
export class MalformedInputError extends Error {
  constructor(
    readonly source: string,
    readonly issues: string[],
  ) {
    super(`Malformed ${source}: ${issues.slice(0, 5).join('; ')}`);
    this.name = 'MalformedInputError';
  }
}

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

export const parseOrThrow = <S extends z.ZodTypeAny>(schema: S, payload: unknown, source: string): z.output<S> => {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedInputError(source, formatIssues(parsed.error));
  }
  return parsed.data;
};

const looseText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => (value == null ? '' : String(value)));

export const RawLinkRecordSchema = z.object({
  text: looseText,
  url: looseText,
  filename: looseText,
  estimated_category: z
    .string()
    .nullish()
    .transform((value) => {
      const trimmed = (value ?? '').trim();
      return isDocumentCategory(trimmed) ? trimmed : 'other';
    }),
});

export const RawLinkListSchema = z.array(RawLinkRecordSchema);

export type RawLinkRecord = z.output<typeof RawLinkRecordSchema>;

const CategorySchema = z.enum(DOCUMENT_CATEGORIES);

const CandidateSchema = z.object({
  text: z.string(),
  url: z.string().min(1),
  filename: z.string(),
  category: CategorySchema,
  categorySource: z.enum(['hint', 'rules', 'oracle']),
  materialId: z.string(),
  priorityScore: z.number().int().min(1),
  scoreComponents: z.object({
    base: z.number(),
    filenameBonus: z.number(),
    mentionBonus: z.number(),
    categoryPenalty: z.number(),
  }),
  adjustments: z.array(z.string()),
});

const SelectedCandidateSchema = CandidateSchema.extend({
  decisionPending: z.boolean(),
  decisionGroupId: z.string().optional(),
  decisionRole: z.enum(['summary', 'full']).optional(),
  decisionResolved: z.boolean().optional(),
});

const SnapshotSchema = z.object({
  url: z.string().min(1),
  text: z.string(),
  priorityScore: z.number(),
});

const DeferredDecisionSchema = z.object({
  groupId: z.string().min(1),
  status: z.literal('pending'),
  rule: z.string(),
  summaryCandidate: SnapshotSchema,
  fullCandidate: SnapshotSchema,
});

/** The part of a selection result the document pipeline reads. */
export const SelectionPayloadSchema = z.object({
  selectedCandidates: z.array(SelectedCandidateSchema),
  deferredDecisions: z.array(DeferredDecisionSchema),
});

export const DownloadRecordSchema = z.object({
  index: z.number().int().nonnegative(),
  url: z.string().min(1),
  originalFilename: z.string(),
  savedPath: z.string(),
  downloaded: z.boolean(),
  sizeBytes: z.number().int().nonnegative().optional(),
  contentType: z.string().optional(),
  usedBrowserHeaders: z.boolean().optional(),
  error: z.string().optional(),
});

export const DownloadListSchema = z.array(DownloadRecordSchema);

const SelectionInputSchema = z.object({
  candidates: z.unknown().optional(),
  linkLines: z.string().optional(),
  minutesText: z.string().optional().default(''),
});

const hasLinkInput = (body: { candidates?: unknown; linkLines?: string }) =>
  body.candidates !== undefined || body.linkLines !== undefined;

const LINK_INPUT_REQUIRED = { message: 'candidates or linkLines is required' };

export const SelectionRequestSchema = SelectionInputSchema.refine(hasLinkInput, LINK_INPUT_REQUIRED);

export const RunRequestSchema = SelectionInputSchema.extend({
  maxWorkers: z.number().int().min(1).max(MAX_WORKERS).optional(),
}).refine(hasLinkInput, LINK_INPUT_REQUIRED);

export const ResolutionRequestSchema = z.object({
  runId: z.string().regex(/^[A-Za-z0-9_-]{1,80}$/),
  selection: z.unknown(),
  downloads: z.unknown(),
});
