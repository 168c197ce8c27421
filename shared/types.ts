export type StageName = 'selection' | 'download' | 'resolution' | 'analysis';

export type StageStatus = 'start' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export const DOCUMENT_CATEGORIES = [
  'executive_summary',
  'material',
  'agenda',
  'minutes',
  'reference',
  'personal_material',
  'participants',
  'seating',
  'disclosure_method',
  'other',
] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

export const isDocumentCategory = (value: unknown): value is DocumentCategory =>
  DOCUMENT_CATEGORIES.some((category) => category === value);

/**
 * One link record as produced by an upstream extractor. Several extractors may
 * report the same URL with different labels.
 */
export interface LinkRecord {
  text: string;
  url: string;
  filename: string;
  estimatedCategory: DocumentCategory;
}

export type CategorySource = 'hint' | 'rules' | 'oracle';

export interface ScoreComponents {
  base: number;
  filenameBonus: number;
  mentionBonus: number;
  categoryPenalty: number;
}

export interface Candidate {
  text: string;
  url: string;
  filename: string;
  category: DocumentCategory;
  categorySource: CategorySource;
  materialId: string;
  priorityScore: number;
  scoreComponents: ScoreComponents;
  adjustments: string[];
}

export type DecisionRole = 'summary' | 'full';

export interface CandidateSnapshot {
  url: string;
  text: string;
  priorityScore: number;
}

export interface DeferredDecisionGroup {
  groupId: string;
  status: 'pending' | 'resolved';
  rule: string;
  summaryCandidate: CandidateSnapshot;
  fullCandidate: CandidateSnapshot;
}

export interface ResolvedDecision {
  groupId: string;
  status: 'resolved';
  rule: string;
  chosenRole: DecisionRole;
  chosenUrl: string;
  chosenText: string;
  rejectedUrl: string;
  rejectedText: string;
  reason: string;
  fullPageCount: number | null;
}

export interface SelectedCandidate extends Candidate {
  decisionPending: boolean;
  decisionGroupId?: string;
  decisionRole?: DecisionRole;
  decisionResolved?: boolean;
}

export interface OracleClassificationStatus {
  enabled: boolean;
  errors: string[];
}

export interface SelectionResult {
  runId: string;
  inputs: {
    source: 'json' | 'lines';
    linkCount: number;
    minutesMentionCount: number;
  };
  allCandidates: Candidate[];
  selectedCandidates: SelectedCandidate[];
  deferredDecisions: DeferredDecisionGroup[];
  selectionRule: string;
  oracleClassification: OracleClassificationStatus;
}

export interface DownloadRecord {
  index: number;
  url: string;
  originalFilename: string;
  savedPath: string;
  downloaded: boolean;
  sizeBytes?: number;
  contentType?: string;
  usedBrowserHeaders?: boolean;
  error?: string;
}

export interface DocumentFeatures {
  lineCount: number;
  sentenceLikeCount: number;
  sentenceDensity: number;
  bulletCount: number;
  symbolBulletCount: number;
  nominalEndingCount: number;
  topicLineCount: number;
  paragraphCount: number;
  particleCount: number;
  politeStyleCount: number;
  plainStyleCount: number;
  citationCount: number;
  referenceExprCount: number;
  pageNumberLineCount: number;
  shortLineRatio: number;
}

export type DocumentType =
  | 'participants_list'
  | 'agenda'
  | 'press_release'
  | 'survey_report'
  | 'word_like'
  | 'powerpoint_like'
  | 'mixed';

export type SummaryStrategy =
  | 'longform_summary'
  | 'slide_bullet_summary'
  | 'agenda_structure_summary'
  | 'name_list_extract'
  | 'news_style_summary'
  | 'data_points_summary'
  | 'hybrid_summary';

export interface AnalysisResult {
  url: string;
  text: string;
  savedPath: string;
  analyzed: boolean;
  pageCount?: number | null;
  samplePath?: string;
  features?: DocumentFeatures;
  documentType?: DocumentType;
  classificationReason?: string;
  summaryStrategy?: SummaryStrategy;
  error?: string;
}

export interface DocumentPipelineResult {
  runId: string;
  inputs: {
    maxWorkers: number;
    pageThreshold: number;
  };
  deferredResolutionProbe: Record<string, number | null>;
  resolvedDeferredDecisions: ResolvedDecision[];
  finalSelected: SelectedCandidate[];
  perDocumentAnalysis: AnalysisResult[];
}

export interface PageReportRunResult {
  runId: string;
  selection: SelectionResult;
  downloads: DownloadRecord[];
  documents: DocumentPipelineResult;
}

export interface ApiConfigResponse {
  selection: {
    minScore: number;
    maxScoreBased: number;
  };
  deferred: {
    pageThreshold: number;
  };
  analysis: {
    maxWorkers: number;
    samplePages: number;
  };
  oracleClassification: {
    enabled: boolean;
    hasApiKey: boolean;
  };
}
