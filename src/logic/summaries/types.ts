export type MessageRole = 'user' | 'model';

export const SUMMARY_SIZES = ['short', 'medium', 'long'] as const;
export type SummarySize = (typeof SUMMARY_SIZES)[number];

export const REFINEMENT_INTENTS = [
  'shorter',
  'longer',
  'simpler',
  'technical',
  'bulletPoints',
  'addDetails',
  'custom',
] as const;
export type RefinementIntent = (typeof REFINEMENT_INTENTS)[number];
export type PresetRefinementIntent = Exclude<RefinementIntent, 'custom'>;

export const EXPORT_FORMATS = ['markdown', 'html'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type DocumentKind = 'pdf' | 'image' | 'text' | 'word' | 'other';

export interface SummaryVersion {
  readonly content: string;
  readonly createdAt: Date;
  readonly versionNumber: number;
  readonly refinementPrompt: string | null; // null for version 1 only
}

export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly createdAt: Date;
  readonly attachmentRef?: string;
}

export interface ContextMessage {
  role: MessageRole;
  content: string;
}

export interface DocumentMetadata {
  documentId: string;
  name: string;
  sizeBytes: number;
  extension: string;
  mimeType: string;
  selectedAt: Date;
}

export interface SummaryConfig {
  size: SummarySize;
  customPrompt?: string;
}

export type GenerationPhase = 'idle' | 'prompting' | 'awaitingRemote' | 'committed' | 'failed';

export interface RemoteCallOptions {
  signal?: AbortSignal;
  onPhase?: (phase: GenerationPhase) => void;
}
