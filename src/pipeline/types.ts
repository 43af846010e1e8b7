import type { Credentials } from '../core/credentials.js';
import type { CommentThreadResult } from '../scrapers/comments.js';

/** Opaque identifier of one discovered work, usually its URL. */
export type ItemReference = string;

export interface ExtractionResult {
  title: string;
  description: string;
  tags: string[];
  transcript: string;
  error?: string;
}

// ============================================================================
// COLLABORATORS
// ============================================================================

export interface Discovery {
  /** Ordered references for a query; may be empty. */
  discover(query: string, signal?: AbortSignal): Promise<ItemReference[]>;
}

export interface Extractor {
  extract(itemRef: ItemReference, signal?: AbortSignal): Promise<ExtractionResult>;
}

export interface Summarizer {
  summarize(query: string, itemText: string, signal?: AbortSignal): Promise<string>;
}

export interface CommentSource {
  harvest(itemRef: ItemReference, credentials: Credentials | undefined, signal?: AbortSignal): Promise<CommentThreadResult>;
}

export type CredentialsProvider = () => Promise<Credentials | undefined>;

// ============================================================================
// RUN STATE
// ============================================================================

export type HarvestJobState = 'pending' | 'done' | 'failed' | 'cancelled';

export interface HarvestJob {
  itemRef: ItemReference;
  /** Position in discovery order. */
  index: number;
  state: HarvestJobState;
  commentResult?: CommentThreadResult;
  extractionResult?: ExtractionResult;
}

export interface CompletedItem {
  itemRef: ItemReference;
  index: number;
  text: string;
}

export type RunState = 'init' | 'discovering' | 'fanned-out' | 'completed' | 'timed-out' | 'assembled';

export type ArtifactStatus = 'complete' | 'truncated' | 'no-results' | 'nothing-processed';

export interface FinalArtifact {
  query: string;
  status: ArtifactStatus;
  /** Rendered item texts, in discovery order. */
  perItem: string[];
  truncated: boolean;
  /** Assembled text handed back to the caller. */
  text: string;
  discovered: number;
  processed: number;
  elapsedMs: number;
}
