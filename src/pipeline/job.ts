import { logger } from '../core/logger.js';
import { errorMessage, isCancelled } from '../core/errors.js';
import { hasCredentials, type Credentials } from '../core/credentials.js';
import type { CommentThreadResult } from '../scrapers/comments.js';
import { renderItem } from './render.js';
import type { CommentSource, ExtractionResult, Extractor, HarvestJob, ItemReference } from './types.js';

export interface HarvestJobDeps {
  extractor: Extractor;
  comments: CommentSource;
}

export const NO_CREDENTIALS_ERROR = 'Comments not fetched: no credentials configured.';

export function emptyExtraction(error: string): ExtractionResult {
  return { title: '', description: '', tags: [], transcript: '', error };
}

async function extractSafely(extractor: Extractor, itemRef: ItemReference, signal?: AbortSignal): Promise<ExtractionResult> {
  try {
    return await extractor.extract(itemRef, signal);
  } catch (error) {
    if (isCancelled(error) || signal?.aborted) {
      throw error;
    }
    logger.error(`Extraction failed for ${itemRef}`, { error: errorMessage(error) });
    return emptyExtraction(`Extraction failed: ${errorMessage(error)}`);
  }
}

async function harvestSafely(
  comments: CommentSource,
  itemRef: ItemReference,
  credentials: Credentials | undefined,
  signal?: AbortSignal,
): Promise<CommentThreadResult> {
  if (!hasCredentials(credentials)) {
    return { items: [], error: NO_CREDENTIALS_ERROR };
  }

  try {
    return await comments.harvest(itemRef, credentials, signal);
  } catch (error) {
    if (isCancelled(error) || signal?.aborted) {
      throw error;
    }
    logger.error(`Comment harvest failed for ${itemRef}`, { error: errorMessage(error) });
    return { items: [], error: `Comment harvest failed: ${errorMessage(error)}` };
  }
}

/**
 * Run extraction and comment harvesting for one item concurrently and render
 * the combined text. Collaborator failures end up as error strings in the
 * rendering; only cancellation propagates.
 */
export async function runHarvestJob(
  job: HarvestJob,
  deps: HarvestJobDeps,
  credentials: Credentials | undefined,
  signal?: AbortSignal,
): Promise<string> {
  const [extractionResult, commentResult] = await Promise.all([
    extractSafely(deps.extractor, job.itemRef, signal),
    harvestSafely(deps.comments, job.itemRef, credentials, signal),
  ]);

  job.extractionResult = extractionResult;
  job.commentResult = commentResult;

  return renderItem(job.itemRef, extractionResult, commentResult);
}
