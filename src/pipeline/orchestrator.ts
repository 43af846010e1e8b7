import { logger } from '../core/logger.js';
import { errorMessage, isCancelled } from '../core/errors.js';
import { createCancellationToken, systemClock, type CancellationToken, type Clock } from '../core/cancellation.js';
import type { Credentials } from '../core/credentials.js';
import { runHarvestJob } from './job.js';
import { PipelineRun } from './run.js';
import {
  completeText,
  noResultsText,
  nothingProcessedText,
  summarizedText,
  truncatedText,
} from './render.js';
import type {
  ArtifactStatus,
  CommentSource,
  CredentialsProvider,
  Discovery,
  Extractor,
  FinalArtifact,
  HarvestJob,
  ItemReference,
  Summarizer,
} from './types.js';

export interface OrchestratorDeps {
  discovery: Discovery;
  extractor: Extractor;
  comments: CommentSource;
  credentials: CredentialsProvider;
  summarizer?: Summarizer;
  clock?: Clock;
  /** Default global deadline for a run. */
  deadlineMs: number;
}

const TIMEOUT = Symbol('timeout');

/**
 * Fans one harvest job out per discovered item under a single deadline and
 * assembles whatever finished into the final artifact.
 */
export class PipelineOrchestrator {
  private readonly clock: Clock;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async run(query: string, deadlineMs: number = this.deps.deadlineMs): Promise<FinalArtifact> {
    const run = new PipelineRun(query, deadlineMs, this.clock.now());
    const token = createCancellationToken();
    const deadline = new Promise<typeof TIMEOUT>(resolve => {
      token.signal.addEventListener('abort', () => resolve(TIMEOUT), { once: true });
    });
    const cancelTimer = this.clock.schedule(deadlineMs, () => {
      logger.warn(`Run for "${query}" reached its ${deadlineMs}ms deadline, cancelling outstanding work`);
      token.cancel(`Deadline of ${deadlineMs}ms exceeded`);
    });

    logger.info(`Starting run for "${query}"`, { deadlineMs });

    try {
      run.transition('discovering');
      const prepared = await Promise.race([
        Promise.all([this.loadCredentials(), this.discover(query, token.signal)]),
        deadline,
      ]);

      if (prepared === TIMEOUT) {
        run.transition('timed-out');
        run.truncated = true;
        return await this.assemble(run, 0, token);
      }

      const [credentials, itemRefs] = prepared;
      if (itemRefs.length === 0) {
        logger.warn(`No items found for "${query}"`);
        run.truncated = false;
        return await this.assemble(run, 0, token);
      }

      logger.info(`Found ${itemRefs.length} items for "${query}", starting jobs`);
      run.transition('fanned-out');

      const jobs = itemRefs.map((itemRef, index) =>
        this.startJob(run, run.addJob(itemRef, index), itemRefs.length, credentials, token)
      );
      const outcome = await Promise.race([Promise.all(jobs), deadline]);

      if (outcome === TIMEOUT) {
        run.transition('timed-out');
        for (const job of run.pendingJobs()) {
          job.state = 'cancelled';
        }
        run.truncated = true;
        logger.warn(`Run for "${query}" timed out with ${run.accumulator.length}/${itemRefs.length} items complete`);
      } else {
        run.transition('completed');
        run.truncated = false;
      }

      return await this.assemble(run, itemRefs.length, token);
    } finally {
      cancelTimer();
    }
  }

  // Append-on-completion: the item lands in the accumulator as soon as it finishes
  private async startJob(
    run: PipelineRun,
    job: HarvestJob,
    total: number,
    credentials: Credentials | undefined,
    token: CancellationToken,
  ): Promise<void> {
    try {
      const text = await runHarvestJob(job, this.deps, credentials, token.signal);
      if (token.isCancelled) {
        job.state = 'cancelled';
        return;
      }
      job.state = 'done';
      run.append({ itemRef: job.itemRef, index: job.index, text });
      logger.info(`Processed item (${run.accumulator.length}/${total}): ${job.extractionResult?.title || job.itemRef}`);
    } catch (error) {
      if (isCancelled(error) || token.isCancelled) {
        job.state = 'cancelled';
        return;
      }
      job.state = 'failed';
      logger.error(`Job for ${job.itemRef} failed, skipping item`, { error: errorMessage(error) });
    }
  }

  // Discovery failures collapse to an empty list
  private async discover(query: string, signal: AbortSignal): Promise<ItemReference[]> {
    try {
      return await this.deps.discovery.discover(query, signal);
    } catch (error) {
      if (!signal.aborted) {
        logger.error(`Discovery failed for "${query}"`, { error: errorMessage(error) });
      }
      return [];
    }
  }

  private async loadCredentials(): Promise<Credentials | undefined> {
    try {
      return await this.deps.credentials();
    } catch (error) {
      logger.error('Failed to load credentials, continuing anonymously', { error: errorMessage(error) });
      return undefined;
    }
  }

  private async assemble(run: PipelineRun, discovered: number, token: CancellationToken): Promise<FinalArtifact> {
    const perItem = [...run.accumulator]
      .sort((a, b) => a.index - b.index)
      .map(item => item.text);

    let status: ArtifactStatus;
    let text: string;

    if (discovered === 0 && !run.truncated) {
      status = 'no-results';
      text = noResultsText(run.query);
    } else if (perItem.length === 0) {
      status = 'nothing-processed';
      text = nothingProcessedText(run.query, discovered, run.truncated ? run.deadlineMs : undefined);
    } else if (run.truncated) {
      // Degraded path: no further blocking work
      status = 'truncated';
      text = truncatedText(run.query, run.deadlineMs, perItem, discovered);
    } else {
      status = 'complete';
      text = this.deps.summarizer
        ? summarizedText(run.query, await this.summarizeAll(this.deps.summarizer, run.query, perItem, token))
        : completeText(run.query, perItem);
    }

    run.transition('assembled');
    const elapsedMs = this.clock.now() - run.startedAt;
    logger.info(`Run for "${run.query}" assembled`, { status, processed: perItem.length, discovered, elapsedMs });

    return {
      query: run.query,
      status,
      perItem,
      truncated: run.truncated,
      text,
      discovered,
      processed: perItem.length,
      elapsedMs,
    };
  }

  private async summarizeAll(
    summarizer: Summarizer,
    query: string,
    texts: readonly string[],
    token: CancellationToken,
  ): Promise<string[]> {
    const summaries: string[] = [];
    for (const [i, text] of texts.entries()) {
      if (token.isCancelled) {
        summaries.push(text);
        continue;
      }
      try {
        logger.info(`Summarizing item ${i + 1}/${texts.length} for "${query}"`);
        summaries.push(await summarizer.summarize(query, text, token.signal));
      } catch (error) {
        logger.error(`Summary failed for item ${i + 1}, keeping raw text`, { error: errorMessage(error) });
        summaries.push(text);
      }
    }
    return summaries;
  }
}
