/**
 * TWO-TIER COMMENT HARVESTER
 * ==========================
 * Fetches root comments for one item page by page, and for every accepted
 * root with replies, fans out an independent paginated reply fetch.
 *
 * - Every request holds a permit from a shared pool while in flight
 * - Transient failures retry with linear backoff; exhausted retries end pagination softly
 * - Root comments shorter than minLength are dropped before their replies are fetched
 * - A failed reply thread contributes no replies and never aborts the item
 */

import { z } from 'zod';
import { logger } from '../core/logger.js';
import { RequestPermits } from '../core/rateLimit.js';
import { randomDelay, sleep, type SleepFn } from '../core/humanize.js';
import { withRetry, failureReason, success, softEnd, retryable, fatal, type FetchOutcome, type RetryPolicy } from '../core/retry.js';
import { cancellationReason } from '../core/cancellation.js';
import { hasCredentials, type Credentials } from '../core/credentials.js';
import {
  ConfigurationError,
  ResolutionError,
  TransientError,
  errorMessage,
  isCancelled,
} from '../core/errors.js';
import {
  CLOSED_CODES,
  NOT_FOUND_CODE,
  commentPageSchema,
  commentSchema,
  envelopeSchema,
  resolveDataSchema,
  type CommentApi,
  type CommentPage,
  type RequestContext,
  type UpstreamComment,
} from './client.js';

// ============================================================================
// TYPES
// ============================================================================

export interface JitterRange {
  minMs: number;
  maxMs: number;
}

export interface HarvestOptions {
  maxConcurrentRequests: number;
  maxRetries: number;
  baseDelayMs: number;
  rootPageSize: number;
  replyPageSize: number;
  rootCap: number;
  maxRepliesPerRoot: number;
  minLength: number;
  rootJitter: JitterRange;
  replyJitter: JitterRange;
}

export interface RootComment {
  id: number;
  text: string;
  replyCount: number;
}

/** Root text followed by its marked replies. */
export type FlattenedComment = string;

export interface CommentThreadResult {
  items: FlattenedComment[];
  error?: string;
}

export interface CommentHarvesterDeps {
  api: CommentApi;
  options: HarvestOptions;
  /** Shared pool; defaults to one sized by maxConcurrentRequests. */
  permits?: RequestPermits;
  sleep?: SleepFn;
  random?: () => number;
}

export const REPLY_MARKER = ' [reply] ';

export function flattenThread(rootText: string, replies: readonly string[]): FlattenedComment {
  return rootText + replies.map(reply => `${REPLY_MARKER}${reply}`).join('');
}

// Length in characters (code points), not UTF-16 units
export function textLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Validate the envelope's code before touching data.
 * `onCode` decides non-zero codes the caller treats specially.
 */
export function classifyResponse<S extends z.ZodTypeAny>(
  body: unknown,
  schema: S,
  onCode: (code: number) => FetchOutcome<z.output<S>> | undefined,
): FetchOutcome<z.output<S>> {
  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) {
    return retryable(new TransientError('Malformed response envelope'));
  }

  const { code, message } = envelope.data;
  if (code === 0) {
    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      return retryable(new TransientError(`Malformed response data: ${data.error.issues[0]?.message ?? 'invalid'}`));
    }
    return success(data.data);
  }

  return onCode(code) ?? retryable(new TransientError(`API error ${code}: ${message ?? 'no message'}`));
}

/** Keep the entries that parse as comments; skip the rest. */
export function parseComments(entries: readonly unknown[], source: string): UpstreamComment[] {
  const comments: UpstreamComment[] = [];
  for (const entry of entries) {
    const parsed = commentSchema.safeParse(entry);
    if (parsed.success) {
      comments.push(parsed.data);
    }
  }
  const skipped = entries.length - comments.length;
  if (skipped > 0) {
    logger.debug(`Skipped ${skipped} malformed comments in ${source}`);
  }
  return comments;
}

const closedAsSoftEnd = (code: number): FetchOutcome<CommentPage> | undefined =>
  CLOSED_CODES.includes(code) ? softEnd(`comments closed (code ${code})`) : undefined;

// ============================================================================
// HARVESTER
// ============================================================================

export class CommentHarvester {
  readonly permits: RequestPermits;
  private readonly api: CommentApi;
  private readonly options: HarvestOptions;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly policy: RetryPolicy;

  constructor(deps: CommentHarvesterDeps) {
    this.api = deps.api;
    this.options = deps.options;
    this.permits = deps.permits ?? new RequestPermits(deps.options.maxConcurrentRequests);
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
    this.policy = { maxRetries: deps.options.maxRetries, baseDelayMs: deps.options.baseDelayMs };
  }

  async harvest(itemRef: string, credentials: Credentials | undefined, signal?: AbortSignal): Promise<CommentThreadResult> {
    if (!hasCredentials(credentials)) {
      throw new ConfigurationError('Comment harvesting requires credentials; none were loaded.');
    }

    const ctx: RequestContext = { credentials, signal };
    const { rootCap, maxRepliesPerRoot } = this.options;

    const resolved = await this.resolveHandle(itemRef, ctx);
    if (resolved.kind !== 'success') {
      const error = resolved.kind === 'fatal'
        ? resolved.error.message
        : `Failed to resolve ${itemRef} after ${this.policy.maxRetries} attempts: ${failureReason(resolved)}`;
      logger.error(error);
      return { items: [], error };
    }

    const handle = resolved.data;
    logger.info(`Starting comment fetch for ${itemRef}`, { handle, rootCap, maxRepliesPerRoot });

    const roots: RootComment[] = [];
    const threads = new Map<RootComment, Promise<PromiseSettledResult<string[]>>>();

    await this.collectRoots(handle, ctx, root => {
      roots.push(root);
      if (root.replyCount > 0) {
        threads.set(root, settle(this.fetchReplies(handle, root.id, ctx)));
      }
    });

    if (threads.size > 0) {
      logger.debug(`Fetching replies for ${threads.size} root comments of ${itemRef}`);
    }

    const items: FlattenedComment[] = [];
    for (const root of roots) {
      const thread = threads.get(root);
      const outcome = thread ? await thread : undefined;
      let replies: string[] = [];

      if (outcome?.status === 'fulfilled') {
        replies = outcome.value;
      } else if (outcome?.status === 'rejected') {
        if (isCancelled(outcome.reason)) {
          throw outcome.reason;
        }
        logger.error(`Reply fetch failed for root ${root.id} of ${itemRef}`, { error: errorMessage(outcome.reason) });
      }

      items.push(flattenThread(root.text, replies));
    }

    if (signal?.aborted) {
      throw cancellationReason(signal);
    }

    logger.info(`Harvested ${items.length} comment threads for ${itemRef}`);
    return { items };
  }

  private resolveHandle(itemRef: string, ctx: RequestContext): Promise<FetchOutcome<number>> {
    return withRetry(
      async (): Promise<FetchOutcome<number>> => {
        const outcome = await this.attempt(
          () => this.api.resolve(itemRef, ctx),
          resolveDataSchema,
          code => (code === NOT_FOUND_CODE
            ? fatal(new ResolutionError(itemRef, `Item ${itemRef} not found upstream (code ${code}).`))
            : undefined),
          ctx.signal,
        );
        return outcome.kind === 'success' ? success(outcome.data.handle) : outcome;
      },
      this.policy,
      { label: `Resolve ${itemRef}`, signal: ctx.signal, sleep: this.sleep },
    );
  }

  private async collectRoots(handle: number, ctx: RequestContext, onRoot: (root: RootComment) => void): Promise<void> {
    const { rootCap, rootPageSize, minLength, rootJitter } = this.options;
    const maxPages = Math.ceil(rootCap / rootPageSize);
    let accepted = 0;

    for (let page = 1; page <= maxPages; page++) {
      const outcome = await withRetry(
        () => this.attempt(
          () => this.api.listRootComments(handle, page, rootPageSize, ctx),
          commentPageSchema,
          closedAsSoftEnd,
          ctx.signal,
          rootJitter,
        ),
        this.policy,
        { label: `Root page ${page} of ${handle}`, signal: ctx.signal, sleep: this.sleep },
      );

      if (outcome.kind !== 'success') {
        logger.debug(`Stopping root pagination for ${handle} at page ${page}`, { outcome: outcome.kind });
        return;
      }

      const { comments: entries, cursor } = outcome.data;
      if (entries.length === 0) {
        logger.debug(`No more root comments for ${handle} at page ${page}`);
        return;
      }

      const eligible = parseComments(entries, `root page ${page} of ${handle}`)
        .filter(comment => textLength(comment.text) >= minLength)
        .slice(0, rootCap - accepted);

      for (const comment of eligible) {
        onRoot({ id: comment.id, text: comment.text, replyCount: comment.replyCount });
        accepted++;
      }

      if (accepted >= rootCap) {
        logger.debug(`Root comment cap ${rootCap} reached for ${handle}`);
        return;
      }
      // Upstream marks its last root page; asking past it only returns an empty page
      if (cursor?.isEnd) {
        return;
      }
    }
  }

  private async fetchReplies(handle: number, rootId: number, ctx: RequestContext): Promise<string[]> {
    const { maxRepliesPerRoot, replyPageSize, replyJitter } = this.options;
    const maxPages = Math.ceil(maxRepliesPerRoot / replyPageSize);
    const replies: string[] = [];

    for (let page = 1; page <= maxPages; page++) {
      const outcome = await withRetry(
        () => this.attempt(
          () => this.api.listReplies(handle, rootId, page, replyPageSize, ctx),
          commentPageSchema,
          closedAsSoftEnd,
          ctx.signal,
          replyJitter,
        ),
        this.policy,
        { label: `Reply page ${page} of root ${rootId}`, signal: ctx.signal, sleep: this.sleep },
      );

      if (outcome.kind !== 'success') {
        break;
      }

      const { comments: entries, cursor } = outcome.data;
      if (entries.length === 0) {
        break;
      }

      // Replies are not length-filtered; each one counts toward the cap
      const comments = parseComments(entries, `reply page ${page} of root ${rootId}`);
      for (const comment of comments.slice(0, maxRepliesPerRoot - replies.length)) {
        replies.push(comment.text);
      }

      if (replies.length >= maxRepliesPerRoot || cursor?.isEnd) {
        break;
      }
    }

    logger.debug(`Fetched ${replies.length} replies for root ${rootId}`);
    return replies;
  }

  // One request: optional jitter, then the call under a permit, then classification
  private async attempt<S extends z.ZodTypeAny>(
    call: () => Promise<unknown>,
    schema: S,
    onCode: (code: number) => FetchOutcome<z.output<S>> | undefined,
    signal?: AbortSignal,
    jitter?: JitterRange,
  ): Promise<FetchOutcome<z.output<S>>> {
    if (jitter && jitter.maxMs > 0) {
      await randomDelay(jitter.minMs, jitter.maxMs, signal, this.sleep, this.random);
    }

    let body: unknown;
    try {
      body = await this.permits.run(call, signal);
    } catch (error) {
      if (isCancelled(error)) {
        throw error;
      }
      return retryable(error instanceof Error ? error : new TransientError(String(error)));
    }

    return classifyResponse(body, schema, onCode);
  }
}

function settle<T>(promise: Promise<T>): Promise<PromiseSettledResult<T>> {
  return promise.then(
    (value): PromiseSettledResult<T> => ({ status: 'fulfilled', value }),
    (reason: unknown): PromiseSettledResult<T> => ({ status: 'rejected', reason }),
  );
}
