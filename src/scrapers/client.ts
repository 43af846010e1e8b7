import { z } from 'zod';
import { TransientError, CancelledError, errorMessage } from '../core/errors.js';
import { cancellationReason } from '../core/cancellation.js';
import type { Credentials } from '../core/credentials.js';

// ============================================================================
// WIRE FORMAT
// ============================================================================

/** Upstream codes meaning "closed" or "not found". */
export const NOT_FOUND_CODE = -404;
export const CLOSED_CODES: readonly number[] = [12002, NOT_FOUND_CODE];

export const envelopeSchema = z.object({
  code: z.number().int(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

export const resolveDataSchema = z.object({
  handle: z.number().int(),
});

export const commentSchema = z.object({
  id: z.number().int(),
  text: z.string(),
  replyCount: z.number().int().nonnegative().default(0),
});

export type UpstreamComment = z.infer<typeof commentSchema>;

// Entries stay unparsed here so one bad comment does not sink its page
export const commentPageSchema = z.object({
  comments: z.array(z.unknown()).nullish().transform(val => val ?? []),
  cursor: z.object({ isEnd: z.boolean().optional() }).optional(),
});

export type CommentPage = z.infer<typeof commentPageSchema>;

// ============================================================================
// TRANSPORT
// ============================================================================

export interface RequestContext {
  credentials?: Credentials;
  signal?: AbortSignal;
}

/**
 * Logical endpoints of the upstream comment service. Implementations return
 * the raw decoded JSON body and throw TransientError on transport failures.
 */
export interface CommentApi {
  resolve(itemRef: string, ctx: RequestContext): Promise<unknown>;
  listRootComments(handle: number, page: number, pageSize: number, ctx: RequestContext): Promise<unknown>;
  listReplies(handle: number, rootId: number, page: number, pageSize: number, ctx: RequestContext): Promise<unknown>;
}

export interface UpstreamClientOptions {
  baseUrl: string;
  resolvePath: string;
  rootPath: string;
  replyPath: string;
  userAgent: string;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
}

// Fill {placeholders} in a path template
export function expandTemplate(template: string, params: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in params ? encodeURIComponent(String(params[key])) : match
  );
}

/**
 * GET a JSON document with a per-request timeout linked to the caller's
 * cancellation signal.
 */
export async function getJson(
  url: string,
  headers: Record<string, string>,
  timeoutMs: number,
  signal?: AbortSignal,
  fetchImpl: typeof fetch = fetch,
): Promise<unknown> {
  if (signal?.aborted) {
    throw cancellationReason(signal);
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetchImpl(url, { headers, signal: controller.signal });
    const body = await response.text();

    if (!response.ok) {
      throw new TransientError(`HTTP ${response.status} from ${url}`, response.status);
    }

    try {
      return JSON.parse(body);
    } catch {
      throw new TransientError(`Bad JSON from ${url}: ${body.slice(0, 100)}`, response.status);
    }
  } catch (error) {
    if (signal?.aborted) {
      throw cancellationReason(signal);
    }
    if (error instanceof TransientError || error instanceof CancelledError) {
      throw error;
    }
    if (controller.signal.aborted) {
      throw new TransientError(`Request timed out after ${timeoutMs}ms: ${url}`);
    }
    throw new TransientError(`Network error for ${url}: ${errorMessage(error)}`);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

export class UpstreamClient implements CommentApi {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: UpstreamClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  resolve(itemRef: string, ctx: RequestContext): Promise<unknown> {
    return this.get(expandTemplate(this.options.resolvePath, { ref: itemRef }), ctx);
  }

  listRootComments(handle: number, page: number, pageSize: number, ctx: RequestContext): Promise<unknown> {
    return this.get(expandTemplate(this.options.rootPath, { handle, page, size: pageSize }), ctx);
  }

  listReplies(handle: number, rootId: number, page: number, pageSize: number, ctx: RequestContext): Promise<unknown> {
    return this.get(expandTemplate(this.options.replyPath, { handle, root: rootId, page, size: pageSize }), ctx);
  }

  headers(credentials?: Credentials): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent,
      'Accept': 'application/json, */*',
      'Accept-Language': 'en-US,en;q=0.9',
    };
    if (credentials?.cookieHeader) {
      headers['Cookie'] = credentials.cookieHeader;
    }
    return headers;
  }

  get(pathAndQuery: string, ctx: RequestContext): Promise<unknown> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}${pathAndQuery}`;
    return getJson(url, this.headers(ctx.credentials), this.options.requestTimeoutMs, ctx.signal, this.fetchImpl);
  }
}
