import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PipelineOrchestrator, type OrchestratorDeps } from '../src/pipeline/orchestrator.js';
import { NO_CREDENTIALS_ERROR } from '../src/pipeline/job.js';
import { renderItem, summarizedText, truncatedText, completeText } from '../src/pipeline/render.js';
import { sleep } from '../src/core/humanize.js';
import { CommentHarvester, REPLY_MARKER, type CommentThreadResult } from '../src/scrapers/comments.js';
import type { CommentApi } from '../src/scrapers/client.js';
import type { CommentSource, Discovery, ExtractionResult, Extractor, Summarizer } from '../src/pipeline/types.js';

const DEADLINE_MS = 5000;

const extractionFor = (itemRef: string): ExtractionResult => ({
  title: `Title ${itemRef}`,
  description: '',
  tags: [],
  transcript: '',
});

const commentsFor = (itemRef: string): CommentThreadResult => ({ items: [`comment on ${itemRef}`] });

const textFor = (itemRef: string) => renderItem(itemRef, extractionFor(itemRef), commentsFor(itemRef));

// Comment source whose per-item latency is given in milliseconds
function timedComments(latencyMs: Record<string, number>) {
  const harvest = vi.fn<CommentSource['harvest']>(async (itemRef, _credentials, signal) => {
    await sleep(latencyMs[itemRef] ?? 0, signal);
    return commentsFor(itemRef);
  });
  return { harvest };
}

function makeDeps(overrides: Partial<OrchestratorDeps> = {}): OrchestratorDeps {
  const discovery: Discovery = { discover: async () => ['A', 'B'] };
  const extractor: Extractor = { extract: async itemRef => extractionFor(itemRef) };
  return {
    discovery,
    extractor,
    comments: timedComments({}),
    credentials: async () => ({ cookieHeader: 'session=test-secret' }),
    deadlineMs: DEADLINE_MS,
    ...overrides,
  };
}

// Upstream stand-in answering scripted requests after a delay
function scriptedApi(script: Record<string, { delayMs: number; body: unknown }>): CommentApi {
  const respond = async (key: string, signal?: AbortSignal) => {
    const entry = script[key];
    if (!entry) {
      return { code: 0, data: { comments: [], cursor: { isEnd: true } } };
    }
    await sleep(entry.delayMs, signal);
    return entry.body;
  };
  return {
    resolve: (itemRef, ctx) => respond(`resolve ${itemRef}`, ctx.signal),
    listRootComments: (handle, page, _size, ctx) => respond(`roots ${handle}:${page}`, ctx.signal),
    listReplies: (handle, rootId, page, _size, ctx) => respond(`replies ${handle}:${rootId}:${page}`, ctx.signal),
  };
}

describe('PipelineOrchestrator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns partial results when the deadline hits mid-run', async () => {
    const summarize = vi.fn<Summarizer['summarize']>(async () => 'summary');
    const orchestrator = new PipelineOrchestrator(makeDeps({
      comments: timedComments({ A: 2000, B: 10_000 }),
      summarizer: { summarize },
    }));

    const pending = orchestrator.run('cats');
    await vi.advanceTimersByTimeAsync(DEADLINE_MS);
    const artifact = await pending;

    const perItem = [textFor('A')];
    expect(artifact).toEqual({
      query: 'cats',
      status: 'truncated',
      perItem,
      truncated: true,
      text: truncatedText('cats', DEADLINE_MS, perItem, 2),
      discovered: 2,
      processed: 1,
      elapsedMs: DEADLINE_MS,
    });
    expect(summarize).not.toHaveBeenCalled();
  });

  it('keeps a finished item and drops one still paginating at the deadline', async () => {
    const ok = (data: unknown) => ({ code: 0, data });
    const api = scriptedApi({
      'resolve A': { delayMs: 500, body: ok({ handle: 1 }) },
      'roots 1:1': {
        delayMs: 1000,
        body: ok({
          comments: [{ id: 11, text: 'root one', replyCount: 0 }, { id: 12, text: 'root two', replyCount: 1 }],
          cursor: { isEnd: true },
        }),
      },
      'replies 1:12:1': { delayMs: 500, body: ok({ comments: [{ id: 121, text: 'reply one' }], cursor: { isEnd: true } }) },
      'resolve B': { delayMs: 500, body: ok({ handle: 2 }) },
      'roots 2:1': {
        delayMs: 1000,
        body: ok({ comments: Array.from({ length: 20 }, (_, i) => ({ id: 200 + i, text: `B root ${i + 1}` })) }),
      },
      'roots 2:2': { delayMs: 10_000, body: ok({ comments: [] }) },
    });
    const comments = new CommentHarvester({
      api,
      options: {
        maxConcurrentRequests: 3,
        maxRetries: 3,
        baseDelayMs: 1000,
        rootPageSize: 20,
        replyPageSize: 10,
        rootCap: 50,
        maxRepliesPerRoot: 10,
        minLength: 5,
        rootJitter: { minMs: 0, maxMs: 0 },
        replyJitter: { minMs: 0, maxMs: 0 },
      },
    });
    const orchestrator = new PipelineOrchestrator(makeDeps({ comments }));

    const pending = orchestrator.run('X');
    await vi.advanceTimersByTimeAsync(DEADLINE_MS);
    const artifact = await pending;

    const itemA = renderItem('A', extractionFor('A'), { items: ['root one', `root two${REPLY_MARKER}reply one`] });
    expect(artifact.status).toBe('truncated');
    expect(artifact.truncated).toBe(true);
    expect(artifact.perItem).toEqual([itemA]);
    expect(artifact.discovered).toBe(2);
    expect(artifact.elapsedMs).toBe(DEADLINE_MS);
  });

  it('orders results by discovery index and summarizes full runs', async () => {
    const summarize = vi.fn<Summarizer['summarize']>(async (_query, itemText) => `summary of ${itemText.split('\n')[0]}`);
    const orchestrator = new PipelineOrchestrator(makeDeps({
      comments: timedComments({ A: 300, B: 100 }),
      summarizer: { summarize },
    }));

    const pending = orchestrator.run('cats');
    await vi.advanceTimersByTimeAsync(300);
    const artifact = await pending;

    expect(artifact.status).toBe('complete');
    expect(artifact.truncated).toBe(false);
    expect(artifact.perItem).toEqual([textFor('A'), textFor('B')]);
    expect(artifact.text).toBe(summarizedText('cats', ['summary of Source: A', 'summary of Source: B']));
    expect(artifact.elapsedMs).toBe(300);
  });

  it('keeps the raw text for an item whose summary fails', async () => {
    const summarize = vi.fn<Summarizer['summarize']>(async (_query, itemText) => {
      if (itemText.startsWith('Source: A')) {
        throw new Error('rate limited');
      }
      return 'summary of B';
    });
    const orchestrator = new PipelineOrchestrator(makeDeps({ summarizer: { summarize } }));

    const artifact = await orchestrator.run('cats');

    expect(artifact.text).toBe(summarizedText('cats', [textFor('A'), 'summary of B']));
    expect(summarize).toHaveBeenCalledTimes(2);
  });

  it('concatenates items when no summarizer is configured', async () => {
    const orchestrator = new PipelineOrchestrator(makeDeps());

    const artifact = await orchestrator.run('cats');

    expect(artifact.status).toBe('complete');
    expect(artifact.text).toBe(completeText('cats', [textFor('A'), textFor('B')]));
  });

  it('reports no results for an empty discovery', async () => {
    const comments = timedComments({});
    const orchestrator = new PipelineOrchestrator(makeDeps({
      discovery: { discover: async () => [] },
      comments,
    }));

    const artifact = await orchestrator.run('cats');

    expect(artifact).toMatchObject({
      status: 'no-results',
      truncated: false,
      text: 'No content found for "cats".',
      discovered: 0,
      processed: 0,
      perItem: [],
    });
    expect(comments.harvest).not.toHaveBeenCalled();
  });

  it('treats a failing discovery as no results', async () => {
    const orchestrator = new PipelineOrchestrator(makeDeps({
      discovery: {
        discover: async () => {
          throw new Error('search down');
        },
      },
    }));

    const artifact = await orchestrator.run('cats');

    expect(artifact.status).toBe('no-results');
  });

  it('reports nothing processed when every item times out', async () => {
    const orchestrator = new PipelineOrchestrator(makeDeps({
      comments: timedComments({ A: 10_000, B: 10_000 }),
    }));

    const pending = orchestrator.run('cats');
    await vi.advanceTimersByTimeAsync(DEADLINE_MS);
    const artifact = await pending;

    expect(artifact).toMatchObject({
      status: 'nothing-processed',
      truncated: true,
      processed: 0,
      discovered: 2,
      text: 'Query "cats" timed out after 5s before any of 2 items was processed.',
    });
  });

  it('reports a deadline that hits during discovery', async () => {
    const orchestrator = new PipelineOrchestrator(makeDeps({
      discovery: {
        discover: async (_query, signal) => {
          await sleep(60_000, signal);
          return ['A'];
        },
      },
    }));

    const pending = orchestrator.run('cats', 1000);
    await vi.advanceTimersByTimeAsync(1000);
    const artifact = await pending;

    expect(artifact).toMatchObject({
      status: 'nothing-processed',
      truncated: true,
      discovered: 0,
      text: 'Query "cats" timed out after 1s before discovery completed.',
      elapsedMs: 1000,
    });
  });

  it('skips an item whose job fails unexpectedly', async () => {
    const corrupt: ExtractionResult = {
      title: '',
      description: '',
      transcript: '',
      get tags(): string[] {
        throw new Error('corrupt tags');
      },
    };
    const orchestrator = new PipelineOrchestrator(makeDeps({
      discovery: { discover: async () => ['A', 'B'] },
      extractor: { extract: async itemRef => (itemRef === 'A' ? corrupt : extractionFor(itemRef)) },
    }));

    const artifact = await orchestrator.run('cats');

    expect(artifact.status).toBe('complete');
    expect(artifact.perItem).toEqual([textFor('B')]);
    expect(artifact.processed).toBe(1);
  });

  it('reports nothing processed when every job fails', async () => {
    const orchestrator = new PipelineOrchestrator(makeDeps({
      discovery: { discover: async () => ['A'] },
      extractor: {
        extract: async () => ({
          title: '',
          description: '',
          transcript: '',
          get tags(): string[] {
            throw new Error('corrupt tags');
          },
        }),
      },
    }));

    const artifact = await orchestrator.run('cats');

    expect(artifact.status).toBe('nothing-processed');
    expect(artifact.truncated).toBe(false);
    expect(artifact.text).toBe('Found 1 items for "cats" but none could be processed.');
  });

  it('continues anonymously when credentials cannot be loaded', async () => {
    const comments = timedComments({});
    const orchestrator = new PipelineOrchestrator(makeDeps({
      discovery: { discover: async () => ['A'] },
      comments,
      credentials: async () => {
        throw new Error('disk error');
      },
    }));

    const artifact = await orchestrator.run('cats');

    expect(comments.harvest).not.toHaveBeenCalled();
    expect(artifact.perItem[0]?.split('\n').pop()).toBe(`Comment error: ${NO_CREDENTIALS_ERROR}`);
  });

  it('passes the run signal to collaborators and aborts it at the deadline', async () => {
    const signals: AbortSignal[] = [];
    const orchestrator = new PipelineOrchestrator(makeDeps({
      discovery: { discover: async () => ['A'] },
      comments: {
        harvest: async (itemRef, _credentials, signal) => {
          if (signal) signals.push(signal);
          await sleep(10_000, signal);
          return commentsFor(itemRef);
        },
      },
    }));

    const pending = orchestrator.run('cats');
    await vi.advanceTimersByTimeAsync(DEADLINE_MS);
    await pending;

    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
  });
});
