import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import { once } from 'events';
import type { Server } from 'http';
import { createApp, type HarvestRunner } from '../src/web/server.js';
import type { FinalArtifact } from '../src/pipeline/types.js';

const artifact: FinalArtifact = {
  query: 'cats',
  status: 'complete',
  perItem: ['item text'],
  truncated: false,
  text: 'Results for "cats" from 1 items:\n\n#### Item 1\nitem text',
  discovered: 1,
  processed: 1,
  elapsedMs: 12,
};

const run = vi.fn<HarvestRunner['run']>();
let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = createApp({ run }).listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server has no TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
});

beforeEach(() => {
  run.mockReset();
});

const postHarvest = (body: unknown) =>
  fetch(`${baseUrl}/api/harvest`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });

describe('HTTP API', () => {
  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok' });
  });

  it('runs a harvest and returns the artifact', async () => {
    run.mockResolvedValue(artifact);

    const response = await postHarvest({ query: '  cats ', timeoutSeconds: 2.5 });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(artifact);
    expect(run).toHaveBeenCalledWith('cats', 2500);
  });

  it('uses the default deadline when no timeout is given', async () => {
    run.mockResolvedValue(artifact);

    await postHarvest({ query: 'cats' });

    expect(run).toHaveBeenCalledWith('cats', undefined);
  });

  it('rejects an invalid body', async () => {
    const response = await postHarvest({ query: '   ', timeoutSeconds: -1 });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Invalid request',
      issues: ['query must not be empty', 'Number must be greater than 0'],
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('maps an unexpected failure to 500', async () => {
    run.mockRejectedValue(new Error('boom'));

    const response = await postHarvest({ query: 'cats' });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Harvest failed. Check server logs.' });
  });
});
