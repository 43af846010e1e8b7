import { z } from 'zod';
import { logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { envelopeSchema, expandTemplate, type UpstreamClient } from './client.js';
import type { Discovery, ItemReference } from '../pipeline/types.js';

const searchDataSchema = z.object({
  items: z.array(z.object({ ref: z.string().min(1) })).nullish().transform(val => val ?? []),
});

export interface SearchDiscoveryOptions {
  searchPath: string;
  limit: number;
}

/**
 * Discovers item references through the upstream search endpoint.
 * Never throws: any failure is logged and reported as no results.
 */
export class SearchDiscovery implements Discovery {
  constructor(
    private readonly client: UpstreamClient,
    private readonly options: SearchDiscoveryOptions,
  ) {}

  async discover(query: string, signal?: AbortSignal): Promise<ItemReference[]> {
    const trimmed = query.trim();
    if (!trimmed) {
      return [];
    }

    try {
      const body = await this.client.get(
        expandTemplate(this.options.searchPath, { query: trimmed, limit: this.options.limit }),
        { signal },
      );
      const envelope = envelopeSchema.parse(body);
      if (envelope.code !== 0) {
        logger.warn(`Search for "${trimmed}" returned code ${envelope.code}: ${envelope.message ?? 'no message'}`);
        return [];
      }

      const refs = searchDataSchema.parse(envelope.data).items
        .map(item => item.ref)
        .slice(0, this.options.limit);
      logger.info(`Search for "${trimmed}" found ${refs.length} items`);
      return refs;
    } catch (error) {
      if (signal?.aborted) {
        return [];
      }
      logger.error(`Search failed for "${trimmed}"`, { error: errorMessage(error) });
      return [];
    }
  }
}
