import { z } from 'zod';
import { HarvestError, TransientError } from '../core/errors.js';
import { envelopeSchema, expandTemplate, type UpstreamClient } from './client.js';
import type { ExtractionResult, Extractor, ItemReference } from '../pipeline/types.js';

const viewDataSchema = z.object({
  title: z.string().default(''),
  description: z.string().nullish().transform(val => val ?? ''),
  tags: z.array(z.union([z.string(), z.object({ name: z.string() })]))
    .nullish()
    .transform(tags => (tags ?? []).map(tag => (typeof tag === 'string' ? tag : tag.name))),
});

/**
 * Reads title, description and tags from the upstream view endpoint.
 * Transcripts are produced elsewhere, so this extractor leaves them empty.
 */
export class MetadataExtractor implements Extractor {
  constructor(
    private readonly client: UpstreamClient,
    private readonly viewPath: string,
  ) {}

  async extract(itemRef: ItemReference, signal?: AbortSignal): Promise<ExtractionResult> {
    const body = await this.client.get(expandTemplate(this.viewPath, { ref: itemRef }), { signal });

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new TransientError(`Malformed view response for ${itemRef}`);
    }
    if (envelope.data.code !== 0) {
      throw new HarvestError(`View of ${itemRef} returned code ${envelope.data.code}: ${envelope.data.message ?? 'no message'}`);
    }

    const data = viewDataSchema.safeParse(envelope.data.data);
    if (!data.success) {
      throw new TransientError(`Malformed view payload for ${itemRef}`);
    }

    return { ...data.data, transcript: '' };
  }
}
