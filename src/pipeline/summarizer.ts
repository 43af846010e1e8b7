import OpenAI, { type ClientOptions } from 'openai';
import { logger } from '../core/logger.js';
import { HarvestError } from '../core/errors.js';
import type { Summarizer } from './types.js';

const SYSTEM_PROMPT =
  'You condense harvested item pages. Keep facts, opinions from the comments and anything ' +
  'relevant to the user query. Answer in plain text without preamble.';

export interface OpenAiSummarizerOptions {
  apiKey: string;
  baseUrl?: string;
  model: string;
  fetch?: ClientOptions['fetch'];
}

/**
 * Summarizer backed by any OpenAI-compatible chat completion endpoint.
 */
export class OpenAiSummarizer implements Summarizer {
  private client: OpenAI;
  private model: string;

  constructor(opts: OpenAiSummarizerOptions) {
    this.client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseUrl, fetch: opts.fetch, maxRetries: 0 });
    this.model = opts.model;
  }

  async summarize(query: string, itemText: string, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: `Query: ${query}\n\n${itemText}` },
        ],
      },
      { signal },
    );

    const content = response.choices[0]?.message.content?.trim();
    if (!content) {
      throw new HarvestError(`Empty completion from ${this.model}`);
    }
    logger.debug(`Summarized ${itemText.length} chars into ${content.length}`);
    return content;
  }
}
