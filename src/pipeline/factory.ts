import type { Config } from '../config.js';
import { logger } from '../core/logger.js';
import { loadCredentials } from '../core/credentials.js';
import { UpstreamClient } from '../scrapers/client.js';
import { CommentHarvester } from '../scrapers/comments.js';
import { SearchDiscovery } from '../scrapers/search.js';
import { MetadataExtractor } from '../scrapers/metadata.js';
import { OpenAiSummarizer } from './summarizer.js';
import { PipelineOrchestrator } from './orchestrator.js';

// Wire the concrete collaborators from configuration
export function createOrchestrator(config: Config, fetchImpl?: typeof fetch): PipelineOrchestrator {
  const { upstream, harvest, pipeline, llm } = config;

  const client = new UpstreamClient({
    baseUrl: upstream.baseUrl,
    resolvePath: upstream.resolvePath,
    rootPath: upstream.rootPath,
    replyPath: upstream.replyPath,
    userAgent: upstream.userAgent,
    requestTimeoutMs: harvest.requestTimeoutMs,
    fetchImpl,
  });

  // One harvester, so every item of a run shares the same permit pool
  const comments = new CommentHarvester({ api: client, options: harvest });

  const summarizer = llm.apiKey
    ? new OpenAiSummarizer({ apiKey: llm.apiKey, baseUrl: llm.baseUrl, model: llm.model })
    : undefined;
  if (!summarizer) {
    logger.info('LLM_API_KEY not set, results will not be summarized');
  }

  return new PipelineOrchestrator({
    discovery: new SearchDiscovery(client, { searchPath: upstream.searchPath, limit: pipeline.discoveryLimit }),
    extractor: new MetadataExtractor(client, upstream.viewPath),
    comments,
    credentials: () => loadCredentials(config.paths.cookies),
    summarizer,
    deadlineMs: pipeline.deadlineMs,
  });
}
