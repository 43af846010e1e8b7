import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { createOrchestrator } from '../pipeline/factory.js';

interface CliArgs {
  query: string;
  timeoutSeconds?: number;
  json: boolean;
}

function parseArgs(argv: string[]): CliArgs | undefined {
  const words: string[] = [];
  let timeoutSeconds: number | undefined;
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--json') {
      json = true;
    } else if (arg === '--timeout') {
      timeoutSeconds = Number(argv[++i]);
      if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
        return undefined;
      }
    } else {
      words.push(arg);
    }
  }

  const query = words.join(' ').trim();
  return query ? { query, timeoutSeconds, json } : undefined;
}

async function runHarvest(args: CliArgs) {
  const orchestrator = createOrchestrator(config);
  const deadlineMs = args.timeoutSeconds !== undefined ? Math.round(args.timeoutSeconds * 1000) : undefined;
  const artifact = await orchestrator.run(args.query, deadlineMs);

  console.log(args.json ? JSON.stringify(artifact, null, 2) : artifact.text);
  logger.info(`Harvest finished with status ${artifact.status} in ${artifact.elapsedMs}ms`);
}

// CLI entry point
const args = parseArgs(process.argv.slice(2));

if (!args) {
  console.log('Usage: npm run harvest -- "<query>" [--timeout <seconds>] [--json]');
  process.exit(1);
}

runHarvest(args)
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    logger.error(`Harvest failed: ${errorMessage(error)}`);
    process.exit(1);
  });
