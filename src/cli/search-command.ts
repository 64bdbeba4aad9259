import type { Command } from 'commander';
import {
  BATCH_OPTIONS_SCHEMA,
  SEARCH_OPTIONS_SCHEMA,
  type BatchOptions,
  type SearchOptions,
} from '../schemas/cli-schemas';
import { handleUnknownError } from '../errors/index';
import { toEvidence } from '../retrieval/evidence-engine';
import {
  printEvidenceRow,
  printQueryHeader,
  printRetrievalSummary,
} from '../output/reporter';
import { applyOutputMode, buildComponents, resolveConfig } from './context';

function parseOptions<T>(parse: () => T): T {
  try {
    return parse();
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing CLI options');
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
}

/*
 * Registers the 'search' command: ranked evidence for a single query.
 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Retrieve ranked evidence for a query')
    .argument('<query...>', 'search query')
    .option('-k, --top-k <n>', 'Number of evidence items to return')
    .option('-n, --results <n>', 'Number of raw search results to request (max 10)')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .action(async (queryParts: string[], opts: unknown) => {
      const options: SearchOptions = parseOptions(() => SEARCH_OPTIONS_SCHEMA.parse(opts));
      const config = resolveConfig();
      applyOutputMode(options.output);

      const { engine } = buildComponents(config);
      const query = queryParts.join(' ');
      const hits = await engine.retrieveHits(query, {
        topK: options.topK,
        searchResults: options.results,
      });

      if (options.output === 'json') {
        const evidence = hits.map((hit) => ({ ...toEvidence(hit), score: hit.similarityScore }));
        console.log(JSON.stringify({ query, evidence }, null, 2));
        return;
      }

      printQueryHeader(query);
      hits.forEach((hit, i) => printEvidenceRow(i + 1, hit));
      printRetrievalSummary(1, hits.length);
    });
}

/*
 * Registers the 'batch' command: evidence for several queries at once.
 */
export function registerBatchCommand(program: Command): void {
  program
    .command('batch')
    .description('Retrieve evidence for several queries')
    .argument('<queries...>', 'search queries (quote each one)')
    .option('-k, --top-k <n>', 'Number of evidence items per query')
    .option('-c, --concurrency <n>', 'Number of queries retrieved in parallel')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .action(async (queries: string[], opts: unknown) => {
      const options: BatchOptions = parseOptions(() => BATCH_OPTIONS_SCHEMA.parse(opts));
      const config = resolveConfig();
      applyOutputMode(options.output);

      const { engine } = buildComponents(config);
      const results = await engine.batchRetrieve(queries, {
        topK: options.topK,
        concurrency: options.concurrency,
      });

      if (options.output === 'json') {
        console.log(JSON.stringify(Object.fromEntries(results), null, 2));
        return;
      }

      let total = 0;
      for (const [query, evidence] of results) {
        printQueryHeader(query);
        evidence.forEach((item, i) => {
          console.log(`  ${i + 1}. ${item.title || item.url}`);
          console.log(`     ${item.url}`);
        });
        console.log('');
        total += evidence.length;
      }
      printRetrievalSummary(results.size, total);
    });
}
