import type { Command } from '../types.js';
import { createRetrievalEngine } from '../../retrieval/retrieval-engine.js';
import type { SearchResult } from '../../storage/types.js';
import {
  STORAGE_OPTIONS,
  getIntFlag,
  getNumberFlag,
  parseFilter,
  positionalArgs,
  resolveCliConfig,
  UsageError,
} from '../utils.js';

export function printResults(results: readonly SearchResult[]): void {
  results.forEach((r, i) => {
    console.log(`${i + 1}. [${r.score.toFixed(3)}] ${r.sectionHeader}`);
    console.log(`   Chapter ${r.metadata.chapterNum} • ${r.metadata.contentType} • ${r.chunkId}`);
    console.log(`   ${r.summary}`);
  });
}

export const searchCommand: Command = {
  name: 'search',
  description: 'Retrieve passages for a query',
  usage: 'studyrag search <query> [options]',
  options: {
    '--k <n>': 'Number of results (default: retrieval.defaultK)',
    '--rerank': 'Oversample and rerank with the judge model',
    '--candidates <n>': 'Candidate pool for --rerank (default: retrieval.rerankCandidateK)',
    '--threshold <x>': 'Drop results scoring below x, in [-1, 1] (not with --rerank)',
    '--chapter <n>': 'Only passages from this chapter',
    '--type <t>': 'Only this content type: video, text or chapter_intro',
    '--context': 'Also print the formatted context block',
    '--json': 'Print results as JSON',
    ...STORAGE_OPTIONS,
  },
  handler: async (args) => {
    const query = positionalArgs(args).join(' ');
    if (!query) {
      throw new UsageError('Query required');
    }
    if (args.includes('--rerank') && args.includes('--threshold')) {
      throw new UsageError('--threshold cannot be combined with --rerank: reranked scores are rank positions');
    }

    const { runtime } = resolveCliConfig(args);
    const k = getIntFlag(args, '--k') ?? runtime.defaultK;
    const filter = parseFilter(args);
    const threshold = getNumberFlag(args, '--threshold');
    const json = args.includes('--json');

    const engine = createRetrievalEngine(runtime);
    try {
      if (args.includes('--rerank')) {
        const candidateK = getIntFlag(args, '--candidates') ?? runtime.rerankCandidateK;
        const result = await engine.retrieveWithReranking(query, k, candidateK, filter);
        if (json) {
          console.log(JSON.stringify({ ...result, usage: engine.getUsageStats() }, null, 2));
          return;
        }
        console.log(`Reranking: ${result.outcome} (${result.candidateCount} candidates)`);
        printResults(result.results);
        if (args.includes('--context')) console.log(result.context);
        return;
      }

      if (threshold !== undefined) {
        const results = await engine.retrieveWithScores(query, k, threshold, filter);
        if (json) {
          console.log(JSON.stringify(results, null, 2));
        } else {
          printResults(results);
        }
        return;
      }

      const result = await engine.retrieve(query, k, filter);
      if (json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      printResults(result.results);
      if (args.includes('--context')) console.log(result.context);
    } finally {
      engine.close();
    }
  },
};
