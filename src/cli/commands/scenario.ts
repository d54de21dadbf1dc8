import { readFileSync } from 'node:fs';
import type { Command } from '../types.js';
import { parseExamQuestion, toScenarioQuery } from '../../retrieval/exam-question-parser.js';
import { createRetrievalEngine } from '../../retrieval/retrieval-engine.js';
import {
  STORAGE_OPTIONS,
  getFlag,
  getIntFlag,
  parseFilter,
  positionalArgs,
  resolveCliConfig,
  UsageError,
} from '../utils.js';
import { printResults } from './search.js';

export const scenarioCommand: Command = {
  name: 'scenario',
  description: 'Retrieve context for an exam question file',
  usage: 'studyrag scenario <question.txt> [options]',
  options: {
    '--k <n>': 'Results for the main query (default: retrieval.scenarioK)',
    '--id <id>': 'Question id shown in the output',
    '--chapter <n>': 'Only passages from this chapter',
    '--type <t>': 'Only this content type: video, text or chapter_intro',
    '--context': 'Also print the formatted context block',
    '--json': 'Print the result as JSON',
    ...STORAGE_OPTIONS,
  },
  handler: async (args) => {
    const [file] = positionalArgs(args);
    if (!file) {
      throw new UsageError('Question file required');
    }

    const exam = parseExamQuestion(readFileSync(file, 'utf-8'), getFlag(args, '--id'));
    if (!exam.question) {
      throw new UsageError(`No question (a line ending in "?") found in ${file}`);
    }

    const { runtime } = resolveCliConfig(args);
    const k = getIntFlag(args, '--k') ?? runtime.scenarioK;
    const filter = parseFilter(args);

    const engine = createRetrievalEngine(runtime);
    try {
      const result = await engine.retrieveForScenario(toScenarioQuery(exam), k, filter);
      if (args.includes('--json')) {
        console.log(JSON.stringify({ question: exam, ...result }, null, 2));
        return;
      }
      console.log(`Question ${exam.id}: ${exam.question}`);
      exam.options.forEach((option, i) => console.log(`  ${String.fromCharCode(65 + i)}. ${option}`));
      console.log('');
      printResults(result.results);
      if (args.includes('--context')) console.log(result.context);
    } finally {
      engine.close();
    }
  },
};
