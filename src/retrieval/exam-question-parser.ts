/**
 * Parses pasted exam questions.
 *
 * Two layouts are understood. Labelled:
 *
 * ```
 * A company is moving its payroll system to a hosted provider.
 * Which control should be reviewed first?
 * A. Encryption at rest
 * B. The provider's audit reports
 * Answer: B
 * Audit reports show the provider's controls.
 * ```
 *
 * Unlabelled, where a line reading `answer` introduces one option per line:
 *
 * ```
 * Which control should be reviewed first?
 * answer
 * Encryption at rest
 * The provider's audit reports
 * ```
 *
 * Lines before the first one ending in `?` are the scenario.
 */

import type { ScenarioQuery } from './types.js';

export interface ExamQuestion {
  id: string;
  scenario: string;
  question: string;
  options: string[];
  /** Letter, number or text after `Answer:`; never passed to retrieval */
  correctAnswer?: string;
  explanation?: string;
}

type Section = 'scenario' | 'question' | 'options' | 'explanation';

const LABELLED_OPTION = /^([A-D]|[1-4])\.\s*(.+)$/;
const ANSWER_LINE = /^(?:correct answer|answer):\s*(.+)$/i;

export function parseExamQuestion(text: string, id = 'unknown'): ExamQuestion {
  const scenario: string[] = [];
  const question: string[] = [];
  const options: string[] = [];
  const explanation: string[] = [];
  let correctAnswer: string | undefined;

  let section: Section = 'scenario';
  let unlabelled = false;

  for (const rawLine of text.trim().split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const option = LABELLED_OPTION.exec(line);
    if (option && (section === 'question' || section === 'options')) {
      section = 'options';
      options.push(option[2]);
      continue;
    }

    const answer = ANSWER_LINE.exec(line);
    if (answer) {
      section = 'explanation';
      correctAnswer = answer[1].trim();
      continue;
    }

    if (line.toLowerCase() === 'answer' && section === 'question') {
      section = 'options';
      unlabelled = true;
      continue;
    }

    switch (section) {
      case 'scenario':
        if (line.endsWith('?')) {
          section = 'question';
          question.push(line);
        } else {
          scenario.push(line);
        }
        break;
      case 'question':
        question.push(line);
        break;
      case 'options':
        if (unlabelled) options.push(line);
        break;
      case 'explanation':
        explanation.push(line);
        break;
    }
  }

  return {
    id,
    scenario: scenario.join(' '),
    question: question.join(' '),
    options,
    ...(correctAnswer !== undefined ? { correctAnswer } : {}),
    ...(explanation.length > 0 ? { explanation: explanation.join(' ') } : {}),
  };
}

/**
 * The retrieval view of a question: the answer and explanation stay behind.
 */
export function toScenarioQuery(exam: ExamQuestion): ScenarioQuery {
  return { scenario: exam.scenario, question: exam.question, options: exam.options };
}
