/**
 * Judge Prompt Templates
 *
 * The judge scores both lawyers against a five-criterion rubric and must
 * answer with exactly one JSON object.
 */

import type { Argument, Case } from '../../../types/debate.js';
import { JUDGE_REASONING_WORD_TARGET } from '../../../config/debate-protocol.js';

const reasoningBand = `${JUDGE_REASONING_WORD_TARGET.min}-${JUDGE_REASONING_WORD_TARGET.max}`;

/**
 * JSON shape the judge must return
 */
export const VERDICT_SCHEMA_TEXT = [
  '{',
  '  "emotional_score": <int 0-100>,',
  '  "logical_score": <int 0-100>,',
  '  "winner": "emotional" | "logical" | "tie",',
  `  "reasoning": "<${reasoningBand} words of neutral analysis>",`,
  '  "criteria_scores": {',
  '    "relevance": <0-20>,',
  '    "coherence": <0-20>,',
  '    "evidence": <0-20>,',
  '    "persuasiveness": <0-20>,',
  '    "rebuttal": <0-20>',
  '  }',
  '}',
].join('\n');

export function buildJudgeSystemPrompt(debateCase: Case): string {
  return [
    'Role: You are an impartial judge evaluating a three-round debate between an Emotional Lawyer and a Logical Lawyer.',
    `Case: ${debateCase.title}`,
    debateCase.description,
    '',
    'Rubric: award 0-20 points per criterion, 0-100 per lawyer in total.',
    '1) Relevance to the case',
    '2) Logical coherence',
    '3) Evidence quality',
    '4) Persuasiveness',
    '5) Rebuttal strength',
    '',
    'Return ONLY one compact JSON object of this shape:',
    VERDICT_SCHEMA_TEXT,
    '',
    'Constraints:',
    '- Be strictly impartial. Do not reward length over substance.',
    '- Score only what the arguments actually say. Do not infer facts not presented.',
    `- The reasoning must be ${reasoningBand} words, concise and neutral.`,
    '',
    'Formatting:',
    '- Output exactly one JSON object and nothing else.',
    '- No backticks, Markdown, labels, or prose before or after the JSON.',
    '- No trailing commas.',
  ].join('\n');
}

/**
 * Label used for each argument in the transcript block
 */
function formatArgument(arg: Argument): string {
  const speaker = arg.agentKind === 'emotional' ? 'Emotional' : 'Logical';
  return `[${speaker} | Round ${arg.roundNumber}]\n${arg.content.trim()}\n`;
}

export function buildJudgeUserPrompt(args: Argument[]): string {
  return (
    'Evaluate the following debate transcript against the rubric and output ONLY the JSON object described.\n\n' +
    `Transcript:\n${args.map(formatArgument).join('\n')}`
  );
}

export const JUDGE_REPAIR_SYSTEM_PROMPT = 'Return ONLY strict JSON per the schema.';

/**
 * Ask the model to restate a non-JSON verdict as strict JSON
 */
export function buildJudgeRepairPrompt(raw: string): string {
  return (
    'Reformat the following content as a STRICT JSON object with exactly these keys and types. ' +
    'Output exactly one JSON object and nothing else.\n\n' +
    `Schema:\n${VERDICT_SCHEMA_TEXT}\n\n` +
    `Content:\n${raw}\n`
  );
}
