/**
 * Persona Style Checks
 *
 * Measures the traits each persona is asked to show (emotional vocabulary,
 * pronouns, rhetorical questions for the emotional lawyer; structure,
 * conditionals, evidence vocabulary for the logical lawyer) and reports the
 * targets an argument misses. Results are advisory: agents log them.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { AgentKind } from '../../../types/debate.js';
import { countWords } from '../../debate/response-normalizer.js';
import type { QualityCheck, QualityCheckFailure, QualityCheckResult } from './types.js';

const lexiconSchema = z.object({
  emotional: z.array(z.string()),
  pronouns: z.array(z.string()),
  structuralMarkers: z.array(z.string()),
  evidence: z.array(z.string()),
});

export type StyleLexicon = z.infer<typeof lexiconSchema>;

function loadLexicon(): Record<keyof StyleLexicon, Set<string>> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./style-lexicon.json', import.meta.url), 'utf-8')
  );
  const lexicon = lexiconSchema.parse(raw);
  return {
    emotional: new Set(lexicon.emotional),
    pronouns: new Set(lexicon.pronouns),
    structuralMarkers: new Set(lexicon.structuralMarkers),
    evidence: new Set(lexicon.evidence),
  };
}

const LEXICON = loadLexicon();

export interface StyleMetrics {
  wordCount: number;
  /** Share of words from the emotional lexicon */
  emotionalRatio: number;
  /** Share of first and second person pronouns */
  pronounRatio: number;
  /** Share of words from the evidence lexicon */
  evidenceRatio: number;
  rhetoricalQuestions: number;
  exclamations: number;
  structuralMarkers: number;
  ifThenStatements: number;
}

/**
 * Compute style metrics for an argument
 */
export function analyzeArgumentStyle(text: string): StyleMetrics {
  const wordCount = countWords(text);
  const words = text.toLowerCase().match(/[a-z]+(?:'[a-z]+)?/g) ?? [];

  let emotional = 0;
  let pronouns = 0;
  let evidence = 0;
  let structural = 0;
  for (const word of words) {
    if (LEXICON.emotional.has(word)) emotional++;
    if (LEXICON.pronouns.has(word)) pronouns++;
    if (LEXICON.evidence.has(word)) evidence++;
    if (LEXICON.structuralMarkers.has(word)) structural++;
  }

  const ratio = (count: number) => (wordCount === 0 ? 0 : count / wordCount);

  return {
    wordCount,
    emotionalRatio: ratio(emotional),
    pronounRatio: ratio(pronouns),
    evidenceRatio: ratio(evidence),
    rhetoricalQuestions: (text.match(/\?+/g) ?? []).length,
    exclamations: (text.match(/!/g) ?? []).length,
    structuralMarkers: structural,
    ifThenStatements: (text.match(/\bif\b[^.!?]*?(?:\bthen\b|,)/gi) ?? []).length,
  };
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Build a check on one metric
 */
function metricCheck(
  name: string,
  description: string,
  test: (metrics: StyleMetrics) => boolean,
  describe: (metrics: StyleMetrics) => string
): QualityCheck {
  return {
    name,
    description,
    severity: 'warning',
    validator: (output: string): QualityCheckResult => {
      const metrics = analyzeArgumentStyle(output);
      return test(metrics)
        ? { passed: true }
        : { passed: false, message: describe(metrics), details: { ...metrics } };
    },
  };
}

export const emotionalVocabularyCheck = metricCheck(
  'emotional_vocabulary',
  'Emotional vocabulary above 10% of words',
  (m) => m.emotionalRatio > 0.1,
  (m) => `Emotional vocabulary at ${percent(m.emotionalRatio)}, target above 10%`
);

export const pronounUsageCheck = metricCheck(
  'personal_pronouns',
  'Personal pronouns above 12% of words',
  (m) => m.pronounRatio > 0.12,
  (m) => `Personal pronouns at ${percent(m.pronounRatio)}, target above 12%`
);

export const rhetoricalQuestionsCheck = metricCheck(
  'rhetorical_questions',
  'Two to four rhetorical questions',
  (m) => m.rhetoricalQuestions >= 2 && m.rhetoricalQuestions <= 4,
  (m) => `${m.rhetoricalQuestions} rhetorical question(s), target 2-4`
);

export const emotionalExclamationsCheck = metricCheck(
  'exclamations',
  'One to three exclamation marks',
  (m) => m.exclamations >= 1 && m.exclamations <= 3,
  (m) => `${m.exclamations} exclamation mark(s), target 1-3`
);

export const structuralMarkersCheck = metricCheck(
  'structural_markers',
  'Four to six structural markers',
  (m) => m.structuralMarkers >= 4 && m.structuralMarkers <= 6,
  (m) => `${m.structuralMarkers} structural marker(s), target 4-6`
);

export const ifThenCheck = metricCheck(
  'if_then_statements',
  'Two or three explicit if-then statements',
  (m) => m.ifThenStatements >= 2 && m.ifThenStatements <= 3,
  (m) => `${m.ifThenStatements} if-then statement(s), target 2-3`
);

export const evidenceVocabularyCheck = metricCheck(
  'evidence_vocabulary',
  'Evidence vocabulary above 8% of words',
  (m) => m.evidenceRatio > 0.08,
  (m) => `Evidence vocabulary at ${percent(m.evidenceRatio)}, target above 8%`
);

export const restrainedToneCheck = metricCheck(
  'restrained_tone',
  'Emotional vocabulary below 3% of words',
  (m) => m.emotionalRatio < 0.03,
  (m) => `Emotional vocabulary at ${percent(m.emotionalRatio)}, target below 3%`
);

export const logicalExclamationsCheck = metricCheck(
  'exclamations',
  'At most one exclamation mark',
  (m) => m.exclamations <= 1,
  (m) => `${m.exclamations} exclamation mark(s), target 0-1`
);

/**
 * Checks applied to each persona
 */
export const STYLE_CHECKS: Record<AgentKind, QualityCheck[]> = {
  emotional: [
    emotionalVocabularyCheck,
    pronounUsageCheck,
    rhetoricalQuestionsCheck,
    emotionalExclamationsCheck,
  ],
  logical: [
    structuralMarkersCheck,
    ifThenCheck,
    evidenceVocabularyCheck,
    restrainedToneCheck,
    logicalExclamationsCheck,
  ],
};

/**
 * Run every check for `kind` and return the ones that failed
 */
export function runStyleChecks(text: string, kind: AgentKind): QualityCheckFailure[] {
  const failures: QualityCheckFailure[] = [];
  for (const check of STYLE_CHECKS[kind]) {
    const result = check.validator(text);
    if (!result.passed) {
      failures.push({
        name: check.name,
        severity: check.severity,
        message: result.message ?? check.description,
      });
    }
  }
  return failures;
}
