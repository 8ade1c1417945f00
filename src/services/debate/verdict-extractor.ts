/**
 * Verdict Extractor
 *
 * Turns the judge's raw output into a Verdict. Tries, in order: fence strip,
 * first balanced JSON object, strict parse, trailing-comma repair, and
 * finally a regex scan of the raw text. Never throws; every path returns
 * scores in [0, 100], criteria in [0, 20] and a valid winner.
 *
 * Winner reconciliation (both paths): when the scores differ the higher
 * score wins, and a declared winner that disagrees is overridden and
 * reported. When the scores are equal a valid declared winner is kept,
 * otherwise the result is a tie.
 */

import pino from 'pino';
import {
  CRITERIA_KEYS,
  WINNERS,
  type CriteriaScores,
  type Verdict,
  type Winner,
} from '../../types/debate.js';
import { MIN_REASONING_CHARS } from '../../config/debate-protocol.js';

const logger = pino({
  name: 'verdict-extractor',
  level: process.env.LOG_LEVEL || 'info',
});

export const SCORE_MAX = 100;
export const CRITERION_MAX = 20;
export const HEURISTIC_CRITERION_SCORE = 10;
export const HEURISTIC_DEFAULT_SCORE = 50;

export const HEURISTIC_REASONING =
  'The model did not return strict JSON; scores and winner were recovered heuristically from its raw output.';

/**
 * Quality defects found while building the verdict
 */
export type VerdictIssue =
  | 'heuristic_fallback'
  | 'trailing_commas_repaired'
  | 'score_missing'
  | 'score_not_integer'
  | 'score_clamped'
  | 'winner_missing'
  | 'winner_invalid'
  | 'winner_overridden'
  | 'criteria_missing'
  | 'criteria_clamped'
  | 'reasoning_too_short';

/**
 * Tagged extraction result
 */
export interface VerdictExtraction {
  kind: 'parsed' | 'heuristic';
  verdict: Verdict;
  issues: VerdictIssue[];
  /** Both scores arrived as JSON integers inside [0, 100] */
  scoresWereIntegers: boolean;
}

type JsonObject = Record<string, unknown>;

interface CoercedNumber {
  value: number;
  wasInteger: boolean;
  clamped: boolean;
  missing: boolean;
}

const EMOTIONAL_SCORE_PATTERNS = [
  /emotional[_\s-]*score\D{0,10}(\d{1,3})/i,
  /\bemo(?:tional)?\s*[:=]\s*(\d{1,3})/i,
];

const LOGICAL_SCORE_PATTERNS = [
  /logical[_\s-]*score\D{0,10}(\d{1,3})/i,
  /\blogical\s*[:=]\s*(\d{1,3})/i,
];

const WINNER_PATTERN = /winner\D{0,10}(emotional|logical|tie)/i;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWinner(value: unknown): value is Winner {
  return typeof value === 'string' && WINNERS.some((w) => w === value);
}

/**
 * Remove a leading ```lang line and a trailing ``` if present
 */
export function stripFences(text: string): string {
  return text
    .trim()
    .replace(/^```[a-zA-Z]*\r?\n/, '')
    .replace(/```$/, '')
    .trim();
}

/**
 * First balanced {...} block, ignoring braces inside string literals.
 * Returns null when there is no '{' or the block never closes.
 */
export function extractFirstObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

/**
 * Drop commas directly before a closing brace or bracket
 */
export function removeTrailingCommas(text: string): string {
  return text.replace(/,\s*([}\]])/g, '$1');
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function coerceNumber(value: unknown, max: number): CoercedNumber {
  let numeric: number | null = null;
  let wasInteger = false;

  if (typeof value === 'number' && Number.isFinite(value)) {
    numeric = Math.trunc(value);
    wasInteger = Number.isInteger(value);
  } else if (typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
    numeric = Math.trunc(parseFloat(value));
  }

  if (numeric === null) {
    return { value: 0, wasInteger: false, clamped: false, missing: value === undefined || value === null };
  }

  const clampedValue = Math.min(max, Math.max(0, numeric));
  return {
    value: clampedValue,
    wasInteger: wasInteger && clampedValue === numeric,
    clamped: clampedValue !== numeric,
    missing: false,
  };
}

function coerceReasoning(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function winnerFromScores(emotionalScore: number, logicalScore: number): Winner {
  if (emotionalScore > logicalScore) return 'emotional';
  if (logicalScore > emotionalScore) return 'logical';
  return 'tie';
}

/**
 * Apply the reconciliation rule to a declared winner (possibly absent or invalid)
 */
export function reconcileWinner(
  emotionalScore: number,
  logicalScore: number,
  declared: unknown
): { winner: Winner; issue?: VerdictIssue } {
  const derived = winnerFromScores(emotionalScore, logicalScore);

  if (declared === undefined || declared === null) {
    return { winner: derived, issue: 'winner_missing' };
  }
  if (!isWinner(declared)) {
    return { winner: derived, issue: 'winner_invalid' };
  }
  if (derived === 'tie') {
    return { winner: declared };
  }
  if (declared !== derived) {
    return { winner: derived, issue: 'winner_overridden' };
  }
  return { winner: derived };
}

function pickField(data: JsonObject, snake: string, camel: string): unknown {
  return data[snake] !== undefined ? data[snake] : data[camel];
}

function normalizeCriteria(value: unknown, issues: VerdictIssue[]): CriteriaScores {
  const source = isJsonObject(value) ? value : {};
  if (!isJsonObject(value)) {
    issues.push('criteria_missing');
  }

  const criteria: CriteriaScores = {
    relevance: 0,
    coherence: 0,
    evidence: 0,
    persuasiveness: 0,
    rebuttal: 0,
  };
  let clamped = false;

  for (const key of CRITERIA_KEYS) {
    const coerced = coerceNumber(source[key], CRITERION_MAX);
    criteria[key] = coerced.value;
    clamped = clamped || coerced.clamped;
  }

  if (clamped) {
    issues.push('criteria_clamped');
  }
  return criteria;
}

/**
 * Normalize a decoded JSON object into a typed Verdict
 */
export function normalizeParsedVerdict(data: JsonObject): VerdictExtraction {
  const issues: VerdictIssue[] = [];

  const emotional = coerceNumber(pickField(data, 'emotional_score', 'emotionalScore'), SCORE_MAX);
  const logical = coerceNumber(pickField(data, 'logical_score', 'logicalScore'), SCORE_MAX);

  if (emotional.missing || logical.missing) issues.push('score_missing');
  if (emotional.clamped || logical.clamped) issues.push('score_clamped');
  const scoresWereIntegers = emotional.wasInteger && logical.wasInteger;
  if (!scoresWereIntegers && !emotional.missing && !logical.missing) issues.push('score_not_integer');

  const { winner, issue } = reconcileWinner(emotional.value, logical.value, data.winner);
  if (issue) issues.push(issue);

  const reasoning = coerceReasoning(data.reasoning);
  if (reasoning.trim().length < MIN_REASONING_CHARS) {
    issues.push('reasoning_too_short');
  }

  const criteriaScores = normalizeCriteria(
    pickField(data, 'criteria_scores', 'criteriaScores'),
    issues
  );

  return {
    kind: 'parsed',
    verdict: {
      emotionalScore: emotional.value,
      logicalScore: logical.value,
      winner,
      reasoning,
      criteriaScores,
    },
    issues,
    scoresWereIntegers,
  };
}

function scanScore(text: string, patterns: RegExp[]): number | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match?.[1] !== undefined) {
      return Math.min(SCORE_MAX, parseInt(match[1], 10));
    }
  }
  return null;
}

/**
 * Recover scores and winner from free text
 */
export function heuristicVerdict(text: string): VerdictExtraction {
  const emotionalScore = scanScore(text, EMOTIONAL_SCORE_PATTERNS) ?? HEURISTIC_DEFAULT_SCORE;
  const logicalScore = scanScore(text, LOGICAL_SCORE_PATTERNS) ?? HEURISTIC_DEFAULT_SCORE;

  const declared = WINNER_PATTERN.exec(text)?.[1]?.toLowerCase();
  const { winner } = reconcileWinner(emotionalScore, logicalScore, declared ?? 'tie');

  return {
    kind: 'heuristic',
    verdict: {
      emotionalScore,
      logicalScore,
      winner,
      reasoning: HEURISTIC_REASONING,
      criteriaScores: {
        relevance: HEURISTIC_CRITERION_SCORE,
        coherence: HEURISTIC_CRITERION_SCORE,
        evidence: HEURISTIC_CRITERION_SCORE,
        persuasiveness: HEURISTIC_CRITERION_SCORE,
        rebuttal: HEURISTIC_CRITERION_SCORE,
      },
    },
    issues: ['heuristic_fallback'],
    scoresWereIntegers: false,
  };
}

/**
 * Parse raw judge output into a tagged extraction result
 */
export function parseVerdict(raw: string): VerdictExtraction {
  const cleaned = stripFences(raw);
  const candidate = extractFirstObject(cleaned) ?? cleaned;

  const strict = tryParseObject(candidate);
  if (strict) {
    const result = normalizeParsedVerdict(strict);
    if (result.issues.length > 0) {
      logger.debug({ issues: result.issues }, 'Verdict parsed with issues');
    }
    return result;
  }

  const repaired = tryParseObject(removeTrailingCommas(candidate));
  if (repaired) {
    const result = normalizeParsedVerdict(repaired);
    result.issues.unshift('trailing_commas_repaired');
    logger.debug({ issues: result.issues }, 'Verdict parsed after repair');
    return result;
  }

  const result = heuristicVerdict(cleaned);
  logger.warn(
    {
      emotionalScore: result.verdict.emotionalScore,
      logicalScore: result.verdict.logicalScore,
      winner: result.verdict.winner,
      rawLength: raw.length,
    },
    'Verdict JSON parse failed; applied heuristic extraction'
  );
  return result;
}

/**
 * Raw judge output to Verdict. Never throws.
 */
export function extractVerdict(raw: string): Verdict {
  return parseVerdict(raw).verdict;
}
