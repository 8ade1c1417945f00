/**
 * Verdict Extractor Tests
 */

import { describe, it, expect } from 'vitest';
import {
  HEURISTIC_CRITERION_SCORE,
  HEURISTIC_REASONING,
  extractFirstObject,
  extractVerdict,
  heuristicVerdict,
  parseVerdict,
  reconcileWinner,
  removeTrailingCommas,
  stripFences,
} from '../src/services/debate/verdict-extractor.js';
import { WINNERS } from '../src/types/debate.js';

const REASONING =
  'Both lawyers engaged the facts, but the emotional side connected the harm to the remedy more directly than its opponent did.';

const FULL_CRITERIA = {
  relevance: 15,
  coherence: 15,
  evidence: 15,
  persuasiveness: 15,
  rebuttal: 15,
};

function verdictJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    emotional_score: 65,
    logical_score: 58,
    winner: 'emotional',
    reasoning: REASONING,
    criteria_scores: FULL_CRITERIA,
    ...overrides,
  });
}

describe('stripFences', () => {
  it('should remove a language-tagged fence', () => {
    expect(stripFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('should leave unfenced text alone', () => {
    expect(stripFences('  {"a": 1} ')).toBe('{"a": 1}');
  });
});

describe('extractFirstObject', () => {
  it('should return the first balanced object from surrounding prose', () => {
    expect(extractFirstObject('Verdict: {"a": {"b": 2}} trailing {"c": 3}')).toBe('{"a": {"b": 2}}');
  });

  it('should ignore braces inside strings', () => {
    expect(extractFirstObject('{"reasoning": "a } inside", "x": 1}')).toBe('{"reasoning": "a } inside", "x": 1}');
  });

  it('should handle escaped quotes inside strings', () => {
    expect(extractFirstObject('{"r": "say \\"}\\" loudly"}')).toBe('{"r": "say \\"}\\" loudly"}');
  });

  it('should return null without an opening brace or when unbalanced', () => {
    expect(extractFirstObject('no json here')).toBeNull();
    expect(extractFirstObject('{"a": 1')).toBeNull();
  });
});

describe('removeTrailingCommas', () => {
  it('should drop commas before closing braces and brackets', () => {
    expect(removeTrailingCommas('{"a": [1, 2,], "b": 3,\n}')).toBe('{"a": [1, 2], "b": 3}');
  });
});

describe('reconcileWinner', () => {
  it('should derive from scores when the declared winner is missing', () => {
    expect(reconcileWinner(65, 58, undefined)).toEqual({ winner: 'emotional', issue: 'winner_missing' });
  });

  it('should override an invalid token', () => {
    expect(reconcileWinner(70, 60, 'prosecution')).toEqual({ winner: 'emotional', issue: 'winner_invalid' });
  });

  it('should override a declared winner that contradicts the scores', () => {
    expect(reconcileWinner(40, 72, 'emotional')).toEqual({ winner: 'logical', issue: 'winner_overridden' });
  });

  it('should keep a valid declared winner on equal scores', () => {
    expect(reconcileWinner(70, 70, 'logical')).toEqual({ winner: 'logical' });
  });

  it('should tie on equal scores with no declared winner', () => {
    expect(reconcileWinner(50, 50, null)).toEqual({ winner: 'tie', issue: 'winner_missing' });
  });
});

describe('parseVerdict', () => {
  it('should set winner to emotional when the winner field is missing and scores are 65/58', () => {
    const raw = JSON.stringify({
      emotional_score: 65,
      logical_score: 58,
      reasoning: REASONING,
      criteria_scores: FULL_CRITERIA,
    });

    const result = parseVerdict(raw);

    expect(result.kind).toBe('parsed');
    expect(result.verdict.emotionalScore).toBe(65);
    expect(result.verdict.logicalScore).toBe(58);
    expect(result.verdict.winner).toBe('emotional');
    expect(result.issues).toEqual(['winner_missing']);
    expect(result.scoresWereIntegers).toBe(true);
  });

  it('should strip a json fence and keep a consistent tie', () => {
    const raw =
      '```json\n' +
      JSON.stringify({
        emotional_score: 70,
        logical_score: 70,
        winner: 'tie',
        reasoning: REASONING,
        criteria_scores: FULL_CRITERIA,
      }) +
      '\n```';

    const result = parseVerdict(raw);

    expect(result.kind).toBe('parsed');
    expect(result.verdict).toEqual({
      emotionalScore: 70,
      logicalScore: 70,
      winner: 'tie',
      reasoning: REASONING,
      criteriaScores: FULL_CRITERIA,
    });
    expect(result.issues).toEqual([]);
  });

  it('should override an invalid winner token to emotional when emotional scores higher', () => {
    const result = parseVerdict(verdictJson({ emotional_score: 80, logical_score: 60, winner: 'plaintiff' }));

    expect(result.verdict.winner).toBe('emotional');
    expect(result.issues).toContain('winner_invalid');
  });

  it('should find the object inside surrounding prose', () => {
    const result = parseVerdict(`Here is my ruling:\n${verdictJson()}\nThank you.`);

    expect(result.kind).toBe('parsed');
    expect(result.verdict.emotionalScore).toBe(65);
  });

  it('should repair trailing commas', () => {
    const raw = `{"emotional_score": 61, "logical_score": 75, "winner": "logical", "reasoning": "${REASONING}", "criteria_scores": {"relevance": 12, "coherence": 13, "evidence": 14, "persuasiveness": 15, "rebuttal": 16,},}`;

    const result = parseVerdict(raw);

    expect(result.kind).toBe('parsed');
    expect(result.issues[0]).toBe('trailing_commas_repaired');
    expect(result.verdict.logicalScore).toBe(75);
    expect(result.verdict.criteriaScores.rebuttal).toBe(16);
  });

  it('should clamp out-of-range scores and criteria', () => {
    const result = parseVerdict(
      verdictJson({
        emotional_score: 140,
        logical_score: -5,
        criteria_scores: { ...FULL_CRITERIA, evidence: 35 },
      })
    );

    expect(result.verdict.emotionalScore).toBe(100);
    expect(result.verdict.logicalScore).toBe(0);
    expect(result.verdict.criteriaScores.evidence).toBe(20);
    expect(result.issues).toEqual(expect.arrayContaining(['score_clamped', 'criteria_clamped']));
    expect(result.scoresWereIntegers).toBe(false);
  });

  it('should truncate fractional and numeric-string scores', () => {
    const result = parseVerdict(verdictJson({ emotional_score: 72.9, logical_score: '64' }));

    expect(result.verdict.emotionalScore).toBe(72);
    expect(result.verdict.logicalScore).toBe(64);
    expect(result.issues).toContain('score_not_integer');
    expect(result.scoresWereIntegers).toBe(false);
  });

  it('should accept camelCase keys', () => {
    const raw = JSON.stringify({
      emotionalScore: 55,
      logicalScore: 66,
      winner: 'logical',
      reasoning: REASONING,
      criteriaScores: FULL_CRITERIA,
    });

    const result = parseVerdict(raw);

    expect(result.verdict.emotionalScore).toBe(55);
    expect(result.verdict.logicalScore).toBe(66);
    expect(result.issues).toEqual([]);
  });

  it('should zero missing criteria and flag short reasoning', () => {
    const raw = JSON.stringify({ emotional_score: 60, logical_score: 50, winner: 'emotional', reasoning: 'Too short.' });

    const result = parseVerdict(raw);

    expect(result.verdict.criteriaScores).toEqual({
      relevance: 0,
      coherence: 0,
      evidence: 0,
      persuasiveness: 0,
      rebuttal: 0,
    });
    expect(result.issues).toEqual(['reasoning_too_short', 'criteria_missing']);
  });

  it('should fall back to the heuristic scan for free text', () => {
    const result = parseVerdict('The winner is logical with scores emo=40 logical=72');

    expect(result.kind).toBe('heuristic');
    expect(result.verdict.emotionalScore).toBe(40);
    expect(result.verdict.logicalScore).toBe(72);
    expect(result.verdict.winner).toBe('logical');
    expect(result.verdict.reasoning).toBe(HEURISTIC_REASONING);
    expect(result.issues).toEqual(['heuristic_fallback']);
  });

  it('should treat a JSON array as unparseable', () => {
    expect(parseVerdict('[1, 2, 3]').kind).toBe('heuristic');
  });
});

describe('heuristicVerdict', () => {
  it('should read snake_case score labels from broken JSON', () => {
    const result = heuristicVerdict('{"emotional_score": 77, "logical_score": 61, "winner": "emotional", "reasoning": "unterminated');

    expect(result.verdict.emotionalScore).toBe(77);
    expect(result.verdict.logicalScore).toBe(61);
    expect(result.verdict.winner).toBe('emotional');
  });

  it('should default both scores to 50 and tie when nothing is found', () => {
    const result = heuristicVerdict('I cannot decide.');

    expect(result.verdict.emotionalScore).toBe(50);
    expect(result.verdict.logicalScore).toBe(50);
    expect(result.verdict.winner).toBe('tie');
    expect(result.verdict.criteriaScores.coherence).toBe(HEURISTIC_CRITERION_SCORE);
  });

  it('should cap scanned scores at 100', () => {
    expect(heuristicVerdict('emotional score: 250, logical score: 30').verdict.emotionalScore).toBe(100);
  });
});

describe('extractVerdict', () => {
  it('should never throw and always return bounded values', () => {
    const inputs = ['', '{', '}{', 'null', '{"emotional_score": "abc"}', '```', '{"winner": 5}', 'x'.repeat(5000)];

    for (const input of inputs) {
      const verdict = extractVerdict(input);
      expect(verdict.emotionalScore).toBeGreaterThanOrEqual(0);
      expect(verdict.emotionalScore).toBeLessThanOrEqual(100);
      expect(verdict.logicalScore).toBeGreaterThanOrEqual(0);
      expect(verdict.logicalScore).toBeLessThanOrEqual(100);
      expect(WINNERS).toContain(verdict.winner);
      for (const value of Object.values(verdict.criteriaScores)) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(20);
      }
    }
  });
});
