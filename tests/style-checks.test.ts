/**
 * Tests for persona style checks
 */

import { describe, it, expect } from 'vitest';
import { analyzeArgumentStyle, runStyleChecks } from '../src/services/agents/prompts/style-checks.js';

const EMOTIONAL_TEXT = 'You betrayed our trust! Is this justice? Is this fair? My family suffered pain.';

const LOGICAL_TEXT =
  'First, the contract shows rent was due. Second, if the heating failed, then the statute applies. ' +
  'Third, the records prove notice. Therefore, if notice was given, the burden shifts.';

describe('analyzeArgumentStyle', () => {
  it('should measure an emotional argument', () => {
    expect(analyzeArgumentStyle(EMOTIONAL_TEXT)).toEqual({
      wordCount: 14,
      emotionalRatio: 6 / 14,
      pronounRatio: 3 / 14,
      evidenceRatio: 0,
      rhetoricalQuestions: 2,
      exclamations: 1,
      structuralMarkers: 0,
      ifThenStatements: 0,
    });
  });

  it('should measure a logical argument', () => {
    const metrics = analyzeArgumentStyle(LOGICAL_TEXT);

    expect(metrics.wordCount).toBe(29);
    expect(metrics.structuralMarkers).toBe(4);
    expect(metrics.ifThenStatements).toBe(2);
    expect(metrics.evidenceRatio).toBe(6 / 29);
    expect(metrics.emotionalRatio).toBe(0);
    expect(metrics.exclamations).toBe(0);
  });

  it('should return zeros for empty text', () => {
    expect(analyzeArgumentStyle('')).toEqual({
      wordCount: 0,
      emotionalRatio: 0,
      pronounRatio: 0,
      evidenceRatio: 0,
      rhetoricalQuestions: 0,
      exclamations: 0,
      structuralMarkers: 0,
      ifThenStatements: 0,
    });
  });
});

describe('runStyleChecks', () => {
  it('should pass arguments that meet their persona targets', () => {
    expect(runStyleChecks(EMOTIONAL_TEXT, 'emotional')).toEqual([]);
    expect(runStyleChecks(LOGICAL_TEXT, 'logical')).toEqual([]);
  });

  it('should report every missed emotional target', () => {
    expect(runStyleChecks(LOGICAL_TEXT, 'emotional')).toEqual([
      { name: 'emotional_vocabulary', severity: 'warning', message: 'Emotional vocabulary at 0.0%, target above 10%' },
      { name: 'personal_pronouns', severity: 'warning', message: 'Personal pronouns at 0.0%, target above 12%' },
      { name: 'rhetorical_questions', severity: 'warning', message: '0 rhetorical question(s), target 2-4' },
      { name: 'exclamations', severity: 'warning', message: '0 exclamation mark(s), target 1-3' },
    ]);
  });

  it('should report every missed logical target', () => {
    const failures = runStyleChecks(EMOTIONAL_TEXT, 'logical');

    expect(failures.map((f) => f.name)).toEqual([
      'structural_markers',
      'if_then_statements',
      'evidence_vocabulary',
      'restrained_tone',
    ]);
    expect(failures[3]?.message).toBe('Emotional vocabulary at 42.9%, target below 3%');
  });
});
