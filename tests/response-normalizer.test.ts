/**
 * Response Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  FILLER_SENTENCE,
  cleanResponse,
  countWords,
  isWithinWordLimits,
  normalizeResponse,
  padToMinimum,
  trimToMaximum,
} from '../src/services/debate/response-normalizer.js';

function words(count: number, word = 'word'): string {
  return Array.from({ length: count }, () => word).join(' ');
}

describe('countWords', () => {
  it('should count whitespace-delimited tokens', () => {
    expect(countWords('  one two\nthree\tfour ')).toBe(4);
  });

  it('should return 0 for empty or blank text', () => {
    expect(countWords('')).toBe(0);
    expect(countWords(' \n\t ')).toBe(0);
  });
});

describe('cleanResponse', () => {
  it('should unwrap a fenced block', () => {
    expect(cleanResponse('```text\nHello there.\n```')).toBe('Hello there.');
  });

  it('should leave a single unmatched fence alone', () => {
    expect(cleanResponse('```\nHello there.')).toBe('```\nHello there.');
  });

  it('should strip one layer of matching quotes', () => {
    expect(cleanResponse('"Members of the jury."')).toBe('Members of the jury.');
    expect(cleanResponse("'Members of the jury.'")).toBe('Members of the jury.');
  });

  it('should not strip mismatched quotes', () => {
    expect(cleanResponse('"Members of the jury.\'')).toBe('"Members of the jury.\'');
  });

  it('should collapse horizontal whitespace and keep line breaks', () => {
    expect(cleanResponse('First   point. \n  Second\t\tpoint.')).toBe('First point.\nSecond point.');
  });
});

describe('padToMinimum', () => {
  it('should append the filler sentence until the minimum is reached', () => {
    const padded = padToMinimum('Short text.', 20);
    expect(padded).toBe(`Short text. ${FILLER_SENTENCE} ${FILLER_SENTENCE}`);
    expect(countWords(padded)).toBe(34);
  });

  it('should build from the filler when text is empty', () => {
    expect(padToMinimum('', 10)).toBe(FILLER_SENTENCE);
  });

  it('should leave long enough text unchanged', () => {
    expect(padToMinimum('a b c', 3)).toBe('a b c');
  });
});

describe('trimToMaximum', () => {
  it('should return text unchanged when within the maximum', () => {
    expect(trimToMaximum('a b c', 1, 3)).toBe('a b c');
  });

  it('should cut at the last sentence end inside the window', () => {
    const text = 'One two three. Four five six seven eight';
    expect(trimToMaximum(text, 2, 5)).toBe('One two three.');
  });

  it('should fall back to a hard cut when the sentence cut would go below the minimum', () => {
    const text = 'One two three. Four five six seven eight';
    expect(trimToMaximum(text, 4, 5)).toBe('One two three. Four five');
  });

  it('should accept closing quotes after the sentence end', () => {
    const text = 'He said "stop." and then kept going on';
    expect(trimToMaximum(text, 2, 5)).toBe('He said "stop."');
  });

  it('should return an empty string for a non-positive maximum', () => {
    expect(trimToMaximum('a b c', 0, 0)).toBe('');
  });
});

describe('normalizeResponse', () => {
  it('should pad short responses into the band', () => {
    const result = normalizeResponse('Justice demands a remedy.', 250, 350);
    expect(isWithinWordLimits(result, 250, 350)).toBe(true);
    expect(result.startsWith('Justice demands a remedy. Therefore,')).toBe(true);
  });

  it('should trim long responses into the band', () => {
    const sentence = 'The record shows a clear breach of duty.';
    const raw = Array.from({ length: 60 }, () => sentence).join(' ');
    const result = normalizeResponse(raw, 250, 350);
    expect(countWords(result)).toBe(344);
    expect(result.endsWith('breach of duty.')).toBe(true);
  });

  it('should hard-cut unpunctuated text at the maximum', () => {
    const result = normalizeResponse(words(500), 250, 350);
    expect(countWords(result)).toBe(350);
  });

  it('should keep text already inside the band', () => {
    const raw = words(300);
    expect(normalizeResponse(raw, 250, 350)).toBe(raw);
  });

  it('should be idempotent', () => {
    const once = normalizeResponse('```\n"A short plea for mercy."\n```', 250, 350);
    expect(normalizeResponse(once, 250, 350)).toBe(once);
  });

  it('should be idempotent when the cut ends on a quoted sentence', () => {
    const raw = `"Members of the jury. ${words(296)} she cried "stop." ${words(100, 'more')}`;

    const once = normalizeResponse(raw, 250, 350);

    expect(normalizeResponse(once, 250, 350)).toBe(once);
    expect(countWords(once)).toBe(303);
    expect(once.startsWith('Members of the jury. word')).toBe(true);
    expect(once.endsWith('she cried "stop.')).toBe(true);
  });

  it('should unwrap nested quote layers to a fixed point', () => {
    const once = normalizeResponse(`""${words(9)} end.""`, 5, 20);

    expect(once).toBe(`${words(9)} end.`);
    expect(normalizeResponse(once, 5, 20)).toBe(once);
  });

  it('should always land in the band', () => {
    const inputs = ['', '   ', words(249), words(251), words(350), words(351), `${words(400)}.`, '"\'"'];
    for (const input of inputs) {
      expect(isWithinWordLimits(normalizeResponse(input, 250, 350), 250, 350)).toBe(true);
    }
  });
});
