/**
 * Response Normalizer
 *
 * Coerces raw generated text into an argument whose whitespace-token count
 * lies in [minWords, maxWords]. Every function here is total: any string in,
 * a string out.
 */

/**
 * Neutral closing sentence appended until the minimum length is reached
 */
export const FILLER_SENTENCE =
  'Therefore, based on the foregoing reasons, this position is justified and the requested remedy follows logically.';

const FENCED_BLOCK = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/;
const SENTENCE_END = /[.!?]["'”’)\]]*$/;
const TOKEN = /\S+/g;

/**
 * Number of whitespace-delimited tokens
 */
export function countWords(text: string): number {
  return text.match(TOKEN)?.length ?? 0;
}

/**
 * Trim, unwrap one code fence and one layer of matching quotes,
 * collapse horizontal whitespace. Line breaks survive.
 */
export function cleanResponse(raw: string): string {
  let text = raw.trim();

  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) {
    text = (fenced[1] ?? '').trim();
  }

  if (text.length >= 2) {
    const first = text[0];
    const last = text[text.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      text = text.slice(1, -1).trim();
    }
  }

  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .trim();
}

/**
 * Append the filler sentence until the text has at least `minWords` tokens
 */
export function padToMinimum(text: string, minWords: number): string {
  let padded = text;
  while (countWords(padded) < minWords) {
    padded = padded ? `${padded} ${FILLER_SENTENCE}` : FILLER_SENTENCE;
  }
  return padded;
}

/**
 * Keep at most `maxWords` tokens, preferring to end on a sentence boundary.
 *
 * The sentence cut is only taken when it leaves at least `minWords` tokens;
 * otherwise the raw `maxWords`-token prefix is returned.
 */
export function trimToMaximum(text: string, minWords: number, maxWords: number): string {
  if (maxWords <= 0) {
    return '';
  }

  const tokens = [...text.matchAll(TOKEN)];
  if (tokens.length <= maxWords) {
    return text;
  }

  const tokenEnd = (index: number): number => {
    const match = tokens[index];
    return match ? (match.index ?? 0) + match[0].length : 0;
  };

  for (let i = maxWords - 1; i >= 0; i--) {
    const token = tokens[i];
    if (token && SENTENCE_END.test(token[0])) {
      if (i + 1 >= minWords) {
        return text.slice(0, tokenEnd(i));
      }
      break;
    }
  }

  return text.slice(0, tokenEnd(maxWords - 1));
}

/**
 * Whether the text already sits inside the band
 */
export function isWithinWordLimits(text: string, minWords: number, maxWords: number): boolean {
  const words = countWords(text);
  return words >= minWords && words <= maxWords;
}

const MAX_NORMALIZE_PASSES = 8;

function normalizeOnce(raw: string, minWords: number, maxWords: number): string {
  return trimToMaximum(padToMinimum(cleanResponse(raw), minWords), minWords, maxWords);
}

/**
 * Clean, pad, then trim. The result is within [minWords, maxWords]
 * whenever minWords <= maxWords.
 *
 * A trim can expose another enclosing quote pair (a text that opens with a
 * quote and is cut after a quoted sentence end), so passes repeat until
 * cleaning no longer changes the text. The result is then a fixed point.
 */
export function normalizeResponse(raw: string, minWords: number, maxWords: number): string {
  let text = normalizeOnce(raw, minWords, maxWords);
  for (let pass = 1; pass < MAX_NORMALIZE_PASSES && cleanResponse(text) !== text; pass++) {
    text = normalizeOnce(text, minWords, maxWords);
  }
  return text;
}
