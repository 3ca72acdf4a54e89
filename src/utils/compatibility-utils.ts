/**
 * Legacy tokenization kept for older vocabularies
 */

import { UNK_TOKEN } from '../constants.js';

/**
 * Greedy longest-match-first tokenization against a vocabulary.
 *
 * At each position the longest substring found in `vocab` is taken; when
 * none is, `unkToken` is emitted and the scan moves one character forward.
 * Every remaining length is tried, so the worst case is quadratic in the
 * input length. Positions are Unicode code points.
 *
 * @example
 * ```typescript
 * greedyTokenize("abc", new Set(["ab", "a", "[UNK]"])); // ['ab', '[UNK]']
 * ```
 */
export function greedyTokenize(
  text: string,
  vocab: ReadonlySet<string>,
  unkToken: string = UNK_TOKEN
): string[] {
  // UTF-16 offset of every code point boundary, including the end
  const offsets: number[] = [];
  let offset = 0;
  for (const char of text) {
    offsets.push(offset);
    offset += char.length;
  }
  offsets.push(offset);

  const n = offsets.length - 1;
  const tokens: string[] = [];
  let i = 0;

  while (i < n) {
    let matchEnd = -1;
    for (let j = n; j > i; j--) {
      if (vocab.has(text.slice(offsets[i], offsets[j]))) {
        matchEnd = j;
        break;
      }
    }

    if (matchEnd === -1) {
      tokens.push(unkToken);
      i += 1;
    } else {
      tokens.push(text.slice(offsets[i], offsets[matchEnd]));
      i = matchEnd;
    }
  }

  return tokens;
}

/**
 * Warns about deprecated greedy tokenization
 */
export function warnDeprecatedGreedy(): void {
  console.warn(
    'ReactionTokenizer: greedyTokenize is deprecated and not recommended ' +
    'for reaction class data. Use encode() instead.'
  );
}
