/**
 * Utility functions for segmenting SMILES and reaction strings
 */

import { PIECE_SEPARATOR, REACTION_CLASS_PATTERN, SMILES_PATTERN } from '../constants.js';

/**
 * Checks whether a string is a reaction class label: one or more groups of
 * digits separated by single dots.
 *
 * @example
 * ```typescript
 * isReactionClass("2.12.13"); // true
 * isReactionClass("1.2..3");  // false
 * ```
 */
export function isReactionClass(text: string): boolean {
  return REACTION_CLASS_PATTERN.test(text);
}

/**
 * Splits text on whitespace runs, discarding empty pieces.
 */
export function splitPieces(text: string): string[] {
  return text.split(PIECE_SEPARATOR).filter(piece => piece.length > 0);
}

/**
 * Tokenizes a SMILES string into its atomic units.
 *
 * Characters that no alternative matches (a lone '>', 'J', whitespace) are
 * skipped without being reported.
 *
 * @param smiles - A SMILES or reaction SMILES string
 * @yields The tokens one-by-one with order preserved
 *
 * @example
 * ```typescript
 * import { splitSmiles } from 'reaction-tokenizer';
 * console.log([...splitSmiles("CCO>>CBr")]); // ['C', 'C', 'O', '>>', 'C', 'Br']
 * ```
 */
export function* splitSmiles(smiles: string): Generator<string> {
  // matchAll works on a copy of the pattern, so lastIndex never leaks between calls
  for (const match of smiles.matchAll(SMILES_PATTERN)) {
    yield match[0];
  }
}

/**
 * Returns the number of tokens `splitSmiles` produces for a string.
 */
export function lenSmiles(smiles: string): number {
  return Array.from(splitSmiles(smiles)).length;
}

/**
 * Constructs an alphabet from an iterable of reaction strings.
 *
 * Each string is split into pieces the way the encoder splits it: reaction
 * class labels are kept whole, everything else is segmented as SMILES.
 *
 * @param reactions - An iterable of reaction strings such as `"CCO>>CBr 2.12.13"`
 * @returns The set of every token that appears in the input strings
 *
 * @example
 * ```typescript
 * import { getAlphabetFromSmiles } from 'reaction-tokenizer';
 * const alphabet = getAlphabetFromSmiles(["CCO>>CBr 2.12.13", "C[N+]"]);
 * console.log([...alphabet].sort()); // ['2.12.13', '>>', 'Br', 'C', 'O', '[N+]']
 * ```
 */
export function getAlphabetFromSmiles(reactions: Iterable<string>): Set<string> {
  const alphabet = new Set<string>();

  for (const reaction of reactions) {
    for (const piece of splitPieces(reaction)) {
      if (isReactionClass(piece)) {
        alphabet.add(piece);
        continue;
      }
      for (const token of splitSmiles(piece)) {
        alphabet.add(token);
      }
    }
  }

  return alphabet;
}
