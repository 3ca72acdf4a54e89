/**
 * Token id to reaction string decoder
 */

import type { VocabularyTable } from './vocabulary.js';
import { isReactionClass } from './utils/smiles-utils.js';

/**
 * Translates token ids back into a readable reaction string.
 *
 * Padding ids are dropped and unknown ids become `[UNK]`. SMILES fragments
 * are concatenated directly; reaction classes and bracketed tokens are set
 * apart by a single space.
 */
export function decoder(ids: readonly number[], vocabulary: VocabularyTable): string {
  if (ids.length === 0) {
    return '';
  }

  const padId = vocabulary.specialTokenIds.pad;
  const tokens: string[] = [];

  for (const id of ids) {
    if (id === padId) {
      continue;
    }
    tokens.push(vocabulary.lookupToken(id));
  }

  return joinTokens(tokens);
}

/**
 * Joins tokens with the decoder's spacing rule.
 */
export function joinTokens(tokens: readonly string[]): string {
  let result = '';

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (i > 0 && needsSpace(tokens[i - 1], token)) {
      result += ' ';
    }
    result += token;
  }

  return result;
}

function needsSpace(previous: string, current: string): boolean {
  return (
    isReactionClass(current) ||
    isReactionClass(previous) ||
    current.startsWith('[') ||
    previous.startsWith('[')
  );
}
