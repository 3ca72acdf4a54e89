/**
 * Reaction string to token id encoder
 */

import type { VocabularyTable } from './vocabulary.js';
import { isReactionClass, splitPieces, splitSmiles } from './utils/smiles-utils.js';
import type { PieceKind } from './types.js';

/**
 * Translates a reaction string such as `"CCO>>CCCBr 2.12.13"` into token ids.
 *
 * Never throws: tokens missing from the vocabulary become the `[UNK]` id.
 */
export function encoder(text: string, vocabulary: VocabularyTable): number[] {
  return tokenize(text, vocabulary).map(token => vocabulary.lookupId(token));
}

/**
 * Splits a reaction string into the token strings `encoder` maps to ids.
 */
export function tokenize(text: string, vocabulary: VocabularyTable): string[] {
  const tokens: string[] = [];

  for (const piece of splitPieces(text)) {
    if (classifyPiece(piece, vocabulary) === 'smiles') {
      for (const token of splitSmiles(piece)) {
        tokens.push(token);
      }
    } else {
      tokens.push(piece);
    }
  }

  return tokens;
}

export function classifyPiece(piece: string, vocabulary: VocabularyTable): PieceKind {
  if (isReactionClass(piece)) {
    return 'reaction_class';
  }
  // Covers special tokens and any other whole-piece vocabulary entry
  if (vocabulary.contains(piece)) {
    return 'vocabulary';
  }
  return 'smiles';
}
