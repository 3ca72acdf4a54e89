/**
 * Type definitions for the reaction tokenizer
 */

import type { REQUIRED_SPECIAL_TOKENS } from './constants.js';

// Vocabulary mappings
export type StringToIndex = Record<string, number>;
export type IndexToString = Map<number, string>;

// Vocabularies exported by the training pipeline wrap the mapping
export interface NestedVocabulary {
  token_to_id: StringToIndex;
}

/**
 * Anything a tokenizer can be built from. A `Map` keeps insertion order for
 * integer-like tokens, which plain objects enumerate first.
 */
export type VocabularySource = StringToIndex | NestedVocabulary | ReadonlyMap<string, number>;

export type SpecialToken = typeof REQUIRED_SPECIAL_TOKENS[number];

export interface SpecialTokenIds {
  pad: number;
  mask: number;
  unk: number;
  eos: number;
  noagent: number;
}

// How the encoder classified a whitespace-separated piece
export type PieceKind = "reaction_class" | "vocabulary" | "smiles";
