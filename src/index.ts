/**
 * Reaction tokenizer: the text front-end of reaction prediction models.
 *
 * Converts reaction SMILES, optionally followed by a reaction class label
 * such as "2.12.13", into integer token ids, and token ids back into a
 * readable string. SMILES are segmented into atoms, bonds and structural
 * symbols by an ordered pattern; reaction classes and whole-piece vocabulary
 * entries (special tokens like "[EOS]") are kept as single tokens.
 *
 * Typical usage example:
 *     import { ReactionTokenizer } from 'reaction-tokenizer';
 *
 *     const tokenizer = new ReactionTokenizer(vocabulary);
 *     const ids = tokenizer.encode("CCO>>CCCBr 2.12.13");
 *     const text = tokenizer.decode(ids);
 */

export const version = "0.1.0";

// Tokenizer and vocabulary
export { ReactionTokenizer } from './tokenizer.js';
export { VocabularyTable } from './vocabulary.js';

// Core encoding/decoding functions
export { encoder, tokenize, classifyPiece } from './encoder.js';
export { decoder, joinTokens } from './decoder.js';

// Exception classes
export { MissingSpecialTokenError } from './exceptions.js';

// Utility functions
export {
  isReactionClass,
  splitPieces,
  splitSmiles,
  lenSmiles,
  getAlphabetFromSmiles
} from './utils/smiles-utils.js';

export { greedyTokenize } from './utils/compatibility-utils.js';

export {
  PAD_TOKEN,
  MASK_TOKEN,
  UNK_TOKEN,
  EOS_TOKEN,
  NOAGENT_TOKEN,
  REQUIRED_SPECIAL_TOKENS
} from './constants.js';

// Export types for TypeScript users
export type {
  StringToIndex,
  IndexToString,
  NestedVocabulary,
  VocabularySource,
  SpecialToken,
  SpecialTokenIds,
  PieceKind
} from './types.js';
