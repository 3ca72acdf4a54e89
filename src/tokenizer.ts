/**
 * Tokenizer for reaction SMILES paired with reaction class labels
 */

import { VocabularyTable } from './vocabulary.js';
import { encoder, tokenize } from './encoder.js';
import { decoder } from './decoder.js';
import { isReactionClass, splitSmiles } from './utils/smiles-utils.js';
import { greedyTokenize, warnDeprecatedGreedy } from './utils/compatibility-utils.js';
import {
  PAD_TOKEN,
  MASK_TOKEN,
  UNK_TOKEN,
  EOS_TOKEN,
  NOAGENT_TOKEN
} from './constants.js';
import type { VocabularySource } from './types.js';

/**
 * Converts reaction strings to token ids and back.
 *
 * The vocabulary is read once at construction and never modified, so a
 * single instance can serve any number of callers.
 *
 * @example
 * ```typescript
 * const tokenizer = new ReactionTokenizer(vocab);
 * const ids = tokenizer.encode("CCO>>CCCBr 2.12.13");
 * tokenizer.decode(ids); // "CCO>>CCCBr 2.12.13"
 * ```
 */
export class ReactionTokenizer {
  public readonly padToken = PAD_TOKEN;
  public readonly maskToken = MASK_TOKEN;
  public readonly unkToken = UNK_TOKEN;
  public readonly eosToken = EOS_TOKEN;
  public readonly noagentToken = NOAGENT_TOKEN;

  public readonly padTokenId: number;
  public readonly maskTokenId: number;
  public readonly unkTokenId: number;
  public readonly eosTokenId: number;
  public readonly noagentTokenId: number;

  private readonly vocabulary: VocabularyTable;

  /**
   * @param source - token to id mapping, optionally nested under `token_to_id`
   * @throws MissingSpecialTokenError if a required special token is absent
   */
  constructor(source: VocabularySource | VocabularyTable) {
    this.vocabulary = source instanceof VocabularyTable ? source : new VocabularyTable(source);

    const ids = this.vocabulary.specialTokenIds;
    this.padTokenId = ids.pad;
    this.maskTokenId = ids.mask;
    this.unkTokenId = ids.unk;
    this.eosTokenId = ids.eos;
    this.noagentTokenId = ids.noagent;
  }

  /** Number of tokens in the vocabulary, special tokens included. */
  get vocabSize(): number {
    return this.vocabulary.size;
  }

  get vocab(): ReadonlySet<string> {
    return this.vocabulary.tokens;
  }

  getSpecialTokenId(token: string): number {
    return this.vocabulary.lookupId(token);
  }

  isReactionClass(text: string): boolean {
    return isReactionClass(text);
  }

  tokenizeSmiles(smiles: string): string[] {
    return Array.from(splitSmiles(smiles));
  }

  tokenize(text: string): string[] {
    return tokenize(text, this.vocabulary);
  }

  /**
   * Expects `"SMILES"` or `"SMILES REACTION_CLASS"`; any whitespace-separated
   * mix of SMILES, reaction classes and vocabulary entries is accepted.
   */
  encode(text: string): number[] {
    return encoder(text, this.vocabulary);
  }

  decode(ids: readonly number[]): string {
    return decoder(ids, this.vocabulary);
  }

  /**
   * @deprecated Kept for older pipelines; use {@link encode} instead.
   */
  greedyTokenize(text: string): string[] {
    warnDeprecatedGreedy();
    return greedyTokenize(text, this.vocabulary.tokens, this.unkToken);
  }
}
