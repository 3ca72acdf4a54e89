/**
 * Immutable token <-> id table backing the tokenizer
 */

import { MissingSpecialTokenError } from './exceptions.js';
import {
  PAD_TOKEN,
  MASK_TOKEN,
  UNK_TOKEN,
  EOS_TOKEN,
  NOAGENT_TOKEN
} from './constants.js';
import type {
  IndexToString,
  NestedVocabulary,
  SpecialToken,
  SpecialTokenIds,
  StringToIndex,
  VocabularySource
} from './types.js';

export class VocabularyTable {
  private readonly tokenToId: ReadonlyMap<string, number>;
  private readonly idToToken: IndexToString;
  public readonly tokens: ReadonlySet<string>;
  public readonly specialTokenIds: Readonly<SpecialTokenIds>;

  /**
   * Builds both directions of the table in a single pass. When two tokens
   * share an id, the later one owns the id in the reverse direction.
   *
   * @throws MissingSpecialTokenError if any required special token is absent
   */
  constructor(source: VocabularySource) {
    const tokenToId = new Map<string, number>();
    const idToToken: IndexToString = new Map();

    for (const [token, id] of sourceEntries(source)) {
      tokenToId.set(token, id);
      idToToken.set(id, token);
    }

    this.tokenToId = tokenToId;
    this.idToToken = idToToken;
    this.tokens = new Set(tokenToId.keys());

    this.specialTokenIds = Object.freeze({
      pad: this.require(PAD_TOKEN),
      mask: this.require(MASK_TOKEN),
      unk: this.require(UNK_TOKEN),
      eos: this.require(EOS_TOKEN),
      noagent: this.require(NOAGENT_TOKEN)
    });
  }

  /** Number of token entries, not distinct ids. */
  get size(): number {
    return this.tokenToId.size;
  }

  get unkTokenId(): number {
    return this.specialTokenIds.unk;
  }

  contains(token: string): boolean {
    return this.tokenToId.has(token);
  }

  /**
   * Returns the id of `token`, or the `[UNK]` id for tokens the vocabulary
   * has never seen.
   */
  lookupId(token: string): number {
    return this.tokenToId.get(token) ?? this.specialTokenIds.unk;
  }

  /**
   * Returns the token owning `id`, or the literal `[UNK]` string.
   */
  lookupToken(id: number): string {
    return this.idToToken.get(id) ?? UNK_TOKEN;
  }

  require(token: SpecialToken): number {
    const id = this.tokenToId.get(token);
    if (id === undefined) {
      throw new MissingSpecialTokenError(token);
    }
    return id;
  }
}

function sourceEntries(source: VocabularySource): Iterable<[string, number]> {
  if (isMapSource(source)) {
    return source.entries();
  }
  return Object.entries(isNestedSource(source) ? source.token_to_id : source);
}

function isMapSource(source: VocabularySource): source is ReadonlyMap<string, number> {
  return source instanceof Map;
}

// A flat vocabulary may legitimately contain a "token_to_id" token with a numeric id
function isNestedSource(source: StringToIndex | NestedVocabulary): source is NestedVocabulary {
  const nested = source.token_to_id;
  return typeof nested === 'object' && nested !== null;
}
