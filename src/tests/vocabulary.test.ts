import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import {
  VocabularyTable,
  MissingSpecialTokenError,
  REQUIRED_SPECIAL_TOKENS
} from '../index.js';
import { SPECIAL_TOKENS, VOCAB, without } from './fixtures.js';

describe('Vocabulary Table Tests', () => {
  test('missing special token', async () => {
    for (const token of REQUIRED_SPECIAL_TOKENS) {
      assert.throws(
        () => new VocabularyTable(without(VOCAB, token)),
        (error: unknown) => {
          if (!(error instanceof MissingSpecialTokenError)) {
            return false;
          }
          assert.equal(error.token, token);
          assert.equal(error.message, `${token} token is missing in vocabulary!`);
          return true;
        }
      );
    }
  });

  test('first missing special token is reported', async () => {
    assert.throws(
      () => new VocabularyTable(without(VOCAB, '[UNK]', '[PAD]')),
      { name: 'MissingSpecialTokenError', token: '[PAD]' }
    );
  });

  test('size counts entries', async () => {
    assert.equal(new VocabularyTable(VOCAB).size, 19);
    assert.equal(new VocabularyTable(SPECIAL_TOKENS).size, 5);
  });

  test('shared ids keep the last token', async () => {
    const table = new VocabularyTable({ ...SPECIAL_TOKENS, "a": 7, "b": 7 });
    assert.equal(table.size, 7);
    assert.equal(table.lookupId('a'), 7);
    assert.equal(table.lookupId('b'), 7);
    assert.equal(table.lookupToken(7), 'b');
  });

  test('map source keeps insertion order', async () => {
    const entries: [string, number][] = [...Object.entries(SPECIAL_TOKENS), ["7", 9], ["3", 9]];
    assert.equal(new VocabularyTable(new Map(entries)).lookupToken(9), '3');
    // integer-like keys of a plain object enumerate in ascending order
    assert.equal(new VocabularyTable(Object.fromEntries(entries)).lookupToken(9), '7');
  });

  test('nested source', async () => {
    const table = new VocabularyTable({ token_to_id: VOCAB });
    assert.equal(table.size, 19);
    assert.equal(table.lookupId('Br'), 11);
    assert(!table.contains('token_to_id'));
  });

  test('flat source with a token_to_id token', async () => {
    const table = new VocabularyTable({ ...SPECIAL_TOKENS, "token_to_id": 5 });
    assert.equal(table.size, 6);
    assert.equal(table.lookupId('token_to_id'), 5);
  });

  test('lookups fall back to unknown', async () => {
    const table = new VocabularyTable(VOCAB);
    assert.equal(table.lookupId('Xe'), 2);
    assert.equal(table.lookupToken(999), '[UNK]');
    assert.equal(table.lookupToken(-1), '[UNK]');
    assert.equal(table.unkTokenId, 2);
  });

  test('contains and require', async () => {
    const table = new VocabularyTable(VOCAB);
    assert(table.contains('>>'));
    assert(!table.contains('Na'));
    for (const token of REQUIRED_SPECIAL_TOKENS) {
      assert.equal(table.require(token), table.lookupId(token));
    }
  });

  test('special token ids', async () => {
    const table = new VocabularyTable(VOCAB);
    assert.deepEqual({ ...table.specialTokenIds }, { pad: 0, mask: 1, unk: 2, eos: 3, noagent: 4 });
    assert(Object.isFrozen(table.specialTokenIds));
  });
});
