import type { StringToIndex } from '../index.js';

export const SPECIAL_TOKENS: StringToIndex = {
  "[PAD]": 0,
  "[MASK]": 1,
  "[UNK]": 2,
  "[EOS]": 3,
  "[NOAGENT]": 4
};

export const VOCAB: StringToIndex = {
  ...SPECIAL_TOKENS,
  "C": 5,
  "O": 6,
  ">": 7,
  "B": 8,
  "r": 9,
  ">>": 10,
  "Br": 11,
  "2.12.13": 12,
  "N": 13,
  "[N+]": 14,
  "(": 15,
  ")": 16,
  ".": 17,
  "Cl": 18
};

export function without(vocab: StringToIndex, ...tokens: string[]): StringToIndex {
  return Object.fromEntries(
    Object.entries(vocab).filter(([token]) => !tokens.includes(token))
  );
}
