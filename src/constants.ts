/**
 * Constants shared by the reaction tokenizer
 */

export const PAD_TOKEN = "[PAD]";
export const MASK_TOKEN = "[MASK]";
export const UNK_TOKEN = "[UNK]";
export const EOS_TOKEN = "[EOS]";
export const NOAGENT_TOKEN = "[NOAGENT]";

// Checked in this order when a vocabulary is loaded
export const REQUIRED_SPECIAL_TOKENS = [
  PAD_TOKEN,
  MASK_TOKEN,
  UNK_TOKEN,
  EOS_TOKEN,
  NOAGENT_TOKEN
] as const;

export const TWO_LETTER_ELEMENTS = [
  "Br", "Cl", "Si", "Se", "Na", "Ca", "Li", "Mg",
  "Zn", "Cu", "Fe", "Mn", "Hg", "Ag", "Au"
] as const;

// Dotted numerals such as 2.12.13, in any script's decimal digits
export const REACTION_CLASS_PATTERN = /^\p{Nd}+(\.\p{Nd}+)*$/u;

// Runs of whitespace between pieces. Includes the information separators
// U+001C-U+001F and NEL, excludes the byte order mark.
export const PIECE_SEPARATOR =
  /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

// Alternatives are tried left to right, so '>>' and bracket atoms win
// over the single-character class. Bracket lengths count code points.
export const SMILES_PATTERN = new RegExp(
  ">>|\\[[^\\[\\]]{1,10}\\]|" +
  TWO_LETTER_ELEMENTS.join("|") +
  "|[B-IK-Zb-ik-z0-9=#$%@+\\-()/\\\\.]",
  "gu"
);
