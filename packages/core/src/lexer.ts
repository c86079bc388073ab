/**
 * Tally assembly lexer using Chevrotain.
 */
import { createToken, Lexer, type TokenType } from "chevrotain";
import { MNEMONICS } from "./instruction.js";

// Identifiers (labels)
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

// All opcode keywords share this category so the parser can consume any of them.
export const Mnemonic = createToken({ name: "Mnemonic", pattern: Lexer.NA });

// Longer mnemonics first: "jumpz" before "jump", "loadc" before "load".
export const mnemonicTokens: TokenType[] = [...MNEMONICS]
  .sort((a, b) => b.length - a.length || a.localeCompare(b))
  .map((m) =>
    createToken({
      name: `Op_${m}`,
      pattern: new RegExp(m),
      longer_alt: Ident,
      categories: [Mnemonic],
    })
  );

export const IntLit = createToken({
  name: "IntLit",
  pattern: /-?(?:0|[1-9]\d*)(?![A-Za-z0-9_])/,
});

// Punctuation
export const Colon = createToken({ name: "Colon", pattern: /:/ });

// Newlines terminate statements; other whitespace and comments are skipped.
export const Newline = createToken({ name: "Newline", pattern: /\r?\n/ });
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});
export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\n\r]*/,
  group: Lexer.SKIPPED,
});

// Token order matters: keywords before Ident
export const allTokens: TokenType[] = [
  WhiteSpace,
  Newline,
  Comment,
  Mnemonic,
  ...mnemonicTokens,
  IntLit,
  Ident,
  Colon,
];

export const TallyLexer = new Lexer(allTokens);
