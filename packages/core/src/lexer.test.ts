/**
 * Tests for the Tally assembly lexer.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { TallyLexer } from "./lexer.js";

describe("Tally Lexer", () => {
  it("tokenizes every mnemonic as its own keyword", () => {
    const result = TallyLexer.tokenize("loadc load store pop new jump jumpz halt");
    assert.equal(result.errors.length, 0);
    const names = result.tokens.map((t) => t.tokenType.name);
    assert.deepEqual(names, [
      "Op_loadc", "Op_load", "Op_store", "Op_pop",
      "Op_new", "Op_jump", "Op_jumpz", "Op_halt",
    ]);
  });

  it("distinguishes mnemonics from identifiers with longer names", () => {
    const result = TallyLexer.tokenize("address loader jumper halting");
    assert.equal(result.errors.length, 0);
    for (const t of result.tokens) {
      assert.equal(t.tokenType.name, "Ident", `Expected '${t.image}' to be Ident`);
    }
  });

  it("tokenizes signed integers", () => {
    const result = TallyLexer.tokenize("0 42 -7");
    assert.equal(result.errors.length, 0);
    assert.deepEqual(result.tokens.map((t) => t.image), ["0", "42", "-7"]);
    for (const t of result.tokens) {
      assert.equal(t.tokenType.name, "IntLit");
    }
  });

  it("keeps newlines and skips comments", () => {
    const result = TallyLexer.tokenize("loop: # top of loop\n  halt\n");
    assert.equal(result.errors.length, 0);
    const names = result.tokens.map((t) => t.tokenType.name);
    assert.deepEqual(names, ["Ident", "Colon", "Newline", "Op_halt", "Newline"]);
  });

  it("reports invalid characters", () => {
    const result = TallyLexer.tokenize("loadc $5");
    assert.ok(result.errors.length > 0);
  });
});
