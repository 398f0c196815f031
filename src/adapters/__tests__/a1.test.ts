import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { a1Range, columnLetter, quoteSheet } from "../a1.js";

describe("A1 ranges", () => {
  it("converts column numbers to letters", () => {
    assert.deepEqual([1, 13, 14, 26, 27, 52, 53].map(columnLetter), ["A", "M", "N", "Z", "AA", "AZ", "BA"]);
  });

  it("quotes sheet titles", () => {
    assert.equal(quoteSheet("Сводная - Март"), "'Сводная - Март'");
    assert.equal(quoteSheet("It's"), "'It''s'");
  });

  it("builds cell and rectangle ranges", () => {
    assert.equal(a1Range("S", 1, 1, 13, 20), "'S'!A1:M20");
    assert.equal(a1Range("S", 14, 1), "'S'!N1");
  });
});
