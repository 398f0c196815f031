import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { selectRoundRobin } from "../cursor.js";

const ITEMS = ["a", "b", "c", "d", "e"];

describe("selectRoundRobin", () => {
  it("takes a window from the cursor and advances it", () => {
    assert.deepEqual(selectRoundRobin(ITEMS, 0, 2), { selected: ["a", "b"], nextCursor: 2 });
  });

  it("wraps around the end of the list", () => {
    assert.deepEqual(selectRoundRobin(ITEMS, 4, 2), { selected: ["e", "a"], nextCursor: 1 });
    assert.deepEqual(selectRoundRobin(ITEMS, 7, 3), { selected: ["c", "d", "e"], nextCursor: 0 });
  });

  it("selects everything when unlimited or when the limit covers the list", () => {
    assert.deepEqual(selectRoundRobin(ITEMS, 3, 0), { selected: ITEMS, nextCursor: 3 });
    assert.deepEqual(selectRoundRobin(ITEMS, 0, 9), { selected: ITEMS, nextCursor: 0 });
  });

  it("handles an empty list", () => {
    assert.deepEqual(selectRoundRobin([], 5, 2), { selected: [], nextCursor: 0 });
  });

  it("visits every item over consecutive cycles", () => {
    let cursor = 0;
    const seen: string[] = [];
    for (let i = 0; i < 5; i++) {
      const { selected, nextCursor } = selectRoundRobin(ITEMS, cursor, 2);
      seen.push(...selected);
      cursor = nextCursor;
    }
    assert.deepEqual(seen, ["a", "b", "c", "d", "e", "a", "b", "c", "d", "e"]);
  });
});
