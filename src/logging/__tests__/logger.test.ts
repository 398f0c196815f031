import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createLogger, describeError } from "../logger.js";

describe("logger", () => {
  it("prefixes timestamp, level and nested tags", () => {
    const lines: string[] = [];
    const log = createLogger((line) => lines.push(line), undefined, () => new Date("2024-03-01T06:00:00Z"));

    log.info("hello");
    log.child("run1").child("Март").ok("done");

    assert.deepEqual(lines, [
      "[2024-03-01T06:00:00.000Z] [INFO] hello",
      "[2024-03-01T06:00:00.000Z] [OK] [run1 Март] done"
    ]);
  });

  it("describes errors by name and message", () => {
    assert.equal(describeError(new TypeError("bad")), "TypeError: bad");
    assert.equal(describeError("oops"), "Error: oops");
  });
});
