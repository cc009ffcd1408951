import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseDays } from "../cli/util.js";

describe("parseDays", () => {
  it("accepts positive numbers", () => {
    assert.equal(parseDays("30"), 30);
    assert.equal(parseDays(" 7 "), 7);
    assert.equal(parseDays("0.5"), 0.5);
  });

  it("rejects zero, negatives and non-numbers", () => {
    assert.equal(parseDays("0"), null);
    assert.equal(parseDays("-3"), null);
    assert.equal(parseDays("soon"), null);
    assert.equal(parseDays(""), null);
    assert.equal(parseDays("   "), null);
    assert.equal(parseDays("Infinity"), null);
  });
});
