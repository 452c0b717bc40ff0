import { describe, it } from "node:test";
import assert from "node:assert";
import { VolumeRoundingChecker } from "@signal-audit/rules";
import { tables, split, pos, T1 } from "../helpers/builders.js";

const A = "000001.SZE";

describe("VolumeRoundingChecker", () => {
  const checker = new VolumeRoundingChecker();

  it("is named after its lot size", () => {
    assert.strictEqual(checker.name, "Volume Rounding (100 shares)");
    assert.strictEqual(new VolumeRoundingChecker({ lotSize: 10 }).name, "Volume Rounding (10 shares)");
  });

  it("passes trade volumes that are whole lots", () => {
    const result = checker.check(tables({
      split: [split("trader-1", T1, A, 1300)],
      positions: [pos("trader-1", T1, A, 200)]
    }));
    assert.strictEqual(result.status, "PASS");
    assert.strictEqual(result.message, "All 1 trade volumes are properly rounded to 100 shares across 1 time events");
  });

  it("fails a trade volume one unit off a lot and reports the remainder", () => {
    const result = checker.check(tables({
      split: [split("trader-1", T1, A, 1301)],
      positions: [pos("trader-1", T1, A, 200)]
    }));
    assert.strictEqual(result.status, "FAIL");
    assert.strictEqual(result.message, "Found 1 trade volumes not rounded to 100 shares across 1 time events");
    assert.deepStrictEqual((result.details ?? "").split("\n"), [
      `time=${T1}: 1 unrounded volumes`,
      `    participant=trader-1, ticker=${A}: target=1301.0, pos=200.0, volume=1101.0 (remainder=1.0)`
    ]);
  });

  it("treats a missing position as zero", () => {
    const unrounded = checker.findUnrounded(tables({
      split: [split("trader-1", T1, A, 500), split("trader-2", T1, A, 550)]
    }));
    assert.deepStrictEqual(unrounded, [{
      time: T1,
      participantId: "trader-2",
      ticker: A,
      target: 550,
      position: 0,
      tradeVolume: 550,
      remainder: 50
    }]);
  });

  it("uses the floor remainder for sells", () => {
    const [u] = checker.findUnrounded(tables({
      split: [split("trader-1", T1, A, 0)],
      positions: [pos("trader-1", T1, A, 150)]
    }));
    assert.strictEqual(u.tradeVolume, -150);
    assert.strictEqual(u.remainder, 50);
  });

  it("accepts volumes within tolerance of a lot boundary on either side", () => {
    const unrounded = checker.findUnrounded(tables({
      split: [split("trader-1", T1, A, 1300.0000001), split("trader-2", T1, A, 1299.9999999)],
      positions: [pos("trader-1", T1, A, 200), pos("trader-2", T1, A, 200)]
    }));
    assert.deepStrictEqual(unrounded, []);
  });
});
