import { describe, it } from "node:test";
import assert from "node:assert";
import { DirectionConsistencyChecker, pairTrades, tradingTimeline } from "@signal-audit/rules";
import { PREV_CLOSE } from "@signal-audit/common";
import { tables, split, pos, T1, T2, T3 } from "../helpers/builders.js";

const A = "000001.SZE";
const B = "000002.SZE";

describe("trade pairing", () => {
  it("builds one timeline from split and position times, without the previous close", () => {
    const timeline = tradingTimeline(
      [split("trader-1", T3, A, 0), split("trader-1", PREV_CLOSE, A, 0)],
      [pos("trader-1", T1, A, 0), pos("trader-2", T2, A, 0)]
    );
    assert.deepStrictEqual(timeline, [T1, T2, T3]);
  });

  it("pairs against the next time on the shared timeline only", () => {
    // trader-2's snapshot at T2 puts T2 on the timeline; trader-1 has none there
    const pairs = pairTrades(
      [split("trader-1", T1, A, 500), split("trader-2", T1, A, 300)],
      [pos("trader-1", T1, A, 0), pos("trader-1", T3, A, 500), pos("trader-2", T1, A, 0), pos("trader-2", T2, A, 300)]
    );
    assert.deepStrictEqual(pairs, [{
      participantId: "trader-2",
      ticker: A,
      timeFrom: T1,
      timeTo: T2,
      target: 300,
      currentPosition: 0,
      nextPosition: 300,
      intendedTrade: 300,
      actualTrade: 300
    }]);
  });
});

describe("DirectionConsistencyChecker", () => {
  const checker = new DirectionConsistencyChecker();

  function day() {
    return tables({
      split: [
        split("trader-1", T1, A, 1500),
        split("trader-2", T1, A, 500),
        split("trader-3", T1, B, 900),
        split("trader-1", T2, A, 800)
      ],
      positions: [
        pos("trader-1", T1, A, 1000),
        pos("trader-1", T2, A, 800),
        pos("trader-2", T1, A, 1000),
        pos("trader-2", T2, A, 1200),
        pos("trader-3", T1, B, 500),
        pos("trader-3", T2, B, 900)
      ]
    });
  }

  it("flags a buy followed by a falling position and a sell followed by a rising one", () => {
    const result = checker.check(day());
    assert.strictEqual(result.status, "FAIL");
    assert.strictEqual(result.message, "Found 2 direction consistency violations out of 3 total trades");
    assert.deepStrictEqual((result.details ?? "").split("\n"), [
      "BUY Direction Violations (1):",
      `  ${T1}→${T2}: 1 violations`,
      `    trader-1/${A}: 1000→800 (intended buy 500, but position decreased)`,
      "SELL Direction Violations (1):",
      `  ${T1}→${T2}: 1 violations`,
      `    trader-2/${A}: 1000→1200 (intended sell -500, but position increased)`
    ]);
  });

  it("classifies each violation", () => {
    const { total, violations } = checker.findViolations(day());
    assert.strictEqual(total, 3);
    assert.deepStrictEqual(
      violations.map(v => [v.participantId, v.violationType]),
      [["trader-1", "BUY_DECREASED"], ["trader-2", "SELL_INCREASED"]]
    );
  });

  it("places no obligation on a trade with nothing intended", () => {
    const result = checker.check(tables({
      split: [split("trader-1", T1, A, 1000)],
      positions: [pos("trader-1", T1, A, 1000), pos("trader-1", T2, A, 400)]
    }));
    assert.strictEqual(result.status, "PASS");
    assert.strictEqual(
      result.message,
      "All 1 trades follow correct direction consistency (buy increases positions, sell decreases positions)"
    );
  });

  it("accepts a buy that left the position unchanged", () => {
    const result = checker.check(tables({
      split: [split("trader-1", T1, A, 1500)],
      positions: [pos("trader-1", T1, A, 1000), pos("trader-1", T2, A, 1000)]
    }));
    assert.strictEqual(result.status, "PASS");
  });
});
