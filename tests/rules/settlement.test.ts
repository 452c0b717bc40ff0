import { describe, it } from "node:test";
import assert from "node:assert";
import { PREV_CLOSE } from "@signal-audit/common";
import { SettlementChecker, SettlementLedger } from "@signal-audit/rules";
import { tables, merged, pos, vpos, T1, T2, T3 } from "../helpers/builders.js";

const A = "000001.SZE";

describe("SettlementLedger", () => {
  it("keeps today's buys out of the settled quantity", () => {
    const ledger = new SettlementLedger();
    ledger.seed(A, 6000);
    assert.strictEqual(ledger.apply(T1, A, 8000), null);
    assert.deepStrictEqual(ledger.position(A), { ticker: A, settledQuantity: 6000, unsettledQuantity: 2000 });

    const violation = ledger.apply(T2, A, 1000);
    assert.deepStrictEqual(violation, {
      time: T2,
      ticker: A,
      target: 1000,
      currentBefore: 8000,
      tradeVolume: -7000,
      requiredSell: 7000,
      availableSettled: 6000,
      excess: 1000
    });
  });

  it("draws successive sells down from the settled quantity", () => {
    const ledger = new SettlementLedger();
    ledger.seed(A, 1000);
    assert.strictEqual(ledger.apply(T1, A, 600), null);
    assert.strictEqual(ledger.apply(T2, A, 0), null);
    assert.strictEqual(ledger.apply(T3, A, -1)?.excess, 1);
  });

  it("leaves the settled quantity untouched by a rejected sell", () => {
    const ledger = new SettlementLedger();
    ledger.seed(A, 1000);

    const rejected = ledger.apply(T1, A, -500);
    assert.strictEqual(rejected?.requiredSell, 1500);
    assert.strictEqual(rejected?.excess, 500);
    assert.deepStrictEqual(ledger.position(A), { ticker: A, settledQuantity: 1000, unsettledQuantity: -1500 });

    assert.strictEqual(ledger.apply(T2, A, -1500), null);
    assert.strictEqual(ledger.position(A).settledQuantity, 0);
  });

  it("treats an unseeded ticker as holding nothing", () => {
    const ledger = new SettlementLedger();
    assert.strictEqual(ledger.apply(T1, A, -500)?.availableSettled, 0);
  });
});

describe("SettlementChecker", () => {
  function ledgerDay(finalTarget: number) {
    return tables({
      merged: [merged("grp-500", T1, A, 8000), merged("grp-500", T2, A, finalTarget)],
      virtualPositions: [vpos("pm-a", PREV_CLOSE, A, 4000), vpos("pm-b", PREV_CLOSE, A, 2000)]
    });
  }

  it("fails a sell that reaches into shares bought today", () => {
    const result = new SettlementChecker().check(ledgerDay(1000));
    assert.strictEqual(result.status, "FAIL");
    assert.strictEqual(result.message, "Found 1 T+1 constraint violations (total excess: 1000)");
    assert.deepStrictEqual((result.details ?? "").split("\n"), [
      "Found 1 T+1 constraint violations (strategy: ledger):",
      `  time=${T2}: 1 violations`,
      `    ${A}: target=1000, before=8000, trade=-7000, need_sell=7000, available=6000, excess=1000`
    ]);
  });

  it("passes a sell covered by the previous close", () => {
    const checker = new SettlementChecker();
    const result = checker.check(ledgerDay(2000));
    assert.strictEqual(result.status, "PASS");
    assert.strictEqual(result.message, "All 2 alpha targets respect T+1 sellable constraints (strategy: ledger)");
    assert.deepStrictEqual(checker.evaluate(ledgerDay(2000)).ledger, [
      { ticker: A, settledQuantity: 0, unsettledQuantity: 2000 }
    ]);
  });

  it("seeds zero for a ticker without a previous close position", () => {
    const evaluation = new SettlementChecker().evaluate(tables({
      merged: [merged("grp-500", T1, A, 1000), merged("grp-500", T2, A, 0)],
      virtualPositions: [vpos("pm-a", T1, A, 1000)]
    }));
    assert.strictEqual(evaluation.violations.length, 1);
    assert.strictEqual(evaluation.violations[0].excess, 1000);
  });

  it("checks group sells against summed available sellable volume", () => {
    const checker = new SettlementChecker();
    const evaluation = checker.evaluate(tables({
      merged: [merged("grp-500", T1, A, 200)],
      positions: [pos("trader-1", T1, A, 500, 300), pos("trader-2", T1, A, 500, 300)]
    }));
    assert.strictEqual(evaluation.strategy, "available-sellable");
    assert.deepStrictEqual(evaluation.violations, [{
      time: T1,
      ticker: A,
      target: 200,
      currentBefore: 1000,
      tradeVolume: -800,
      requiredSell: 800,
      availableSettled: 600,
      excess: 200
    }]);
  });

  it("prefers the ledger when both kinds of data are present", () => {
    const day = ledgerDay(2000);
    day.positions = [pos("trader-1", T1, A, 500, 0)];
    assert.strictEqual(new SettlementChecker().evaluate(day).strategy, "ledger");
    assert.strictEqual(
      new SettlementChecker({ strategy: "available-sellable" }).evaluate(day).strategy,
      "available-sellable"
    );
  });

  describe("missing data", () => {
    it("reports ERROR when the ledger is requested without virtual positions", () => {
      const result = new SettlementChecker({ strategy: "ledger" }).check(tables({
        merged: [merged("grp-500", T1, A, 100)]
      }));
      assert.strictEqual(result.status, "ERROR");
      assert.strictEqual(result.message, "PM virtual position data not provided");
    });

    it("reports ERROR when positions carry no available sellable volume", () => {
      const result = new SettlementChecker({ strategy: "available-sellable" }).check(tables({
        positions: [pos("trader-1", T1, A, 500)]
      }));
      assert.strictEqual(result.status, "ERROR");
      assert.strictEqual(result.message, "Available sellable volume not provided in position snapshots");
    });

    it("reports ERROR when neither source is available", () => {
      const result = new SettlementChecker().check(tables({ positions: [pos("trader-1", T1, A, 500)] }));
      assert.strictEqual(result.status, "ERROR");
      assert.strictEqual(
        result.message,
        "Neither PM virtual position data nor available sellable volume provided"
      );
    });
  });
});
