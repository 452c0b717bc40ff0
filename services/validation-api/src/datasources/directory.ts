/**
 * DirectorySignalSource - ISignalSource over a directory of pipe-delimited files
 *
 * Expected files:
 * - InCheckAlphaEv.csv    event|alphaid|time|ticker|volume
 * - MergedAlphaEv.csv     event|alphaid|time|ticker|volume               [optional]
 * - SplitAlphaEv.csv      event|alphaid|time|ticker|volume
 * - SplitCtxEv.csv        event|alphaid|time|ticker|realtime_pos|realtime_long_pos|realtime_short_pos[|realtime_avail_shot_vol]
 * - MarketDataEv.csv      event|alphaid|time|ticker|last_price|prev_close_price   [optional]
 * - PmVirtualPosEv.csv    alphaid|time|ticker|virtual_position            [optional]
 *
 * The time column may hold a previous-close marker such as "nil_last_alpha".
 */

import { readFile, access } from "fs/promises";
import { join } from "path";
import {
  DataContractError,
  parseSignalTables,
  type ISignalSource,
  type SignalTables
} from "@signal-audit/common";

export const SIGNAL_FILES = {
  pm: "InCheckAlphaEv.csv",
  merged: "MergedAlphaEv.csv",
  split: "SplitAlphaEv.csv",
  positions: "SplitCtxEv.csv",
  market: "MarketDataEv.csv",
  virtualPositions: "PmVirtualPosEv.csv"
} as const;

type SignalFile = keyof typeof SIGNAL_FILES;

interface ColumnSpec {
  column: string;
  field: string;
  kind: "text" | "number";
  optional?: boolean;
}

const text = (column: string, field: string, optional = false): ColumnSpec =>
  ({ column, field, kind: "text", optional });
const num = (column: string, field: string, optional = false): ColumnSpec =>
  ({ column, field, kind: "number", optional });

const ALPHA_COLUMNS: ColumnSpec[] = [
  text("event", "event"),
  text("alphaid", "participantId"),
  text("time", "time"),
  text("ticker", "ticker"),
  num("volume", "volume")
];

const COLUMNS: Record<SignalFile, ColumnSpec[]> = {
  pm: ALPHA_COLUMNS,
  merged: ALPHA_COLUMNS,
  split: ALPHA_COLUMNS,
  positions: [
    text("event", "event"),
    text("alphaid", "participantId"),
    text("time", "time"),
    text("ticker", "ticker"),
    num("realtime_pos", "realtimePos"),
    num("realtime_long_pos", "realtimeLongPos"),
    num("realtime_short_pos", "realtimeShortPos"),
    num("realtime_avail_shot_vol", "realtimeAvailSellVolume", true)
  ],
  market: [
    text("event", "event"),
    text("alphaid", "participantId", true),
    text("time", "time"),
    text("ticker", "ticker"),
    num("last_price", "lastPrice"),
    num("prev_close_price", "prevClosePrice")
  ],
  virtualPositions: [
    text("alphaid", "participantId"),
    text("time", "time"),
    text("ticker", "ticker"),
    num("virtual_position", "virtualPosition")
  ]
};

const DELIMITER = "|";

/**
 * Parse one delimited table into wire-form rows.
 * Throws DataContractError when a required column is missing.
 */
export function parseDelimited(table: string, content: string, columns: ColumnSpec[]): Record<string, string | number>[] {
  const lines = content.split(/\r?\n/).filter(l => l.trim() !== "");
  if (lines.length === 0) {
    throw new DataContractError(`${table} data is empty (no header row)`, table);
  }

  const header = lines[0].split(DELIMITER).map(h => h.trim());
  const missing = columns.filter(c => !c.optional && !header.includes(c.column)).map(c => c.column);
  if (missing.length > 0) {
    throw new DataContractError(
      `${table} data missing required columns: ${missing.join(", ")}`,
      table,
      missing.map(c => `missing column ${c}`)
    );
  }

  const present = columns
    .map(spec => ({ spec, index: header.indexOf(spec.column) }))
    .filter(c => c.index >= 0);

  return lines.slice(1).map(line => {
    const cells = line.split(DELIMITER).map(c => c.trim());
    const row: Record<string, string | number> = {};
    for (const { spec, index } of present) {
      const cell = cells[index] ?? "";
      // a blank number is absent, not 0; the row schema rejects it if required
      if (cell === "" && (spec.optional || spec.kind === "number")) continue;
      row[spec.field] = spec.kind === "number" ? Number(cell) : cell;
    }
    return row;
  });
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class DirectorySignalSource implements ISignalSource {
  constructor(private readonly dir: string) {}

  get description(): string {
    return `directory ${this.dir}`;
  }

  private async readTable(name: SignalFile, required: boolean): Promise<Record<string, string | number>[] | undefined> {
    const path = join(this.dir, SIGNAL_FILES[name]);
    if (!(await exists(path))) {
      if (required) {
        throw new DataContractError(`Required file not found: ${path}`, name);
      }
      return undefined;
    }
    const content = await readFile(path, "utf8");
    return parseDelimited(name, content, COLUMNS[name]);
  }

  async load(): Promise<SignalTables> {
    const [pm, merged, split, positions, market, virtualPositions] = await Promise.all([
      this.readTable("pm", true),
      this.readTable("merged", false),
      this.readTable("split", true),
      this.readTable("positions", true),
      this.readTable("market", false),
      this.readTable("virtualPositions", false)
    ]);

    if (!merged) {
      console.warn(`${SIGNAL_FILES.merged} not found in ${this.dir}; using PM alphas as merged groups`);
    }

    return parseSignalTables({ pm, merged, split, positions, market, virtualPositions });
  }
}
