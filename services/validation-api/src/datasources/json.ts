/**
 * JsonSignalSource - ISignalSource over tables supplied inline
 * (e.g. the body of a /validate request).
 */

import { parseSignalTables, type ISignalSource, type SignalTables } from "@signal-audit/common";

export class JsonSignalSource implements ISignalSource {
  readonly description = "inline tables";

  constructor(private readonly raw: unknown) {}

  async load(): Promise<SignalTables> {
    return parseSignalTables(this.raw);
  }
}
