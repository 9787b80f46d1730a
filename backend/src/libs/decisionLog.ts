/**
 * Append-only decision log: one CSV file and one JSON-lines file per record kind.
 * Records are never rewritten. Appends are chained so concurrent requests cannot interleave rows.
 */

import fs from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import type { Log } from "./log.js";

export type DecisionLogEntry =
  | { kind: "negotiation"; productId: number | null; input: unknown; output: unknown }
  | { kind: "moderation"; input: { message: string }; output: unknown };

export type DecisionKind = DecisionLogEntry["kind"];

export type DecisionRecord = {
  timestamp: string;
  kind: DecisionKind;
  product_id?: number | null;
  input: unknown;
  output: unknown;
};

const CSV_HEADERS: Record<DecisionKind, string[]> = {
  negotiation: ["timestamp", "product_id", "input", "output"],
  moderation: ["timestamp", "message", "output"],
};

export interface DecisionLogger {
  append(entry: DecisionLogEntry): void;
  flush(): Promise<void>;
}

export class DecisionLog implements DecisionLogger {
  private tail: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(
    private readonly logDir: string,
    private readonly log: Log,
    private readonly now: () => Date = () => new Date(),
  ) {}

  csvPath(kind: DecisionKind): string {
    return path.join(this.logDir, `${kind}_log.csv`);
  }

  jsonlPath(kind: DecisionKind): string {
    return path.join(this.logDir, `${kind}_log.jsonl`);
  }

  /** Fire-and-forget. The timestamp is taken at call time, not at write time. */
  append(entry: DecisionLogEntry): void {
    const timestamp = this.now().toISOString();
    this.tail = this.tail
      .then(() => this.write(timestamp, entry))
      .catch((err: unknown) => {
        this.log.error({ err, kind: entry.kind }, "Decision log append failed");
      });
  }

  flush(): Promise<void> {
    return this.tail;
  }

  private async write(timestamp: string, entry: DecisionLogEntry): Promise<void> {
    if (!this.dirReady) {
      await fs.promises.mkdir(this.logDir, { recursive: true });
      this.dirReady = true;
    }

    let row: unknown[];
    let record: DecisionRecord;
    if (entry.kind === "negotiation") {
      row = [timestamp, entry.productId, JSON.stringify(entry.input), JSON.stringify(entry.output)];
      record = { timestamp, kind: entry.kind, product_id: entry.productId, input: entry.input, output: entry.output };
    } else {
      row = [timestamp, entry.input.message, JSON.stringify(entry.output)];
      record = { timestamp, kind: entry.kind, input: entry.input, output: entry.output };
    }

    const csvFile = this.csvPath(entry.kind);
    const header = fs.existsSync(csvFile) ? "" : stringify([CSV_HEADERS[entry.kind]]);
    await fs.promises.appendFile(csvFile, header + stringify([row]), "utf8");
    await fs.promises.appendFile(this.jsonlPath(entry.kind), `${JSON.stringify(record)}\n`, "utf8");
  }
}
