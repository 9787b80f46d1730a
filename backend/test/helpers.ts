import path from "node:path";
import { loadConfig, type AppConfig } from "../src/libs/config.js";
import { loadDatasetFromCsv, type ProductDataset } from "../src/libs/dataset.js";
import type { DecisionLogEntry, DecisionLogger } from "../src/libs/decisionLog.js";
import { ModelCallError, type LanguageModel } from "../src/libs/gemini.js";

export const REPO_ROOT = path.resolve(__dirname, "..", "..");

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig(env, REPO_ROOT);
}

export function sampleDataset(): ProductDataset {
  return loadDatasetFromCsv(path.join(REPO_ROOT, "backend", "data", "products.csv"));
}

/** In-process stand-in for Gemini; records every prompt and timeout it was called with. */
export class FakeModel implements LanguageModel {
  readonly modelVersion = "fake-model";
  readonly calls: Array<{ prompt: string; timeoutMs: number }> = [];

  constructor(private readonly respond: (prompt: string) => Promise<string>) {}

  complete(prompt: string, timeoutMs: number): Promise<string> {
    this.calls.push({ prompt, timeoutMs });
    return this.respond(prompt);
  }
}

export function modelReplying(text: string): FakeModel {
  return new FakeModel(async () => text);
}

export function modelFailing(err: unknown = new ModelCallError("timeout", "Model call timed out after 5000ms")): FakeModel {
  return new FakeModel(async () => {
    throw err;
  });
}

export class RecordingDecisionLog implements DecisionLogger {
  readonly entries: DecisionLogEntry[] = [];
  flushed = 0;

  append(entry: DecisionLogEntry): void {
    this.entries.push(entry);
  }

  async flush(): Promise<void> {
    this.flushed += 1;
  }
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
