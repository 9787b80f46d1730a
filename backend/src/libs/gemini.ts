/**
 * Gemini text completion, either through the Gemini Developer API (API key) or Vertex AI
 * (application default credentials). Single attempt, bounded by a deadline; no retries.
 */

import { GoogleAuth } from "google-auth-library";
import type { LlmConfig } from "./config.js";

export interface LanguageModel {
  readonly modelVersion: string;
  complete(prompt: string, timeoutMs: number): Promise<string>;
}

export type ModelCallErrorKind = "timeout" | "http" | "network" | "empty" | "unconfigured";

export class ModelCallError extends Error {
  public readonly kind: ModelCallErrorKind;
  public readonly status?: number;

  constructor(kind: ModelCallErrorKind, message: string, status?: number) {
    super(message);
    this.name = "ModelCallError";
    this.kind = kind;
    this.status = status;
  }
}

type FetchFn = typeof fetch;

const MAX_OUTPUT_TOKENS = 300;
const TEMPERATURE = 0.2;
const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta";

type GenerateContentResponse = {
  candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
};

/** Runs `work` with an abort signal that fires after `timeoutMs`; rejects with a timeout error either way. */
export async function withDeadline<T>(timeoutMs: number, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new ModelCallError("timeout", `Model call timed out after ${timeoutMs}ms`);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

abstract class GeminiModel implements LanguageModel {
  constructor(
    public readonly modelVersion: string,
    protected readonly fetchFn: FetchFn,
  ) {}

  protected abstract endpoint(): string;
  protected abstract headers(): Promise<Record<string, string>>;

  complete(prompt: string, timeoutMs: number): Promise<string> {
    return withDeadline(timeoutMs, (signal) => this.request(prompt, signal));
  }

  private async request(prompt: string, signal: AbortSignal): Promise<string> {
    const body = {
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      generationConfig: { maxOutputTokens: MAX_OUTPUT_TOKENS, temperature: TEMPERATURE },
    };

    let res: Response;
    try {
      res = await this.fetchFn(this.endpoint(), {
        method: "POST",
        headers: { "Content-Type": "application/json", ...(await this.headers()) },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (err instanceof ModelCallError) throw err;
      if (signal.aborted) throw new ModelCallError("timeout", "Model call aborted by deadline");
      throw new ModelCallError("network", `Model request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!res.ok) {
      const errText = await res.text().catch(() => "");
      throw new ModelCallError("http", `Gemini error ${res.status}: ${errText.slice(0, 200)}`, res.status);
    }

    const data = (await res.json()) as GenerateContentResponse;
    const text = data.candidates?.[0]?.content?.parts?.[0]?.text;
    if (text == null || text.trim() === "") {
      throw new ModelCallError("empty", "Gemini returned no text");
    }
    return text;
  }
}

export class GeminiApiModel extends GeminiModel {
  constructor(
    private readonly apiKey: string,
    model: string,
    fetchFn: FetchFn = fetch,
  ) {
    super(model, fetchFn);
  }

  protected endpoint(): string {
    return `${GEMINI_API_BASE}/models/${this.modelVersion}:generateContent`;
  }

  protected async headers(): Promise<Record<string, string>> {
    return { "x-goog-api-key": this.apiKey };
  }
}

export class VertexGeminiModel extends GeminiModel {
  private readonly auth = new GoogleAuth({ scopes: ["https://www.googleapis.com/auth/cloud-platform"] });

  constructor(
    private readonly projectId: string,
    private readonly location: string,
    model: string,
    fetchFn: FetchFn = fetch,
  ) {
    super(model, fetchFn);
  }

  protected endpoint(): string {
    const { location, projectId } = this;
    return `https://${location}-aiplatform.googleapis.com/v1/projects/${projectId}/locations/${location}/publishers/google/models/${this.modelVersion}:generateContent`;
  }

  protected async headers(): Promise<Record<string, string>> {
    const client = await this.auth.getClient();
    const token = await client.getAccessToken();
    if (!token.token) {
      throw new ModelCallError("network", "Failed to get Vertex AI access token");
    }
    return { Authorization: `Bearer ${token.token}` };
  }
}

/** Used when no credentials are configured: every call fails fast so callers take their fallback path. */
export class UnconfiguredModel implements LanguageModel {
  constructor(public readonly modelVersion: string) {}

  async complete(): Promise<string> {
    throw new ModelCallError("unconfigured", "No GEMINI_API_KEY or GCP_PROJECT configured");
  }
}

export function createLanguageModel(config: LlmConfig, fetchFn: FetchFn = fetch): LanguageModel {
  switch (config.provider) {
    case "gemini-api":
      return new GeminiApiModel(config.apiKey, config.model, fetchFn);
    case "vertex":
      return new VertexGeminiModel(config.projectId, config.location, config.model, fetchFn);
    case "none":
      return new UnconfiguredModel(config.model);
  }
}
