import { APIConnectionError, APIError, OpenAI } from "openai";

export interface CompletionOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** External text-completion service; may be slow or down at any time. */
export interface CompletionProvider {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

const SYSTEM_PROMPT = `You are an operations analyst for a municipal incident-reporting service.
You receive KPI figures for a period and write a short executive summary for administrators:
state the overall situation, point out the riskiest zones and the backlog, and suggest one concrete action.
Answer in plain text, at most 120 words, no markdown.`;

export class OpenAICompletionProvider implements CompletionProvider {
  private client: OpenAI | null = null;

  constructor(private readonly apiKey: string, private readonly model: string) {}

  private getClient(): OpenAI {
    if (!this.client) this.client = new OpenAI({ apiKey: this.apiKey });
    return this.client;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await this.getClient().chat.completions.create(
      {
        model: this.model,
        temperature: 0.3,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
      },
      // Retries are the narrative service's job.
      { timeout: options.timeoutMs, maxRetries: 0, signal: options.signal }
    );
    return response.choices?.[0]?.message?.content ?? "";
  }
}

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

/** Connection problems, timeouts, rate limits and 5xx are worth one more try. */
export function isTransientProviderError(error: unknown): boolean {
  if (error instanceof APIConnectionError) return true;
  if (error instanceof APIError) {
    const status = error.status;
    return status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500;
  }
  return false;
}
