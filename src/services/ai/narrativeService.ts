import { Logger, moduleLogger } from "../../observability/logging";
import { KpiSnapshot } from "../../types/KpiInterface";
import { AIUnavailable } from "../errors";
import { CompletionProvider, isTransientProviderError } from "./completionProvider";

export interface NarrativeServiceOptions {
  timeoutMs: number;
  maxChars: number;
}

export type NarrativeInput = Pick<
  KpiSnapshot,
  | "range"
  | "filters"
  | "totalCount"
  | "activeCount"
  | "resolutionRate"
  | "priorityDistribution"
  | "topRiskZones"
  | "transparencyRate"
  | "averageOpenAgeHours"
  | "alertLevel"
>;

export class NarrativeTimeout extends Error {
  constructor(readonly timeoutMs: number) {
    super(`completion timed out after ${timeoutMs}ms`);
    this.name = "NarrativeTimeout";
  }
}

const percent = (rate: number) => `${Math.round(rate * 1000) / 10}%`;

export function buildPrompt(input: NarrativeInput): string {
  const zones = input.topRiskZones.length
    ? input.topRiskZones.map((z) => `${z.bucket} (${z.count})`).join("; ")
    : "none";
  const priorities = Object.entries(input.priorityDistribution)
    .map(([priority, count]) => `${priority}: ${count}`)
    .join(", ");
  return [
    `Period: ${input.range.preset} (${input.range.from ?? "beginning"} to ${input.range.to})`,
    `Status filter: ${input.filters.status}${input.filters.category ? `, category: ${input.filters.category}` : ""}`,
    `Total reports: ${input.totalCount}`,
    `Active (not resolved or closed): ${input.activeCount}`,
    `Resolution rate (closed/total): ${percent(input.resolutionRate)}`,
    `Anonymous share: ${percent(input.transparencyRate)}`,
    `Average age of open reports: ${input.averageOpenAgeHours} h (alert: ${input.alertLevel})`,
    `Priority distribution: ${priorities}`,
    `Top risk zones (lat,lon bucket and count): ${zones}`,
  ].join("\n");
}

/**
 * Wraps the completion provider with a hard per-attempt timeout and exactly
 * one retry on transient failures. Any failure that survives that becomes
 * AIUnavailable. The returned text is opaque; it is only trimmed and capped.
 */
export class NarrativeService {
  private readonly log: Logger;

  constructor(
    private readonly provider: CompletionProvider,
    private readonly options: NarrativeServiceOptions,
    logger?: Logger
  ) {
    this.log = logger ?? moduleLogger("narrative");
  }

  async summarize(input: NarrativeInput): Promise<string> {
    const prompt = buildPrompt(input);
    let attempts = 0;
    for (;;) {
      attempts++;
      try {
        const text = (await this.attemptOnce(prompt)).trim();
        if (!text) throw new AIUnavailable("empty completion", attempts);
        return this.cap(text);
      } catch (error) {
        if (error instanceof AIUnavailable) throw error;
        const transient = error instanceof NarrativeTimeout || isTransientProviderError(error);
        const reason = error instanceof Error ? error.message : String(error);
        if (transient && attempts < 2) {
          this.log.warn({ reason, attempts }, "narrative attempt failed; retrying once");
          continue;
        }
        throw new AIUnavailable(reason, attempts);
      }
    }
  }

  private cap(text: string): string {
    if (text.length <= this.options.maxChars) return text;
    return `${text.slice(0, Math.max(0, this.options.maxChars - 3)).trimEnd()}...`;
  }

  private async attemptOnce(prompt: string): Promise<string> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first: a provider that rejects on abort must not win the race.
        reject(new NarrativeTimeout(timeoutMs));
        controller.abort();
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.provider.complete(prompt, { timeoutMs, signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
