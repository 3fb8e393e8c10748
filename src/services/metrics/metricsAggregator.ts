import { Logger, moduleLogger } from "../../observability/logging";
import { KpiFilters, KpiSnapshot, NarrativeStatus, RangePreset, StatusFilter } from "../../types/KpiInterface";
import { ReportRecord } from "../../types/ReportInterface";
import { FINISHED_STATUSES, OPEN_STATUSES, ReportStatusEnum } from "../../types/enums/reportStatusEnum";
import { AIUnavailable, AggregationSourceError } from "../errors";
import { NarrativeInput } from "../ai/narrativeService";
import { ReportQuery, ReportStore } from "../stores";
import { computeKpis } from "./kpis";
import { describeRange, rangeBounds } from "./timeRange";
import { TtlLruCache } from "./ttlLruCache";

export interface SnapshotQuery {
  range: RangePreset;
  filters: KpiFilters;
  analyzeAi: boolean;
}

export interface AggregatorOptions {
  geoPrecision: number;
  topZones: number;
}

export interface Narrator {
  summarize(input: NarrativeInput): Promise<string>;
}

export type NarrativeOutcome =
  | { status: "generated"; text: string }
  | { status: "unavailable"; reason: string };

export interface MetricsAggregatorDeps {
  reports: Pick<ReportStore, "scan">;
  cache: TtlLruCache<string, KpiSnapshot>;
  /** null when no AI provider is configured */
  narrator: Narrator | null;
  options: AggregatorOptions;
  clock?: () => Date;
  logger?: Logger;
}

export function cacheKey(query: SnapshotQuery): string {
  return JSON.stringify([
    query.range,
    query.filters.status,
    query.filters.category ?? null,
    query.analyzeAi,
  ]);
}

export function statusesFor(filter: StatusFilter): readonly ReportStatusEnum[] | undefined {
  switch (filter) {
    case "all":
      return undefined;
    case "open":
      return OPEN_STATUSES;
    case "finished":
      return FINISHED_STATUSES;
    default:
      return [filter];
  }
}

/** Cache hits hand the same snapshot to every caller, so nothing in it may change. */
export function freezeSnapshot(snapshot: KpiSnapshot): KpiSnapshot {
  Object.freeze(snapshot.priorityDistribution);
  Object.freeze(snapshot.statusDistribution);
  snapshot.topRiskZones.forEach((zone) => Object.freeze(zone));
  Object.freeze(snapshot.topRiskZones);
  snapshot.dailyTrend.forEach((day) => Object.freeze(day));
  Object.freeze(snapshot.dailyTrend);
  Object.freeze(snapshot.range);
  Object.freeze(snapshot.filters);
  return Object.freeze(snapshot);
}

/**
 * Dashboard KPIs with memoisation. Cache writes happen only once a snapshot
 * is complete, so an abandoned request never leaves a partial entry behind;
 * two concurrent misses on one key may both compute.
 */
export class MetricsAggregator {
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: MetricsAggregatorDeps) {
    this.log = deps.logger ?? moduleLogger("metrics");
    this.clock = deps.clock ?? (() => new Date());
  }

  async snapshot(query: SnapshotQuery): Promise<KpiSnapshot> {
    const key = cacheKey(query);
    const cached = this.deps.cache.get(key);
    if (cached) {
      this.log.debug({ key }, "kpi cache hit");
      return cached;
    }

    const now = this.clock();
    const bounds = rangeBounds(query.range, now);
    const population = await this.scan({
      from: bounds.from,
      to: bounds.to,
      statuses: statusesFor(query.filters.status),
      category: query.filters.category,
    });

    const figures = computeKpis(population, {
      now,
      geoPrecision: this.deps.options.geoPrecision,
      topZones: this.deps.options.topZones,
    });
    const base = {
      ...figures,
      range: describeRange(query.range, bounds),
      filters: { ...query.filters },
      generatedAt: now.toISOString(),
    };

    let narrative: string | null = null;
    let narrativeStatus: NarrativeStatus = "not_requested";
    if (query.analyzeAi) {
      const outcome = await this.narrate(base);
      if (outcome.status === "generated") {
        narrative = outcome.text;
        narrativeStatus = "generated";
      } else {
        narrativeStatus = "unavailable";
        this.log.warn({ key, reason: outcome.reason }, "serving kpis without narrative");
      }
    }

    const snapshot = freezeSnapshot({ ...base, narrative, narrativeStatus });
    this.deps.cache.set(key, snapshot);
    this.log.info({ key, total: snapshot.totalCount, narrativeStatus }, "kpi snapshot computed");
    return snapshot;
  }

  private async scan(query: ReportQuery): Promise<ReportRecord[]> {
    try {
      return await this.deps.reports.scan(query);
    } catch (error) {
      this.log.error({ err: error }, "report scan failed");
      throw new AggregationSourceError(error);
    }
  }

  /** Optional stage: never throws for an unavailable narrator. */
  private async narrate(input: NarrativeInput): Promise<NarrativeOutcome> {
    const narrator = this.deps.narrator;
    if (!narrator) return { status: "unavailable", reason: "no AI provider configured" };
    try {
      return { status: "generated", text: await narrator.summarize(input) };
    } catch (error) {
      if (error instanceof AIUnavailable) return { status: "unavailable", reason: error.reason };
      throw error;
    }
  }
}
