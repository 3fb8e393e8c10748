import { KpiSnapshot } from "../../types/KpiInterface";
import { ReportRecord } from "../../types/ReportInterface";
import { ReportPriorityEnum } from "../../types/enums/reportPriorityEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";
import { MemoryReportStore } from "../../tests/memoryStores";
import { CompletionProvider } from "../ai/completionProvider";
import { NarrativeService } from "../ai/narrativeService";
import { AIUnavailable, AggregationSourceError } from "../errors";
import { MetricsAggregator, Narrator, SnapshotQuery, cacheKey, statusesFor } from "./metricsAggregator";
import { TtlLruCache } from "./ttlLruCache";

const NOW = new Date("2026-06-10T12:00:00.000Z");
const HOUR = 3600 * 1000;

function report(id: string, ageHours: number, status: ReportStatusEnum, category = "roads"): ReportRecord {
  const createdAt = new Date(NOW.getTime() - ageHours * HOUR);
  return {
    id,
    creatorId: "reporter",
    category,
    description: "d",
    location: { lat: 10, lon: 20 },
    images: [],
    priority: ReportPriorityEnum.MEDIUM,
    status,
    assigneeId: null,
    createdAt,
    updatedAt: createdAt,
    closedAt: null,
    version: 0,
  };
}

function query(patch: Partial<SnapshotQuery> = {}): SnapshotQuery {
  return { range: "all", filters: { status: "all" }, analyzeAi: false, ...patch };
}

async function setup(narrator: Narrator | null = null) {
  let cacheNow = 0;
  const reports = new MemoryReportStore();
  await reports.insert(report("p1", 1, ReportStatusEnum.PENDING));
  await reports.insert(report("p2", 2, ReportStatusEnum.IN_PROGRESS));
  await reports.insert(report("r1", 30, ReportStatusEnum.RESOLVED));
  await reports.insert(report("c1", 200, ReportStatusEnum.CLOSED, "lighting"));
  const aggregator = new MetricsAggregator({
    reports,
    cache: new TtlLruCache<string, KpiSnapshot>({ maxEntries: 8, ttlMs: 60_000, now: () => cacheNow }),
    narrator,
    options: { geoPrecision: 2, topZones: 5 },
    clock: () => NOW,
  });
  return { reports, aggregator, expire: () => (cacheNow += 60_000) };
}

describe("statusesFor", () => {
  it("maps the status filter onto concrete statuses", () => {
    expect(statusesFor("all")).toBeUndefined();
    expect(statusesFor("open")).toEqual(["pending", "assigned", "in_progress"]);
    expect(statusesFor("finished")).toEqual(["resolved", "closed"]);
    expect(statusesFor(ReportStatusEnum.ASSIGNED)).toEqual(["assigned"]);
  });
});

describe("cacheKey", () => {
  it("distinguishes every query dimension", () => {
    const keys = new Set([
      cacheKey(query()),
      cacheKey(query({ range: "week" })),
      cacheKey(query({ filters: { status: "open" } })),
      cacheKey(query({ filters: { status: "all", category: "roads" } })),
      cacheKey(query({ analyzeAi: true })),
    ]);
    expect(keys.size).toBe(5);
  });
});

describe("MetricsAggregator", () => {
  it("computes a snapshot and serves repeats from the cache", async () => {
    const { reports, aggregator } = await setup();
    const first = await aggregator.snapshot(query());
    expect(first).toMatchObject({
      totalCount: 4,
      activeCount: 2,
      resolutionRate: 0.25,
      range: { preset: "all", from: null, to: "2026-06-10T12:00:00.000Z" },
      filters: { status: "all" },
      generatedAt: "2026-06-10T12:00:00.000Z",
      narrative: null,
      narrativeStatus: "not_requested",
    });
    const second = await aggregator.snapshot(query());
    expect(second).toBe(first);
    expect(reports.scanCalls).toBe(1);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("freezes the nested figures of a cached snapshot", async () => {
    const { aggregator } = await setup();
    const first = await aggregator.snapshot(query());
    expect(Object.isFrozen(first.priorityDistribution)).toBe(true);
    expect(Object.isFrozen(first.statusDistribution)).toBe(true);
    expect(Object.isFrozen(first.topRiskZones)).toBe(true);
    expect(Object.isFrozen(first.topRiskZones[0])).toBe(true);
    expect(Object.isFrozen(first.dailyTrend)).toBe(true);
    expect(Object.isFrozen(first.range)).toBe(true);
    expect(() => {
      first.priorityDistribution.low = 5;
    }).toThrow(TypeError);

    const again = await aggregator.snapshot(query());
    expect(again.priorityDistribution.low).toBe(0);
  });

  it("recomputes once the cached entry expires", async () => {
    const { reports, aggregator, expire } = await setup();
    await aggregator.snapshot(query());
    expire();
    await aggregator.snapshot(query());
    expect(reports.scanCalls).toBe(2);
  });

  it.each([
    ["open", 2],
    ["finished", 2],
    [ReportStatusEnum.RESOLVED, 1],
    [ReportStatusEnum.CLOSED, 1],
  ] as const)("narrows the population for status %s", async (status, total) => {
    const { aggregator } = await setup();
    const snapshot = await aggregator.snapshot(query({ filters: { status } }));
    expect(snapshot.totalCount).toBe(total);
  });

  it("narrows by range and category", async () => {
    const { aggregator } = await setup();
    expect((await aggregator.snapshot(query({ range: "day" }))).totalCount).toBe(2);
    expect((await aggregator.snapshot(query({ range: "week" }))).totalCount).toBe(3);
    const lighting = await aggregator.snapshot(query({ filters: { status: "all", category: "lighting" } }));
    expect(lighting.totalCount).toBe(1);
    expect(lighting.resolutionRate).toBe(1);
  });

  it("wraps scan failures and caches nothing", async () => {
    const { reports, aggregator } = await setup();
    reports.scanError = new Error("connection reset");
    await expect(aggregator.snapshot(query())).rejects.toBeInstanceOf(AggregationSourceError);
    reports.scanError = null;
    await aggregator.snapshot(query());
    expect(reports.scanCalls).toBe(2);
  });

  it("attaches the narrative when requested", async () => {
    const narrator = { summarize: jest.fn(async () => "Backlog is stable.") };
    const { aggregator } = await setup(narrator);
    const snapshot = await aggregator.snapshot(query({ analyzeAi: true }));
    expect(snapshot.narrative).toBe("Backlog is stable.");
    expect(snapshot.narrativeStatus).toBe("generated");
    expect(narrator.summarize).toHaveBeenCalledWith(expect.objectContaining({ totalCount: 4, activeCount: 2 }));
  });

  it("does not call the narrator unless asked", async () => {
    const narrator = { summarize: jest.fn(async () => "unused") };
    const { aggregator } = await setup(narrator);
    await aggregator.snapshot(query());
    expect(narrator.summarize).not.toHaveBeenCalled();
  });

  it("serves figures without a narrative when no provider is configured", async () => {
    const { aggregator } = await setup(null);
    const snapshot = await aggregator.snapshot(query({ analyzeAi: true }));
    expect(snapshot.narrative).toBeNull();
    expect(snapshot.narrativeStatus).toBe("unavailable");
    expect(snapshot.totalCount).toBe(4);
  });

  it("caches the narrative-less result when the narrator is unavailable", async () => {
    const narrator = {
      summarize: jest.fn(async (): Promise<string> => {
        throw new AIUnavailable("completion timed out after 50ms", 2);
      }),
    };
    const { reports, aggregator, expire } = await setup(narrator);
    const first = await aggregator.snapshot(query({ analyzeAi: true }));
    const second = await aggregator.snapshot(query({ analyzeAi: true }));
    expect(first.narrativeStatus).toBe("unavailable");
    expect(second).toBe(first);
    expect(narrator.summarize).toHaveBeenCalledTimes(1);
    expect(reports.scanCalls).toBe(1);
    expire();
    await aggregator.snapshot(query({ analyzeAi: true }));
    expect(narrator.summarize).toHaveBeenCalledTimes(2);
  });

  it("propagates unexpected narrator errors", async () => {
    const narrator = {
      summarize: jest.fn(async (): Promise<string> => {
        throw new TypeError("boom");
      }),
    };
    const { aggregator } = await setup(narrator);
    await expect(aggregator.snapshot(query({ analyzeAi: true }))).rejects.toThrow("boom");
  });

  it("degrades when a real narrative service times out", async () => {
    const hanging: CompletionProvider = {
      complete: (_prompt, { signal }) =>
        new Promise<string>((_, reject) => {
          signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    };
    const { aggregator } = await setup(new NarrativeService(hanging, { timeoutMs: 20, maxChars: 200 }));
    const snapshot = await aggregator.snapshot(query({ analyzeAi: true }));
    expect(snapshot.narrative).toBeNull();
    expect(snapshot.narrativeStatus).toBe("unavailable");
    expect(snapshot.totalCount).toBe(4);
  });
});
