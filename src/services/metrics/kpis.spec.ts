import { ReportRecord } from "../../types/ReportInterface";
import { ReportPriorityEnum } from "../../types/enums/reportPriorityEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";
import { computeKpis, geoBucket, rankZones, ratio } from "./kpis";

const now = new Date("2026-06-10T12:00:00.000Z");
const HOUR = 3600 * 1000;

function report(n: number, patch: Partial<ReportRecord> & { ageHours: number }): ReportRecord {
  const { ageHours, ...rest } = patch;
  const createdAt = new Date(now.getTime() - ageHours * HOUR);
  return {
    id: `r-${n}`,
    creatorId: `reporter-${n}`,
    category: "roads",
    description: "d",
    location: { lat: 0, lon: 0 },
    images: [],
    priority: ReportPriorityEnum.MEDIUM,
    status: ReportStatusEnum.PENDING,
    assigneeId: null,
    createdAt,
    updatedAt: createdAt,
    closedAt: null,
    version: 0,
    ...rest,
  };
}

const A = { lat: 4.6097, lon: -74.0817 };
const B = { lat: 4.6512, lon: -74.0551 };
const C = { lat: 4.5981, lon: -74.076 };
const D = { lat: 4.7, lon: -74.1 };

// Ten reports: four anonymous, three resolved and nothing closed.
const population: ReportRecord[] = [
  report(0, { ageHours: 1, location: A, creatorId: null }),
  report(1, { ageHours: 2, location: A, creatorId: null, priority: ReportPriorityEnum.HIGH }),
  report(2, { ageHours: 3, location: A, creatorId: null }),
  report(3, { ageHours: 4, location: A, creatorId: null }),
  report(4, { ageHours: 5, location: B, images: ["https://img.example.com/1.jpg"] }),
  report(5, { ageHours: 6, location: B, images: ["https://img.example.com/2.jpg"] }),
  report(6, { ageHours: 7, location: C, priority: ReportPriorityEnum.CRITICAL }),
  report(7, { ageHours: 30, location: C, status: ReportStatusEnum.RESOLVED, assigneeId: "h" }),
  report(8, { ageHours: 50, location: D, status: ReportStatusEnum.RESOLVED, assigneeId: "h" }),
  report(9, { ageHours: 200, location: D, status: ReportStatusEnum.RESOLVED, assigneeId: "h" }),
];

const options = { now, geoPrecision: 2, topZones: 3 };

describe("computeKpis", () => {
  const kpis = computeKpis(population, options);

  it("counts closed reports only towards the resolution rate", () => {
    expect(kpis.totalCount).toBe(10);
    expect(kpis.resolutionRate).toBe(0);
    expect(kpis.transparencyRate).toBe(0.4);
  });

  it("counts everything neither resolved nor closed as active", () => {
    expect(kpis.activeCount).toBe(7);
  });

  it("lists every priority and status, zeros included", () => {
    expect(kpis.priorityDistribution).toEqual({ low: 0, medium: 8, high: 1, critical: 1 });
    expect(kpis.statusDistribution).toEqual({ pending: 7, assigned: 0, in_progress: 0, resolved: 3, closed: 0 });
  });

  it("ranks risk zones by count, then bucket id", () => {
    expect(kpis.topRiskZones).toEqual([
      { bucket: "4.61,-74.08", lat: 4.61, lon: -74.08, count: 4 },
      { bucket: "4.60,-74.08", lat: 4.6, lon: -74.08, count: 2 },
      { bucket: "4.65,-74.06", lat: 4.65, lon: -74.06, count: 2 },
    ]);
  });

  it("derives the dashboard extras", () => {
    expect(kpis.evidenceRate).toBe(0.2);
    expect(kpis.averageOpenAgeHours).toBe(4);
    expect(kpis.alertLevel).toBe("normal");
    expect(kpis.dailyTrend).toEqual([
      { date: "2026-06-04", count: 0 },
      { date: "2026-06-05", count: 0 },
      { date: "2026-06-06", count: 0 },
      { date: "2026-06-07", count: 0 },
      { date: "2026-06-08", count: 1 },
      { date: "2026-06-09", count: 1 },
      { date: "2026-06-10", count: 7 },
    ]);
  });

  it("raises the alert once open reports average more than a day", () => {
    const stale = computeKpis([report(0, { ageHours: 20 }), report(1, { ageHours: 30 })], options);
    expect(stale.averageOpenAgeHours).toBe(25);
    expect(stale.alertLevel).toBe("critical");
  });

  it("returns zeros for an empty population", () => {
    const empty = computeKpis([], options);
    expect(empty).toMatchObject({
      totalCount: 0,
      activeCount: 0,
      resolutionRate: 0,
      transparencyRate: 0,
      evidenceRate: 0,
      averageOpenAgeHours: 0,
      alertLevel: "normal",
      topRiskZones: [],
    });
    expect(empty.priorityDistribution).toEqual({ low: 0, medium: 0, high: 0, critical: 0 });
    expect(empty.dailyTrend).toHaveLength(7);
  });

  it("returns fewer zones than requested without padding", () => {
    expect(computeKpis([report(0, { ageHours: 1, location: A })], options).topRiskZones).toHaveLength(1);
  });
});

describe("kpi helpers", () => {
  it("rounds rates to four decimals", () => {
    expect(ratio(1, 3)).toBe(0.3333);
    expect(ratio(2, 3)).toBe(0.6667);
    expect(ratio(5, 0)).toBe(0);
  });

  it("buckets coordinates at the configured precision", () => {
    expect(geoBucket(4.6097, -74.0817, 1)).toEqual({ bucket: "4.6,-74.1", lat: 4.6, lon: -74.1 });
    expect(geoBucket(4.6097, -74.0817, 3)).toEqual({ bucket: "4.610,-74.082", lat: 4.61, lon: -74.082 });
  });

  it("breaks ties by bucket id ascending", () => {
    const zones = [
      { bucket: "b", lat: 0, lon: 0, count: 1 },
      { bucket: "a", lat: 0, lon: 0, count: 1 },
      { bucket: "c", lat: 0, lon: 0, count: 2 },
    ];
    expect(rankZones(zones, 3).map((z) => z.bucket)).toEqual(["c", "a", "b"]);
  });
});
