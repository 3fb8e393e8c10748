import { subDays } from "date-fns";
import { AlertLevel, KpiFigures, RiskZone } from "../../types/KpiInterface";
import { ReportRecord } from "../../types/ReportInterface";
import { ReportPriorityEnum } from "../../types/enums/reportPriorityEnum";
import { FINISHED_STATUSES, ReportStatusEnum } from "../../types/enums/reportStatusEnum";
import { dateKey } from "./timeRange";

export interface KpiOptions {
  now: Date;
  /** decimal places kept when bucketing coordinates */
  geoPrecision: number;
  topZones: number;
  trendDays?: number;
  criticalOpenAgeHours?: number;
}

const HOUR_MS = 60 * 60 * 1000;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function ratio(part: number, total: number): number {
  return total === 0 ? 0 : roundTo(part / total, 4);
}

export function geoBucket(lat: number, lon: number, precision: number): Omit<RiskZone, "count"> {
  const bucketLat = roundTo(lat, precision);
  const bucketLon = roundTo(lon, precision);
  return { bucket: `${bucketLat.toFixed(precision)},${bucketLon.toFixed(precision)}`, lat: bucketLat, lon: bucketLon };
}

export function rankZones(zones: Iterable<RiskZone>, limit: number): RiskZone[] {
  return [...zones]
    .sort((a, b) => b.count - a.count || (a.bucket < b.bucket ? -1 : a.bucket > b.bucket ? 1 : 0))
    .slice(0, limit);
}

const emptyPriorities = (): Record<ReportPriorityEnum, number> => ({
  [ReportPriorityEnum.LOW]: 0,
  [ReportPriorityEnum.MEDIUM]: 0,
  [ReportPriorityEnum.HIGH]: 0,
  [ReportPriorityEnum.CRITICAL]: 0,
});

const emptyStatuses = (): Record<ReportStatusEnum, number> => ({
  [ReportStatusEnum.PENDING]: 0,
  [ReportStatusEnum.ASSIGNED]: 0,
  [ReportStatusEnum.IN_PROGRESS]: 0,
  [ReportStatusEnum.RESOLVED]: 0,
  [ReportStatusEnum.CLOSED]: 0,
});

/** One pass over an already-filtered population. */
export function computeKpis(reports: readonly ReportRecord[], options: KpiOptions): KpiFigures {
  const trendDays = options.trendDays ?? 7;
  const criticalAge = options.criticalOpenAgeHours ?? 24;
  const priorityDistribution = emptyPriorities();
  const statusDistribution = emptyStatuses();
  const zones = new Map<string, RiskZone>();

  const trend = new Map<string, number>();
  for (let i = trendDays - 1; i >= 0; i--) trend.set(dateKey(subDays(options.now, i)), 0);

  let closed = 0;
  let active = 0;
  let anonymous = 0;
  let withImages = 0;
  let openAgeHours = 0;

  for (const report of reports) {
    priorityDistribution[report.priority]++;
    statusDistribution[report.status]++;
    if (report.status === ReportStatusEnum.CLOSED) closed++;
    if (!FINISHED_STATUSES.includes(report.status)) {
      active++;
      openAgeHours += Math.max(0, options.now.getTime() - report.createdAt.getTime()) / HOUR_MS;
    }
    if (report.creatorId === null) anonymous++;
    if (report.images.length > 0) withImages++;

    const zone = geoBucket(report.location.lat, report.location.lon, options.geoPrecision);
    const known = zones.get(zone.bucket);
    if (known) known.count++;
    else zones.set(zone.bucket, { ...zone, count: 1 });

    const day = dateKey(report.createdAt);
    const seen = trend.get(day);
    if (seen !== undefined) trend.set(day, seen + 1);
  }

  const averageOpenAgeHours = active === 0 ? 0 : roundTo(openAgeHours / active, 1);
  const alertLevel: AlertLevel = averageOpenAgeHours > criticalAge ? "critical" : "normal";

  return {
    totalCount: reports.length,
    activeCount: active,
    resolutionRate: ratio(closed, reports.length),
    priorityDistribution,
    topRiskZones: rankZones(zones.values(), options.topZones),
    transparencyRate: ratio(anonymous, reports.length),
    statusDistribution,
    evidenceRate: ratio(withImages, reports.length),
    averageOpenAgeHours,
    alertLevel,
    dailyTrend: [...trend.entries()].map(([date, count]) => ({ date, count })),
  };
}
