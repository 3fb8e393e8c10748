import { ReportPriorityEnum } from "./enums/reportPriorityEnum";
import { ReportStatusEnum } from "./enums/reportStatusEnum";

export type RangePreset = "day" | "week" | "month" | "all";

export type StatusFilter = "all" | "open" | "finished" | ReportStatusEnum;

export interface KpiFilters {
  status: StatusFilter;
  category?: string;
}

export interface ResolvedRange {
  preset: RangePreset;
  from: string | null;
  to: string;
}

export interface RiskZone {
  bucket: string;
  lat: number;
  lon: number;
  count: number;
}

export interface DailyCount {
  date: string;
  count: number;
}

export type AlertLevel = "normal" | "critical";

export type NarrativeStatus = "generated" | "unavailable" | "not_requested";

export interface KpiFigures {
  totalCount: number;
  activeCount: number;
  resolutionRate: number;
  priorityDistribution: Record<ReportPriorityEnum, number>;
  topRiskZones: RiskZone[];
  transparencyRate: number;
  statusDistribution: Record<ReportStatusEnum, number>;
  evidenceRate: number;
  averageOpenAgeHours: number;
  alertLevel: AlertLevel;
  dailyTrend: DailyCount[];
}

export interface KpiSnapshot extends KpiFigures {
  range: ResolvedRange;
  filters: KpiFilters;
  generatedAt: string;
  narrative: string | null;
  narrativeStatus: NarrativeStatus;
}
