export enum ReportPriorityEnum {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

export const REPORT_PRIORITIES: readonly ReportPriorityEnum[] = Object.values(ReportPriorityEnum);
