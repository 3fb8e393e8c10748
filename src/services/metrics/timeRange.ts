import { subDays, subHours } from "date-fns";
import { RangePreset, ResolvedRange } from "../../types/KpiInterface";

export interface RangeBounds {
  from?: Date;
  to: Date;
}

export function rangeBounds(preset: RangePreset, now: Date): RangeBounds {
  switch (preset) {
    case "day":
      return { from: subHours(now, 24), to: now };
    case "week":
      return { from: subDays(now, 7), to: now };
    case "month":
      return { from: subDays(now, 30), to: now };
    case "all":
      return { to: now };
  }
}

export function describeRange(preset: RangePreset, bounds: RangeBounds): ResolvedRange {
  return { preset, from: bounds.from ? bounds.from.toISOString() : null, to: bounds.to.toISOString() };
}

export const dateKey = (date: Date) => date.toISOString().slice(0, 10);
