import { z } from "zod";
import { ReportPriorityEnum } from "../../types/enums/reportPriorityEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";

export const nonEmptyString = z.string().trim().min(1);
const note = z.string().trim().max(2000);

export const idParam = z.object({ id: z.string().uuid() });

export const CreateReportSchema = z
  .object({
    category: nonEmptyString.max(80),
    description: nonEmptyString.max(4000),
    location: z.object({
      lat: z.number().min(-90).max(90),
      lon: z.number().min(-180).max(180),
      address: z.string().trim().max(300).optional(),
      city: z.string().trim().max(120).optional(),
    }),
    images: z.array(z.string().url()).max(10).optional(),
    priority: z.nativeEnum(ReportPriorityEnum).optional(),
    anonymous: z.boolean().optional(),
  })
  .strict();

export const TransitionSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("assign"), assigneeId: nonEmptyString, note: note.optional() }).strict(),
  z.object({ action: z.literal("start"), note: note.optional() }).strict(),
  z.object({ action: z.literal("resolve"), note: nonEmptyString.max(2000) }).strict(),
  z.object({ action: z.literal("close"), note: note.optional() }).strict(),
  z
    .object({
      action: z.literal("override"),
      status: z.nativeEnum(ReportStatusEnum),
      assigneeId: nonEmptyString.optional(),
      note: note.optional(),
    })
    .strict(),
]);

export const ReportListQuerySchema = z.object({
  status: z.nativeEnum(ReportStatusEnum).optional(),
  priority: z.nativeEnum(ReportPriorityEnum).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const CommentSchema = z.object({ note: nonEmptyString.max(2000) }).strict();

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

// Group filters ("open", "finished") sit beside the single statuses.
export const MetricsQuerySchema = z.object({
  range: z.enum(["day", "week", "month", "all"]).default("week"),
  status_type: z.union([z.enum(["all", "open", "finished"]), z.nativeEnum(ReportStatusEnum)]).default("all"),
  category: nonEmptyString.max(80).optional(),
  analyze_ai: flag,
});

export const NotificationListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});
