import "dotenv/config";
import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { User } from "../src/app/Models/User";
import { loadConfig } from "../src/config";
import { logger } from "../src/observability/logging";
import { mongoStores } from "../src/services";
import { CaseLedger } from "../src/services/ledger/caseLedger";
import { ReportStateMachine, TransitionCommand } from "../src/services/reports/reportStateMachine";
import { EventSink } from "../src/services/notifications/dispatcher";
import { ReportPriorityEnum } from "../src/types/enums/reportPriorityEnum";
import { ReportStatusEnum } from "../src/types/enums/reportStatusEnum";
import { UserRoleEnum } from "../src/types/enums/userRoleEnum";
import { connectDatabase, disconnectDatabase } from "../src/utils/dbConnection";

const SeedSchema = z.object({
  users: z.array(
    z.object({
      id: z.string().uuid(),
      name: z.string(),
      email: z.string().email().nullable(),
      phone: z.string().nullable(),
      role: z.nativeEnum(UserRoleEnum),
    })
  ),
  reports: z.array(
    z.object({
      category: z.string(),
      description: z.string(),
      lat: z.number(),
      lon: z.number(),
      priority: z.nativeEnum(ReportPriorityEnum),
      anonymous: z.boolean(),
      ageHours: z.number().nonnegative(),
      walk: z.nativeEnum(ReportStatusEnum),
    })
  ),
});

// Seeded data should not page anybody.
const silentEvents: EventSink = {
  dispatch: (event) => ({ eventId: event.id, accepted: false, channels: [] }),
};

const WALK: TransitionCommand[] = [
  { action: "assign", assigneeId: "" },
  { action: "start" },
  { action: "resolve", note: "Fixed on site" },
  { action: "close" },
];
const ORDER = [
  ReportStatusEnum.PENDING,
  ReportStatusEnum.ASSIGNED,
  ReportStatusEnum.IN_PROGRESS,
  ReportStatusEnum.RESOLVED,
  ReportStatusEnum.CLOSED,
];

async function run() {
  const config = loadConfig();
  const seed = SeedSchema.parse(JSON.parse(readFileSync(path.join(__dirname, "data", "seed.json"), "utf8")));
  await connectDatabase(config.dbUrl);

  for (const user of seed.users) {
    await User.updateOne(
      { _id: user.id },
      { $set: { name: user.name, email: user.email, phone: user.phone, role: user.role, isActive: true } },
      { upsert: true }
    );
  }

  const admin = seed.users.find((u) => u.role === UserRoleEnum.ADMIN);
  const handler = seed.users.find((u) => u.role === UserRoleEnum.HANDLER);
  const reporter = seed.users.find((u) => u.role === UserRoleEnum.REPORTER);
  if (!admin || !handler || !reporter) throw new Error("seed.json needs an admin, a handler and a reporter");

  const stores = mongoStores();
  const now = Date.now();
  let createdAt = new Date(now);
  const machine = new ReportStateMachine({
    reports: stores.reports,
    ledger: new CaseLedger(stores.caseUpdates),
    directory: stores.users,
    events: silentEvents,
    clock: () => createdAt,
  });

  for (const item of seed.reports) {
    createdAt = new Date(now - item.ageHours * 3600 * 1000);
    const report = await machine.create(
      { id: reporter.id, role: reporter.role },
      {
        category: item.category,
        description: item.description,
        location: { lat: item.lat, lon: item.lon },
        priority: item.priority,
        anonymous: item.anonymous,
      }
    );
    const steps = ORDER.indexOf(item.walk);
    for (let i = 0; i < steps; i++) {
      createdAt = new Date(createdAt.getTime() + 60_000);
      const step = WALK[i];
      const command = step.action === "assign" ? { ...step, assigneeId: handler.id } : step;
      const actor = step.action === "start" || step.action === "resolve" ? handler : admin;
      await machine.transition({ id: actor.id, role: actor.role }, report.id, command);
    }
    logger.info({ reportId: report.id, status: item.walk }, "seeded report");
  }

  await disconnectDatabase();
}

run().catch((err) => {
  logger.fatal({ err }, "seed failed");
  process.exit(1);
});
