import { memoryStores, user } from "../../tests/memoryStores";
import { NotificationPayload } from "../../types/NotificationInterface";
import { ReportRecord } from "../../types/ReportInterface";
import { NotificationKindEnum } from "../../types/enums/notificationKindEnum";
import { ReportPriorityEnum } from "../../types/enums/reportPriorityEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";
import { UserRoleEnum } from "../../types/enums/userRoleEnum";
import { DeliveryOutcome, NotificationChannel, delivered, failed } from "./channels/types";
import { DispatcherOptions, NotificationDispatcher, backoffDelay } from "./dispatcher";
import { buildEvent } from "./messages";

class FakeChannel implements NotificationChannel {
  readonly calls: Array<{ recipientId: string; payload: NotificationPayload }> = [];

  constructor(
    readonly name: string,
    private readonly behaviour: (recipientId: string) => Promise<DeliveryOutcome> = async () => delivered()
  ) {}

  async send(recipientId: string, payload: NotificationPayload): Promise<DeliveryOutcome> {
    this.calls.push({ recipientId, payload });
    return this.behaviour(recipientId);
  }
}

const report: ReportRecord = {
  id: "r-1",
  creatorId: "reporter-1",
  category: "roads",
  description: "Pothole",
  location: { lat: 1, lon: 2 },
  images: [],
  priority: ReportPriorityEnum.HIGH,
  status: ReportStatusEnum.PENDING,
  assigneeId: null,
  createdAt: new Date("2026-02-01T08:00:00Z"),
  updatedAt: new Date("2026-02-01T08:00:00Z"),
  closedAt: null,
  version: 0,
};

const options: DispatcherOptions = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 250,
  queueCapacity: 10,
  concurrency: 2,
};

const created = (creatorId: string | null = "reporter-1") =>
  buildEvent(NotificationKindEnum.REPORT_CREATED, report, { creatorId, assigneeId: null }, null, report.createdAt);

function setup(channels: NotificationChannel[], overrides: Partial<DispatcherOptions> = {}) {
  const stores = memoryStores([
    user("admin-1", UserRoleEnum.ADMIN),
    user("admin-2", UserRoleEnum.ADMIN),
    user("reporter-1", UserRoleEnum.REPORTER),
  ]);
  const delays: number[] = [];
  const dispatcher = new NotificationDispatcher({
    channels,
    directory: stores.users,
    failures: stores.failures,
    options: { ...options, ...overrides },
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  return { stores, delays, dispatcher };
}

describe("backoffDelay", () => {
  it("doubles from the base and stops at the cap", () => {
    expect([1, 2, 3, 4].map((a) => backoffDelay(a, options))).toEqual([100, 200, 250, 250]);
  });
});

describe("NotificationDispatcher", () => {
  it("returns at once and then fans out to every channel and recipient", async () => {
    const push = new FakeChannel("push");
    const inbox = new FakeChannel("in_app");
    const { dispatcher } = setup([inbox, push]);
    const event = created();

    const result = dispatcher.dispatch(event);
    expect(result).toEqual({ eventId: event.id, accepted: true, channels: ["in_app", "push"] });
    expect(push.calls).toHaveLength(0);

    await dispatcher.drain();
    expect(inbox.calls.map((c) => c.recipientId)).toEqual(["reporter-1", "admin-1", "admin-2"]);
    expect(push.calls.map((c) => c.recipientId)).toEqual(["reporter-1", "admin-1", "admin-2"]);
    expect(push.calls[0].payload.data).toEqual({ reportId: "r-1", kind: "report_created", status: "pending" });
  });

  it("retries a failing channel maxAttempts times, records it once and still delivers elsewhere", async () => {
    const sms = new FakeChannel("sms", async () => failed(new Error("gateway down")));
    const inbox = new FakeChannel("in_app");
    const { dispatcher, stores, delays } = setup([inbox, sms]);

    dispatcher.dispatch(created(null));
    await dispatcher.drain();

    // Two administrators, three attempts each.
    expect(sms.calls).toHaveLength(6);
    expect(inbox.calls).toHaveLength(2);
    // Both recipients back off concurrently.
    expect([...delays].sort((a, b) => a - b)).toEqual([100, 100, 200, 200]);
    expect(stores.failures.rows).toHaveLength(2);
    expect(stores.failures.rows.find((r) => r.recipientId === "admin-1")).toMatchObject({
      channel: "sms",
      recipientId: "admin-1",
      attempts: 3,
      rounds: 0,
      lastError: "gateway down",
      status: "pending",
    });
  });

  it("stops at the first non-retryable failure", async () => {
    const push = new FakeChannel("push", async () => failed(new Error("token revoked"), false));
    const { dispatcher, stores, delays } = setup([push]);

    dispatcher.dispatch(
      buildEvent(NotificationKindEnum.STATUS_CHANGED, report, { creatorId: "reporter-1", assigneeId: null }, null, new Date())
    );
    await dispatcher.drain();

    expect(push.calls).toHaveLength(1);
    expect(delays).toEqual([]);
    expect(stores.failures.rows[0].attempts).toBe(1);
  });

  it("treats a throwing channel as a retryable failure", async () => {
    const email = new FakeChannel("email", async () => {
      throw new Error("smtp timeout");
    });
    const { dispatcher, stores } = setup([email]);

    dispatcher.dispatch(
      buildEvent(NotificationKindEnum.STATUS_CHANGED, report, { creatorId: "reporter-1", assigneeId: null }, null, new Date())
    );
    await dispatcher.drain();

    expect(email.calls).toHaveLength(3);
    expect(stores.failures.rows[0].lastError).toBe("smtp timeout");
  });

  it("recovers when a later attempt succeeds", async () => {
    let calls = 0;
    const push = new FakeChannel("push", async () => (++calls < 2 ? failed("flaky") : delivered()));
    const { dispatcher, stores } = setup([push]);

    dispatcher.dispatch(
      buildEvent(NotificationKindEnum.STATUS_CHANGED, report, { creatorId: "reporter-1", assigneeId: null }, null, new Date())
    );
    await dispatcher.drain();

    expect(push.calls).toHaveLength(2);
    expect(stores.failures.rows).toHaveLength(0);
  });

  it("still notifies the creator when administrators cannot be listed", async () => {
    const inbox = new FakeChannel("in_app");
    const { dispatcher, stores } = setup([inbox]);
    stores.users.listError = new Error("directory offline");

    dispatcher.dispatch(created());
    await dispatcher.drain();

    expect(inbox.calls.map((c) => c.recipientId)).toEqual(["reporter-1"]);
  });

  it("records tasks that do not fit in a full queue", async () => {
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => (open = resolve));
    const push = new FakeChannel("push", async () => {
      await gate;
      return delivered();
    });
    const { dispatcher, stores } = setup([push], { queueCapacity: 1, concurrency: 1 });

    dispatcher.dispatch(created());
    // Let the fan-out look up administrators and fill the queue.
    await new Promise<void>((resolve) => setImmediate(resolve));
    open();
    await dispatcher.drain();

    expect(push.calls.map((c) => c.recipientId)).toEqual(["reporter-1", "admin-1"]);
    expect(stores.failures.rows).toHaveLength(1);
    expect(stores.failures.rows[0]).toMatchObject({
      recipientId: "admin-2",
      attempts: 0,
      lastError: "delivery queue full",
    });
  });

  it("does not accept events without channels", () => {
    const { dispatcher } = setup([]);
    expect(dispatcher.dispatch(created()).accepted).toBe(false);
  });

  it("rejects two channels with the same name", () => {
    expect(() => setup([new FakeChannel("push"), new FakeChannel("push")])).toThrow(
      'Duplicate notification channel "push"'
    );
  });

  it("puts a recorded failure back on its channel for another round", async () => {
    let fail = true;
    const sms = new FakeChannel("sms", async () => (fail ? failed("down") : delivered()));
    const { dispatcher, stores } = setup([sms]);

    dispatcher.dispatch(
      buildEvent(NotificationKindEnum.STATUS_CHANGED, report, { creatorId: "reporter-1", assigneeId: null }, null, new Date())
    );
    await dispatcher.drain();
    const [failure] = stores.failures.rows;

    fail = false;
    expect(dispatcher.redeliver(failure)).toBe("queued");
    await dispatcher.drain();
    expect(sms.calls).toHaveLength(4);
    expect(stores.failures.rows).toHaveLength(1);

    expect(dispatcher.redeliver({ ...failure, channel: "fax" })).toBe("unknown_channel");
  });
});
