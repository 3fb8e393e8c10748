import { setTimeout as delay } from "timers/promises";
import { FailedDelivery, NotificationEvent } from "../../types/NotificationInterface";
import { Logger, moduleLogger } from "../../observability/logging";
import { ChannelDeliveryFailed } from "../errors";
import { FailedDeliveryStore, UserDirectory } from "../stores";
import { ChannelQueue, DeliveryTask } from "./channelQueue";
import { DeliveryOutcome, NotificationChannel, failed } from "./channels/types";
import { needsAdministrators, resolveRecipients } from "./recipients";

export interface DispatcherOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  queueCapacity: number;
  concurrency: number;
}

export interface DispatchResult {
  eventId: string;
  accepted: boolean;
  channels: string[];
}

/** What the state machine needs: hand over an event, get control back at once. */
export interface EventSink {
  dispatch(event: NotificationEvent): DispatchResult;
}

/** `unknown_channel` is permanent; `queue_full` may clear by the next sweep. */
export type RedeliveryResult = "queued" | "unknown_channel" | "queue_full";

export interface DispatcherDeps {
  channels: NotificationChannel[];
  directory: Pick<UserDirectory, "listAdministratorIds">;
  failures: FailedDeliveryStore;
  options: DispatcherOptions;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function backoffDelay(attempt: number, options: Pick<DispatcherOptions, "baseDelayMs" | "maxDelayMs">): number {
  return Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
}

interface ChannelEntry {
  channel: NotificationChannel;
  queue: ChannelQueue;
}

export class NotificationDispatcher implements EventSink {
  private readonly entries = new Map<string, ChannelEntry>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: DispatcherDeps) {
    this.log = deps.logger ?? moduleLogger("dispatcher");
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    for (const channel of deps.channels) {
      if (this.entries.has(channel.name)) throw new Error(`Duplicate notification channel "${channel.name}"`);
      const queue = new ChannelQueue(
        deps.options.queueCapacity,
        deps.options.concurrency,
        (task) => this.deliver(channel, task),
        (error, task) => this.log.error({ err: error, channel: channel.name, eventId: task.eventId }, "delivery worker crashed")
      );
      this.entries.set(channel.name, { channel, queue });
    }
  }

  get channelNames(): string[] {
    return [...this.entries.keys()];
  }

  dispatch(event: NotificationEvent): DispatchResult {
    if (this.entries.size === 0) {
      this.log.warn({ eventId: event.id }, "no notification channels configured");
      return { eventId: event.id, accepted: false, channels: [] };
    }
    this.track(
      this.fanOut(event).catch((error) =>
        this.log.error({ err: error, eventId: event.id }, "notification fan-out failed")
      )
    );
    return { eventId: event.id, accepted: true, channels: this.channelNames };
  }

  /** Puts a recorded failure back on its channel queue for another round. */
  redeliver(failure: FailedDelivery): RedeliveryResult {
    const entry = this.entries.get(failure.channel);
    if (!entry) return "unknown_channel";
    const accepted = entry.queue.offer({
      eventId: failure.eventId,
      reportId: failure.reportId,
      kind: failure.kind,
      recipientId: failure.recipientId,
      payload: failure.payload,
      round: failure.rounds + 1,
    });
    return accepted ? "queued" : "queue_full";
  }

  /** Resolves once every fan-out and queued delivery has finished. */
  async drain(): Promise<void> {
    for (;;) {
      const busy: Promise<void>[] = [...this.inflight];
      for (const { queue } of this.entries.values()) {
        if (!queue.isIdle) busy.push(queue.idle());
      }
      if (busy.length === 0) return;
      await Promise.all(busy);
    }
  }

  private track(job: Promise<void>) {
    this.inflight.add(job);
    void job.finally(() => this.inflight.delete(job));
  }

  private async fanOut(event: NotificationEvent): Promise<void> {
    const administrators = needsAdministrators(event.kind) ? await this.administrators(event) : [];
    const recipients = resolveRecipients(event.kind, event.audience, administrators);
    this.log.debug({ eventId: event.id, kind: event.kind, recipients: recipients.length }, "fanning out notification");

    for (const { channel, queue } of this.entries.values()) {
      for (const recipientId of recipients) {
        const task: DeliveryTask = {
          eventId: event.id,
          reportId: event.reportId,
          kind: event.kind,
          recipientId,
          payload: event.payload,
          round: 0,
        };
        if (!queue.offer(task)) {
          this.log.warn({ channel: channel.name, eventId: event.id }, "delivery queue full");
          await this.record(channel.name, task, 0, "delivery queue full");
        }
      }
    }
  }

  private async administrators(event: NotificationEvent): Promise<string[]> {
    try {
      return await this.deps.directory.listAdministratorIds();
    } catch (error) {
      this.log.error({ err: error, eventId: event.id }, "could not list administrators; notifying remaining recipients");
      return [];
    }
  }

  private async deliver(channel: NotificationChannel, task: DeliveryTask): Promise<void> {
    const { maxAttempts } = this.deps.options;
    let attempts = 0;
    let lastError = "unknown error";

    while (attempts < maxAttempts) {
      attempts++;
      const outcome = await this.attempt(channel, task);
      if (outcome.ok) {
        this.log.debug({ channel: channel.name, eventId: task.eventId, attempts, skipped: outcome.skipped === true }, "delivered");
        return;
      }
      lastError = outcome.error;
      if (!outcome.retryable) break;
      if (attempts < maxAttempts) await this.sleep(backoffDelay(attempts, this.deps.options));
    }

    const failure = new ChannelDeliveryFailed(channel.name, task.recipientId, attempts, lastError);
    this.log.warn({ err: failure, eventId: task.eventId, round: task.round }, "notification delivery failed");
    await this.record(channel.name, task, attempts, lastError);
  }

  private async attempt(channel: NotificationChannel, task: DeliveryTask): Promise<DeliveryOutcome> {
    try {
      return await channel.send(task.recipientId, task.payload, {
        eventId: task.eventId,
        reportId: task.reportId,
        kind: task.kind,
      });
    } catch (error) {
      return failed(error);
    }
  }

  private async record(channel: string, task: DeliveryTask, attempts: number, lastError: string): Promise<void> {
    try {
      await this.deps.failures.record({
        eventId: task.eventId,
        reportId: task.reportId,
        kind: task.kind,
        channel,
        recipientId: task.recipientId,
        payload: task.payload,
        attempts,
        rounds: task.round,
        lastError,
      });
    } catch (error) {
      this.log.error({ err: error, channel, eventId: task.eventId }, "could not record failed delivery");
    }
  }
}
