import cron, { ScheduledTask } from "node-cron";
import { Logger, moduleLogger } from "../observability/logging";
import { NotificationDispatcher } from "../services/notifications/dispatcher";
import { FailedDeliveryStore } from "../services/stores";

export interface DeliveryRetryDeps {
  failures: FailedDeliveryStore;
  dispatcher: Pick<NotificationDispatcher, "redeliver">;
  maxRounds: number;
  batchSize?: number;
  logger?: Logger;
}

export interface DeliveryRetrySummary {
  requeued: number;
  abandoned: number;
  deferred: number;
}

/**
 * One sweep over recorded failures: each goes back on its channel queue
 * until it has been through `maxRounds` retry rounds, then it is abandoned.
 * A failure for a channel that is no longer configured is abandoned at once;
 * one refused by a full queue stays pending but spends a round.
 */
export async function runDeliveryRetry(deps: DeliveryRetryDeps): Promise<DeliveryRetrySummary> {
  const log = deps.logger ?? moduleLogger("delivery-retry");
  const pending = await deps.failures.listPending(deps.batchSize ?? 100);
  const summary: DeliveryRetrySummary = { requeued: 0, abandoned: 0, deferred: 0 };

  for (const failure of pending) {
    if (failure.rounds >= deps.maxRounds) {
      await deps.failures.mark(failure.id, "abandoned");
      summary.abandoned++;
      log.warn({ failureId: failure.id, channel: failure.channel, eventId: failure.eventId }, "delivery abandoned");
      continue;
    }
    const result = deps.dispatcher.redeliver(failure);
    if (result === "unknown_channel") {
      await deps.failures.mark(failure.id, "abandoned");
      summary.abandoned++;
      log.warn({ failureId: failure.id, channel: failure.channel }, "delivery abandoned: channel not configured");
      continue;
    }
    if (result === "queue_full") {
      await deps.failures.spendRound(failure.id);
      summary.deferred++;
      continue;
    }
    await deps.failures.mark(failure.id, "requeued");
    summary.requeued++;
  }

  if (pending.length) log.info(summary, "delivery retry sweep finished");
  return summary;
}

export function startDeliveryRetryJob(deps: DeliveryRetryDeps, schedule: string): ScheduledTask {
  const log = deps.logger ?? moduleLogger("delivery-retry");
  let running = false;
  return cron.schedule(schedule, async () => {
    if (running) return;
    running = true;
    try {
      await runDeliveryRetry(deps);
    } catch (error) {
      log.error({ err: error }, "delivery retry sweep failed");
    } finally {
      running = false;
    }
  });
}
