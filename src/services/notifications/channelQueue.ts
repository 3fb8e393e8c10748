import { NotificationPayload } from "../../types/NotificationInterface";
import { NotificationKindEnum } from "../../types/enums/notificationKindEnum";

export interface DeliveryTask {
  eventId: string;
  reportId: string;
  kind: NotificationKindEnum;
  recipientId: string;
  payload: NotificationPayload;
  /** 0 for a fresh event, n for the n-th retry round of a recorded failure */
  round: number;
}

/**
 * Bounded FIFO drained by a fixed number of concurrent workers. `offer`
 * refuses tasks once `capacity` tasks are waiting.
 */
export class ChannelQueue {
  private readonly waiting: DeliveryTask[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly capacity: number,
    private readonly concurrency: number,
    private readonly worker: (task: DeliveryTask) => Promise<void>,
    private readonly onCrash: (error: unknown, task: DeliveryTask) => void
  ) {}

  offer(task: DeliveryTask): boolean {
    if (this.waiting.length >= this.capacity) return false;
    this.waiting.push(task);
    this.pump();
    return true;
  }

  get isIdle(): boolean {
    return this.active === 0 && this.waiting.length === 0;
  }

  idle(): Promise<void> {
    if (this.isIdle) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump() {
    while (this.active < this.concurrency) {
      const task = this.waiting.shift();
      if (!task) break;
      this.active++;
      void this.worker(task)
        .catch((error) => this.onCrash(error, task))
        .finally(() => {
          this.active--;
          this.pump();
          if (this.isIdle) {
            const waiters = this.idleWaiters;
            this.idleWaiters = [];
            waiters.forEach((resolve) => resolve());
          }
        });
    }
  }
}
