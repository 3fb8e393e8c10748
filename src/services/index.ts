import nodemailer from "nodemailer";
import { AppConfig } from "../config";
import { Logger, moduleLogger } from "../observability/logging";
import { KpiSnapshot } from "../types/KpiInterface";
import { firebaseMessaging } from "../utils/firebaseConfig";
import { createTwilioClient } from "../utils/twilioClient";
import { CompletionProvider, OpenAICompletionProvider } from "./ai/completionProvider";
import { NarrativeService } from "./ai/narrativeService";
import { CaseLedger } from "./ledger/caseLedger";
import { MetricsAggregator } from "./metrics/metricsAggregator";
import { TtlLruCache } from "./metrics/ttlLruCache";
import { EmailChannel } from "./notifications/channels/emailChannel";
import { InAppChannel } from "./notifications/channels/inAppChannel";
import { PushChannel } from "./notifications/channels/pushChannel";
import { SmsChannel } from "./notifications/channels/smsChannel";
import { NotificationChannel } from "./notifications/channels/types";
import { NotificationDispatcher } from "./notifications/dispatcher";
import {
  MongoCaseUpdateStore,
  MongoFailedDeliveryStore,
  MongoInboxStore,
  MongoReportStore,
  MongoUserDirectory,
} from "./persistence/mongoStores";
import { ReportStateMachine } from "./reports/reportStateMachine";
import { CaseUpdateStore, FailedDeliveryStore, InboxStore, ReportStore, UserDirectory } from "./stores";

export interface Stores {
  reports: ReportStore;
  caseUpdates: CaseUpdateStore;
  users: UserDirectory;
  failures: FailedDeliveryStore;
  inbox: InboxStore;
}

export function mongoStores(): Stores {
  return {
    reports: new MongoReportStore(),
    caseUpdates: new MongoCaseUpdateStore(),
    users: new MongoUserDirectory(),
    failures: new MongoFailedDeliveryStore(),
    inbox: new MongoInboxStore(),
  };
}

export interface ServiceOverrides {
  stores?: Stores;
  channels?: NotificationChannel[];
  /** null disables narratives even when an API key is configured */
  completion?: CompletionProvider | null;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface Services {
  config: AppConfig;
  stores: Stores;
  ledger: CaseLedger;
  dispatcher: NotificationDispatcher;
  reports: ReportStateMachine;
  metrics: MetricsAggregator;
}

/** Channels enabled by whichever credentials are present. In-app is always on. */
export function createChannels(config: AppConfig, stores: Stores, log: Logger): NotificationChannel[] {
  const channels: NotificationChannel[] = [new InAppChannel(stores.inbox)];
  const { firebaseServiceAccountJson, smtpUrl, emailFrom, twilio } = config.channels;

  if (firebaseServiceAccountJson) {
    let messaging: ReturnType<typeof firebaseMessaging> | null = null;
    channels.push(
      new PushChannel(stores.users, () => {
        if (!messaging) messaging = firebaseMessaging(firebaseServiceAccountJson);
        return messaging;
      })
    );
  }
  if (smtpUrl && emailFrom) {
    channels.push(new EmailChannel(stores.users, nodemailer.createTransport(smtpUrl), emailFrom));
  }
  if (twilio) {
    channels.push(new SmsChannel(stores.users, createTwilioClient(twilio.accountSid, twilio.authToken), twilio.fromNumber));
  }

  log.info({ channels: channels.map((c) => c.name) }, "notification channels enabled");
  return channels;
}

function completionFor(config: AppConfig, overrides: ServiceOverrides): CompletionProvider | null {
  if (overrides.completion !== undefined) return overrides.completion;
  return config.ai.apiKey ? new OpenAICompletionProvider(config.ai.apiKey, config.ai.model) : null;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const log = overrides.logger ?? moduleLogger("services");
  const stores = overrides.stores ?? mongoStores();
  const ledger = new CaseLedger(stores.caseUpdates);

  const dispatcher = new NotificationDispatcher({
    channels: overrides.channels ?? createChannels(config, stores, log),
    directory: stores.users,
    failures: stores.failures,
    options: config.dispatch,
    sleep: overrides.sleep,
  });

  const reports = new ReportStateMachine({
    reports: stores.reports,
    ledger,
    directory: stores.users,
    events: dispatcher,
    clock: overrides.clock,
  });

  const completion = completionFor(config, overrides);
  const narrator = completion
    ? new NarrativeService(completion, { timeoutMs: config.ai.timeoutMs, maxChars: config.ai.maxNarrativeChars })
    : null;

  const metrics = new MetricsAggregator({
    reports: stores.reports,
    cache: new TtlLruCache<string, KpiSnapshot>({
      maxEntries: config.metrics.cacheMaxEntries,
      ttlMs: config.metrics.cacheTtlMs,
    }),
    narrator,
    options: { geoPrecision: config.metrics.geoPrecision, topZones: config.metrics.topZones },
    clock: overrides.clock,
  });

  return { config, stores, ledger, dispatcher, reports, metrics };
}
