import express, { Application } from "express";
import compression from "compression";
import cors from "cors";
import helmet from "helmet";
import { Server as HttpServer } from "http";
import { ScheduledTask } from "node-cron";
import { errorMiddleware, notFound, createAuth } from "./app/Middlewares";
import { AppConfig } from "./config";
import { startDeliveryRetryJob } from "./jobs/deliveryRetry.job";
import { httpLogger, moduleLogger } from "./observability/logging";
import { attachSentryErrorHandler, initSentry } from "./observability/sentry";
import { HealthRoutes, MetricsRoutes, NotificationRoutes, ReportRoutes } from "./routes";
import { Services } from "./services";

const log = moduleLogger("server");

export class Server {
  public app: Application;
  private http: HttpServer | null = null;
  private retryJob: ScheduledTask | null = null;

  constructor(private readonly config: AppConfig, private readonly services: Services) {
    this.app = express();
    initSentry(config.sentryDsn, config.env);
    this.registerMiddlewares();
    this.registerRoutes();
  }

  registerMiddlewares() {
    this.app.disable("x-powered-by");
    this.app.use(helmet());
    this.app.use(compression());
    this.app.use(cors({ origin: this.config.corsOrigins, credentials: true }));
    this.app.use(httpLogger);
    this.app.use(express.json({ limit: "1mb" }));
  }

  registerRoutes() {
    const auth = createAuth(this.config.jwtSecret);
    const { reports, metrics, stores } = this.services;

    this.app.use(HealthRoutes());
    this.app.use("/api/v1/reports", auth, ReportRoutes(reports));
    this.app.use("/api/v1/metrics", auth, MetricsRoutes(metrics));
    this.app.use("/api/v1/notifications", auth, NotificationRoutes(stores.inbox));

    this.app.use(notFound);
    attachSentryErrorHandler(this.app);
    this.app.use(errorMiddleware);
  }

  start(): HttpServer {
    const { dispatch } = this.config;
    this.retryJob = startDeliveryRetryJob(
      { failures: this.services.stores.failures, dispatcher: this.services.dispatcher, maxRounds: dispatch.maxRetryRounds },
      dispatch.retrySchedule
    );
    this.http = this.app.listen(this.config.port, () => {
      log.info({ port: this.config.port, env: this.config.env }, "HTTP server started");
    });
    return this.http;
  }

  /** Stops accepting requests, then lets queued notifications finish. */
  async stop(): Promise<void> {
    this.retryJob?.stop();
    this.retryJob = null;
    const http = this.http;
    this.http = null;
    if (http) {
      await new Promise<void>((resolve, reject) => http.close((err) => (err ? reject(err) : resolve())));
    }
    await this.services.dispatcher.drain();
  }
}
