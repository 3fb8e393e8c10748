import HealthRoutes from "./health";
import MetricsRoutes from "./metrics.routes";
import NotificationRoutes from "./notification.routes";
import ReportRoutes from "./report.routes";

export { HealthRoutes, MetricsRoutes, NotificationRoutes, ReportRoutes };
