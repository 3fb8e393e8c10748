import { MetricsAggregator } from "../../../services/metrics/metricsAggregator";
import { getKpiSnapshotAction } from "./Actions/getKpiSnapshotAction";

export class MetricsController {
  readonly snapshot;

  constructor(metrics: MetricsAggregator) {
    this.snapshot = getKpiSnapshotAction(metrics);
  }
}
