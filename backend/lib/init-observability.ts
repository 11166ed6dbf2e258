import { LoggingWrapper } from "./logging.js";
import { MetricsWrapper } from "./metrics.js";

export interface Observability {
  logger: LoggingWrapper;
  metrics: MetricsWrapper;
}

/**
 * Initialize logger and metrics for one unit of work
 */
function initObservability({
  serviceName,
  correlationId,
  runId,
}: {
  serviceName: string;
  correlationId: string;
  runId?: string;
}): Observability {
  const logger = new LoggingWrapper(serviceName, {
    correlationId,
    ...(runId ? { runId } : {}),
  });

  const metrics = new MetricsWrapper(serviceName);

  return { logger, metrics };
}

export { initObservability };
