import { Metrics, MetricUnit } from "@aws-lambda-powertools/metrics";

type Unit = (typeof MetricUnit)[keyof typeof MetricUnit];

/**
 * Thin wrapper around Powertools Metrics (EMF) with standard dimensions
 */
class MetricsWrapper {
  private metrics: Metrics;

  constructor(serviceName: string, defaultDimensions: Record<string, string> = {}) {
    this.metrics = new Metrics({
      namespace: process.env.POWERTOOLS_METRICS_NAMESPACE || "HighlightReel",
      serviceName,
      defaultDimensions: {
        Service: serviceName,
        Environment: process.env.HIGHLIGHT_ENV || "dev",
        ...defaultDimensions,
      },
    });
  }

  /**
   * Add a metric; extra dimensions go out as a single EMF blob immediately
   */
  addMetric(metricName: string, unit: Unit, value: number, additionalDimensions?: Record<string, string>) {
    if (additionalDimensions) {
      const single = this.metrics.singleMetric();
      single.addDimensions(additionalDimensions);
      single.addMetric(metricName, unit, value);
      return;
    }
    this.metrics.addMetric(metricName, unit, value);
  }

  addCount(metricName: string, additionalDimensions?: Record<string, string>) {
    this.addMetric(metricName, MetricUnit.Count, 1, additionalDimensions);
  }

  addDuration(metricName: string, durationMs: number, additionalDimensions?: Record<string, string>) {
    this.addMetric(metricName, MetricUnit.Milliseconds, durationMs, additionalDimensions);
  }

  /**
   * Publish all stored metrics
   */
  publishStoredMetrics() {
    this.metrics.publishStoredMetrics();
  }

  /**
   * Record FFmpeg execution time
   */
  recordFFmpegExecution(operation: string, durationMs: number, success: boolean) {
    this.addDuration("FFmpegExecTime", durationMs, {
      Operation: operation,
      Success: success.toString(),
    });
  }

  /**
   * Record service operation metrics
   */
  recordOperation(operation: string, success: boolean, durationMs: number) {
    this.addCount(`${operation}${success ? "Success" : "Error"}`);
    this.addDuration(`${operation}Duration`, durationMs);
  }

  recordClipCount(count: number) {
    this.addMetric("HighlightClips", MetricUnit.Count, count);
  }
}

export { MetricsWrapper };
