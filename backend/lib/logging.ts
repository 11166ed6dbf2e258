import { Logger } from "@aws-lambda-powertools/logger";

type LoggerOptions = NonNullable<ConstructorParameters<typeof Logger>[0]>;
type LogLevel = NonNullable<LoggerOptions["logLevel"]>;

const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR", "SILENT"] as const;

function isLogLevel(value: string): value is (typeof LOG_LEVELS)[number] {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLogLevel(): LogLevel {
  const level = String(process.env.LOG_LEVEL || "INFO").toUpperCase();
  return isLogLevel(level) ? level : "INFO";
}

/**
 * Thin wrapper around Powertools Logger providing context fields
 */
class LoggingWrapper {
  private logger: Logger;

  constructor(
    serviceName: string,
    persistentAttributes: Record<string, unknown> = {}
  ) {
    this.logger = new Logger({
      serviceName:
        process.env.POWERTOOLS_SERVICE_NAME || "HighlightReel/MediaProcessing",
      logLevel: resolveLogLevel(),
      persistentLogAttributes: { component: serviceName, ...persistentAttributes },
    });
  }

  info(message: string, attributes?: Record<string, unknown>) {
    if (attributes) this.logger.info(message, attributes);
    else this.logger.info(message);
  }

  error(message: string, attributes?: Record<string, unknown>) {
    if (attributes) this.logger.error(message, attributes);
    else this.logger.error(message);
  }

  warn(message: string, attributes?: Record<string, unknown>) {
    if (attributes) this.logger.warn(message, attributes);
    else this.logger.warn(message);
  }

  debug(message: string, attributes?: Record<string, unknown>) {
    if (attributes) this.logger.debug(message, attributes);
    else this.logger.debug(message);
  }

  /**
   * Add persistent attributes to all subsequent log messages
   */
  addPersistentAttributes(attributes: Record<string, unknown>) {
    this.logger.addPersistentLogAttributes(attributes);
  }
}

export { LoggingWrapper };
