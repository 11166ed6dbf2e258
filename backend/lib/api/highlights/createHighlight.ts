import { v4 as uuidv4 } from "uuid";
import { LoggingWrapper } from "../../logging.js";
import { HighlightError, ProcessFailureError } from "../../errors.js";
import { describeErrors, loadValidator } from "../../schemas.js";
import {
  handler as buildHighlight,
  type HandlerOverrides,
  type HighlightEvent,
} from "../../../services/highlight-builder/handler.js";

export interface ApiRequest {
  headers?: Record<string, string | undefined>;
  body?: string | null;
}

export interface ApiResponse {
  statusCode: number;
  body: string;
}

type HighlightRequest = Omit<HighlightEvent, "correlationId">;

const STATUS_BY_CODE: Record<HighlightError["code"], number> = {
  INVALID_RANGE: 400,
  EVENT_PARSE_FAILED: 400,
  TIMESTAMP_PARSE_FAILED: 400,
  INVALID_OUTPUT_PATH: 400,
  SOURCE_VIDEO_UNAVAILABLE: 404,
  WORK_DIR_IN_USE: 409,
  CANCELLED: 499,
  EXTRACTION_FAILED: 502,
  MERGE_FAILED: 502,
  MANIFEST_WRITE_FAILED: 500,
};

function respond(statusCode: number, payload: unknown): ApiResponse {
  return { statusCode, body: JSON.stringify(payload) };
}

export async function createHighlight(
  event: ApiRequest,
  overrides: HandlerOverrides = {}
): Promise<ApiResponse> {
  const logger = new LoggingWrapper("createHighlight");
  const correlationId = event.headers?.["x-correlation-id"] || uuidv4();

  logger.addPersistentAttributes({
    correlationId,
    operation: "createHighlight",
  });

  let body: unknown;
  try {
    body = JSON.parse(event.body || "{}");
  } catch {
    logger.error("Request body is not valid JSON");
    return respond(400, { error: "Request body must be valid JSON", correlationId });
  }

  const validate = loadValidator<HighlightRequest>("highlight-request.schema.json");
  if (!validate(body)) {
    const details = describeErrors(validate.errors);
    logger.error("Invalid highlight request", { details });
    return respond(400, { error: "Invalid request", details, correlationId });
  }

  try {
    const result = await buildHighlight({ ...body, correlationId }, overrides);
    logger.info("Highlight created successfully", {
      runId: result.runId,
      outputPath: result.outputPath,
    });
    return respond(201, result);
  } catch (error) {
    if (error instanceof HighlightError) {
      const statusCode = STATUS_BY_CODE[error.code];
      logger.error("Highlight run rejected", { code: error.code, error: error.message, statusCode });
      return respond(statusCode, {
        error: error.message,
        code: error.code,
        correlationId,
        ...(error instanceof ProcessFailureError
          ? { diagnostics: error.stderr, exitCode: error.exitCode }
          : {}),
      });
    }

    logger.error("Failed to create highlight", {
      error: error instanceof Error ? error.message : String(error),
    });
    return respond(500, { error: "Internal server error", correlationId });
  }
}

// Lambda handler wrapper
export const handler = createHighlight;
