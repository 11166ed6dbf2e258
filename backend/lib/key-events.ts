import { EventParseError } from "./errors.js";
import { describeErrors, loadValidator } from "./schemas.js";
import { createTimeRangeEvent, timestampToSeconds } from "./time-range.js";
import type { RawCaptionEvent, RawKeyEvent, TimeRangeEvent } from "./types.js";

const WRAPPER_KEYS = ["key_events", "key_points", "events"] as const;

/**
 * Strip a surrounding markdown code fence (```json ... ```) from model output.
 */
export function stripCodeFences(text: string): string {
  let clean = text.trim();
  if (clean.startsWith("```json")) {
    clean = clean.slice(7);
  } else if (clean.startsWith("```")) {
    clean = clean.slice(3);
  }
  if (clean.endsWith("```")) {
    clean = clean.slice(0, -3);
  }
  return clean.trim();
}

function parseJson(input: unknown): unknown {
  if (typeof input !== "string") {
    return input;
  }
  try {
    return JSON.parse(stripCodeFences(input));
  } catch (error) {
    throw new EventParseError(
      `Event payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      [],
      error
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Accepts a bare array or one of the known wrapper objects
function unwrapList(data: unknown): unknown[] {
  if (Array.isArray(data)) {
    return data;
  }
  if (isRecord(data)) {
    for (const key of WRAPPER_KEYS) {
      const value = data[key];
      if (Array.isArray(value)) {
        return value;
      }
    }
  }
  throw new EventParseError(
    `Expected an array of events or an object with one of: ${WRAPPER_KEYS.join(", ")}`
  );
}

/**
 * Parse the analysis step's output into validated, ordered events.
 * Order is preserved: upstream lists events by importance, not by time.
 */
export function parseKeyEvents(input: unknown): TimeRangeEvent[] {
  const items = unwrapList(parseJson(input));
  const validate = loadValidator<RawKeyEvent[]>("key-events.schema.json");
  if (!validate(items)) {
    const details = describeErrors(validate.errors);
    throw new EventParseError(`Invalid key events: ${details.join("; ")}`, details);
  }

  return items.map((item, index) =>
    withIndex(index, () =>
      createTimeRangeEvent(
        item.start_time,
        item.end_time,
        item.summary ?? item.label ?? item.description ?? `event ${index}`,
        item.reason
      )
    )
  );
}

/**
 * Parse captioner output (`mm:ss.ff` timestamps) into events.
 * A malformed timestamp raises TimestampParseError; nothing defaults to zero.
 */
export function parseCaptionEvents(input: unknown): TimeRangeEvent[] {
  const items = unwrapList(parseJson(input));
  const validate = loadValidator<RawCaptionEvent[]>("caption-events.schema.json");
  if (!validate(items)) {
    const details = describeErrors(validate.errors);
    throw new EventParseError(`Invalid caption events: ${details.join("; ")}`, details);
  }

  return items.map((item, index) =>
    withIndex(index, () =>
      createTimeRangeEvent(
        timestampToSeconds(item.start_time ?? item.start ?? ""),
        timestampToSeconds(item.end_time ?? item.end ?? ""),
        item.description ?? item.caption ?? `event ${index}`
      )
    )
  );
}

function withIndex<T>(index: number, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof Error) {
      error.message = `events[${index}]: ${error.message}`;
    }
    throw error;
  }
}
