import { InvalidRangeError, TimestampParseError } from "./errors.js";
import type { TimeRangeEvent } from "./types.js";

export type TimestampParseResult =
  | { ok: true; seconds: number }
  | { ok: false; error: TimestampParseError };

const TIMESTAMP_PATTERN = /^(?:(\d+):)?(\d+):(\d+(?:\.\d+)?)$/;

/**
 * Parse a caption timestamp (`mm:ss.ff`, or `hh:mm:ss.ff`) into seconds.
 */
export function parseTimestamp(input: string): TimestampParseResult {
  const trimmed = input.trim();
  const match = TIMESTAMP_PATTERN.exec(trimmed);
  if (!match) {
    return {
      ok: false,
      error: new TimestampParseError(input, "expected mm:ss.ff"),
    };
  }

  const [, hoursPart, minutesPart, secondsPart] = match;
  const hours = hoursPart === undefined ? 0 : Number.parseInt(hoursPart, 10);
  const minutes = Number.parseInt(minutesPart, 10);
  const seconds = Number.parseFloat(secondsPart);

  if (seconds >= 60) {
    return { ok: false, error: new TimestampParseError(input, "seconds must be below 60") };
  }
  if (hoursPart !== undefined && minutes >= 60) {
    return { ok: false, error: new TimestampParseError(input, "minutes must be below 60") };
  }

  return { ok: true, seconds: hours * 3600 + minutes * 60 + seconds };
}

export function timestampToSeconds(input: string): number {
  const result = parseTimestamp(input);
  if (!result.ok) {
    throw result.error;
  }
  return result.seconds;
}

export function eventDuration(event: TimeRangeEvent): number {
  return event.end_time - event.start_time;
}

/**
 * Throws InvalidRangeError unless the event is a finite, non-negative,
 * strictly increasing range that lasts at least a millisecond once rendered
 * for ffmpeg.
 */
export function validateEvent(event: TimeRangeEvent, index?: number): void {
  const where = index === undefined ? "" : ` (event ${index})`;
  if (!Number.isFinite(event.start_time) || !Number.isFinite(event.end_time)) {
    throw new InvalidRangeError(`Event "${event.label}"${where} has a non-finite time`, index);
  }
  if (event.start_time < 0) {
    throw new InvalidRangeError(
      `Event "${event.label}"${where} starts before 0 (${event.start_time})`,
      index
    );
  }
  if (eventDuration(event) <= 0) {
    throw new InvalidRangeError(
      `Event "${event.label}"${where} has end_time ${event.end_time} <= start_time ${event.start_time}`,
      index
    );
  }
  if (formatSeconds(eventDuration(event)) === "0") {
    throw new InvalidRangeError(
      `Event "${event.label}"${where} is shorter than a millisecond (${eventDuration(event)}s)`,
      index
    );
  }
}

export function createTimeRangeEvent(
  start_time: number,
  end_time: number,
  label: string,
  reason?: string
): TimeRangeEvent {
  const event: TimeRangeEvent =
    reason === undefined ? { start_time, end_time, label } : { start_time, end_time, label, reason };
  validateEvent(event);
  return Object.freeze(event);
}

export function validateEvents(events: readonly TimeRangeEvent[]): void {
  if (events.length === 0) {
    throw new InvalidRangeError("At least one event is required");
  }
  events.forEach((event, index) => validateEvent(event, index));
}

/**
 * Render seconds for an ffmpeg `-ss`/`-t` argument (millisecond precision).
 */
export function formatSeconds(seconds: number): string {
  const fixed = seconds.toFixed(3);
  return fixed.replace(/\.?0+$/, "") || "0";
}
