/**
 * Clock widget
 * Time of `state.now` in the configured time zone, with an optional date.
 */

import { createLogger } from "@glance/core";
import { COLORS } from "../rendering/palette.js";
import { optionBoolean, optionEnum, optionString } from "./helpers.js";
import { DRAWN, type WidgetDefinition } from "./types.js";

const log = createLogger("clock");

export type TimeFormat = "24h" | "12h";

export interface ClockOptions {
  format: TimeFormat;
  seconds: boolean;
  timeZone: string;
}

export interface ClockText {
  time: string;
  /** "AM"/"PM" in 12h format */
  ampm: string | null;
  /** e.g. "Tue, Mar 05" */
  date: string;
}

type DateParts = Partial<Record<Intl.DateTimeFormatPartTypes, string>>;

function dateParts(now: Date, timeZone: string): DateParts {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    weekday: "short",
    month: "short",
    day: "2-digit",
  });
  const parts: DateParts = {};
  for (const part of formatter.formatToParts(now)) parts[part.type] = part.value;
  return parts;
}

/**
 * Clock strings for `now`. An unknown time zone falls back to UTC.
 */
export function formatClock(now: Date, options: ClockOptions): ClockText {
  let parts: DateParts;
  try {
    parts = dateParts(now, options.timeZone);
  } catch (error) {
    log.debug(`Unknown time zone "${options.timeZone}", using UTC:`, error instanceof Error ? error.message : error);
    parts = dateParts(now, "UTC");
  }

  const hour24 = parseInt(parts.hour ?? "0", 10);
  const minute = parts.minute ?? "00";
  const second = parts.second ?? "00";
  const date = `${parts.weekday ?? ""}, ${parts.month ?? ""} ${parts.day ?? ""}`;

  let hour = String(hour24).padStart(2, "0");
  let ampm: string | null = null;
  if (options.format === "12h") {
    hour = String(hour24 % 12 || 12).padStart(2, "0");
    ampm = hour24 < 12 ? "AM" : "PM";
  }
  const time = options.seconds ? `${hour}:${minute}:${second}` : `${hour}:${minute}`;
  return { time, ampm, date };
}

export const clockWidget: WidgetDefinition = {
  type: "clock",
  name: "Clock",
  entityIds: () => [],

  render(ctx, config, state) {
    const showDate = optionBoolean(config.options, "show_date", true);
    const clock = formatClock(state.now, {
      format: optionEnum(config.options, "time_format", ["24h", "12h"], "24h"),
      seconds: optionBoolean(config.options, "show_seconds", false),
      timeZone: optionString(config.options, "timezone", "UTC"),
    });

    const { width, height } = ctx;
    const cx = Math.floor(width / 2);
    const cy = Math.floor(height / 2);
    const fontTime = ctx.getFont("xlarge");
    const fontSmall = ctx.getFont("small");
    const timeY = cy - (showDate ? Math.trunc(height * 0.08) : 0);

    ctx.drawText(clock.time, [cx, timeY], fontTime, config.color ?? COLORS.white, "mm");

    if (clock.ampm) {
      const ampmX = cx + Math.floor(ctx.getTextSize(clock.time, fontTime).width / 2) + 5;
      ctx.drawText(clock.ampm, [ampmX, timeY - Math.trunc(height * 0.08)], fontSmall, COLORS.gray, "lm");
    }

    if (showDate) {
      ctx.drawText(clock.date, [cx, cy + Math.trunc(height * 0.2)], ctx.getFont("regular"), COLORS.gray, "mm");
    }

    if (config.label) {
      ctx.drawText(config.label.toUpperCase(), [cx, Math.trunc(height * 0.12)], fontSmall, COLORS.gray, "mm");
    }
    return DRAWN;
  },
};
