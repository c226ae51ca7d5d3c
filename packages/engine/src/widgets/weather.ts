/**
 * Weather widget
 *
 * Large cells show the condition icon, temperature, condition text,
 * humidity and a forecast row; small cells show icon, temperature and
 * humidity side by side.
 */

import type { RenderContext } from "../render-context.js";
import { COLORS } from "../rendering/palette.js";
import { optionBoolean, optionNumber, readAttribute } from "./helpers.js";
import { DRAWN, type ForecastEntry, type WidgetDefinition } from "./types.js";

const WEATHER_ICONS: Readonly<Record<string, string>> = {
  sunny: "weather-sunny",
  "clear-night": "weather-night",
  partlycloudy: "weather-partly-cloudy",
  cloudy: "weather-cloudy",
  rainy: "weather-rainy",
  pouring: "weather-rainy",
  snowy: "weather-snowy",
  fog: "weather-fog",
  windy: "weather-windy",
  lightning: "weather-lightning",
  "lightning-rainy": "weather-lightning",
};

export function weatherIcon(condition: string): string {
  return WEATHER_ICONS[condition] ?? "weather-sunny";
}

/** "partly-cloudy" → "Partly Cloudy" */
export function conditionTitle(condition: string): string {
  return condition
    .replace(/-/g, " ")
    .split(" ")
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(" ");
}

interface Current {
  icon: string;
  temperature: string;
  humidity: string;
  condition: string;
}

function renderFull(ctx: RenderContext, now: Current, forecast: readonly ForecastEntry[], showHumidity: boolean): void {
  const { width, height } = ctx;
  const cx = Math.floor(width / 2);
  const padding = Math.trunc(width * 0.04);
  const fontTiny = ctx.getFont("tiny");
  const top = padding;

  const iconSize = Math.max(24, Math.trunc(height * 0.25));
  ctx.drawIcon(now.icon, [cx - Math.floor(iconSize / 2), top], iconSize, COLORS.gold);
  ctx.drawText(now.temperature, [cx, top + iconSize + Math.trunc(height * 0.08)], ctx.getFont("xlarge"), COLORS.white, "mm");
  ctx.drawText(
    conditionTitle(now.condition),
    [cx, top + iconSize + Math.trunc(height * 0.22)],
    ctx.getFont("small"),
    COLORS.gray,
    "mm"
  );

  if (showHumidity) {
    const dropSize = Math.max(8, Math.trunc(height * 0.07));
    const y = top + iconSize + Math.trunc(height * 0.3);
    ctx.drawIcon("drop", [padding, y], dropSize, COLORS.cyan);
    ctx.drawText(`${now.humidity}%`, [padding + dropSize + 4, y + Math.floor(dropSize / 2)], fontTiny, COLORS.cyan, "lm");
  }

  if (forecast.length === 0) return;
  const forecastY = height - Math.trunc(height * 0.28);
  const itemWidth = Math.floor((width - padding * 2) / forecast.length);
  const smallIcon = Math.max(10, Math.trunc(height * 0.1));

  forecast.forEach((day, i) => {
    const fx = padding + i * itemWidth + Math.floor(itemWidth / 2);
    const dayName = day.label ? day.label.slice(0, 3) : `D${i + 1}`;
    ctx.drawText(dayName.toUpperCase(), [fx, forecastY], fontTiny, COLORS.gray, "mm");
    ctx.drawIcon(
      weatherIcon(day.condition),
      [fx - Math.floor(smallIcon / 2), forecastY + Math.trunc(height * 0.05)],
      smallIcon,
      COLORS.gray
    );
    ctx.drawText(`${Math.round(day.value)}°`, [fx, forecastY + Math.trunc(height * 0.2)], fontTiny, COLORS.white, "mm");
  });
}

function renderCompact(ctx: RenderContext, now: Current, showHumidity: boolean): void {
  const { width, height } = ctx;
  const cy = Math.floor(height / 2);
  const padding = Math.trunc(width * 0.04);
  const iconSize = Math.max(16, Math.min(32, Math.trunc(height * 0.4)));

  ctx.drawIcon(now.icon, [padding, cy - Math.floor(iconSize / 2)], iconSize, COLORS.gold);
  ctx.drawText(now.temperature, [width - padding, cy - Math.trunc(height * 0.04)], ctx.getFont("large"), COLORS.white, "rm");
  if (showHumidity) {
    ctx.drawText(`${now.humidity}%`, [width - padding, cy + Math.trunc(height * 0.15)], ctx.getFont("tiny"), COLORS.cyan, "rm");
  }
}

export const weatherWidget: WidgetDefinition = {
  type: "weather",
  name: "Weather",

  render(ctx, config, state) {
    const entity = state.entity;
    if (!entity?.available) {
      ctx.drawText(
        "No Weather Data",
        [Math.floor(ctx.width / 2), Math.floor(ctx.height / 2)],
        ctx.getFont("regular"),
        COLORS.gray,
        "mm"
      );
      return DRAWN;
    }

    const temperature = readAttribute(entity, "temperature");
    const current: Current = {
      icon: weatherIcon(entity.state),
      temperature: temperature === null ? "--" : `${temperature}°`,
      humidity: readAttribute(entity, "humidity") ?? "--",
      condition: entity.state,
    };
    const showForecast = optionBoolean(config.options, "show_forecast", true);
    const showHumidity = optionBoolean(config.options, "show_humidity", true);

    if (ctx.height > 120 && showForecast) {
      const days = Math.max(0, Math.trunc(optionNumber(config.options, "forecast_days", 3)));
      renderFull(ctx, current, state.forecast.slice(0, days), showHumidity);
    } else {
      renderCompact(ctx, current, showHumidity);
    }
    return DRAWN;
  },
};
