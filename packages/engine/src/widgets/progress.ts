/**
 * Progress widget
 * A value against a target, e.g. steps walked today out of a daily goal.
 */

import { bar, column, icon, row, spacer, text, type Component } from "../components/components.js";
import { compareSizeCategory, type RenderContext } from "../render-context.js";
import { COLORS } from "../rendering/palette.js";
import { THEME_TEXT_PRIMARY, THEME_TEXT_SECONDARY, themeAccent, type Color } from "../theme.js";
import {
  extractNumeric,
  formatNumber,
  getFriendlyName,
  getUnit,
  optionBoolean,
  optionEnum,
  optionNumber,
  optionString,
} from "./helpers.js";
import { tree, type WidgetDefinition } from "./types.js";

const BAR_HEIGHT_RATIO = { thin: 0.1, normal: 0.17, thick: 0.25 } as const;

type BarThickness = keyof typeof BAR_HEIGHT_RATIO;

export interface ProgressProps {
  value: number;
  target: number;
  label: string;
  unit: string;
  color: Color;
  icon?: string;
  showTarget: boolean;
  barHeight: BarThickness;
}

/** Share of target reached, capped at 100 */
export function progressPercent(value: number, target: number): number {
  return target > 0 ? Math.min(100, (value / target) * 100) : 0;
}

export function progressValueText(props: Pick<ProgressProps, "value" | "target" | "unit" | "showTarget">): string {
  const shown = props.showTarget ? `${formatNumber(props.value)}/${formatNumber(props.target)}` : formatNumber(props.value);
  return props.unit ? `${shown} ${props.unit}` : shown;
}

/**
 * Three arrangements by cell size: micro cells put the value and the bar
 * on two short rows, medium and larger ones give label, value and bar a
 * row each.
 */
export function buildProgress(ctx: Pick<RenderContext, "width" | "height" | "sizeCategory" | "getFont" | "getTextSize">, props: ProgressProps): Component {
  const { width, height } = ctx;
  const padding = Math.trunc(width * 0.05);
  const barHeight = Math.max(4, Math.trunc(height * BAR_HEIGHT_RATIO[props.barHeight]));
  const percent = progressPercent(props.value, props.target);
  const valueText = progressValueText(props);
  const labelText = props.label.toUpperCase();
  const percentText = `${percent.toFixed(0)}%`;
  const size = ctx.sizeCategory;

  if (compareSizeCategory(size, "medium") >= 0) {
    const header: Component[] = [];
    if (props.icon) header.push(icon(props.icon, { size: Math.max(16, Math.trunc(height * 0.18)), color: props.color }));
    header.push(text(labelText, { font: "small", color: THEME_TEXT_SECONDARY }));

    return column(
      [
        row(header, { gap: 6, justify: "center", padding }),
        row([text(valueText, { font: "large", color: THEME_TEXT_PRIMARY })], { justify: "center", padding }),
        row(
          [
            bar(percent, { color: props.color, background: COLORS.darkGray, height: barHeight }),
            text(percentText, { font: "small", color: THEME_TEXT_PRIMARY, align: "end" }),
          ],
          { gap: 8, padding }
        ),
      ],
      { gap: Math.trunc(height * 0.06), justify: "center", align: "stretch" }
    );
  }

  const iconSize = Math.max(10, Math.trunc(height * 0.2));
  const top: Component[] = [];
  if (props.icon) top.push(icon(props.icon, { size: iconSize, color: props.color }));

  if (size === "micro") {
    top.push(text(valueText, { font: "small", color: THEME_TEXT_PRIMARY, align: "start" }));
  } else {
    const labelWidth = ctx.getTextSize(labelText, ctx.getFont("small")).width;
    const valueWidth = ctx.getTextSize(valueText, ctx.getFont("regular")).width;
    const iconWidth = props.icon ? iconSize + 4 : 0;
    if (width - padding * 2 - iconWidth - valueWidth - 8 >= labelWidth) {
      top.push(
        text(labelText, { font: "small", color: THEME_TEXT_SECONDARY, align: "start" }),
        spacer(),
        text(valueText, { font: "regular", color: THEME_TEXT_PRIMARY, align: "end" })
      );
    } else {
      top.push(text(valueText, { font: "regular", color: THEME_TEXT_PRIMARY, align: "start" }));
    }
  }

  return column(
    [
      row(top, { gap: 4, padding }),
      row(
        [
          bar(percent, { color: props.color, background: COLORS.darkGray, height: barHeight }),
          text(percentText, { font: size === "micro" ? "tiny" : "small", color: THEME_TEXT_PRIMARY, align: "end" }),
        ],
        { gap: 8, padding }
      ),
    ],
    { gap: Math.trunc(height * 0.1), justify: "center", align: "stretch" }
  );
}

export const progressWidget: WidgetDefinition = {
  type: "progress",
  name: "Progress",

  render(ctx, config, state) {
    const { options } = config;
    const entity = state.entity;
    return tree(
      buildProgress(ctx, {
        value: extractNumeric(entity),
        target: optionNumber(options, "target", 100) || 100,
        label: config.label || getFriendlyName(entity) || "Progress",
        unit: optionString(options, "unit") || getUnit(entity),
        color: config.color ?? themeAccent(config.slot),
        icon: optionString(options, "icon"),
        showTarget: optionBoolean(options, "show_target", true),
        barHeight: optionEnum(options, "bar_height", ["thin", "normal", "thick"], "normal"),
      })
    );
  },
};
