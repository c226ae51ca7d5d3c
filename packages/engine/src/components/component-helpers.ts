/**
 * Prebuilt component trees for common widget patterns
 *
 *   return barGauge({ percent: 75, value: "75%", label: "CPU", color: COLORS.cyan });
 */

import { COLORS, ICON_SIZE } from "../rendering/palette.js";
import type { FontSize } from "../rendering/renderer.js";
import { THEME_TEXT_PRIMARY, THEME_TEXT_SECONDARY, type Color } from "../theme.js";
import {
  adaptive,
  arc,
  bar,
  column,
  empty,
  icon,
  ring,
  row,
  spacer,
  stack,
  text,
  type Component,
} from "./components.js";

export interface GaugeProps {
  percent: number;
  value: string;
  label: string;
  color: Color;
  background?: Color;
}

/** Header row (icon, label, value) above a progress bar */
export function barGauge(props: GaugeProps & { icon?: string; padding?: number }): Component {
  const header: Component[] = [];
  if (props.icon) header.push(icon(props.icon, { color: props.color, maxSize: ICON_SIZE.md }));
  header.push(
    text(props.label.toUpperCase(), { font: "tiny", color: COLORS.gray }),
    spacer(),
    text(props.value, { font: "medium", bold: true, color: COLORS.white })
  );

  return column(
    [
      adaptive(header, { gap: 4 }),
      bar(props.percent, { color: props.color, background: props.background ?? COLORS.darkGray }),
    ],
    { gap: 4, padding: props.padding ?? 8, align: "stretch", justify: "center" }
  );
}

/** Ring with the value and label centered inside */
export function ringGauge(props: GaugeProps): Component {
  return stack([
    ring(props.percent, { color: props.color, background: props.background ?? COLORS.darkGray }),
    column(
      [
        text(props.value, { font: "large", color: COLORS.white }),
        text(props.label.toUpperCase(), { font: "tiny", color: COLORS.gray }),
      ],
      { align: "center", justify: "center" }
    ),
  ]);
}

/** 270° arc with the label on top and the value in the middle */
export function arcGauge(props: GaugeProps): Component {
  return stack([
    column([text(props.label.toUpperCase(), { font: "small", color: COLORS.gray })], {
      justify: "start",
      align: "center",
      padding: 8,
    }),
    arc(props.percent, { color: props.color, background: props.background ?? COLORS.darkGray }),
    column([text(props.value, { font: "large", color: COLORS.white })], { align: "center", justify: "center" }),
  ]);
}

export function iconValue(props: {
  icon: string;
  value: string;
  label: string;
  color: Color;
  valueColor?: Color;
  labelColor?: Color;
}): Component {
  return column(
    [
      icon(props.icon, { color: props.color, maxSize: ICON_SIZE.xl }),
      text(props.value, { font: "medium", bold: true, color: props.valueColor ?? COLORS.white }),
      text(props.label.toUpperCase(), { font: "tiny", color: props.labelColor ?? COLORS.gray }),
    ],
    { align: "center", justify: "center", gap: 2 }
  );
}

export function centeredValue(props: {
  value: string;
  label?: string | null;
  valueColor?: Color;
  labelColor?: Color;
  valueFont?: FontSize;
  labelFont?: FontSize;
}): Component {
  const children: Component[] = [
    text(props.value, { font: props.valueFont ?? "large", color: props.valueColor ?? COLORS.white }),
  ];
  if (props.label) {
    children.push(
      text(props.label.toUpperCase(), { font: props.labelFont ?? "tiny", color: props.labelColor ?? COLORS.gray })
    );
  }
  return column(children, { align: "center", justify: "center", gap: 4 });
}

/** Label on the left, value on the right; stacks when they don't fit */
export function labelValue(props: {
  label: string;
  value: string;
  labelColor?: Color;
  valueColor?: Color;
  font?: FontSize;
}): Component {
  const font = props.font ?? "small";
  return adaptive(
    [
      text(props.label, { font, color: props.labelColor ?? COLORS.gray, align: "start" }),
      spacer(),
      text(props.value, { font, color: props.valueColor ?? COLORS.white, align: "end" }),
    ],
    { gap: 4 }
  );
}

/**
 * Icon, label and status text on one row. The status sits at the right
 * edge and is left out when empty; so is the icon.
 */
export function statusIndicator(props: {
  label: string;
  isOn: boolean;
  onColor: Color;
  offColor: Color;
  statusText?: string;
  icon?: string | null;
  iconSize?: number;
  font?: FontSize;
  padding?: number;
}): Component {
  const color = props.isOn ? props.onColor : props.offColor;
  const font = props.font ?? "small";
  const children: Component[] = [];
  if (props.icon) children.push(icon(props.icon, { size: props.iconSize ?? ICON_SIZE.xs, color }));
  children.push(text(props.label, { font, color: THEME_TEXT_PRIMARY, align: "start" }));
  if (props.statusText) children.push(spacer(), text(props.statusText, { font, color, align: "end" }));

  return row(children, { gap: 6, padding: props.padding ?? 0, align: "center", justify: "start" });
}

/** Header (icon, label, value) over a bar with the rounded percentage */
export function progressRow(props: {
  label: string;
  value: string;
  percent: number;
  color: Color;
  icon?: string;
  iconSize?: number;
  barHeight?: number;
  padding?: number;
  gap?: number;
}): Component {
  const padding = props.padding ?? 0;
  const header: Component[] = [];
  if (props.icon) header.push(icon(props.icon, { size: props.iconSize, maxSize: ICON_SIZE.sm, color: props.color }));
  header.push(
    text(props.label.toUpperCase(), { font: "tiny", color: THEME_TEXT_SECONDARY, align: "start" }),
    spacer(),
    text(props.value, { font: "tiny", color: THEME_TEXT_PRIMARY, align: "end" })
  );

  return column(
    [
      row(header, { gap: 4, padding, align: "center" }),
      row(
        [
          bar(props.percent, { color: props.color, background: COLORS.darkGray, height: props.barHeight ?? 6 }),
          text(`${Math.round(props.percent)}%`, { font: "tiny", color: THEME_TEXT_PRIMARY, align: "end" }),
        ],
        { gap: 8, padding, align: "center" }
      ),
    ],
    { gap: props.gap ?? 2, align: "stretch" }
  );
}

export function conditional(condition: boolean, ifTrue: Component, ifFalse?: Component): Component {
  return condition ? ifTrue : (ifFalse ?? empty());
}
