/**
 * Widget framework types
 */

import type { Frame, RGB } from "@glance/core";
import type { Component } from "../components/components.js";
import type { RenderContext } from "../render-context.js";

export const WIDGET_TYPES = [
  "text",
  "clock",
  "entity",
  "gauge",
  "progress",
  "chart",
  "status",
  "weather",
  "camera",
  "icon",
  "media",
  "multi_progress",
  "status_list",
  "attribute_list",
] as const;

export type WidgetType = (typeof WIDGET_TYPES)[number];

export function isWidgetType(value: string): value is WidgetType {
  return WIDGET_TYPES.some((type) => type === value);
}

export type EntityAttributes = Readonly<Record<string, unknown>>;

export interface AvailableEntity {
  entityId: string;
  available: true;
  state: string;
  attributes: EntityAttributes;
  unit?: string;
  friendlyName?: string;
}

/** The entity exists but has no usable value right now */
export interface UnavailableEntity {
  entityId: string;
  available: false;
}

export type EntitySnapshot = AvailableEntity | UnavailableEntity;

export interface ForecastEntry {
  /** Day or hour label, e.g. "Tue" */
  label: string;
  /** Condition tag such as "sunny" or "rainy" */
  condition: string;
  value: number;
}

/**
 * Everything a widget may read during one render. Gathered before the
 * pass starts; nothing here is fetched lazily.
 */
export interface WidgetState {
  /** Snapshot of the widget's primary entity, null when absent */
  entity: EntitySnapshot | null;
  /** Extra snapshots by entity id */
  entities: Readonly<Record<string, EntitySnapshot>>;
  /** Numeric history, oldest first */
  history: readonly number[];
  forecast: readonly ForecastEntry[];
  /** Decoded image payload */
  image: Frame | null;
  now: Date;
}

export function emptyWidgetState(now: Date = new Date()): WidgetState {
  return { entity: null, entities: {}, history: [], forecast: [], image: null, now };
}

export interface WidgetConfig {
  type: WidgetType;
  slot: number;
  entityId?: string;
  label?: string;
  color?: RGB;
  options: Readonly<Record<string, unknown>>;
}

/** Either the widget painted the context itself or it returns a tree */
export type WidgetOutput = { kind: "drawn" } | { kind: "tree"; root: Component };

export const DRAWN: WidgetOutput = { kind: "drawn" };

export function tree(root: Component): WidgetOutput {
  return { kind: "tree", root };
}

export interface Widget {
  readonly config: WidgetConfig;
  /** Entity ids this widget reads */
  entityIds(): string[];
  render(ctx: RenderContext, state: WidgetState): WidgetOutput;
}

/**
 * One widget type: how to render a config against a state
 */
export interface WidgetDefinition {
  type: WidgetType;
  /** Human-readable name */
  name: string;
  render(ctx: RenderContext, config: WidgetConfig, state: WidgetState): WidgetOutput;
  /** Defaults to the configured entityId */
  entityIds?(config: WidgetConfig): string[];
}

export type WidgetRegistry = Record<WidgetType, WidgetDefinition>;
