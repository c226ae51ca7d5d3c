/**
 * Two-pass component layout
 *
 * measureComponent() reports a node's natural size within a maximum box
 * and never draws. renderComponent() draws a node into the box its parent
 * assigned. All sizes are logical pixels in the render context's local
 * space; container positions are truncated to whole pixels.
 */

import type { Size } from "@glance/core";
import type { RenderContext } from "../render-context.js";
import type { AdaptiveNode, Align, Component, FlexNode, Justify, PaddingNode } from "./components.js";

export interface Insets {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/** Per-side values win over vertical/horizontal, which win over `all` */
export function resolveInsets(node: PaddingNode): Insets {
  return {
    top: node.top ?? node.vertical ?? node.all,
    right: node.right ?? node.horizontal ?? node.all,
    bottom: node.bottom ?? node.vertical ?? node.all,
    left: node.left ?? node.horizontal ?? node.all,
  };
}

// ---------------------------------------------------------------------------
// Flex distribution
// ---------------------------------------------------------------------------

export interface FlexItem {
  /** Natural main-axis size */
  basis: number;
  /** Spacers grow into free space */
  grow: boolean;
}

export interface FlexSlot {
  offset: number;
  size: number;
}

/**
 * Place items along one axis of length `available`.
 *
 * Free space goes to growing items in equal shares; without any, it is
 * distributed by `justify`. When the items overflow, the non-growing ones
 * shrink in proportion to their natural size.
 */
export function distribute(items: readonly FlexItem[], available: number, gap: number, justify: Justify): FlexSlot[] {
  const n = items.length;
  if (n === 0) return [];
  const sizes = items.map((item) => item.basis);
  const used = sizes.reduce((sum, s) => sum + s, 0) + gap * (n - 1);
  let free = available - used;

  const growers = items.filter((item) => item.grow).length;
  if (free > 0 && growers > 0) {
    const share = free / growers;
    items.forEach((item, i) => {
      if (item.grow) sizes[i] += share;
    });
    free = 0;
  } else if (free < 0) {
    const shrinkable = items.reduce((sum, item) => sum + (item.grow ? 0 : item.basis), 0);
    if (shrinkable > 0) {
      const overflow = Math.min(-free, shrinkable);
      items.forEach((item, i) => {
        if (!item.grow) sizes[i] -= (overflow * item.basis) / shrinkable;
      });
    }
    free = 0;
  }

  let lead = 0;
  let between = gap;
  switch (justify) {
    case "center":
      lead = free / 2;
      break;
    case "end":
      lead = free;
      break;
    case "space-between":
      if (n > 1) between = gap + free / (n - 1);
      break;
    case "space-around":
      lead = free / (2 * n);
      between = gap + free / n;
      break;
    case "start":
      break;
  }

  const slots: FlexSlot[] = [];
  let cursor = lead;
  for (const size of sizes) {
    slots.push({ offset: cursor, size });
    cursor += size + between;
  }
  return slots;
}

/** Offset and size of a child on the cross axis */
export function alignCross(align: Align, natural: number, available: number): FlexSlot {
  if (align === "stretch") return { offset: 0, size: available };
  const size = Math.min(natural, available);
  switch (align) {
    case "start":
      return { offset: 0, size };
    case "end":
      return { offset: available - size, size };
    case "center":
      return { offset: Math.floor((available - size) / 2), size };
  }
}

// ---------------------------------------------------------------------------
// Measure
// ---------------------------------------------------------------------------

function measureFlex(ctx: RenderContext, node: FlexNode, maxWidth: number, maxHeight: number): Size {
  const p2 = node.padding * 2;
  let main = p2;
  let cross = 0;
  node.children.forEach((child, i) => {
    if (i > 0) main += node.gap;
    const size =
      node.kind === "row"
        ? measureComponent(ctx, child, maxWidth, maxHeight - p2)
        : measureComponent(ctx, child, maxWidth - p2, maxHeight);
    main += node.kind === "row" ? size.width : size.height;
    cross = Math.max(cross, node.kind === "row" ? size.height : size.width);
  });

  return node.kind === "row"
    ? { width: Math.min(main, maxWidth), height: Math.min(cross + p2, maxHeight) }
    : { width: Math.min(cross + p2, maxWidth), height: Math.min(main, maxHeight) };
}

function adaptiveAsRow(node: AdaptiveNode): FlexNode {
  return {
    kind: "row",
    children: node.children,
    gap: node.gap,
    padding: node.padding,
    justify: "space-between",
    align: "center",
  };
}

/**
 * Natural size of `node` within maxWidth x maxHeight
 */
export function measureComponent(ctx: RenderContext, node: Component, maxWidth: number, maxHeight: number): Size {
  switch (node.kind) {
    case "text":
      return ctx.getTextSize(node.text, ctx.getFont(node.font, node.bold, node.adjust));
    case "icon": {
      const size = node.size ?? Math.max(0, Math.min(maxWidth, maxHeight, node.maxSize ?? Infinity));
      return { width: size, height: size };
    }
    case "bar":
      return { width: maxWidth, height: node.height ?? Math.max(6, Math.trunc(maxHeight * 0.15)) };
    case "ring":
    case "arc": {
      const size = Math.max(0, Math.min(maxWidth, maxHeight));
      return { width: size, height: size };
    }
    case "sparkline":
    case "image":
      return { width: maxWidth, height: maxHeight };
    case "spacer":
      return { width: node.minSize, height: node.minSize };
    case "empty":
      return { width: 0, height: 0 };
    case "row":
    case "column":
      return measureFlex(ctx, node, maxWidth, maxHeight);
    case "adaptive":
      return measureFlex(ctx, adaptiveAsRow(node), maxWidth, maxHeight);
    case "stack":
      return node.children.reduce<Size>(
        (acc, child) => {
          const size = measureComponent(ctx, child, maxWidth, maxHeight);
          return { width: Math.max(acc.width, size.width), height: Math.max(acc.height, size.height) };
        },
        { width: 0, height: 0 }
      );
    case "center":
      return measureComponent(ctx, node.child, maxWidth, maxHeight);
    case "padding": {
      const p = resolveInsets(node);
      const inner = measureComponent(ctx, node.child, maxWidth - p.left - p.right, maxHeight - p.top - p.bottom);
      return { width: inner.width + p.left + p.right, height: inner.height + p.top + p.bottom };
    }
    case "panel":
      return node.child ? measureComponent(ctx, node.child, maxWidth, maxHeight) : { width: maxWidth, height: maxHeight };
  }
}

// ---------------------------------------------------------------------------
// Render
// ---------------------------------------------------------------------------

function renderFlex(ctx: RenderContext, node: FlexNode, x: number, y: number, width: number, height: number): void {
  if (node.children.length === 0) return;
  const innerX = x + node.padding;
  const innerY = y + node.padding;
  const innerW = Math.max(0, width - node.padding * 2);
  const innerH = Math.max(0, height - node.padding * 2);
  const horizontal = node.kind === "row";

  const sizes = node.children.map((child) => measureComponent(ctx, child, innerW, innerH));
  const slots = distribute(
    node.children.map((child, i) => ({
      basis: horizontal ? sizes[i].width : sizes[i].height,
      grow: child.kind === "spacer",
    })),
    horizontal ? innerW : innerH,
    node.gap,
    node.justify
  );

  node.children.forEach((child, i) => {
    const main = slots[i];
    const cross = alignCross(node.align, horizontal ? sizes[i].height : sizes[i].width, horizontal ? innerH : innerW);
    if (horizontal) {
      renderComponent(
        ctx,
        child,
        innerX + Math.trunc(main.offset),
        innerY + cross.offset,
        Math.trunc(main.size),
        cross.size
      );
    } else {
      renderComponent(
        ctx,
        child,
        innerX + cross.offset,
        innerY + Math.trunc(main.offset),
        cross.size,
        Math.trunc(main.size)
      );
    }
  });
}

/**
 * True when the children fit side by side in `width` (equality counts)
 */
export function adaptiveFitsRow(ctx: RenderContext, node: AdaptiveNode, width: number, height: number): boolean {
  const innerW = width - node.padding * 2;
  const total =
    node.children.reduce((sum, child) => sum + measureComponent(ctx, child, innerW, height).width, 0) +
    node.gap * (node.children.length - 1);
  return total <= innerW;
}

/**
 * Draw `node` into the box (x, y, width, height)
 */
export function renderComponent(
  ctx: RenderContext,
  node: Component,
  x: number,
  y: number,
  width: number,
  height: number
): void {
  switch (node.kind) {
    case "text": {
      const font = ctx.getFont(node.font, node.bold, node.adjust);
      const cy = y + Math.floor(height / 2);
      if (node.align === "start") ctx.drawText(node.text, [x, cy], font, node.color, "lm");
      else if (node.align === "end") ctx.drawText(node.text, [x + width, cy], font, node.color, "rm");
      else ctx.drawText(node.text, [x + Math.floor(width / 2), cy], font, node.color, "mm");
      return;
    }
    case "icon": {
      const size = node.size ?? Math.max(0, Math.min(width, height, node.maxSize ?? Infinity));
      ctx.drawIcon(
        node.name,
        [x + Math.floor((width - size) / 2), y + Math.floor((height - size) / 2)],
        size,
        node.color
      );
      return;
    }
    case "bar":
      ctx.drawBar({ x1: x, y1: y, x2: x + width, y2: y + height }, node.percent, node.color, node.background);
      return;
    case "ring": {
      const radius = Math.floor(Math.min(width, height) / 2);
      const thickness = node.thickness ?? Math.max(4, Math.floor(radius / 5));
      ctx.drawRingGauge(
        [x + Math.floor(width / 2), y + Math.floor(height / 2)],
        radius - thickness,
        node.percent,
        { color: node.color, background: node.background, width: thickness }
      );
      return;
    }
    case "arc": {
      const half = Math.floor(Math.min(width, height) / 2);
      const cx = x + Math.floor(width / 2);
      const cy = y + Math.floor(height / 2);
      ctx.drawArc({ x1: cx - half, y1: cy - half, x2: cx + half, y2: cy + half }, node.percent, {
        color: node.color,
        background: node.background,
        width: node.width,
      });
      return;
    }
    case "sparkline":
      ctx.drawSparkline({ x1: x, y1: y, x2: x + width, y2: y + height }, node.data, {
        color: node.color,
        fill: node.fill,
        smooth: node.smooth,
        gradient: node.gradient,
      });
      return;
    case "image":
      ctx.drawImage(node.source, { x1: x, y1: y, x2: x + width, y2: y + height }, node.fit);
      return;
    case "spacer":
    case "empty":
      return;
    case "row":
    case "column":
      renderFlex(ctx, node, x, y, width, height);
      return;
    case "adaptive": {
      if (node.children.length === 0) return;
      const layout: FlexNode = adaptiveFitsRow(ctx, node, width, height)
        ? adaptiveAsRow(node)
        : { ...adaptiveAsRow(node), kind: "column", justify: "center" };
      renderFlex(ctx, layout, x, y, width, height);
      return;
    }
    case "stack":
      for (const child of node.children) renderComponent(ctx, child, x, y, width, height);
      return;
    case "center": {
      const size = measureComponent(ctx, node.child, width, height);
      const w = Math.min(size.width, width);
      const h = Math.min(size.height, height);
      renderComponent(ctx, node.child, x + Math.floor((width - w) / 2), y + Math.floor((height - h) / 2), w, h);
      return;
    }
    case "padding": {
      const p = resolveInsets(node);
      renderComponent(ctx, node.child, x + p.left, y + p.top, width - p.left - p.right, height - p.top - p.bottom);
      return;
    }
    case "panel":
      ctx.drawPanel({ x1: x, y1: y, x2: x + width, y2: y + height }, { background: node.color, border: node.border, radius: node.radius });
      if (node.child) renderComponent(ctx, node.child, x, y, width, height);
      return;
  }
}
