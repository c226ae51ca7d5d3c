/**
 * Scalable bitmap fonts
 *
 * A face is a grid font stored as JSON: every glyph is a list of rows of
 * "#" (ink) and "." (blank), `ascent + descent` rows tall. Rendering scales
 * the grid so that the em box is `size` canvas pixels tall; bold widens
 * every stroke by one grid unit.
 *
 * Glyphs are looked up along a chain of faces. The chain always ends in a
 * built-in face that draws a hollow box for any character, so text never
 * fails to render.
 */

import type { Frame, RGB } from "@glance/core";
import { fillRect } from "./raster.js";

export interface Glyph {
  /** Width in grid units */
  width: number;
  rows: readonly string[];
}

export interface FontFace {
  readonly name: string;
  /** Grid rows above the baseline, including top padding */
  readonly ascent: number;
  readonly descent: number;
  /** Blank grid columns between glyphs */
  readonly spacing: number;
  glyph(char: string): Glyph | undefined;
}

/** A face at a concrete pixel size */
export interface Font {
  readonly face: FontChain;
  /** Em height in canvas pixels */
  readonly size: number;
  readonly bold: boolean;
}

/**
 * Validate parsed JSON as a face definition
 */
export function parseFontFace(value: unknown, source: string): FontFace {
  if (typeof value !== "object" || value === null) {
    throw new Error(`${source}: font file must contain an object`);
  }
  const name = "name" in value && typeof value.name === "string" ? value.name : source;
  const ascent = "ascent" in value ? value.ascent : undefined;
  const descent = "descent" in value ? value.descent : undefined;
  const spacing = "spacing" in value ? value.spacing : 1;
  if (typeof ascent !== "number" || typeof descent !== "number" || ascent + descent <= 0) {
    throw new Error(`${source}: ascent and descent must be numbers`);
  }
  if (typeof spacing !== "number") {
    throw new Error(`${source}: spacing must be a number`);
  }
  const rawGlyphs = "glyphs" in value ? value.glyphs : undefined;
  if (typeof rawGlyphs !== "object" || rawGlyphs === null) {
    throw new Error(`${source}: missing glyphs`);
  }

  const glyphs = new Map<string, Glyph>();
  for (const [char, rows] of Object.entries(rawGlyphs)) {
    if (!Array.isArray(rows) || rows.length !== ascent + descent) {
      throw new Error(`${source}: glyph ${JSON.stringify(char)} must have ${ascent + descent} rows`);
    }
    const lines: string[] = [];
    for (const row of rows) {
      if (typeof row !== "string") {
        throw new Error(`${source}: glyph ${JSON.stringify(char)} has a non-string row`);
      }
      lines.push(row);
    }
    const width = lines[0].length;
    if (lines.some((row) => row.length !== width)) {
      throw new Error(`${source}: glyph ${JSON.stringify(char)} has ragged rows`);
    }
    glyphs.set(char, { width, rows: lines });
  }

  return {
    name,
    ascent,
    descent,
    spacing,
    glyph: (char) => glyphs.get(char),
  };
}

/**
 * Built-in last-resort face: a hollow box for every character
 */
export function createTofuFace(): FontFace {
  const box: Glyph = {
    width: 5,
    rows: [".....", "#####", "#...#", "#...#", "#...#", "#...#", "#...#", "#####", ".....", "....."],
  };
  const blank: Glyph = { width: 3, rows: Array.from({ length: 10 }, () => "...") };
  return {
    name: "tofu",
    ascent: 8,
    descent: 2,
    spacing: 1,
    glyph: (char) => (char === " " ? blank : box),
  };
}

interface ResolvedGlyph {
  glyph: Glyph;
  face: FontFace;
}

/**
 * Ordered list of faces; the first face that has a glyph wins
 */
export class FontChain {
  readonly faces: readonly FontFace[];
  private readonly tofu = createTofuFace();

  constructor(faces: readonly FontFace[]) {
    this.faces = faces;
  }

  /** Metrics come from the first face */
  get primary(): FontFace {
    return this.faces[0] ?? this.tofu;
  }

  resolve(char: string): ResolvedGlyph {
    for (const face of this.faces) {
      const glyph = face.glyph(char);
      if (glyph) return { glyph, face };
    }
    return { glyph: this.tofu.glyph(char) ?? { width: 0, rows: [] }, face: this.tofu };
  }
}

function unitFor(face: FontFace, size: number): number {
  return size / (face.ascent + face.descent);
}

/**
 * Advance of each character in canvas pixels (fractional)
 */
function advances(font: Font, text: string): number[] {
  const out: number[] = [];
  for (const char of text) {
    const { glyph, face } = font.face.resolve(char);
    const units = glyph.width + face.spacing + (font.bold ? 1 : 0);
    out.push(units * unitFor(face, font.size));
  }
  return out;
}

/**
 * Width of `text` in canvas pixels. Trailing letter spacing is not counted.
 */
export function measureTextWidth(font: Font, text: string): number {
  const adv = advances(font, text);
  if (adv.length === 0) return 0;
  const last = [...text].at(-1) ?? "";
  const { face } = font.face.resolve(last);
  const total = adv.reduce((sum, a) => sum + a, 0) - face.spacing * unitFor(face, font.size);
  return Math.max(0, Math.round(total));
}

/**
 * Paint `text` with the em box's top-left corner at (x, y)
 */
export function paintText(frame: Frame, font: Font, text: string, x: number, y: number, color: RGB): void {
  let cursor = x;
  for (const char of text) {
    const { glyph, face } = font.face.resolve(char);
    const unit = unitFor(face, font.size);
    const extra = font.bold ? 1 : 0;

    glyph.rows.forEach((row, r) => {
      for (let c = 0; c < row.length; c++) {
        if (row[c] !== "#") continue;
        fillRect(
          frame,
          {
            x1: Math.round(cursor + c * unit),
            y1: Math.round(y + r * unit),
            x2: Math.round(cursor + (c + 1 + extra) * unit),
            y2: Math.round(y + (r + 1) * unit),
          },
          color
        );
      }
    });

    cursor += (glyph.width + face.spacing + extra) * unit;
  }
}
