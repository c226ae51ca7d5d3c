/**
 * Asset catalog
 *
 * Fonts, icons, themes and entity state tables are read from disk once
 * and handed to the renderer and layouts. Nothing in a render pass touches
 * the filesystem.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { createLogger } from "@glance/core";
import { FontChain, parseFontFace, type FontFace } from "./rendering/bitmap-font.js";
import { IconSet } from "./rendering/icons.js";
import { parseEntityStateTables, type EntityStateTables } from "./entity-states.js";
import { parseTheme, type Theme } from "./theme.js";

const log = createLogger("assets");

/** Bundled asset directory (packages/engine/assets) */
export const ASSET_DIR = fileURLToPath(new URL("../assets/", import.meta.url));

export const BUNDLED_FONT = "fonts/glance-5x7.json";

export interface AssetCatalogOptions {
  /** Font files tried before the bundled face */
  fontPaths?: string[];
  /** Override the bundled asset directory */
  assetDir?: string;
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

export class AssetCatalog {
  readonly fonts: FontChain;
  readonly icons: IconSet;
  readonly entityStates: EntityStateTables;
  private readonly themes: ReadonlyMap<string, Theme>;
  readonly defaultTheme: Theme;

  constructor(
    fonts: FontChain,
    icons: IconSet,
    themes: readonly Theme[],
    defaultThemeName: string,
    entityStates: EntityStateTables
  ) {
    const first = themes[0];
    if (first === undefined) throw new Error("at least one theme is required");
    this.fonts = fonts;
    this.icons = icons;
    this.entityStates = entityStates;
    this.themes = new Map(themes.map((t) => [t.name, t]));
    this.defaultTheme = this.themes.get(defaultThemeName) ?? first;
  }

  get themeNames(): string[] {
    return [...this.themes.keys()];
  }

  hasTheme(name: string): boolean {
    return this.themes.has(name);
  }

  /**
   * Theme by name; unknown or missing names give the default theme
   */
  theme(name?: string): Theme {
    if (name === undefined) return this.defaultTheme;
    const theme = this.themes.get(name);
    if (!theme) {
      log.debug(`Unknown theme "${name}", using "${this.defaultTheme.name}"`);
      return this.defaultTheme;
    }
    return theme;
  }
}

/**
 * Load every face that parses; broken files are skipped with a warning
 */
export function loadFontFaces(paths: readonly string[]): FontFace[] {
  const faces: FontFace[] = [];
  for (const path of paths) {
    try {
      faces.push(parseFontFace(readJson(path), path));
    } catch (error) {
      log.warn(`Skipping font ${path}:`, error instanceof Error ? error.message : error);
    }
  }
  return faces;
}

/**
 * Read fonts, icons, themes and entity state tables from disk
 */
export function loadAssetCatalog(options: AssetCatalogOptions = {}): AssetCatalog {
  const dir = options.assetDir ?? ASSET_DIR;
  const faces = loadFontFaces([...(options.fontPaths ?? []), `${dir}/${BUNDLED_FONT}`]);
  if (faces.length === 0) {
    log.warn("No font could be loaded, text will render as boxes");
  }

  const icons = IconSet.fromJson(readJson(`${dir}/icons.json`));

  const themeFile = readJson(`${dir}/themes.json`);
  const entries =
    typeof themeFile === "object" && themeFile !== null && "themes" in themeFile && Array.isArray(themeFile.themes)
      ? themeFile.themes
      : [];
  const themes = entries.map((entry: unknown) => parseTheme(entry));
  const defaultName =
    typeof themeFile === "object" && themeFile !== null && "default" in themeFile && typeof themeFile.default === "string"
      ? themeFile.default
      : "classic";

  const entityStates = parseEntityStateTables(readJson(`${dir}/entity-states.json`));

  log.debug(`Loaded ${faces.length} font(s), ${icons.names.length} icons, ${themes.length} themes`);
  return new AssetCatalog(new FontChain(faces), icons, themes, defaultName, entityStates);
}
