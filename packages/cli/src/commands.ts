/**
 * Command implementations, kept apart from argument parsing so tests can
 * call them directly.
 */

import { mkdir, readdir, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger } from "@glance/core";
import {
  createLayout,
  LAYOUT_TYPES,
  loadAssetCatalog,
  renderDashboard,
  type AssetCatalog,
  type EngineConfig,
} from "@glance/engine";
import { loadScene, SceneError } from "./scene.js";

const log = createLogger("cli");

/** Bundled sample scenes */
export const SCENES_DIR = fileURLToPath(new URL("../scenes/", import.meta.url));

export interface RenderResult {
  scene: string;
  jpegPath: string;
  jpegBytes: number;
  pngPath: string | null;
  failedSlots: number[];
}

export function catalogFor(config: EngineConfig): AssetCatalog {
  return loadAssetCatalog({ fontPaths: config.fontPaths });
}

/**
 * Render one scene file to `<outBase>.jpg` (and `.png` when asked)
 */
export async function renderSceneFile(
  scenePath: string,
  outBase: string,
  config: EngineConfig,
  options: { png?: boolean; catalog?: AssetCatalog } = {}
): Promise<RenderResult> {
  const scene = await loadScene(scenePath);
  const result = await renderDashboard(scene, options.catalog ?? catalogFor(config), config);

  const jpegPath = `${outBase}.jpg`;
  await writeFile(jpegPath, result.jpeg);
  let pngPath: string | null = null;
  if (options.png) {
    pngPath = `${outBase}.png`;
    await writeFile(pngPath, result.png);
  }

  if (result.failedSlots.length > 0) {
    log.warn(`${basename(scenePath)}: slot(s) ${result.failedSlots.join(", ")} failed to render`);
  }
  return { scene: scenePath, jpegPath, jpegBytes: result.jpeg.length, pngPath, failedSlots: result.failedSlots };
}

/** Output path for a scene without its extension */
export function outputBase(scenePath: string, outDir: string): string {
  return join(outDir, basename(scenePath, extname(scenePath)));
}

export interface SamplesResult {
  rendered: RenderResult[];
  /** Scene files that could not be rendered, with the reason */
  failed: Array<{ scene: string; error: string }>;
}

/**
 * Render every scene in `sceneDir` into `outDir`. A broken scene is
 * reported and skipped.
 */
export async function renderSamples(sceneDir: string, outDir: string, config: EngineConfig): Promise<SamplesResult> {
  const files = (await readdir(sceneDir)).filter((file) => file.endsWith(".json")).sort();
  await mkdir(outDir, { recursive: true });

  const catalog = catalogFor(config);
  const result: SamplesResult = { rendered: [], failed: [] };
  for (const file of files) {
    const scenePath = join(sceneDir, file);
    try {
      result.rendered.push(await renderSceneFile(scenePath, outputBase(scenePath, outDir), config, { png: true, catalog }));
    } catch (error) {
      if (!(error instanceof SceneError)) throw error;
      log.error(`Skipping ${file}: ${error.message}`);
      result.failed.push({ scene: scenePath, error: error.message });
    }
  }
  return result;
}

/** One line per layout type: name, slot count and slot sizes */
export function describeLayouts(config: Pick<EngineConfig, "width" | "height">): string[] {
  return LAYOUT_TYPES.map((type) => {
    const layout = createLayout(type, { width: config.width, height: config.height });
    const sizes = layout.slots.map(({ rect }) => `${rect.x2 - rect.x1}x${rect.y2 - rect.y1}`);
    return `${type.padEnd(16)} ${String(layout.slotCount).padStart(2)} slot(s)  ${sizes.join(" ")}`;
  });
}

/** Icon names, optionally followed by aliases as `alias -> icon` */
export function describeIcons(catalog: AssetCatalog, withAliases = false): string[] {
  const lines = [...catalog.icons.names];
  if (withAliases) {
    for (const alias of catalog.icons.aliasNames) {
      lines.push(`${alias} -> ${catalog.icons.resolve(alias).name}`);
    }
  }
  return lines;
}
