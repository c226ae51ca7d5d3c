#!/usr/bin/env node
/**
 * glance CLI
 */

import { config as loadEnv } from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import { basename, extname } from "node:path";
import { pathToFileURL } from "node:url";
import { loadConfig, toRotation, type EngineConfig } from "@glance/engine";
import { catalogFor, describeIcons, describeLayouts, renderSamples, renderSceneFile, SCENES_DIR } from "./commands.js";
import { SceneError } from "./scene.js";

type GlobalOptions = {
  theme?: string;
  rotation?: EngineConfig["rotation"];
  quality?: number;
  maxBytes?: number;
};

function parseIntOption(min: number, max: number) {
  return (value: string): number => {
    const n = Number.parseInt(value, 10);
    if (Number.isNaN(n) || n < min || n > max) {
      throw new InvalidArgumentError(`Expected an integer between ${min} and ${max}.`);
    }
    return n;
  };
}

function parseRotation(value: string): EngineConfig["rotation"] {
  const rotation = toRotation(Number.parseInt(value, 10));
  if (rotation === null) throw new InvalidArgumentError("Expected 0, 90, 180 or 270.");
  return rotation;
}

/**
 * Engine config from the environment, with flags taking precedence
 */
export function configFrom(options: GlobalOptions, env: Record<string, string | undefined> = process.env): EngineConfig {
  const overrides: Partial<EngineConfig> = {};
  if (options.theme !== undefined) overrides.theme = options.theme;
  if (options.rotation !== undefined) overrides.rotation = options.rotation;
  if (options.quality !== undefined) overrides.jpegQuality = options.quality;
  if (options.maxBytes !== undefined) overrides.maxImageBytes = options.maxBytes;
  return loadConfig(env, overrides);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("glance")
    .description("Render 240x240 dashboard images from scene files")
    .version("0.1.0")
    .option("--theme <name>", "theme for scenes that do not name one")
    .option("--rotation <degrees>", "clockwise rotation before encoding", parseRotation)
    .option("--quality <n>", "starting JPEG quality", parseIntOption(1, 100))
    .option("--max-bytes <n>", "JPEG size budget in bytes", parseIntOption(1, Number.MAX_SAFE_INTEGER));

  program
    .command("render")
    .description("Render a scene file to JPEG")
    .argument("<scene>", "scene JSON file")
    .option("-o, --out <base>", "output path without extension (default: scene name)")
    .option("--png", "also write a PNG")
    .action(async (scene: string, options: { out?: string; png?: boolean }) => {
      const config = configFrom(program.opts<GlobalOptions>());
      const outBase = options.out ?? basename(scene, extname(scene));
      const result = await renderSceneFile(scene, outBase, config, { png: options.png });
      console.log(`Wrote ${result.jpegPath} (${result.jpegBytes} bytes)`);
      if (result.pngPath) console.log(`Wrote ${result.pngPath}`);
    });

  program
    .command("samples")
    .description("Render every scene in a directory")
    .argument("[dir]", "scene directory", SCENES_DIR)
    .option("-o, --out-dir <dir>", "output directory", "samples")
    .action(async (dir: string, options: { outDir: string }) => {
      const config = configFrom(program.opts<GlobalOptions>());
      console.log(`Rendering samples from ${dir} into ${options.outDir}\n`);
      const { rendered, failed } = await renderSamples(dir, options.outDir, config);
      for (const result of rendered) {
        console.log(`  ${basename(result.jpegPath).padEnd(28)} ${result.jpegBytes} bytes`);
      }
      console.log(`\n${rendered.length} rendered, ${failed.length} failed`);
      if (failed.length > 0) process.exitCode = 1;
    });

  program
    .command("layouts")
    .description("List layout types and their slots")
    .action(() => {
      const config = configFrom(program.opts<GlobalOptions>());
      describeLayouts(config).forEach((line) => console.log(line));
    });

  program
    .command("icons")
    .description("List bundled icon names")
    .option("-a, --aliases", "include aliases")
    .action((options: { aliases?: boolean }) => {
      const config = configFrom(program.opts<GlobalOptions>());
      describeIcons(catalogFor(config), options.aliases).forEach((line) => console.log(line));
    });

  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  loadEnv();
  try {
    await createProgram().parseAsync([...argv]);
  } catch (error) {
    if (error instanceof SceneError) {
      console.error(`Invalid scene: ${error.message}`);
    } else {
      console.error("glance failed:", error);
    }
    process.exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
