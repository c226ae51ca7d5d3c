/**
 * Engine configuration
 *
 * Defaults match the 240x240 panel. Every field can be overridden through
 * GLANCE_* environment variables, e.g. GLANCE_JPEG_QUALITY=80.
 */

import { createLogger, type Rotation } from "@glance/core";

const log = createLogger("config");

export interface EngineConfig {
  /** Output width in pixels */
  width: number;
  /** Output height in pixels */
  height: number;
  /** Supersampling factor used while drawing */
  scale: number;
  /** Starting JPEG quality (1-100) */
  jpegQuality: number;
  /** Upload budget for one JPEG frame */
  maxImageBytes: number;
  /** Quality decrement per retry when a frame is over budget */
  qualityStep: number;
  /** Retries stop once quality is at or below this value */
  qualityFloor: number;
  /** Clockwise rotation applied before encoding */
  rotation: Rotation;
  /** Theme used when a scene does not name one */
  theme: string;
  /** Extra bitmap font files, tried before the bundled face */
  fontPaths: string[];
}

export const DEFAULT_CONFIG: EngineConfig = {
  width: 240,
  height: 240,
  scale: 2,
  jpegQuality: 92,
  maxImageBytes: 400 * 1024,
  qualityStep: 10,
  qualityFloor: 20,
  rotation: 0,
  theme: "classic",
  fontPaths: [],
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value < min || value > max) {
    log.warn(`Ignoring ${key}=${raw} (expected ${min}-${max})`);
    return fallback;
  }
  return value;
}

/**
 * Narrow a number to a supported rotation, or null
 */
export function toRotation(value: number): Rotation | null {
  switch (value) {
    case 0:
    case 90:
    case 180:
    case 270:
      return value;
    default:
      return null;
  }
}

/**
 * Build the engine configuration from defaults, environment and overrides
 */
export function loadConfig(env: Env = process.env, overrides: Partial<EngineConfig> = {}): EngineConfig {
  const rotationRaw = readInt(env, "GLANCE_ROTATION", DEFAULT_CONFIG.rotation, 0, 270);
  const rotation = toRotation(rotationRaw);
  if (rotation === null) {
    log.warn(`Ignoring GLANCE_ROTATION=${rotationRaw} (expected 0, 90, 180 or 270)`);
  }

  const fontPaths = (env.GLANCE_FONT_PATHS ?? "")
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  const fromEnv: EngineConfig = {
    width: readInt(env, "GLANCE_WIDTH", DEFAULT_CONFIG.width, 1, 4096),
    height: readInt(env, "GLANCE_HEIGHT", DEFAULT_CONFIG.height, 1, 4096),
    scale: readInt(env, "GLANCE_SCALE", DEFAULT_CONFIG.scale, 1, 4),
    jpegQuality: readInt(env, "GLANCE_JPEG_QUALITY", DEFAULT_CONFIG.jpegQuality, 1, 100),
    maxImageBytes: readInt(env, "GLANCE_MAX_IMAGE_BYTES", DEFAULT_CONFIG.maxImageBytes, 1, Number.MAX_SAFE_INTEGER),
    qualityStep: readInt(env, "GLANCE_QUALITY_STEP", DEFAULT_CONFIG.qualityStep, 1, 100),
    qualityFloor: readInt(env, "GLANCE_QUALITY_FLOOR", DEFAULT_CONFIG.qualityFloor, 1, 100),
    rotation: rotation ?? DEFAULT_CONFIG.rotation,
    theme: env.GLANCE_THEME?.trim() || DEFAULT_CONFIG.theme,
    fontPaths: fontPaths.length > 0 ? fontPaths : [...DEFAULT_CONFIG.fontPaths],
  };

  return { ...fromEnv, ...overrides };
}
