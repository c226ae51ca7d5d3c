/**
 * Media widget
 * Now-playing view of a media player: album art with a caption overlay
 * when the slot has an image, title and progress otherwise, and a paused
 * placeholder while nothing plays.
 */

import type { Frame } from "@glance/core";
import { conditional, labelValue } from "../components/component-helpers.js";
import { bar, column, icon, spacer, text, type Component } from "../components/components.js";
import { createVerticalLayout } from "../components/flex-layout.js";
import { compareSizeCategory, type RenderContext } from "../render-context.js";
import { PLACEHOLDER_NAME } from "../rendering/palette.js";
import { THEME_TEXT_PRIMARY, THEME_TEXT_SECONDARY, themeAccent, type Color } from "../theme.js";
import { optionBoolean, readAttribute, readNumeric, truncateToWidth } from "./helpers.js";
import { DRAWN, tree, type EntitySnapshot, type WidgetDefinition } from "./types.js";

/** Player states shown as paused */
export const IDLE_STATES: ReadonlySet<string> = new Set(["off", "unavailable", "unknown", "idle", "paused"]);

const OVERLAY_COLOR = { r: 10, g: 10, b: 10 };
const ARTIST_COLOR = { r: 160, g: 160, b: 160 };
const TIME_COLOR = { r: 120, g: 120, b: 120 };
const TRACK_COLOR = { r: 40, g: 40, b: 40 };

/**
 * Playback position in seconds. Players report the position as of their
 * last update, so while playing the time since then is added, capped at
 * the duration when one is known.
 */
export function mediaPosition(entity: EntitySnapshot | null, now: Date): number {
  const position = readNumeric(entity, "media_position") ?? 0;
  if (!entity?.available || entity.state !== "playing") return position;

  const updatedAt = readAttribute(entity, "media_position_updated_at");
  const since = updatedAt ? Date.parse(updatedAt) : NaN;
  if (Number.isNaN(since)) return position;

  const elapsed = (now.getTime() - since) / 1000;
  if (elapsed <= 0) return position;
  const duration = readNumeric(entity, "media_duration") ?? 0;
  return duration > 0 ? Math.min(position + elapsed, duration) : position + elapsed;
}

/** "M:SS", or "H:MM:SS" from an hour up */
export function formatMediaTime(seconds: number): string {
  const total = Math.max(0, Math.trunc(seconds));
  const secs = String(total % 60).padStart(2, "0");
  if (total >= 3600) {
    const minutes = String(Math.floor((total % 3600) / 60)).padStart(2, "0");
    return `${Math.floor(total / 3600)}:${minutes}:${secs}`;
  }
  return `${Math.floor(total / 60)}:${secs}`;
}

export interface Track {
  title: string;
  artist: string;
  album: string;
  position: number;
  duration: number;
}

function playedPercent(track: Pick<Track, "position" | "duration">): number {
  return Math.min(100, (track.position / track.duration) * 100);
}

function clip(value: string, maxChars: number): string {
  return value.length > maxChars ? `${value.slice(0, Math.max(0, maxChars - 2))}..` : value;
}

export function buildPaused(ctx: Pick<RenderContext, "height">): Component {
  return column(
    [
      icon("pause", { size: Math.max(32, Math.trunc(ctx.height * 0.3)), color: THEME_TEXT_SECONDARY }),
      text("PAUSED", { font: "regular", color: THEME_TEXT_SECONDARY }),
    ],
    { gap: Math.trunc(ctx.height * 0.06), align: "center", justify: "center" }
  );
}

export interface NowPlayingOptions {
  color: Color;
  showArtist: boolean;
  showAlbum: boolean;
  showProgress: boolean;
}

/**
 * Title with artist and album underneath, and a progress bar with the
 * elapsed and total time at the bottom
 */
export function buildNowPlaying(
  ctx: Pick<RenderContext, "width" | "height">,
  track: Track,
  options: NowPlayingOptions
): Component {
  const { width, height } = ctx;
  const padding = Math.trunc(width * 0.05);
  const maxChars = Math.floor((width - padding * 2) / 8);
  const gap = Math.trunc(height * 0.02);

  return column(
    [
      text("NOW PLAYING", { font: "small", color: THEME_TEXT_SECONDARY }),
      text(clip(track.title, maxChars), { font: "regular", color: THEME_TEXT_PRIMARY }),
      conditional(
        options.showArtist && track.artist !== "",
        text(clip(track.artist, maxChars), { font: "small", color: THEME_TEXT_SECONDARY })
      ),
      conditional(
        options.showAlbum && track.album !== "",
        text(clip(track.album, maxChars), { font: "small", color: THEME_TEXT_SECONDARY })
      ),
      spacer(),
      conditional(
        options.showProgress && track.duration > 0,
        column(
          [
            bar(playedPercent(track), { color: options.color, height: Math.max(4, Math.trunc(height * 0.05)) }),
            labelValue({
              label: formatMediaTime(track.position),
              value: formatMediaTime(track.duration),
              labelColor: THEME_TEXT_SECONDARY,
              valueColor: THEME_TEXT_SECONDARY,
            }),
          ],
          { gap, align: "stretch" }
        )
      ),
    ],
    { gap, padding, align: "stretch", justify: "start" }
  );
}

/**
 * Cover-fitted art with a dark strip along the bottom carrying the
 * title, then the artist from medium cells and the time in large ones,
 * over a thin progress bar
 */
export function drawAlbumArt(
  ctx: RenderContext,
  art: Frame,
  track: Track,
  options: Pick<NowPlayingOptions, "color" | "showProgress">
): void {
  const { width, height } = ctx;
  const size = ctx.sizeCategory;
  const micro = size === "micro";
  const compact = compareSizeCategory(size, "small") <= 0;

  ctx.drawImage(art, { x1: 0, y1: 0, x2: width, y2: height }, "cover");

  const overlayHeight = Math.trunc(height * (compact && !micro ? 0.3 : 0.28));
  const hasBar = options.showProgress && track.duration > 0;
  const barHeight = hasBar ? Math.max(2, Math.trunc(height * 0.015)) : 0;
  const padding = micro ? Math.max(2, Math.trunc(width * 0.02)) : Math.max(4, Math.trunc(width * 0.04));
  const boxes = createVerticalLayout(width, height, { art: null, caption: overlayHeight - barHeight, bar: barHeight });

  ctx.drawRect({ x1: 0, y1: boxes.caption.y, x2: width, y2: height }, { fill: OVERLAY_COLOR });

  const lines: Array<{ text: string; bold: boolean; font: "tiny" | "small"; color: Color }> = [];
  if (track.title) {
    lines.push({ text: track.title, font: compact ? "tiny" : "small", bold: !micro, color: THEME_TEXT_PRIMARY });
  }
  if (track.artist && compareSizeCategory(size, "medium") >= 0) {
    lines.push({ text: track.artist, font: "tiny", bold: false, color: ARTIST_COLOR });
  }
  if (track.duration > 0 && size === "large") {
    const time = `${formatMediaTime(track.position)} / ${formatMediaTime(track.duration)}`;
    lines.push({ text: time, font: "tiny", bold: false, color: TIME_COLOR });
  }

  // Bottom-up so the last line sits on the bar
  let baseline = boxes.caption.bottom - padding;
  for (const line of [...lines].reverse()) {
    if (baseline <= boxes.caption.y) break;
    const font = ctx.getFont(line.font, line.bold);
    const shown = truncateToWidth(ctx, line.text, font, width - padding * 2);
    ctx.drawText(shown, [padding, baseline], font, line.color, "lb");
    baseline -= ctx.getTextSize(shown, font).height + 1;
  }

  if (hasBar) ctx.drawBar(boxes.bar.rect, playedPercent(track), options.color, TRACK_COLOR);
}

export const mediaWidget: WidgetDefinition = {
  type: "media",
  name: "Media Player",

  render(ctx, config, state) {
    const { options } = config;
    const entity = state.entity;
    if (!entity?.available || IDLE_STATES.has(entity.state)) return tree(buildPaused(ctx));

    const track: Track = {
      title: readAttribute(entity, "media_title") ?? "",
      artist: readAttribute(entity, "media_artist") ?? "",
      album: readAttribute(entity, "media_album_name") ?? "",
      position: mediaPosition(entity, state.now),
      duration: readNumeric(entity, "media_duration") ?? 0,
    };
    const color = config.color ?? themeAccent(config.slot);
    const showProgress = optionBoolean(options, "show_progress", true);

    if (state.image && optionBoolean(options, "show_album_art", true)) {
      drawAlbumArt(ctx, state.image, track, { color, showProgress });
      return DRAWN;
    }

    return tree(
      buildNowPlaying(ctx, track.title ? track : { ...track, title: PLACEHOLDER_NAME }, {
        color,
        showArtist: optionBoolean(options, "show_artist", true),
        showAlbum: optionBoolean(options, "show_album", false),
        showProgress,
      })
    );
  },
};
