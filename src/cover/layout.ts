import { CANONICAL_SIZE } from "./art.js";
import type { Palette, TextWrapLimits, VectorDocument } from "./types.js";

export const DEFAULT_WRAP_LIMITS: TextWrapLimits = {
  titleWidth: 22,
  titleLines: 2,
  subtitleWidth: 38,
  subtitleLines: 2,
};

export const ART_REGION = { x: 750, y: 500, size: 1500, radius: 48 } as const;
export const TEXT_LEFT = 150;
export const TEXT_BASE_Y = 2150;
export const TEXT_BASE_RAISE_PER_LINE = 40;
export const LINE_HEIGHT_RATIO = 1.07;

/** Longest title line (in characters) → font size. */
export const TITLE_SIZE_TIERS = [
  { maxChars: 14, size: 160 },
  { maxChars: 18, size: 140 },
  { maxChars: 22, size: 120 },
] as const;
export const MIN_TITLE_SIZE = 104;
export const MULTI_LINE_TITLE_MAX_SIZE = 120;

export const SUBTITLE_SIZE = 80;
export const SUBTITLE_LINE_DY = 100;
export const SUBTITLE_GAP = 160;

export const BADGE_ORIGIN = { x: 150, y: 200 } as const;
export const BADGE_HEIGHT = 150;
export const BADGE_FONT_SIZE = 64;
export const BADGE_PADDING_X = 40;
export const BADGE_BASELINE_Y = 100;
export const BADGE_MAX_WIDTH = CANONICAL_SIZE - 2 * BADGE_ORIGIN.x;
// Average glyph advance as a share of font size for the sans-serif fallback.
const BADGE_GLYPH_RATIO = 0.6;

const ELLIPSIS = "…";

export interface CoverLayoutInput {
  palette: Palette;
  artDataUri: string;
  title: string;
  subtitle?: string;
  badge?: string;
  wrap?: TextWrapLimits;
  canvasSize?: number;
}

export interface TitleMetrics {
  lines: string[];
  fontSize: number;
  lineDy: number;
}

export const escapeXml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");

const splitLongWord = (word: string, width: number): string[] => {
  const chunks: string[] = [];
  for (let index = 0; index < word.length; index += width) {
    chunks.push(word.slice(index, index + width));
  }
  return chunks;
};

/**
 * Greedy word wrap to `width` characters, keeping at most `maxLines` lines.
 * Overflowing text is cut and the last kept line gets an ellipsis.
 */
export const wrapLines = (
  text: string | undefined,
  width: number,
  maxLines: number,
): string[] => {
  const words = (text ?? "")
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .flatMap((word) => (word.length > width ? splitLongWord(word, width) : [word]));
  if (words.length === 0 || maxLines <= 0) {
    return [];
  }

  const lines: string[] = [];
  let current = "";
  for (const word of words) {
    if (current.length === 0) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current = `${current} ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  lines.push(current);

  if (lines.length <= maxLines) {
    return lines;
  }

  const kept = lines.slice(0, maxLines);
  const lastIndex = kept.length - 1;
  if (kept[lastIndex].length > 3) {
    kept[lastIndex] = `${kept[lastIndex].replace(/[. ]+$/, "")}${ELLIPSIS}`;
  }
  return kept;
};

export const titleFontSize = (lines: string[]): number => {
  const longest = Math.max(0, ...lines.map((line) => line.length));
  const tier = TITLE_SIZE_TIERS.find((entry) => longest <= entry.maxChars);
  const size = tier?.size ?? MIN_TITLE_SIZE;
  return lines.length > 1 ? Math.min(size, MULTI_LINE_TITLE_MAX_SIZE) : size;
};

export const measureTitle = (
  title: string,
  wrap: TextWrapLimits = DEFAULT_WRAP_LIMITS,
): TitleMetrics => {
  const lines = wrapLines(title, wrap.titleWidth, wrap.titleLines);
  const fontSize = titleFontSize(lines);
  return { lines, fontSize, lineDy: Math.round(fontSize * LINE_HEIGHT_RATIO) };
};

export const badgeWidth = (badge: string): number =>
  Math.min(
    BADGE_MAX_WIDTH,
    BADGE_PADDING_X * 2 +
      Math.round([...badge].length * BADGE_FONT_SIZE * BADGE_GLYPH_RATIO),
  );

const renderTspans = (lines: string[], lineDy: number): string =>
  lines
    .map(
      (line, index) =>
        `<tspan x="0" dy="${index === 0 ? 0 : lineDy}">${escapeXml(line)}</tspan>`,
    )
    .join("");

/** Build the cover SVG. Output depends only on the inputs. */
export const composeCover = (input: CoverLayoutInput): VectorDocument => {
  const size = input.canvasSize ?? CANONICAL_SIZE;
  const wrap = input.wrap ?? DEFAULT_WRAP_LIMITS;
  const { palette } = input;
  // Layout constants are authored for the canonical canvas.
  const scale = size / CANONICAL_SIZE;
  const px = (value: number): number => Math.round(value * scale);

  const title = measureTitle(input.title, wrap);
  const subtitleLines = wrapLines(
    input.subtitle,
    wrap.subtitleWidth,
    wrap.subtitleLines,
  );
  const extraTitleLines = Math.max(0, title.lines.length - 1);
  const textBaseY = TEXT_BASE_Y - TEXT_BASE_RAISE_PER_LINE * extraTitleLines;
  const subtitleOffsetY = SUBTITLE_GAP + title.lineDy * extraTitleLines;
  const badge = input.badge?.trim() ?? "";
  const art = {
    x: px(ART_REGION.x),
    y: px(ART_REGION.y),
    size: px(ART_REGION.size),
    radius: px(ART_REGION.radius),
  };

  const parts: string[] = [
    `<svg width="${size}" height="${size}" viewBox="0 0 ${size} ${size}" xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink">`,
    "  <defs>",
    '    <linearGradient id="bggrad" x1="0" y1="0" x2="0" y2="1">',
    `      <stop offset="0%" stop-color="${escapeXml(palette.BG1)}"/>`,
    `      <stop offset="100%" stop-color="${escapeXml(palette.BG2)}"/>`,
    "    </linearGradient>",
    '    <clipPath id="artclip">',
    `      <rect x="${art.x}" y="${art.y}" width="${art.size}" height="${art.size}" rx="${art.radius}" ry="${art.radius}"/>`,
    "    </clipPath>",
    "  </defs>",
    `  <rect x="0" y="0" width="${size}" height="${size}" fill="url(#bggrad)"/>`,
    `  <image x="${art.x}" y="${art.y}" width="${art.size}" height="${art.size}" preserveAspectRatio="xMidYMid slice" clip-path="url(#artclip)" opacity="0.96" xlink:href="${input.artDataUri}"/>`,
    `  <g transform="translate(${px(TEXT_LEFT)}, ${px(textBaseY)})">`,
  ];

  if (title.lines.length > 0) {
    parts.push(
      `    <text font-family="sans-serif" font-size="${px(title.fontSize)}" font-weight="700" fill="${escapeXml(palette.TITLE_COLOR)}">${renderTspans(title.lines, px(title.lineDy))}</text>`,
    );
  }
  if (subtitleLines.length > 0) {
    parts.push(
      `    <text y="${px(subtitleOffsetY)}" font-family="sans-serif" font-size="${px(SUBTITLE_SIZE)}" fill="${escapeXml(palette.SUBTITLE_COLOR)}" opacity="0.92">${renderTspans(subtitleLines, px(SUBTITLE_LINE_DY))}</text>`,
    );
  }
  parts.push("  </g>");

  if (badge.length > 0) {
    parts.push(
      `  <g transform="translate(${px(BADGE_ORIGIN.x)}, ${px(BADGE_ORIGIN.y)})">`,
      `    <rect x="0" y="0" width="${px(badgeWidth(badge))}" height="${px(BADGE_HEIGHT)}" rx="${px(BADGE_HEIGHT / 2)}" fill="${escapeXml(palette.BADGE_BG)}" opacity="0.9"/>`,
      `    <text x="${px(BADGE_PADDING_X)}" y="${px(BADGE_BASELINE_Y)}" font-family="sans-serif" font-size="${px(BADGE_FONT_SIZE)}" font-weight="700" fill="${escapeXml(palette.BADGE_COLOR)}">${escapeXml(badge)}</text>`,
      "  </g>",
    );
  }

  parts.push("</svg>", "");

  return Object.freeze({
    svg: parts.join("\n"),
    width: size,
    height: size,
    background: palette.BG2,
  });
};
