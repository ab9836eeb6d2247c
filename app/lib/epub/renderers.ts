import type Sharp from "sharp";
import { RenderUnavailable } from "./errors";
import { escapeXml } from "./xml";
import type { CoverFormat, CoverRenderInput, CoverRenderer, Logger, RenderedCover } from "./types";

export const FALLBACK_FONT = "sans-serif";
const GENERIC_FAMILIES = new Set(["serif", "sans-serif", "monospace", "cursive", "fantasy"]);

// Rough advance width of a bold glyph, as a fraction of the font size
const GLYPH_WIDTH_RATIO = 0.55;
const TITLE_SIZE = 90;
const MIN_SIZE = 5;

// Every space-separated word must be a CSS identifier to go unquoted
function isIdentifierSequence(font: string): boolean {
  return font.split(/\s+/).every((word) => /^[A-Za-z_][\w-]*$/.test(word));
}

/**
 * CSS font-family list: requested fonts in order, sans-serif last
 */
export function fontFamilyList(fonts: readonly string[]): string {
  const families = fonts
    .map((font) => font.trim())
    .filter(Boolean)
    .map((font) =>
      GENERIC_FAMILIES.has(font) || isIdentifierSequence(font)
        ? font
        : `'${font.replace(/'/g, "\\'")}'`,
    );
  if (families[families.length - 1] !== FALLBACK_FONT) {
    families.push(FALLBACK_FONT);
  }
  return families.join(", ");
}

/**
 * Shrink from `start` in steps of 5 until the text fits in 80% of the cover width
 */
export function fitFontSize(text: string, start: number, coverWidth: number): number {
  const happyWidth = coverWidth * 0.8;
  let size = start;
  while (size > MIN_SIZE && text.length * size * GLYPH_WIDTH_RATIO > happyWidth) {
    size -= 5;
  }
  return size;
}

function fmt(value: number): string {
  return String(Number(value.toFixed(2)));
}

/**
 * Draw the cover as SVG markup: grey background, heavy red border,
 * title at a quarter height, author at half, attribution near the bottom.
 */
export function buildCoverSvg(input: CoverRenderInput): string {
  const { width, height } = input;
  const margin = width * 0.05;
  const centre = width / 2;

  const titleSize = fitFontSize(input.title, TITLE_SIZE, width);
  const lines: { text: string; y: number; size: number }[] = [
    { text: input.title, y: height * 0.25, size: titleSize },
    { text: input.author, y: height * 0.5, size: fitFontSize(input.author, titleSize * 0.8, width) },
  ];
  if (input.generator) {
    const label = `Generated by ${input.generator}`;
    lines.push({ text: label, y: height * 0.9, size: fitFontSize(label, titleSize * 0.5, width) });
  }

  const textElements = lines.map(
    (line) =>
      `    <text x="${fmt(centre)}" y="${fmt(line.y)}" font-size="${fmt(line.size)}" stroke-width="${fmt(line.size * 0.025)}">${escapeXml(line.text)}</text>`,
  );

  return [
    `<?xml version="1.0" encoding="UTF-8" standalone="no"?>`,
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `  <rect x="0" y="0" width="${width}" height="${height}" fill="#f2f2f2"/>`,
    `  <rect x="${fmt(margin)}" y="${fmt(margin)}" width="${fmt(width - 2 * margin)}" height="${fmt(height - 2 * margin)}" fill="none" stroke="#8c1a1a" stroke-width="30"/>`,
    `  <g font-family="${escapeXml(fontFamilyList(input.fonts))}" font-weight="bold" text-anchor="middle" fill="#33408c" stroke="#000000">`,
    ...textElements,
    `  </g>`,
    `</svg>`,
    ``,
  ].join("\n");
}

/**
 * Renderer for environments without graphics support: SVG only.
 */
export function createVectorCoverRenderer(): CoverRenderer {
  return {
    name: "vector",
    supports: (format: CoverFormat) => format === "svg",
    async render(input) {
      if (input.format !== "svg") {
        throw new RenderUnavailable(input.format, `The vector renderer cannot produce ${input.format} covers`);
      }
      return {
        data: new TextEncoder().encode(buildCoverSvg(input)),
        mimeType: "image/svg+xml",
        extension: "svg",
      };
    },
  };
}

let sharpModule: Promise<typeof Sharp> | undefined;

/**
 * Loaded on the first PNG render; a missing native binary becomes RenderUnavailable
 */
async function loadSharp(): Promise<typeof Sharp> {
  if (!sharpModule) {
    sharpModule = import("sharp").then((mod) => mod.default);
  }
  try {
    return await sharpModule;
  } catch (error) {
    sharpModule = undefined;
    const reason = error instanceof Error ? error.message : String(error);
    throw new RenderUnavailable("png", `sharp could not be loaded: ${reason}`, { cause: error });
  }
}

/**
 * Renderer backed by sharp: rasterizes the SVG cover to PNG.
 * Font fallback is left to fontconfig through the font-family list.
 */
export function createRasterCoverRenderer(logger: Logger = console): CoverRenderer {
  const vector = createVectorCoverRenderer();
  return {
    name: "raster",
    supports: (format: CoverFormat) => format === "svg" || format === "png",
    async render(input): Promise<RenderedCover> {
      if (input.format === "svg") {
        return vector.render(input);
      }
      const svg = buildCoverSvg(input);
      logger.info(
        `[Cover] Rasterizing ${input.width}x${input.height} cover, fonts: ${fontFamilyList(input.fonts)}`,
      );
      const sharp = await loadSharp();
      const png = await sharp(Buffer.from(svg)).png().toBuffer();
      return { data: png, mimeType: "image/png", extension: "png" };
    },
  };
}

export function createCoverRenderer(logger?: Logger): CoverRenderer {
  return createRasterCoverRenderer(logger);
}
