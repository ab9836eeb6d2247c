import type { CoverRenderer, Logger, NavigationPolicy } from "./types";
import { uuidGenerator, type IdGenerator } from "./ids";
import { createCoverRenderer } from "./renderers";

// Kindle Direct Publishing's recommended cover size
export const COVER_WIDTH = 1600;
export const COVER_HEIGHT = 2560;

export const UNKNOWN_AUTHOR = "Unknown";
export const DEFAULT_LANGUAGE = "en";
export const DEFAULT_GENERATOR = "bindery";
export const DEFLATE_LEVEL = 6;
// Stamped on every archive member so the same book always packs to the same bytes
export const ARCHIVE_DATE = new Date(Date.UTC(2000, 0, 1));

export const EPUB_MIMETYPE = "application/epub+zip";
export const XHTML_MIMETYPE = "application/xhtml+xml";
export const NCX_MIMETYPE = "application/x-dtbncx+xml";
export const STYLESHEET_FILE = "stylesheet.css";

export interface PackOptions {
  idGenerator?: IdGenerator;
  renderer?: CoverRenderer;
  navigation?: NavigationPolicy;
  /** Written to dtb:generator in toc.ncx */
  generatorName?: string;
  compressionLevel?: number;
  logger?: Logger;
  onProgress?: (percent: number, message: string) => void;
}

export type ResolvedPackOptions = Required<PackOptions>;

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function resolvePackOptions(options: PackOptions = {}): ResolvedPackOptions {
  const level = options.compressionLevel ?? DEFLATE_LEVEL;
  const logger = options.logger ?? console;
  return {
    idGenerator: options.idGenerator ?? uuidGenerator,
    renderer: options.renderer ?? createCoverRenderer(logger),
    navigation: options.navigation ?? "all",
    generatorName: options.generatorName || DEFAULT_GENERATOR,
    compressionLevel: Math.min(9, Math.max(1, Math.round(level))),
    logger,
    onProgress: options.onProgress ?? (() => {}),
  };
}
