export type CoverFormat = "svg" | "png";

export type NavigationPolicy = "all" | "visible";

/**
 * A Chapter appears in the main reading order of the book.
 * Content must already be a valid XHTML document; it is written as-is.
 */
export interface Chapter {
  title: string;
  showInTOC: boolean;
  content: string;
}

/**
 * Any other file bundled into the archive: images, stylesheets, fonts.
 */
export interface Attachment {
  /** Generated when empty */
  fileId?: string;
  /** Archive-relative path, e.g. "images/map.png" */
  fileName: string;
  mimeType: string;
  content: Uint8Array;
}

/**
 * Describes a cover to generate. Consumed once during packaging.
 */
export interface CoverRequest {
  format: CoverFormat;
  width?: number;
  height?: number;
  /** Tried in order; the renderer falls back to sans-serif last */
  fontPreferences?: string[];
  /** Name of the program that made the book, printed as "Generated by ..." */
  generator?: string;
  /** "image" embeds the cover in the title page, "text" prints title and author */
  titlePage?: "image" | "text";
}

export interface Book {
  id?: string;
  title: string;
  author?: string;
  language?: string;
  chapters: Chapter[];
  attachments: Attachment[];
  /** fileId of the attachment to use as cover image */
  coverId?: string;
  cover?: CoverRequest;
  /** CSS text, written as stylesheet.css */
  stylesheet?: string;
}

export interface ResolvedChapter extends Chapter {
  readonly index: number;
  readonly fileId: string;
  readonly fileName: string;
  readonly navId: string;
}

export interface ResolvedAttachment extends Attachment {
  readonly fileId: string;
}

/**
 * Packaging view of a Book: every identifier and index is final.
 */
export interface ResolvedBook {
  readonly id: string;
  readonly title: string;
  readonly author: string;
  readonly language: string;
  readonly chapters: readonly ResolvedChapter[];
  readonly attachments: readonly ResolvedAttachment[];
  readonly coverId?: string;
  readonly stylesheet?: string;
}

export interface RenderedCover {
  data: Uint8Array;
  mimeType: string;
  extension: string;
}

export interface CoverRenderInput {
  title: string;
  author: string;
  generator?: string;
  fonts: string[];
  width: number;
  height: number;
  format: CoverFormat;
}

export interface CoverRenderer {
  readonly name: string;
  supports(format: CoverFormat): boolean;
  render(input: CoverRenderInput): Promise<RenderedCover>;
}

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A book after identity assignment, before chapters are indexed
 */
export interface IdentifiedBook extends Omit<Book, "id" | "author" | "language" | "attachments"> {
  id: string;
  author: string;
  language: string;
  attachments: ResolvedAttachment[];
}
