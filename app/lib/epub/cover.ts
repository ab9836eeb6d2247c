import { COVER_HEIGHT, COVER_WIDTH } from "./config";
import { RenderUnavailable } from "./errors";
import { FALLBACK_FONT } from "./renderers";
import { collectIds, freshId, type IdGenerator } from "./ids";
import { escapeXml } from "./xml";
import type {
  Chapter,
  CoverRenderInput,
  CoverRenderer,
  CoverRequest,
  IdentifiedBook,
  Logger,
  RenderedCover,
  ResolvedAttachment,
} from "./types";

const COVER_FILE_ID = "cover";
const COVER_CHAPTER_TITLE = "Cover";

function titlePageXhtml(
  book: Pick<IdentifiedBook, "title" | "author" | "language">,
  body: string,
): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xml:lang="${escapeXml(book.language)}">
<head>
  <title>${escapeXml(book.title)}</title>
</head>
<body>
  <div style="text-align: center;">
${body}
  </div>
</body>
</html>
`;
}

/**
 * Title page chapter: the cover image, or the title and author as text
 */
export function buildTitlePage(
  book: Pick<IdentifiedBook, "title" | "author" | "language">,
  coverFileName: string,
  mode: CoverRequest["titlePage"] = "image",
): Chapter {
  const body =
    mode === "text"
      ? `    <h1>${escapeXml(book.title)}</h1>\n    <p>${escapeXml(book.author)}</p>`
      : `    <img src="${escapeXml(coverFileName)}" alt="${escapeXml(book.title)}"/>`;
  return {
    title: COVER_CHAPTER_TITLE,
    showInTOC: false,
    content: titlePageXhtml(book, body),
  };
}

async function renderCover(
  book: IdentifiedBook,
  request: CoverRequest,
  renderer: CoverRenderer,
  logger: Logger,
): Promise<RenderedCover> {
  if (!renderer.supports(request.format)) {
    throw new RenderUnavailable(
      request.format,
      `Renderer "${renderer.name}" cannot produce ${request.format} covers`,
    );
  }
  const input: CoverRenderInput = {
    title: book.title,
    author: book.author,
    generator: request.generator || undefined,
    fonts: request.fontPreferences ?? [],
    width: request.width ?? COVER_WIDTH,
    height: request.height ?? COVER_HEIGHT,
    format: request.format,
  };

  logger.info(
    `[Cover] Rendering ${input.format} cover ${input.width}x${input.height} for "${book.title}" ` +
      `(font: ${input.fonts[0] ?? FALLBACK_FONT}, renderer: ${renderer.name})`,
  );
  if (input.fonts.length === 0) {
    logger.info(`[Cover] No fonts requested; falling back to ${FALLBACK_FONT}`);
  }

  try {
    return await renderer.render(input);
  } catch (error) {
    if (error instanceof RenderUnavailable) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new RenderUnavailable(request.format, `Cover rendering failed: ${reason}`, { cause: error });
  }
}

/**
 * When the book asks for a cover, render it and inject a title page as the
 * first chapter plus the image as the last attachment. Returns a new book.
 */
export async function composeCover(
  book: IdentifiedBook,
  renderer: CoverRenderer,
  generator: IdGenerator,
  logger: Logger = console,
): Promise<IdentifiedBook> {
  const request = book.cover;
  if (!request) {
    return book;
  }

  const rendered = await renderCover(book, request, renderer, logger);

  const taken = collectIds(book);
  const fileId = taken.has(COVER_FILE_ID) ? freshId(generator, taken) : COVER_FILE_ID;
  const fileNames = new Set(book.attachments.map((a) => a.fileName));
  const preferredName = `cover.${rendered.extension}`;
  const fileName = fileNames.has(preferredName)
    ? `cover-${fileId}.${rendered.extension}`
    : preferredName;

  const attachment: ResolvedAttachment = {
    fileId,
    fileName,
    mimeType: rendered.mimeType,
    content: rendered.data,
  };

  return {
    ...book,
    coverId: book.coverId || fileId,
    chapters: [buildTitlePage(book, fileName, request.titlePage), ...book.chapters],
    attachments: [...book.attachments, attachment],
    cover: undefined,
  };
}
