import {
  DEFAULT_LANGUAGE,
  EPUB_MIMETYPE,
  STYLESHEET_FILE,
  UNKNOWN_AUTHOR,
  resolvePackOptions,
  type PackOptions,
} from "./config";
import { EpubContainer, writeToPath } from "./container";
import { composeCover } from "./cover";
import { IdentityError } from "./errors";
import { assignIdentities, collectIds, freshId } from "./ids";
import { indexChapters } from "./model";
import { buildTocNcx } from "./ncx";
import { buildContentOpf } from "./opf";
import type { Book, IdentifiedBook, ResolvedBook } from "./types";

const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

export interface PackResult {
  book: ResolvedBook;
  container: EpubContainer;
}

function assertUniqueManifestIds(book: ResolvedBook): void {
  const ids = new Set<string>(["ncx"]);
  if (book.stylesheet !== undefined) ids.add("stylesheet");
  const all = [...book.chapters.map((ch) => ch.fileId), ...book.attachments.map((a) => a.fileId)];
  for (const id of all) {
    if (ids.has(id)) {
      throw new IdentityError(`Manifest id "${id}" is used more than once`);
    }
    ids.add(id);
  }
}

/**
 * Derive the final packaging view of a book: ids assigned, cover injected,
 * chapters indexed. The caller's Book is left untouched.
 */
export async function resolveBook(book: Book, options: PackOptions = {}): Promise<ResolvedBook> {
  const { idGenerator, renderer, logger } = resolvePackOptions(options);

  // 1. Identities
  const identified: IdentifiedBook = {
    ...assignIdentities(book, idGenerator),
    author: book.author || UNKNOWN_AUTHOR,
    language: book.language || DEFAULT_LANGUAGE,
    chapters: [...book.chapters],
  };

  // 2. Cover, which prepends a chapter
  const withCover = await composeCover(identified, renderer, idGenerator, logger);

  // 3. Chapter indices reflect the final order
  const chapters = indexChapters(withCover.chapters);

  // 4. Any fileId still missing
  const taken = collectIds(withCover);
  const attachments = withCover.attachments.map((a) =>
    a.fileId ? a : { ...a, fileId: freshId(idGenerator, taken) },
  );

  const resolved: ResolvedBook = {
    id: withCover.id,
    title: withCover.title,
    author: withCover.author,
    language: withCover.language,
    chapters,
    attachments,
    coverId: withCover.coverId || undefined,
    stylesheet: withCover.stylesheet,
  };
  assertUniqueManifestIds(resolved);
  return resolved;
}

/**
 * Resolve the book and lay out every archive member in reading-system order.
 * Nothing is compressed until the container is finalized.
 */
export async function pack(book: Book, options: PackOptions = {}): Promise<PackResult> {
  const resolvedOptions = resolvePackOptions(options);
  const { logger, onProgress: progress } = resolvedOptions;

  logger.info(`[Bindery] Packing "${book.title}" (${book.chapters.length} chapters)`);
  progress(5, "Resolving book...");
  const resolved = await resolveBook(book, resolvedOptions);

  progress(40, "Generating package documents...");
  const opf = buildContentOpf(resolved, logger);
  const ncx = buildTocNcx(resolved, {
    navigation: resolvedOptions.navigation,
    generatorName: resolvedOptions.generatorName,
  });

  const container = new EpubContainer(resolvedOptions.compressionLevel);

  // mimetype must be the first entry, uncompressed
  container.add("mimetype", EPUB_MIMETYPE, { store: true });
  container.add("META-INF/container.xml", CONTAINER_XML);
  container.add("content.opf", opf);
  container.add("toc.ncx", ncx);
  if (resolved.stylesheet !== undefined) {
    container.add(STYLESHEET_FILE, resolved.stylesheet);
  }

  progress(60, "Adding chapters...");
  for (const chapter of resolved.chapters) {
    container.add(chapter.fileName, chapter.content);
  }
  for (const attachment of resolved.attachments) {
    container.add(attachment.fileName, attachment.content);
  }

  progress(80, `Laid out ${container.size} members`);
  return { book: resolved, container };
}

/**
 * Pack and compress the book into EPUB bytes
 */
export async function packToBuffer(
  book: Book,
  options: PackOptions = {},
): Promise<{ book: ResolvedBook; buffer: Buffer }> {
  const { logger, onProgress } = resolvePackOptions(options);
  const result = await pack(book, options);

  onProgress(90, "Compressing EPUB...");
  const buffer = await result.container.finalize();

  logger.info(
    `[Bindery] Packed "${result.book.title}" (${result.container.size} members, ${(buffer.length / 1024).toFixed(1)} KB)`,
  );
  onProgress(100, "Packing complete");
  return { book: result.book, buffer };
}

/**
 * Pack the book and write the EPUB to `path`
 */
export async function writeEpub(
  book: Book,
  path: string,
  options: PackOptions = {},
): Promise<ResolvedBook> {
  const { book: resolved, buffer } = await packToBuffer(book, options);
  await writeToPath(buffer, path);
  return resolved;
}
