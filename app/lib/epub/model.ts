import { InvalidReference } from "./errors";
import { stableHash } from "./ids";
import type { Chapter, ResolvedAttachment, ResolvedBook, ResolvedChapter } from "./types";

export function chapterFileId(index: number): string {
  return `chapter${index}`;
}

export function chapterFileName(index: number): string {
  return `${chapterFileId(index)}.html`;
}

/**
 * Pin a chapter to its final 1-based position in the spine
 */
export function resolveChapter(chapter: Chapter, index: number): ResolvedChapter {
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`Chapter index must be a positive integer, got ${index}`);
  }
  return {
    title: chapter.title,
    showInTOC: chapter.showInTOC,
    content: chapter.content,
    index,
    fileId: chapterFileId(index),
    fileName: chapterFileName(index),
    navId: `ch${stableHash(chapter.title)}`,
  };
}

export function indexChapters(chapters: readonly Chapter[]): ResolvedChapter[] {
  return chapters.map((chapter, i) => resolveChapter(chapter, i + 1));
}

export function findAttachment(
  book: Pick<ResolvedBook, "attachments">,
  fileId: string,
): ResolvedAttachment | undefined {
  return book.attachments.find((attachment) => attachment.fileId === fileId);
}

export function requireAttachment(
  book: Pick<ResolvedBook, "attachments">,
  fileId: string,
): ResolvedAttachment {
  const attachment = findAttachment(book, fileId);
  if (!attachment) {
    throw new InvalidReference(fileId);
  }
  return attachment;
}

/**
 * The attachment the book's coverId points at, if it points at one
 */
export function coverAttachment(book: ResolvedBook): ResolvedAttachment | undefined {
  return book.coverId ? findAttachment(book, book.coverId) : undefined;
}
