import { DEFAULT_GENERATOR } from "./config";
import { escapeXml } from "./xml";
import type { NavigationPolicy, ResolvedBook, ResolvedChapter } from "./types";

export interface NcxOptions {
  /** "all" keeps hidden chapters in the navMap, "visible" drops them */
  navigation?: NavigationPolicy;
  generatorName?: string;
}

export function navigableChapters(
  chapters: readonly ResolvedChapter[],
  navigation: NavigationPolicy,
): ResolvedChapter[] {
  return navigation === "visible" ? chapters.filter((ch) => ch.showInTOC) : [...chapters];
}

function navPoint(chapter: ResolvedChapter, playOrder: number): string {
  return [
    `    <navPoint id="${escapeXml(chapter.navId)}" playOrder="${playOrder}">`,
    `      <navLabel>`,
    `        <text>${escapeXml(chapter.title)}</text>`,
    `      </navLabel>`,
    `      <content src="${escapeXml(chapter.fileName)}"/>`,
    `    </navPoint>`,
  ].join("\n");
}

/**
 * Build the NCX navigation document. Play order follows array order.
 */
export function buildTocNcx(book: ResolvedBook, options: NcxOptions = {}): string {
  const chapters = navigableChapters(book.chapters, options.navigation ?? "all");
  const generator = options.generatorName || DEFAULT_GENERATOR;

  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1" xml:lang="${escapeXml(book.language)}">`,
    `  <head>`,
    `    <meta content="${escapeXml(book.id)}" name="dtb:uid"/>`,
    `    <meta content="1" name="dtb:depth"/>`,
    `    <meta content="${escapeXml(generator)}" name="dtb:generator"/>`,
    `    <meta content="0" name="dtb:totalPageCount"/>`,
    `    <meta content="0" name="dtb:maxPageNumber"/>`,
    `  </head>`,
    `  <docTitle>`,
    `    <text>${escapeXml(book.title)}</text>`,
    `  </docTitle>`,
    `  <docAuthor>`,
    `    <text>${escapeXml(book.author)}</text>`,
    `  </docAuthor>`,
    `  <navMap>`,
    ...chapters.map((chapter, i) => navPoint(chapter, i + 1)),
    `  </navMap>`,
    `</ncx>`,
    ``,
  ].join("\n");
}
