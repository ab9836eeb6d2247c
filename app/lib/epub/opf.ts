import { NCX_MIMETYPE, STYLESHEET_FILE, XHTML_MIMETYPE } from "./config";
import { coverAttachment } from "./model";
import { escapeXml } from "./xml";
import type { Logger, ResolvedBook } from "./types";

const METADATA_NAMESPACES = [
  `xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"`,
  `xmlns:opf="http://www.idpf.org/2007/opf"`,
  `xmlns:dcterms="http://purl.org/dc/terms/"`,
  `xmlns:dc="http://purl.org/dc/elements/1.1/"`,
].join(" ");

function item(href: string, id: string, mediaType: string): string {
  return `    <item href="${escapeXml(href)}" id="${escapeXml(id)}" media-type="${escapeXml(mediaType)}"/>`;
}

/**
 * Build the OPF 2.0 package document: metadata, manifest, spine, guide.
 * Expects a resolved book; chapter indices must already be final.
 */
export function buildContentOpf(book: ResolvedBook, logger?: Logger): string {
  const cover = coverAttachment(book);
  if (book.coverId && !cover) {
    logger?.warn(`[Bindery] coverId "${book.coverId}" matches no attachment; omitting cover reference`);
  }

  const metadata = [
    `    <dc:language>${escapeXml(book.language)}</dc:language>`,
    `    <dc:creator>${escapeXml(book.author)}</dc:creator>`,
    `    <dc:title>${escapeXml(book.title)}</dc:title>`,
    `    <dc:identifier id="uuid_id" opf:scheme="uuid">${escapeXml(book.id)}</dc:identifier>`,
    ...(cover ? [`    <meta name="cover" content="${escapeXml(cover.fileId)}"/>`] : []),
  ];

  const manifest = [
    ...book.chapters.map((ch) => item(ch.fileName, ch.fileId, XHTML_MIMETYPE)),
    ...book.attachments.map((a) => item(a.fileName, a.fileId, a.mimeType)),
    item("toc.ncx", "ncx", NCX_MIMETYPE),
    ...(book.stylesheet !== undefined ? [item(STYLESHEET_FILE, "stylesheet", "text/css")] : []),
  ];

  const spine = book.chapters.map((ch) => `    <itemref idref="${escapeXml(ch.fileId)}"/>`);

  const guide = cover
    ? [`    <reference href="${escapeXml(cover.fileName)}" title="Cover" type="cover"/>`]
    : [];

  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<package xmlns="http://www.idpf.org/2007/opf" unique-identifier="uuid_id" version="2.0">`,
    `  <metadata ${METADATA_NAMESPACES}>`,
    ...metadata,
    `  </metadata>`,
    `  <manifest>`,
    ...manifest,
    `  </manifest>`,
    `  <spine toc="ncx">`,
    ...spine,
    `  </spine>`,
    ...(guide.length > 0 ? [`  <guide>`, ...guide, `  </guide>`] : [`  <guide/>`]),
    `</package>`,
    ``,
  ].join("\n");
}
