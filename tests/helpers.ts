import JSZip from "jszip";
import type { Book, CoverRenderInput, CoverRenderer, Logger } from "../app/lib/epub";

export function makeBook(overrides: Partial<Book> = {}): Book {
  return {
    id: "book-1",
    title: "Must Go Faster",
    author: "Neia Neutuladh",
    chapters: [{ title: "Ch1", showInTOC: true, content: "<p>hi</p>" }],
    attachments: [],
    ...overrides,
  };
}

/**
 * Renderer stand-in that records its calls and returns fixed bytes
 */
export function stubRenderer(options: { fail?: boolean } = {}): CoverRenderer & {
  calls: CoverRenderInput[];
} {
  const calls: CoverRenderInput[] = [];
  return {
    name: "stub",
    calls,
    supports: () => true,
    async render(input) {
      calls.push(input);
      if (options.fail) {
        throw new Error("no fonts installed");
      }
      return {
        data: new Uint8Array([1, 2, 3]),
        mimeType: input.format === "png" ? "image/png" : "image/svg+xml",
        extension: input.format,
      };
    },
  };
}

export function recordingLogger(): Logger & { infos: string[]; warnings: string[] } {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: (message: string) => {
      infos.push(message);
    },
    warn: (message: string) => {
      warnings.push(message);
    },
    error: () => {},
  };
}

export async function readEpub(buffer: Uint8Array): Promise<JSZip> {
  return JSZip.loadAsync(buffer);
}

export async function readMember(zip: JSZip, name: string): Promise<string> {
  const file = zip.file(name);
  if (!file) {
    throw new Error(`Missing member ${name}`);
  }
  return file.async("string");
}

export function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

/**
 * Entries in the order their local headers appear in the zip.
 * method 0 is STORE, 8 is DEFLATE.
 */
export function localHeaders(bytes: Uint8Array): { name: string; method: number }[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const entries: { name: string; method: number }[] = [];
  let offset = 0;
  while (offset + 30 <= bytes.length && view.getUint32(offset, true) === 0x04034b50) {
    const flags = view.getUint16(offset + 6, true);
    const method = view.getUint16(offset + 8, true);
    const compressedSize = view.getUint32(offset + 18, true);
    const nameLength = view.getUint16(offset + 26, true);
    const extraLength = view.getUint16(offset + 28, true);
    const nameStart = offset + 30;
    entries.push({
      name: new TextDecoder().decode(bytes.subarray(nameStart, nameStart + nameLength)),
      method,
    });
    // Bit 3: sizes live in a trailing data descriptor; stop scanning
    if (flags & 0x08) break;
    offset = nameStart + nameLength + extraLength + compressedSize;
  }
  return entries;
}
