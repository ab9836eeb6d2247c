import { describe, it, expect } from "vitest";
import { buildTocNcx, resolveChapter, type ResolvedBook } from "../app/lib/epub";
import { unescapeXml } from "./helpers";

function bookWith(titles: { title: string; showInTOC: boolean }[]): ResolvedBook {
  return {
    id: "book-1",
    title: "Must Go Faster",
    author: "Neia Neutuladh",
    language: "en",
    chapters: titles.map((t, i) => resolveChapter({ ...t, content: "" }, i + 1)),
    attachments: [],
  };
}

function playOrders(ncx: string): number[] {
  return [...ncx.matchAll(/playOrder="(\d+)"/g)].map((m) => Number(m[1]));
}

describe("buildTocNcx", () => {
  it("emits the navigation document", () => {
    const ncx = buildTocNcx(bookWith([{ title: "Ch1", showInTOC: true }]));

    expect(ncx).toBe(`<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1" xml:lang="en">
  <head>
    <meta content="book-1" name="dtb:uid"/>
    <meta content="1" name="dtb:depth"/>
    <meta content="bindery" name="dtb:generator"/>
    <meta content="0" name="dtb:totalPageCount"/>
    <meta content="0" name="dtb:maxPageNumber"/>
  </head>
  <docTitle>
    <text>Must Go Faster</text>
  </docTitle>
  <docAuthor>
    <text>Neia Neutuladh</text>
  </docAuthor>
  <navMap>
    <navPoint id="ch8be2d308316c51d89fba52bb8c75f91a" playOrder="1">
      <navLabel>
        <text>Ch1</text>
      </navLabel>
      <content src="chapter1.html"/>
    </navPoint>
  </navMap>
</ncx>
`);
  });

  it("numbers navPoints 1..N in chapter order", () => {
    const ncx = buildTocNcx(
      bookWith([
        { title: "A", showInTOC: true },
        { title: "B", showInTOC: true },
        { title: "C", showInTOC: true },
      ]),
    );
    const sources = [...ncx.matchAll(/<content src="([^"]+)"\/>/g)].map((m) => m[1]);

    expect(playOrders(ncx)).toEqual([1, 2, 3]);
    expect(sources).toEqual(["chapter1.html", "chapter2.html", "chapter3.html"]);
  });

  it("keeps hidden chapters by default and drops them under the visible policy", () => {
    const book = bookWith([
      { title: "Cover", showInTOC: false },
      { title: "One", showInTOC: true },
    ]);

    const all = buildTocNcx(book);
    expect(playOrders(all)).toEqual([1, 2]);
    expect(all).toContain('<content src="chapter1.html"/>');

    const visible = buildTocNcx(book, { navigation: "visible" });
    expect(playOrders(visible)).toEqual([1]);
    expect(visible).not.toContain('<content src="chapter1.html"/>');
    expect(visible).toContain('<content src="chapter2.html"/>');
  });

  it("reuses the nav id for chapters with the same title", () => {
    const ncx = buildTocNcx(
      bookWith([
        { title: "Interlude", showInTOC: true },
        { title: "Interlude", showInTOC: true },
      ]),
    );
    const ids = [...ncx.matchAll(/<navPoint id="([^"]+)"/g)].map((m) => m[1]);

    expect(ids).toHaveLength(2);
    expect(ids[0]).toBe(ids[1]);
  });

  it("escapes chapter titles so the label round-trips", () => {
    const title = "A & B < C>";
    const ncx = buildTocNcx(bookWith([{ title, showInTOC: true }]));
    const label = ncx.match(/<navLabel>\s*<text>([^<]*)<\/text>/);

    expect(ncx).toContain("<text>A &amp; B &lt; C&gt;</text>");
    expect(label?.[1]).toBe("A &amp; B &lt; C&gt;");
    expect(unescapeXml(label?.[1] ?? "")).toBe(title);
  });

  it("escapes the uid, language and author", () => {
    const ncx = buildTocNcx({ ...bookWith([]), id: "b&1", language: 'en"x', author: "O'Brien & Sons" });

    expect(ncx).toContain('<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1" xml:lang="en&quot;x">\n');
    expect(ncx).toContain('    <meta content="b&amp;1" name="dtb:uid"/>\n');
    expect(ncx).toContain("  <docAuthor>\n    <text>O&apos;Brien &amp; Sons</text>\n  </docAuthor>\n");
  });

  it("escapes generator names", () => {
    const ncx = buildTocNcx(bookWith([]), { generatorName: "a<b>" });
    expect(ncx).toContain('<meta content="a&lt;b&gt;" name="dtb:generator"/>');
  });

  it("writes the configured generator name", () => {
    const ncx = buildTocNcx(bookWith([]), { generatorName: "covertest" });
    expect(ncx).toContain('<meta content="covertest" name="dtb:generator"/>');
    expect(ncx).toContain("  <navMap>\n  </navMap>\n");
  });
});
