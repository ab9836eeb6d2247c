/**
 * Render a PNG and an SVG cover for a sample book, for eyeballing the layout.
 * Usage: npm run covers:sample [-- <output dir>]
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import { createRasterCoverRenderer, type CoverFormat } from "../app/lib/epub";

const outputDir = resolve(process.argv[2] ?? join(dirname(fileURLToPath(import.meta.url)), "../output"));

async function main() {
  mkdirSync(outputDir, { recursive: true });
  const renderer = createRasterCoverRenderer();

  for (const format of ["png", "svg"] satisfies CoverFormat[]) {
    const cover = await renderer.render({
      title: "Must Go Faster",
      author: "Neia Neutuladh",
      generator: "render-sample-covers",
      fonts: ["Droid Sans Mono", "Inconsolata"],
      width: 1600,
      height: 2560,
      format,
    });
    const path = join(outputDir, `cover.${cover.extension}`);
    writeFileSync(path, cover.data);
    console.log(`[Cover] Wrote ${path} (${(cover.data.length / 1024).toFixed(1)} KB)`);
  }
}

main().catch((error) => {
  console.error("[Cover] Sample rendering failed:", error);
  process.exitCode = 1;
});
