import JSZip from "jszip";
import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { ARCHIVE_DATE, DEFLATE_LEVEL, EPUB_MIMETYPE } from "./config";
import { ContainerWriteError } from "./errors";

export interface ContainerMember {
  name: string;
  data: string | Uint8Array;
  store: boolean;
}

/**
 * Ordered list of named members. The zip itself is only built in
 * toZip()/finalize(), so a failed pack never leaves a half-written archive.
 */
export class EpubContainer {
  private readonly members: ContainerMember[] = [];
  private readonly seen = new Set<string>();

  constructor(private readonly compressionLevel: number = DEFLATE_LEVEL) {}

  add(name: string, data: string | Uint8Array, options: { store?: boolean } = {}): void {
    if (!name || name.startsWith("/") || name.includes("\\") || name.split("/").some((part) => part === ".." || part === "")) {
      throw new ContainerWriteError(`Invalid member name "${name}"`);
    }
    if (this.seen.has(name)) {
      throw new ContainerWriteError(`Duplicate member "${name}"`);
    }
    this.seen.add(name);
    this.members.push({ name, data, store: options.store ?? name === "mimetype" });
  }

  names(): string[] {
    return this.members.map((member) => member.name);
  }

  get size(): number {
    return this.members.length;
  }

  toZip(): JSZip {
    const zip = new JSZip();
    for (const member of this.members) {
      zip.file(member.name, member.data, {
        createFolders: false,
        date: ARCHIVE_DATE,
        compression: member.store ? "STORE" : "DEFLATE",
        compressionOptions: member.store ? null : { level: this.compressionLevel },
      });
    }
    return zip;
  }

  async finalize(): Promise<Buffer> {
    try {
      return await this.toZip().generateAsync({
        type: "nodebuffer",
        mimeType: EPUB_MIMETYPE,
        compression: "DEFLATE",
        compressionOptions: { level: this.compressionLevel },
      });
    } catch (error) {
      throw new ContainerWriteError("Failed to generate EPUB archive", { cause: error });
    }
  }
}

export async function writeToPath(bytes: Uint8Array, path: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, bytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ContainerWriteError(`Failed to write ${path}: ${reason}`, { cause: error });
  }
}
