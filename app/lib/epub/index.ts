export { pack, packToBuffer, resolveBook, writeEpub, type PackResult } from "./assembler";
export {
  ARCHIVE_DATE,
  COVER_HEIGHT,
  COVER_WIDTH,
  UNKNOWN_AUTHOR,
  resolvePackOptions,
  silentLogger,
  type PackOptions,
} from "./config";
export { EpubContainer, writeToPath } from "./container";
export { buildTitlePage, composeCover } from "./cover";
export {
  BinderyError,
  ContainerWriteError,
  IdentityError,
  InvalidReference,
  RenderUnavailable,
} from "./errors";
export { assignIdentities, sequenceIdGenerator, stableHash, uuidGenerator, type IdGenerator } from "./ids";
export { findAttachment, requireAttachment, resolveChapter } from "./model";
export { buildTocNcx } from "./ncx";
export { buildContentOpf } from "./opf";
export {
  buildCoverSvg,
  createCoverRenderer,
  createRasterCoverRenderer,
  createVectorCoverRenderer,
} from "./renderers";
export { escapeXml } from "./xml";
export type * from "./types";
