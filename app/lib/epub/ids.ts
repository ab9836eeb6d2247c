import { v4 as uuid, v5 as uuidv5, NIL } from "uuid";
import { IdentityError } from "./errors";
import type { Attachment, Book } from "./types";

const MAX_DRAWS = 16;

export interface IdGenerator {
  next(): string;
}

export const uuidGenerator: IdGenerator = {
  next: () => uuid(),
};

/**
 * Hands out the given ids in order, then fails. Useful for deterministic output.
 */
export function sequenceIdGenerator(ids: readonly string[]): IdGenerator {
  let position = 0;
  return {
    next() {
      if (position >= ids.length) {
        throw new IdentityError(`Id sequence exhausted after ${ids.length} ids`);
      }
      return ids[position++];
    },
  };
}

/**
 * Name-based (v5) UUID of the text in the nil namespace, without dashes.
 * Same title, same hash, on every run.
 */
export function stableHash(text: string): string {
  try {
    return uuidv5(text, NIL).replace(/-/g, "");
  } catch (error) {
    // uuid encodes the name as UTF-8, which rejects lone surrogates
    throw new IdentityError(`Cannot derive a stable id from ${JSON.stringify(text)}`, { cause: error });
  }
}

/**
 * Draw an id not yet in `taken` and reserve it.
 */
export function freshId(generator: IdGenerator, taken: Set<string>): string {
  for (let attempt = 0; attempt < MAX_DRAWS; attempt++) {
    const id = generator.next();
    if (id && !taken.has(id)) {
      taken.add(id);
      return id;
    }
  }
  throw new IdentityError(`Could not generate an unused id after ${MAX_DRAWS} attempts`);
}

export function collectIds(book: Pick<Book, "id" | "attachments">): Set<string> {
  const taken = new Set<string>();
  if (book.id) taken.add(book.id);
  for (const attachment of book.attachments) {
    if (attachment.fileId) taken.add(attachment.fileId);
  }
  return taken;
}

/**
 * Fill in the book id and attachment fileIds that the caller left empty.
 * Returns a copy; ids that are already set are kept as they are.
 */
export function assignIdentities<T extends Pick<Book, "id" | "attachments">>(
  book: T,
  generator: IdGenerator,
): T & { id: string; attachments: (Attachment & { fileId: string })[] } {
  const taken = collectIds(book);
  const id = book.id || freshId(generator, taken);
  const attachments = book.attachments.map((attachment) => ({
    ...attachment,
    fileId: attachment.fileId || freshId(generator, taken),
  }));
  return { ...book, id, attachments };
}
