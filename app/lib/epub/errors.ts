export type BinderyErrorCode =
  | "IDENTITY"
  | "RENDER_UNAVAILABLE"
  | "INVALID_REFERENCE"
  | "CONTAINER_WRITE";

/**
 * Base class for every error raised while packaging a book
 */
export class BinderyError extends Error {
  constructor(
    message: string,
    public readonly code: BinderyErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BinderyError";
  }
}

/**
 * The identifier source ran dry or kept producing ids already in use
 */
export class IdentityError extends BinderyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "IDENTITY", options);
    this.name = "IdentityError";
  }
}

/**
 * A cover was requested in a format no available renderer can produce
 */
export class RenderUnavailable extends BinderyError {
  constructor(
    public readonly format: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, "RENDER_UNAVAILABLE", options);
    this.name = "RenderUnavailable";
  }
}

export class InvalidReference extends BinderyError {
  constructor(public readonly reference: string) {
    super(`No attachment with fileId "${reference}"`, "INVALID_REFERENCE");
    this.name = "InvalidReference";
  }
}

/**
 * Zip generation or the filesystem write failed
 */
export class ContainerWriteError extends BinderyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONTAINER_WRITE", options);
    this.name = "ContainerWriteError";
  }
}
