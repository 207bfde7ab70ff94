/**
 * Error taxonomy for the selection and publish path.
 * `kind` is the discriminator callers switch on.
 */

export type PosterErrorKind =
  | "directory_not_found"
  | "empty_directory"
  | "ordering"
  | "missing_credentials"
  | "image_file_missing"
  | "remote_http"
  | "network"
  | "corrupt_state";

export abstract class PosterError extends Error {
  abstract readonly kind: PosterErrorKind;
}

export class DirectoryNotFoundError extends PosterError {
  readonly kind = "directory_not_found";

  constructor(public readonly dir: string) {
    super(`image directory not found: ${dir}`);
    this.name = "DirectoryNotFoundError";
  }
}

export class EmptyDirectoryError extends PosterError {
  readonly kind = "empty_directory";

  constructor(public readonly dir: string) {
    super(`no .png/.jpg/.jpeg images found in ${dir}`);
    this.name = "EmptyDirectoryError";
  }
}

export class OrderingError extends PosterError {
  readonly kind = "ordering";

  constructor(public readonly filename: string) {
    super(`cannot order images: "${filename}" contains no digits (expected names like story1.png)`);
    this.name = "OrderingError";
  }
}

export class MissingCredentialsError extends PosterError {
  readonly kind = "missing_credentials";

  constructor(public readonly missing: string[]) {
    super(`credentials not configured: ${missing.join(", ")} (set them in the environment or .env)`);
    this.name = "MissingCredentialsError";
  }
}

export class ImageFileMissingError extends PosterError {
  readonly kind = "image_file_missing";

  constructor(public readonly path: string) {
    super(`image file not found at path: ${path}`);
    this.name = "ImageFileMissingError";
  }
}

export class RemoteHttpError extends PosterError {
  readonly kind = "remote_http";

  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly detail: string | null
  ) {
    super(`photo upload rejected with HTTP ${status}${detail ? `: ${detail}` : ""}`);
    this.name = "RemoteHttpError";
  }
}

export class NetworkError extends PosterError {
  readonly kind = "network";

  constructor(
    public readonly reason: string,
    public readonly timedOut: boolean
  ) {
    super(timedOut ? `photo upload timed out: ${reason}` : `could not reach the photo API: ${reason}`);
    this.name = "NetworkError";
  }
}

export class CorruptStateError extends PosterError {
  readonly kind = "corrupt_state";

  constructor(public readonly raw: string) {
    super(`state file does not hold an index: ${JSON.stringify(raw.slice(0, 40))}`);
    this.name = "CorruptStateError";
  }
}

export type PublishError = ImageFileMissingError | RemoteHttpError | NetworkError;
