export type ReadErrorKind = "listing" | "decode" | "resolution" | "sampling";

export type ReadStage =
  | "list-metadata-files"
  | "read-metadata-json"
  | "read-version-hint"
  | "resolve-manifest-list"
  | "read-manifest-list-file"
  | "decode-manifest-list-entry"
  | "resolve-manifest-file"
  | "read-manifest-file"
  | "decode-manifest-entry"
  | "sample-rows";

/** A failure recorded on the model instead of being thrown. */
export interface UnifiedReadError {
  kind: ReadErrorKind;
  stage: ReadStage;
  path: string;
  message: string;
  trace: string | null;
}

const STAGE_KIND_MAP: Record<ReadStage, ReadErrorKind> = {
  "list-metadata-files": "listing",
  "read-metadata-json": "decode",
  "read-version-hint": "resolution",
  "resolve-manifest-list": "resolution",
  "read-manifest-list-file": "decode",
  "decode-manifest-list-entry": "decode",
  "resolve-manifest-file": "resolution",
  "read-manifest-file": "decode",
  "decode-manifest-entry": "decode",
  "sample-rows": "sampling",
};

export function kindForStage(stage: ReadStage): ReadErrorKind {
  return STAGE_KIND_MAP[stage];
}

export class LakegraphError extends Error {
  public readonly stage: ReadStage | null;
  public readonly path: string | null;

  constructor(
    message: string,
    stage: ReadStage | null = null,
    path: string | null = null,
  ) {
    super(message);
    this.name = "LakegraphError";
    this.stage = stage;
    this.path = path;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A directory could not be enumerated. The only kind that aborts a load. */
export class ListingError extends LakegraphError {
  constructor(
    message: string = "Directory could not be listed",
    stage: ReadStage | null = "list-metadata-files",
    path: string | null = null,
  ) {
    super(message, stage, path);
    this.name = "ListingError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DecodeError extends LakegraphError {
  constructor(
    message: string = "File could not be decoded",
    stage: ReadStage | null = null,
    path: string | null = null,
  ) {
    super(message, stage, path);
    this.name = "DecodeError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ResolutionError extends LakegraphError {
  constructor(
    message: string = "Referenced file not found",
    stage: ReadStage | null = null,
    path: string | null = null,
  ) {
    super(message, stage, path);
    this.name = "ResolutionError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SamplingError extends LakegraphError {
  constructor(
    message: string = "Rows could not be sampled",
    stage: ReadStage | null = "sample-rows",
    path: string | null = null,
  ) {
    super(message, stage, path);
    this.name = "SamplingError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const KIND_ERROR_MAP: Record<
  ReadErrorKind,
  new (message: string, stage: ReadStage | null, path: string | null) => LakegraphError
> = {
  listing: ListingError,
  decode: DecodeError,
  resolution: ResolutionError,
  sampling: SamplingError,
};

export function errorFromReadError(error: UnifiedReadError): LakegraphError {
  const ErrorClass = KIND_ERROR_MAP[error.kind];
  return new ErrorClass(error.message, error.stage, error.path);
}

function messageOf(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message || cause.name || "Unknown error";
  }
  if (typeof cause === "string" && cause.length > 0) return cause;
  return "Unknown error";
}

export function readError(
  stage: ReadStage,
  path: string,
  message: string,
  trace: string | null = null,
): UnifiedReadError {
  return { kind: kindForStage(stage), stage, path, message, trace };
}

/** Builds a read-error record from anything a reader threw or rejected with. */
export function toReadError(
  stage: ReadStage,
  path: string,
  cause: unknown,
): UnifiedReadError {
  return readError(
    stage,
    path,
    messageOf(cause),
    cause instanceof Error ? (cause.stack ?? null) : null,
  );
}
