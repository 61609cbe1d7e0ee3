import path from "node:path";
import { METADATA_FILE_SUFFIX } from "./constants";

const FILE_SCHEME = "file:";
const VERSION_RE = /^v?(\d+)(?:-.*)?$/;

/**
 * Canonical form of a recorded file location: no `file:` scheme, forward
 * slashes, no surrounding whitespace.
 */
export function normalizeFilePath(raw: string): string {
  let value = raw.trim();
  if (value.startsWith(FILE_SCHEME)) {
    try {
      value = decodeURIComponent(new URL(value).pathname);
    } catch {
      value = value.slice(FILE_SCHEME.length);
    }
  }
  return value.replace(/\\/g, "/").trim();
}

function segments(value: string): string[] {
  return value.replace(/\\/g, "/").split("/").filter((s) => s.length > 0);
}

/** Final segment of a recorded location, or null when there is none. */
export function lastSegment(reference: string | null | undefined): string | null {
  if (!reference) return null;
  const parts = segments(reference);
  return parts.length > 0 ? parts[parts.length - 1] : null;
}

/**
 * Joins only the final segment of `reference` to `start`. Recorded references
 * may point at another filesystem root, so they are never used verbatim.
 * Returns `start` itself when the reference has no usable segment.
 */
export function resolveForceRelative(
  start: string,
  reference: string | null | undefined,
): string {
  const tail = lastSegment(reference);
  return tail === null ? start : path.join(start, tail);
}

function isAbsoluteLike(value: string): boolean {
  return value.startsWith("/") || /^[A-Za-z]:\//.test(value) || /^[A-Za-z][\w+.-]*:\/\//.test(value);
}

/**
 * Resolves a data file against the table root. The recorded table prefix is
 * the recorded manifest location minus its file name and metadata directory.
 */
export function resolveDataFilePath(
  tableRoot: string,
  recordedManifestPath: string | null | undefined,
  recordedFilePath: string,
): string {
  const file = normalizeFilePath(recordedFilePath);
  const manifestParts = normalizeFilePath(recordedManifestPath ?? "").split("/");
  const tablePrefix = manifestParts.length > 2 ? manifestParts.slice(0, -2).join("/") : "";

  let relative: string;
  if (tablePrefix && file.startsWith(`${tablePrefix}/`)) {
    relative = file.slice(tablePrefix.length + 1);
  } else if (!isAbsoluteLike(file)) {
    relative = file;
  } else {
    const marker = file.lastIndexOf("/data/");
    relative = marker >= 0 ? file.slice(marker + 1) : `data/${lastSegment(file) ?? ""}`;
  }
  return path.join(tableRoot, ...segments(relative));
}

/**
 * Version number encoded in a metadata file name: `v3.metadata.json` and
 * `00003-<uuid>.metadata.json` both give 3.
 */
export function metadataVersionFromFileName(fileName: string): number | null {
  if (!fileName.endsWith(METADATA_FILE_SUFFIX)) return null;
  const stem = fileName.slice(0, -METADATA_FILE_SUFFIX.length);
  const match = VERSION_RE.exec(stem);
  return match ? Number.parseInt(match[1], 10) : null;
}
