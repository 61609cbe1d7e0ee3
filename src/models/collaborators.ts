import type { ManifestEntry, ManifestListEntry, TableMetadata } from "./metadata";

/** A single entry of a manifest list or manifest file that failed to decode. */
export interface EntryDecodeError {
  message: string;
  trace?: string | null;
}

/**
 * Decoded entries of one file plus the entries that could not be decoded.
 * A reader must keep every successfully decoded entry even when others fail.
 */
export interface ReadResult<T> {
  entries: T[];
  errors: EntryDecodeError[];
}

/** Column name to cell value of one sampled row. */
export type SampleRow = Readonly<Record<string, unknown>>;

export interface MetadataReader {
  /** Rejects when the file is missing or malformed. */
  readMetadataVersion(path: string): Promise<TableMetadata>;
  readManifestList(path: string): Promise<ReadResult<ManifestListEntry>>;
  readManifestFile(path: string): Promise<ReadResult<ManifestEntry>>;
}

export interface RowSampler {
  /** Best-effort: may return fewer than `limit` rows, or reject. */
  sampleRows(dataFilePath: string, limit: number): Promise<SampleRow[]>;
}
