import type { UnifiedReadError } from "../errors";
import type { DataFileEntry } from "../unified/data-file";
import type { ManifestListEntry, SnapshotRecord, TableMetadata } from "./metadata";

export interface Table {
  path: string;
  name: string;
  /** Trimmed `version-hint.text`, or "N/A" when unreadable. */
  versionHint: string;
  metadataVersions: MetadataVersion[];
  readErrors: UnifiedReadError[];
}

export interface MetadataVersion {
  path: string;
  fileName: string;
  metadata: TableMetadata;
  rawText: string | null;
  lastModifiedMs: number | null;
  /** Shared with every other version that lists the same snapshot id. */
  snapshots: Snapshot[];
}

export interface Snapshot {
  record: SnapshotRecord;
  manifestListPath: string;
  manifests: Manifest[];
  readErrors: UnifiedReadError[];
}

export interface Manifest {
  record: ManifestListEntry;
  path: string;
  dataFiles: DataFileEntry[];
  readErrors: UnifiedReadError[];
}
