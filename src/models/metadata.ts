export interface SchemaField {
  id?: number | null;
  name?: string | null;
  required?: boolean | null;
  type?: unknown;
}

export interface TableSchema {
  schemaId?: number | null;
  identifierFieldIds?: number[];
  fields: SchemaField[];
}

export interface SnapshotRef {
  snapshotId?: number | null;
  type?: string | null;
}

export interface SnapshotLogEntry {
  timestampMs?: number | null;
  snapshotId?: number | null;
}

export interface MetadataLogEntry {
  timestampMs?: number | null;
  metadataFile?: string | null;
}

/** One parsed `*.metadata.json` file. */
export interface TableMetadata {
  formatVersion?: number | null;
  tableUuid?: string | null;
  location?: string | null;
  lastSequenceNumber?: number | null;
  lastUpdatedMs?: number | null;
  lastColumnId?: number | null;
  currentSnapshotId?: number | null;
  currentSchemaId?: number | null;
  schemas: TableSchema[];
  snapshots: SnapshotRecord[];
  properties: Record<string, string>;
  refs?: Record<string, SnapshotRef>;
  snapshotLog?: SnapshotLogEntry[];
  metadataLog?: MetadataLogEntry[];
}

export interface SnapshotRecord {
  snapshotId?: number | null;
  parentSnapshotId?: number | null;
  sequenceNumber?: number | null;
  schemaId?: number | null;
  timestampMs?: number | null;
  /** Manifest-list location as recorded by the writer. */
  manifestList?: string | null;
  summary?: Record<string, string>;
}

export interface ManifestListEntry {
  manifestPath?: string | null;
  manifestLength?: number | null;
  partitionSpecId?: number | null;
  /** 0 = data, 1 = deletes. */
  content?: number | null;
  sequenceNumber?: number | null;
  minSequenceNumber?: number | null;
  addedSnapshotId?: number | null;
  addedFilesCount?: number | null;
  existingFilesCount?: number | null;
  deletedFilesCount?: number | null;
  addedRowsCount?: number | null;
  existingRowsCount?: number | null;
  deletedRowsCount?: number | null;
}

export interface ManifestEntry {
  /** 0 = existing, 1 = added, 2 = deleted. */
  status: number;
  snapshotId?: number | null;
  sequenceNumber?: number | null;
  fileSequenceNumber?: number | null;
  dataFile?: DataFileRecord | null;
}

export interface KeyValueCount {
  key: number;
  value: number;
}

export interface DataFileRecord {
  filePath?: string | null;
  fileFormat?: string | null;
  recordCount?: number | null;
  fileSizeInBytes?: number | null;
  /** 0 = data, 1 = position deletes, 2 = equality deletes. */
  content?: number | null;
  dataSequenceNumber?: number | null;
  columnSizes?: KeyValueCount[];
  valueCounts?: KeyValueCount[];
  nullValueCounts?: KeyValueCount[];
  nanValueCounts?: KeyValueCount[];
  splitOffsets?: number[];
  equalityIds?: number[] | null;
  sortOrderId?: number | null;
}
