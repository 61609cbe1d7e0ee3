import { FILE_CONTENT, MANIFEST_CONTENT } from "../constants";
import type {
  ManifestEntry,
  ManifestListEntry,
  SnapshotRecord,
} from "../models/metadata";
import type { Manifest, MetadataVersion, Snapshot } from "../models/unified";
import { metadataVersionFromFileName } from "../paths";
import type { DataFileEntry } from "../unified/data-file";

export type SortKey = number | string | null | undefined;

/** Lexicographic comparison of key tuples; null and undefined sort last. */
export function compareKeys(a: readonly SortKey[], b: readonly SortKey[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i];
    const y = b[i];
    if (x == null && y == null) continue;
    if (x == null) return 1;
    if (y == null) return -1;
    if (typeof x === "number" && typeof y === "number") {
      if (x !== y) return x < y ? -1 : 1;
      continue;
    }
    const xs = String(x);
    const ys = String(y);
    if (xs !== ys) return xs < ys ? -1 : 1;
  }
  return 0;
}

/** Delete manifests before data manifests. Absent content means data. */
export function manifestContentRank(content: number | null | undefined): number {
  switch (content ?? MANIFEST_CONTENT.DATA) {
    case MANIFEST_CONTENT.DELETES:
      return 0;
    case MANIFEST_CONTENT.DATA:
      return 1;
    default:
      return 2;
  }
}

/** Equality deletes, then data, then position deletes. */
export function fileContentRank(content: number | null | undefined): number {
  switch (content ?? FILE_CONTENT.DATA) {
    case FILE_CONTENT.EQUALITY_DELETES:
      return 0;
    case FILE_CONTENT.DATA:
      return 1;
    case FILE_CONTENT.POSITION_DELETES:
      return 2;
    default:
      return 3;
  }
}

export function metadataVersionSortKey(version: MetadataVersion): SortKey[] {
  const parsed = metadataVersionFromFileName(version.fileName);
  return [
    parsed === null ? 1 : 0,
    parsed,
    version.metadata.lastUpdatedMs,
    version.lastModifiedMs,
    version.fileName,
  ];
}

export function snapshotSortKey(record: SnapshotRecord): SortKey[] {
  return [record.timestampMs, record.sequenceNumber, record.snapshotId];
}

export function manifestSortKey(record: ManifestListEntry): SortKey[] {
  return [
    record.sequenceNumber,
    record.minSequenceNumber,
    record.addedSnapshotId,
    manifestContentRank(record.content),
    record.manifestPath,
  ];
}

/**
 * The data sequence number falls back to the entry's sequence number and then
 * to the owning manifest's.
 */
export function dataFileSortKey(
  entry: ManifestEntry,
  manifestSequenceNumber: number | null | undefined,
): SortKey[] {
  return [
    entry.dataFile?.dataSequenceNumber ?? entry.sequenceNumber ?? manifestSequenceNumber,
    entry.fileSequenceNumber,
    fileContentRank(entry.dataFile?.content),
    entry.status,
    entry.dataFile?.filePath,
  ];
}

export function sortMetadataVersions(versions: readonly MetadataVersion[]): MetadataVersion[] {
  return [...versions].sort((a, b) =>
    compareKeys(metadataVersionSortKey(a), metadataVersionSortKey(b)),
  );
}

export function sortSnapshots(snapshots: readonly Snapshot[]): Snapshot[] {
  return [...snapshots].sort((a, b) =>
    compareKeys(snapshotSortKey(a.record), snapshotSortKey(b.record)),
  );
}

export function sortManifests(manifests: readonly Manifest[]): Manifest[] {
  return [...manifests].sort((a, b) =>
    compareKeys(manifestSortKey(a.record), manifestSortKey(b.record)),
  );
}

export function sortDataFiles(
  dataFiles: readonly DataFileEntry[],
  manifest: ManifestListEntry,
): DataFileEntry[] {
  return [...dataFiles].sort((a, b) =>
    compareKeys(
      dataFileSortKey(a.record, manifest.sequenceNumber),
      dataFileSortKey(b.record, manifest.sequenceNumber),
    ),
  );
}
