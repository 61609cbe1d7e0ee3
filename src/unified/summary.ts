import { FILE_CONTENT, MANIFEST_CONTENT } from "../constants";
import type { Table } from "../models/unified";
import { metadataVersionFromFileName } from "../paths";

export interface TableSummary {
  tableName: string;
  tablePath: string;
  versionHint: string;
  location: string | null;
  tableUuid: string | null;
  formatVersion: number | null;
  currentSnapshotId: number | null;
  /** Version parsed from the latest metadata file name. */
  currentMetadataVersion: number | null;
  metadataFileCount: number;
  snapshotCount: number;
  manifestCount: number;
  dataManifestCount: number;
  deleteManifestCount: number;
  dataFileCount: number;
  positionDeleteFileCount: number;
  equalityDeleteFileCount: number;
  readErrorCount: number;
  /** Earliest snapshot timestamp, a stand-in for the creation time. */
  earliestSnapshotMs: number | null;
  lastUpdatedMs: number | null;
}

/** Counts over unique snapshots, manifest paths and data-file paths. */
export function summarizeTable(table: Table): TableSummary {
  const latest = table.metadataVersions.at(-1);

  const snapshots = new Set(table.metadataVersions.flatMap((v) => v.snapshots));
  const manifests = new Map<string, number>();
  const files = new Map<string, number>();
  let readErrorCount = table.readErrors.length;
  let earliestSnapshotMs: number | null = null;

  for (const snapshot of snapshots) {
    readErrorCount += snapshot.readErrors.length;
    const ts = snapshot.record.timestampMs;
    if (ts != null && (earliestSnapshotMs === null || ts < earliestSnapshotMs)) {
      earliestSnapshotMs = ts;
    }
    for (const manifest of snapshot.manifests) {
      if (manifests.has(manifest.path)) continue;
      manifests.set(manifest.path, manifest.record.content ?? MANIFEST_CONTENT.DATA);
      readErrorCount += manifest.readErrors.length;
      for (const dataFile of manifest.dataFiles) {
        if (!files.has(dataFile.recordedPath)) files.set(dataFile.recordedPath, dataFile.content);
      }
    }
  }

  const countOf = (values: Iterable<number>, content: number) =>
    [...values].filter((value) => value === content).length;

  return {
    tableName: table.name,
    tablePath: table.path,
    versionHint: table.versionHint,
    location: latest?.metadata.location ?? null,
    tableUuid: latest?.metadata.tableUuid ?? null,
    formatVersion: latest?.metadata.formatVersion ?? null,
    currentSnapshotId: latest?.metadata.currentSnapshotId ?? null,
    currentMetadataVersion: latest ? metadataVersionFromFileName(latest.fileName) : null,
    metadataFileCount: table.metadataVersions.length,
    snapshotCount: snapshots.size,
    manifestCount: manifests.size,
    dataManifestCount: countOf(manifests.values(), MANIFEST_CONTENT.DATA),
    deleteManifestCount: countOf(manifests.values(), MANIFEST_CONTENT.DELETES),
    dataFileCount: countOf(files.values(), FILE_CONTENT.DATA),
    positionDeleteFileCount: countOf(files.values(), FILE_CONTENT.POSITION_DELETES),
    equalityDeleteFileCount: countOf(files.values(), FILE_CONTENT.EQUALITY_DELETES),
    readErrorCount,
    earliestSnapshotMs,
    lastUpdatedMs: latest?.metadata.lastUpdatedMs ?? null,
  };
}
