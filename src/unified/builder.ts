import fs from "node:fs/promises";
import path from "node:path";
import type { ReadErrorListener } from "../config";
import {
  METADATA_DIR,
  METADATA_FILE_SUFFIX,
  VERSION_HINT_FILE,
} from "../constants";
import {
  ListingError,
  readError,
  toReadError,
  type UnifiedReadError,
} from "../errors";
import { sortMetadataVersions, sortSnapshots } from "../graph/ordering";
import type {
  EntryDecodeError,
  MetadataReader,
  ReadResult,
  RowSampler,
  SampleRow,
} from "../models/collaborators";
import type {
  ManifestEntry,
  ManifestListEntry,
  SnapshotRecord,
} from "../models/metadata";
import type { Manifest, MetadataVersion, Snapshot, Table } from "../models/unified";
import { resolveDataFilePath, resolveForceRelative } from "../paths";
import { DataFileEntry } from "./data-file";

export interface LoadTableOptions {
  reader: MetadataReader;
  sampler?: RowSampler;
  /** Upper bound passed to the sampler. Defaults to 50. */
  sampleRowLimit?: number;
  onReadError?: ReadErrorListener[];
}

interface LoadContext {
  reader: MetadataReader;
  sampler: RowSampler | undefined;
  sampleRowLimit: number;
  record: (target: UnifiedReadError[], error: UnifiedReadError) => void;
  notify: (error: UnifiedReadError) => void;
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function readTextOrNull(target: string): Promise<string | null> {
  try {
    return await fs.readFile(target, "utf8");
  } catch {
    return null;
  }
}

async function lastModifiedOrNull(target: string): Promise<number | null> {
  try {
    return (await fs.stat(target)).mtimeMs;
  } catch {
    return null;
  }
}

async function assertDirectory(tableRoot: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(tableRoot)).isDirectory();
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ListingError(`Table directory is not accessible: ${reason}`, null, tableRoot);
  }
  if (!isDirectory) {
    throw new ListingError(`Table path is not a directory: ${tableRoot}`, null, tableRoot);
  }
}

function entryErrors(
  errors: readonly EntryDecodeError[],
  stage: "decode-manifest-list-entry" | "decode-manifest-entry",
  filePath: string,
): UnifiedReadError[] {
  return errors.map((error) => readError(stage, filePath, error.message, error.trace ?? null));
}

function rowLoader(
  ctx: LoadContext,
  dataFilePath: string,
  hasRecordedPath: boolean,
): () => Promise<SampleRow[]> {
  return async () => {
    const sampler = ctx.sampler;
    if (!sampler || !hasRecordedPath) return [];
    if (!(await exists(dataFilePath))) return [];
    try {
      return await sampler.sampleRows(dataFilePath, ctx.sampleRowLimit);
    } catch (e) {
      ctx.notify(toReadError("sample-rows", dataFilePath, e));
      throw e;
    }
  };
}

async function loadManifest(
  record: ManifestListEntry,
  manifestListDir: string,
  ctx: LoadContext,
): Promise<Manifest> {
  const manifestPath = resolveForceRelative(manifestListDir, record.manifestPath);
  const readErrors: UnifiedReadError[] = [];
  const empty: ReadResult<ManifestEntry> = { entries: [], errors: [] };

  let result = empty;
  if (!record.manifestPath?.trim()) {
    ctx.record(
      readErrors,
      readError("resolve-manifest-file", manifestPath, "Manifest list entry has no manifest path"),
    );
  } else if (!(await exists(manifestPath))) {
    ctx.record(
      readErrors,
      readError("resolve-manifest-file", manifestPath, `Manifest file not found: ${manifestPath}`),
    );
  } else {
    try {
      result = await ctx.reader.readManifestFile(manifestPath);
    } catch (e) {
      ctx.record(readErrors, toReadError("read-manifest-file", manifestPath, e));
    }
  }
  for (const error of entryErrors(result.errors, "decode-manifest-entry", manifestPath)) {
    ctx.record(readErrors, error);
  }

  // Data files live beside the metadata directory, under the table root.
  const tableRoot = path.dirname(path.dirname(manifestPath));
  const dataFiles = result.entries.map((entry, index) => {
    const recorded = entry.dataFile?.filePath?.trim() ?? "";
    const hasRecordedPath = recorded.length > 0;
    const resolved = hasRecordedPath
      ? resolveDataFilePath(tableRoot, record.manifestPath, recorded)
      : tableRoot;
    return new DataFileEntry(
      entry,
      resolved,
      hasRecordedPath ? recorded : `missing:${manifestPath}#${index}`,
      rowLoader(ctx, resolved, hasRecordedPath),
    );
  });

  return { record, path: manifestPath, dataFiles, readErrors };
}

async function loadSnapshot(
  record: SnapshotRecord,
  metadataDir: string,
  ctx: LoadContext,
): Promise<Snapshot> {
  const manifestListPath = resolveForceRelative(metadataDir, record.manifestList);
  const readErrors: UnifiedReadError[] = [];
  const empty: ReadResult<ManifestListEntry> = { entries: [], errors: [] };

  let result = empty;
  if (!record.manifestList?.trim()) {
    ctx.record(
      readErrors,
      readError(
        "resolve-manifest-list",
        manifestListPath,
        `Snapshot ${record.snapshotId} has no manifest-list reference`,
      ),
    );
  } else if (!(await exists(manifestListPath))) {
    ctx.record(
      readErrors,
      readError("resolve-manifest-list", manifestListPath, `Manifest list not found: ${manifestListPath}`),
    );
  } else {
    try {
      result = await ctx.reader.readManifestList(manifestListPath);
    } catch (e) {
      ctx.record(readErrors, toReadError("read-manifest-list-file", manifestListPath, e));
    }
  }
  for (const error of entryErrors(result.errors, "decode-manifest-list-entry", manifestListPath)) {
    ctx.record(readErrors, error);
  }

  const manifestListDir = path.dirname(manifestListPath);
  const manifests: Manifest[] = [];
  for (const entry of result.entries) {
    manifests.push(await loadManifest(entry, manifestListDir, ctx));
  }

  return { record, manifestListPath, manifests, readErrors };
}

async function listMetadataFiles(
  metadataDir: string,
  ctx: LoadContext,
  tableErrors: UnifiedReadError[],
): Promise<string[]> {
  try {
    const entries = await fs.readdir(metadataDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(METADATA_FILE_SUFFIX))
      .map((entry) => entry.name)
      .sort();
  } catch (e) {
    ctx.record(tableErrors, toReadError("list-metadata-files", metadataDir, e));
    return [];
  }
}

/**
 * Walks `<tablePath>/metadata` into the unified model. Only an inaccessible
 * table directory throws (`ListingError`); every other failure is recorded on
 * the nearest enclosing node and the walk continues.
 */
export async function loadTable(tablePath: string, options: LoadTableOptions): Promise<Table> {
  const tableRoot = path.resolve(tablePath);
  await assertDirectory(tableRoot);

  const listeners = options.onReadError ?? [];
  const ctx: LoadContext = {
    reader: options.reader,
    sampler: options.sampler,
    sampleRowLimit: options.sampleRowLimit ?? 50,
    record: (target, error) => {
      target.push(error);
      ctx.notify(error);
    },
    notify: (error) => {
      for (const listener of listeners) listener(error);
    },
  };

  const metadataDir = path.join(tableRoot, METADATA_DIR);
  const readErrors: UnifiedReadError[] = [];

  const parsed: MetadataVersion[] = [];
  for (const fileName of await listMetadataFiles(metadataDir, ctx, readErrors)) {
    const filePath = path.join(metadataDir, fileName);
    try {
      const metadata = await ctx.reader.readMetadataVersion(filePath);
      parsed.push({
        path: filePath,
        fileName,
        metadata,
        rawText: await readTextOrNull(filePath),
        lastModifiedMs: await lastModifiedOrNull(filePath),
        snapshots: [],
      });
    } catch (e) {
      ctx.record(readErrors, toReadError("read-metadata-json", filePath, e));
    }
  }

  const hintPath = path.join(metadataDir, VERSION_HINT_FILE);
  let versionHint = "N/A";
  try {
    versionHint = (await fs.readFile(hintPath, "utf8")).trim();
  } catch (e) {
    ctx.record(readErrors, toReadError("read-version-hint", hintPath, e));
  }

  const ordered = sortMetadataVersions(parsed);

  // One Snapshot per id, first occurrence in version order wins.
  const records = new Map<number, SnapshotRecord>();
  for (const version of ordered) {
    for (const snapshot of version.metadata.snapshots) {
      if (snapshot.snapshotId == null || records.has(snapshot.snapshotId)) continue;
      records.set(snapshot.snapshotId, snapshot);
    }
  }
  const snapshots = new Map<number, Snapshot>();
  for (const [id, record] of records) {
    snapshots.set(id, await loadSnapshot(record, metadataDir, ctx));
  }

  const metadataVersions = ordered.map((version) => {
    const ids = new Set<number>();
    const shared: Snapshot[] = [];
    for (const snapshot of version.metadata.snapshots) {
      const id = snapshot.snapshotId;
      if (id == null || ids.has(id)) continue;
      const unified = snapshots.get(id);
      if (unified) {
        ids.add(id);
        shared.push(unified);
      }
    }
    return { ...version, snapshots: sortSnapshots(shared) };
  });

  return {
    path: tableRoot,
    name: path.basename(tableRoot),
    versionHint,
    metadataVersions,
    readErrors,
  };
}
