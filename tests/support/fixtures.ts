import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type {
  EntryDecodeError,
  ManifestEntry,
  ManifestListEntry,
  MetadataReader,
  ReadResult,
  RowSampler,
  SampleRow,
  SnapshotRecord,
  TableMetadata,
} from "../../src/models";

/** Where test data claims the table was written; never exists on disk. */
export const WRITER_ROOT = "/warehouse/db/orders";

export function writerPath(relative: string): string {
  return `${WRITER_ROOT}/${relative}`;
}

export function metadata(snapshots: SnapshotRecord[], extra: Partial<TableMetadata> = {}): TableMetadata {
  return {
    formatVersion: 2,
    tableUuid: "00000000-0000-0000-0000-000000000001",
    location: WRITER_ROOT,
    schemas: [],
    snapshots,
    properties: {},
    ...extra,
  };
}

export function snapshot(
  snapshotId: number,
  timestampMs: number,
  extra: Partial<SnapshotRecord> = {},
): SnapshotRecord {
  return {
    snapshotId,
    timestampMs,
    manifestList: writerPath(`metadata/snap-${snapshotId}.avro`),
    ...extra,
  };
}

export function manifestRef(fileName: string, extra: Partial<ManifestListEntry> = {}): ManifestListEntry {
  return {
    manifestPath: writerPath(`metadata/${fileName}`),
    content: 0,
    sequenceNumber: 1,
    minSequenceNumber: 1,
    ...extra,
  };
}

export function fileEntry(
  filePath: string,
  content = 0,
  extra: Partial<ManifestEntry> = {},
): ManifestEntry {
  return {
    status: 1,
    dataFile: { filePath, content, fileFormat: "PARQUET", recordCount: 3 },
    ...extra,
  };
}

interface StoredResult<T> {
  entries: T[];
  errors: EntryDecodeError[];
}

/**
 * Reads metadata JSON from disk and manifest files from JSON placeholders,
 * standing in for the binary decoder.
 */
export class JsonMetadataReader implements MetadataReader {
  readonly calls: string[] = [];

  async readMetadataVersion(filePath: string): Promise<TableMetadata> {
    this.calls.push(filePath);
    const parsed: TableMetadata = JSON.parse(await fs.readFile(filePath, "utf8"));
    return parsed;
  }

  async readManifestList(filePath: string): Promise<ReadResult<ManifestListEntry>> {
    this.calls.push(filePath);
    const parsed: StoredResult<ManifestListEntry> = JSON.parse(await fs.readFile(filePath, "utf8"));
    return parsed;
  }

  async readManifestFile(filePath: string): Promise<ReadResult<ManifestEntry>> {
    this.calls.push(filePath);
    const parsed: StoredResult<ManifestEntry> = JSON.parse(await fs.readFile(filePath, "utf8"));
    return parsed;
  }
}

/** Sampler answering by data-file name. */
export function fakeSampler(rowsByFileName: Record<string, SampleRow[]>) {
  const sampleRows = vi.fn(async (dataFilePath: string, limit: number): Promise<SampleRow[]> => {
    return (rowsByFileName[path.basename(dataFilePath)] ?? []).slice(0, limit);
  });
  const sampler: RowSampler = { sampleRows };
  return { sampler, sampleRows };
}

/** A table directory under the OS temp dir, removed by `dispose`. */
export class TableFixture {
  readonly root: string;
  readonly metadataDir: string;
  private readonly tempDir: string;

  private constructor(tempDir: string, name: string) {
    this.tempDir = tempDir;
    this.root = path.join(tempDir, name);
    this.metadataDir = path.join(this.root, "metadata");
  }

  static async create(name = "orders"): Promise<TableFixture> {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "lakegraph-"));
    const fixture = new TableFixture(tempDir, name);
    await fs.mkdir(fixture.metadataDir, { recursive: true });
    return fixture;
  }

  async addMetadata(fileName: string, content: TableMetadata | string): Promise<string> {
    const target = path.join(this.metadataDir, fileName);
    const text = typeof content === "string" ? content : JSON.stringify(content);
    await fs.writeFile(target, text, "utf8");
    return target;
  }

  async addManifestList(
    fileName: string,
    entries: ManifestListEntry[],
    errors: EntryDecodeError[] = [],
  ): Promise<string> {
    return this.writeJson(path.join(this.metadataDir, fileName), { entries, errors });
  }

  async addManifest(
    fileName: string,
    entries: ManifestEntry[],
    errors: EntryDecodeError[] = [],
  ): Promise<string> {
    return this.writeJson(path.join(this.metadataDir, fileName), { entries, errors });
  }

  /** Writes an empty placeholder so the data file exists. */
  async addDataFile(relative: string): Promise<string> {
    const target = path.join(this.root, ...relative.split("/"));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, "", "utf8");
    return target;
  }

  async writeVersionHint(text: string): Promise<void> {
    await fs.writeFile(path.join(this.metadataDir, "version-hint.text"), text, "utf8");
  }

  async dispose(): Promise<void> {
    await fs.rm(this.tempDir, { recursive: true, force: true });
  }

  private async writeJson(target: string, value: unknown): Promise<string> {
    await fs.writeFile(target, JSON.stringify(value), "utf8");
    return target;
  }
}
