import type { SampleRow } from "../models/collaborators";
import type { ManifestEntry } from "../models/metadata";

export type RowLoader = () => Promise<SampleRow[]>;

/**
 * A manifest entry with its resolved on-disk path. Sample rows are loaded on
 * first access and cached for the lifetime of the instance.
 */
export class DataFileEntry {
  public readonly record: ManifestEntry;
  public readonly path: string;
  /** Path as recorded in the manifest; the registry key for this file. */
  public readonly recordedPath: string;

  private readonly loadRows: RowLoader;
  private cachedRows: Promise<readonly SampleRow[]> | null = null;

  constructor(
    record: ManifestEntry,
    path: string,
    recordedPath: string,
    loadRows: RowLoader,
  ) {
    this.record = record;
    this.path = path;
    this.recordedPath = recordedPath;
    this.loadRows = loadRows;
  }

  /** Content of the embedded data file, 0 (data) when absent. */
  get content(): number {
    return this.record.dataFile?.content ?? 0;
  }

  rows(): Promise<readonly SampleRow[]> {
    if (this.cachedRows === null) {
      this.cachedRows = this.loadRows().catch((e: unknown) => {
        console.warn(`Row sampling failed for ${this.path}:`, e);
        return [];
      });
    }
    return this.cachedRows;
  }
}
