import type { Table } from "../models/unified";
import { normalizeFilePath } from "../paths";
import { sortDataFiles, sortManifests } from "./ordering";

/**
 * Short numeric labels for data files. A path and any variant of it that
 * normalizes to the same value share one id; ids start at 1 and are never
 * reused.
 */
export class SimpleIdRegistry {
  private nextId = 1;
  private readonly ids = new Map<string, number>();

  assign(path: string): number {
    const raw = path.trim();
    const normalized = normalizeFilePath(path);
    const existing = this.ids.get(normalized) ?? this.ids.get(raw);
    const id = existing ?? this.nextId++;
    this.ids.set(raw, id);
    this.ids.set(normalized, id);
    return id;
  }

  lookup(path: string): number | null {
    return this.ids.get(normalizeFilePath(path)) ?? this.ids.get(path.trim()) ?? null;
  }

  /** Number of distinct ids handed out. */
  get size(): number {
    return this.nextId - 1;
  }
}

/**
 * Assigns an id to every data file reachable from the table, walking
 * metadata, snapshots, manifests and files in graph order. Must run before
 * any delete row is resolved.
 */
export function assignSimpleIds(table: Table, registry: SimpleIdRegistry): void {
  for (const version of table.metadataVersions) {
    for (const snapshot of version.snapshots) {
      for (const manifest of sortManifests(snapshot.manifests)) {
        for (const dataFile of sortDataFiles(manifest.dataFiles, manifest.record)) {
          registry.assign(dataFile.recordedPath);
        }
      }
    }
  }
}
