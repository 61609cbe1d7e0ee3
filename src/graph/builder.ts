import { createHash } from "node:crypto";
import type { ExplorerConfig } from "../config";
import { NODE_DIMENSIONS } from "../constants";
import type { UnifiedReadError } from "../errors";
import type {
  ErrorNode,
  FileNode,
  Graph,
  GraphEdge,
  GraphNode,
  GraphNodeKind,
  ManifestNode,
  MetadataNode,
  SnapshotNode,
} from "../models/graph";
import type { Manifest, MetadataVersion, Snapshot, Table } from "../models/unified";
import type { DataFileEntry } from "../unified/data-file";
import { summarizeTable } from "../unified/summary";
import { deleteTargetPath } from "./delete-rows";
import { sortDataFiles, sortManifests } from "./ordering";
import type { SimpleIdRegistry } from "./simple-ids";

export type GraphBuildConfig = Pick<
  ExplorerConfig,
  "includeRowSamples" | "includeErrorNodes" | "maxFilesPerManifest" | "maxRowsPerFile"
>;

function frame(kind: GraphNodeKind) {
  const { width, height } = NODE_DIMENSIONS[kind];
  return { width, height, position: { x: 0, y: 0 } };
}

export function tableNodeId(table: Table): string {
  return `table_${table.name}`;
}

export function metadataNodeId(version: MetadataVersion): string {
  return `meta_${version.fileName}`;
}

export function snapshotNodeId(snapshot: Snapshot): string {
  return `snap_${snapshot.record.snapshotId}`;
}

/** Keyed by the recorded manifest path, so one manifest is one node. */
export function manifestNodeId(manifest: Manifest, ownerId: string, index: number): string {
  const recorded = manifest.record.manifestPath?.trim();
  if (!recorded) return `man_${ownerId}_${index}`;
  return `man_${createHash("sha1").update(recorded).digest("hex").slice(0, 12)}`;
}

export function fileNodeId(simpleId: number): string {
  return `file_${simpleId}`;
}

function reachedFrom(file: FileNode, snapshotId: number | null): void {
  if (!file.snapshotIds.includes(snapshotId)) file.snapshotIds.push(snapshotId);
}

class GraphAssembly {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();
  private readonly expandedSnapshots = new Set<string>();
  private readonly expandedManifests = new Set<string>();
  private readonly manifestFiles = new Map<string, FileNode[]>();
  private readonly expandedFiles = new Set<string>();
  private nextMetadataId = 1;
  private nextSnapshotId = 1;
  private nextManifestId = 1;

  private readonly registry: SimpleIdRegistry;
  private readonly config: GraphBuildConfig;

  constructor(registry: SimpleIdRegistry, config: GraphBuildConfig) {
    this.registry = registry;
    this.config = config;
  }

  async build(table: Table): Promise<Graph> {
    const tableId = tableNodeId(table);
    this.nodes.set(tableId, {
      kind: "table",
      id: tableId,
      summary: summarizeTable(table),
      ...frame("table"),
    });
    this.addErrors(tableId, table.readErrors);

    let previousId: string | null = null;
    for (const version of table.metadataVersions) {
      const id = this.addMetadata(version);
      this.addEdge(`e_meta_${tableId}_to_${id}`, tableId, id);
      if (previousId !== null) {
        this.addEdge(`e_meta_seq_${previousId}_to_${id}`, previousId, id, true);
      }
      previousId = id;
      await this.addSnapshots(id, version.snapshots);
    }

    return { nodes: [...this.nodes.values()], edges: [...this.edges.values()], width: 0, height: 0 };
  }

  private addMetadata(version: MetadataVersion): string {
    const id = metadataNodeId(version);
    if (!this.nodes.has(id)) {
      const node: MetadataNode = {
        kind: "metadata",
        id,
        fileName: version.fileName,
        path: version.path,
        simpleId: this.nextMetadataId++,
        data: version.metadata,
        ...frame("metadata"),
      };
      this.nodes.set(id, node);
    }
    return id;
  }

  private async addSnapshots(metadataId: string, snapshots: readonly Snapshot[]): Promise<void> {
    let previousId: string | null = null;
    for (const snapshot of snapshots) {
      const id = snapshotNodeId(snapshot);
      if (!this.nodes.has(id)) {
        const node: SnapshotNode = {
          kind: "snapshot",
          id,
          simpleId: this.nextSnapshotId++,
          manifestListPath: snapshot.manifestListPath,
          data: snapshot.record,
          ...frame("snapshot"),
        };
        this.nodes.set(id, node);
      }
      this.addEdge(`e_snap_${metadataId}_to_${id}`, metadataId, id);
      if (previousId !== null) {
        this.addEdge(`e_snap_seq_${metadataId}_${previousId}_to_${id}`, previousId, id, true);
      }
      previousId = id;

      if (!this.expandedSnapshots.has(id)) {
        this.expandedSnapshots.add(id);
        this.addErrors(id, snapshot.readErrors);
        await this.addManifests(id, snapshot);
      }
    }
  }

  private async addManifests(snapshotId: string, snapshot: Snapshot): Promise<void> {
    let previousId: string | null = null;
    const manifests = sortManifests(snapshot.manifests);
    for (const [index, manifest] of manifests.entries()) {
      const id = manifestNodeId(manifest, snapshotId, index);
      if (!this.nodes.has(id)) {
        const node: ManifestNode = {
          kind: "manifest",
          id,
          simpleId: this.nextManifestId++,
          path: manifest.path,
          data: manifest.record,
          ...frame("manifest"),
        };
        this.nodes.set(id, node);
      }
      this.addEdge(`e_man_${snapshotId}_to_${id}`, snapshotId, id);
      if (previousId !== null) {
        this.addEdge(`e_man_seq_${snapshotId}_${previousId}_to_${id}`, previousId, id, true);
      }
      previousId = id;

      // Children are expanded on the first visit only; later visits still
      // record the snapshot that reached them.
      const contextSnapshotId = snapshot.record.snapshotId ?? null;
      if (!this.expandedManifests.has(id)) {
        this.expandedManifests.add(id);
        this.addErrors(id, manifest.readErrors);
        await this.addFiles(id, manifest, contextSnapshotId);
      } else {
        for (const file of this.manifestFiles.get(id) ?? []) {
          reachedFrom(file, contextSnapshotId);
        }
      }
    }
  }

  private async addFiles(
    manifestId: string,
    manifest: Manifest,
    contextSnapshotId: number | null,
  ): Promise<void> {
    let previousId: string | null = null;
    const reached: FileNode[] = [];
    this.manifestFiles.set(manifestId, reached);
    const dataFiles = sortDataFiles(manifest.dataFiles, manifest.record)
      .slice(0, this.config.maxFilesPerManifest);
    for (const dataFile of dataFiles) {
      const simpleId = this.registry.assign(dataFile.recordedPath);
      const id = fileNodeId(simpleId);
      const existing = this.nodes.get(id);
      if (existing?.kind === "file") {
        reachedFrom(existing, contextSnapshotId);
        reached.push(existing);
      } else {
        const node: FileNode = {
          kind: "file",
          id,
          simpleId,
          path: dataFile.path,
          entry: dataFile.record,
          data: dataFile.record.dataFile ?? { filePath: dataFile.recordedPath },
          snapshotIds: [contextSnapshotId],
          manifestSequenceNumber: manifest.record.sequenceNumber ?? null,
          ...frame("file"),
        };
        this.nodes.set(id, node);
        reached.push(node);
      }
      this.addEdge(`e_file_${manifestId}_to_${id}`, manifestId, id);
      if (previousId !== null) {
        this.addEdge(`e_file_seq_${manifestId}_${previousId}_to_${id}`, previousId, id, true);
      }
      previousId = id;

      if (this.config.includeRowSamples && !this.expandedFiles.has(id)) {
        this.expandedFiles.add(id);
        await this.addRows(id, simpleId, dataFile);
      }
    }
  }

  private async addRows(fileId: string, fileSimpleId: number, dataFile: DataFileEntry): Promise<void> {
    const rows = (await dataFile.rows()).slice(0, this.config.maxRowsPerFile);
    const content = dataFile.content;
    rows.forEach((cells, rowIndex) => {
      const id = `row_${fileId}_${rowIndex}`;
      const target = content > 0 ? deleteTargetPath(cells) : null;
      this.nodes.set(id, {
        kind: "row",
        id,
        fileNodeId: fileId,
        fileSimpleId,
        rowIndex,
        cells,
        content,
        isDelete: content > 0,
        targetFileSimpleId: target === null ? null : this.registry.lookup(target),
        ...frame("row"),
      });
      this.addEdge(`e_row_${id}`, fileId, id);
    });
  }

  private addErrors(ownerId: string, errors: readonly UnifiedReadError[]): void {
    if (!this.config.includeErrorNodes) return;
    errors.forEach((error, index) => {
      const id = `err_${ownerId}_${index}`;
      const node: ErrorNode = { kind: "error", id, error, ...frame("error") };
      this.nodes.set(id, node);
      this.addEdge(`e_err_${id}`, ownerId, id);
    });
  }

  private addEdge(id: string, fromId: string, toId: string, isSibling = false): void {
    if (!this.edges.has(id)) {
      this.edges.set(id, { id, fromId, toId, isSibling });
    }
  }
}

/**
 * Turns the unified model into a node/edge graph. Shared snapshots, manifests
 * and files become one node with several incoming edges. Ids depend only on
 * the model, so rebuilding the same table yields the same ids. Every data file
 * must already be registered (`assignSimpleIds`).
 */
export function buildGraph(
  table: Table,
  registry: SimpleIdRegistry,
  config: GraphBuildConfig,
): Promise<Graph> {
  return new GraphAssembly(registry, config).build(table);
}
