import type { UnifiedReadError } from "../errors";
import type { TableSummary } from "../unified/summary";
import type { SampleRow } from "./collaborators";
import type {
  DataFileRecord,
  ManifestEntry,
  ManifestListEntry,
  SnapshotRecord,
  TableMetadata,
} from "./metadata";

export type GraphNodeKind =
  | "table"
  | "metadata"
  | "snapshot"
  | "manifest"
  | "file"
  | "row"
  | "error";

export interface Position {
  x: number;
  y: number;
}

interface GraphNodeBase {
  readonly id: string;
  readonly width: number;
  readonly height: number;
  /** Written by layout, reordering and dragging; nothing else changes. */
  position: Position;
}

export interface TableNode extends GraphNodeBase {
  readonly kind: "table";
  readonly summary: TableSummary;
}

export interface MetadataNode extends GraphNodeBase {
  readonly kind: "metadata";
  readonly fileName: string;
  readonly path: string;
  readonly simpleId: number;
  readonly data: TableMetadata;
}

export interface SnapshotNode extends GraphNodeBase {
  readonly kind: "snapshot";
  readonly simpleId: number;
  readonly manifestListPath: string;
  readonly data: SnapshotRecord;
}

export interface ManifestNode extends GraphNodeBase {
  readonly kind: "manifest";
  readonly simpleId: number;
  readonly path: string;
  readonly data: ManifestListEntry;
}

export interface FileNode extends GraphNodeBase {
  readonly kind: "file";
  readonly simpleId: number;
  readonly path: string;
  readonly entry: ManifestEntry;
  readonly data: DataFileRecord;
  /** Every snapshot whose manifest list reaches this file, in build order. */
  readonly snapshotIds: Array<number | null>;
  readonly manifestSequenceNumber: number | null;
}

export interface RowNode extends GraphNodeBase {
  readonly kind: "row";
  readonly fileNodeId: string;
  readonly fileSimpleId: number;
  readonly rowIndex: number;
  readonly cells: SampleRow;
  /** Content of the owning file. */
  readonly content: number;
  readonly isDelete: boolean;
  readonly targetFileSimpleId: number | null;
}

export interface ErrorNode extends GraphNodeBase {
  readonly kind: "error";
  readonly error: UnifiedReadError;
}

export type GraphNode =
  | TableNode
  | MetadataNode
  | SnapshotNode
  | ManifestNode
  | FileNode
  | RowNode
  | ErrorNode;

export interface EdgeSection {
  startX: number;
  startY: number;
  endX: number;
  endY: number;
}

export interface GraphEdge {
  readonly id: string;
  readonly fromId: string;
  readonly toId: string;
  /** Ordering hint between siblings; never fed to layout. */
  readonly isSibling: boolean;
  readonly sections?: readonly EdgeSection[];
}

export interface Graph {
  nodes: GraphNode[];
  edges: GraphEdge[];
  width: number;
  height: number;
}
