export type {
  TableMetadata,
  TableSchema,
  SchemaField,
  SnapshotRef,
  SnapshotLogEntry,
  MetadataLogEntry,
  SnapshotRecord,
  ManifestListEntry,
  ManifestEntry,
  DataFileRecord,
  KeyValueCount,
} from "./metadata";
export type {
  EntryDecodeError,
  ReadResult,
  SampleRow,
  MetadataReader,
  RowSampler,
} from "./collaborators";
export type { Table, MetadataVersion, Snapshot, Manifest } from "./unified";
export type {
  GraphNodeKind,
  Position,
  GraphNode,
  TableNode,
  MetadataNode,
  SnapshotNode,
  ManifestNode,
  FileNode,
  RowNode,
  ErrorNode,
  GraphEdge,
  EdgeSection,
  Graph,
} from "./graph";
