import type { GraphNodeKind } from "./models/graph";

export const NODE_DIMENSIONS: Record<GraphNodeKind, { width: number; height: number }> = {
  table: { width: 280, height: 120 },
  metadata: { width: 260, height: 120 },
  snapshot: { width: 220, height: 100 },
  manifest: { width: 200, height: 80 },
  file: { width: 200, height: 60 },
  row: { width: 200, height: 80 },
  error: { width: 240, height: 90 },
};

export const MANIFEST_CONTENT = {
  DATA: 0,
  DELETES: 1,
} as const;

export const FILE_CONTENT = {
  DATA: 0,
  POSITION_DELETES: 1,
  EQUALITY_DELETES: 2,
} as const;

export const METADATA_DIR = "metadata";
export const METADATA_FILE_SUFFIX = ".metadata.json";
export const VERSION_HINT_FILE = "version-hint.text";

/** Cells a position-delete row carries. */
export const DELETE_FILE_PATH_COLUMN = "file_path";
export const DELETE_POSITION_COLUMN = "pos";
