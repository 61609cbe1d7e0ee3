export {
  TableExplorer,
  carryOverPositions,
  type TableExplorerOptions,
  type ExplorerSession,
  type LoadOutcome,
  type RelayoutOverrides,
} from "./explorer";
export {
  DEFAULT_CONFIG,
  resolveConfig,
  type ExplorerConfig,
  type OrderedKind,
  type ReadErrorListener,
} from "./config";
export {
  LakegraphError,
  ListingError,
  DecodeError,
  ResolutionError,
  SamplingError,
  errorFromReadError,
  kindForStage,
  readError,
  toReadError,
  type ReadErrorKind,
  type ReadStage,
  type UnifiedReadError,
} from "./errors";
export { FILE_CONTENT, MANIFEST_CONTENT, NODE_DIMENSIONS } from "./constants";
export { normalizeFilePath, resolveDataFilePath, metadataVersionFromFileName } from "./paths";

export { loadTable, type LoadTableOptions } from "./unified/builder";
export { DataFileEntry } from "./unified/data-file";
export { discoverTables } from "./unified/warehouse";
export { summarizeTable, type TableSummary } from "./unified/summary";

export { SimpleIdRegistry, assignSimpleIds } from "./graph/simple-ids";
export { buildGraph, type GraphBuildConfig } from "./graph/builder";
export { filterVisible } from "./graph/visibility";
export { deletePosition, deleteTargetPath } from "./graph/delete-rows";

export {
  applyLayout,
  dagreLayout,
  type DagreLayoutOptions,
  type LayoutAdapter,
  type LayoutEdgeInput,
  type LayoutNodeInput,
  type LayoutResult,
} from "./layout/dag-layout";
export { enforceChronologicalOrder } from "./layout/chronological-order";
export { linkPositionDeletes } from "./layout/position-deletes";
export { routeEdges } from "./layout/edge-routing";

export type * from "./models";
