import type { UnifiedReadError } from "./errors";
import type { GraphNodeKind } from "./models/graph";

/** Kinds whose sibling groups are re-stacked after layout. */
export type OrderedKind = "metadata" | "snapshot" | "manifest" | "file" | "row";

/** Listener called for every read error as it is recorded. */
export interface ReadErrorListener {
  (error: UnifiedReadError): void;
}

export interface ExplorerConfig {
  includeRowSamples: boolean;
  /** Emit error nodes for recorded read errors. */
  includeErrorNodes: boolean;
  /** Node kinds removed from the final graph. */
  hiddenKinds: readonly GraphNodeKind[];
  maxFilesPerManifest: number;
  maxRowsPerFile: number;
  /** Upper bound passed to the row sampler. */
  sampleRowLimit: number;
  /** Vertical spacing between nodes of one layer. */
  nodeSpacing: number;
  /** Horizontal spacing between layers. */
  layerSpacing: number;
  /** Smallest y distance kept between consecutive siblings after reordering. */
  minimumGaps: Record<OrderedKind, number>;
  onReadError?: ReadErrorListener[];
}

export const DEFAULT_CONFIG: Required<Omit<ExplorerConfig, "onReadError">> = {
  includeRowSamples: true,
  includeErrorNodes: true,
  hiddenKinds: [],
  maxFilesPerManifest: 10,
  maxRowsPerFile: 5,
  sampleRowLimit: 50,
  nodeSpacing: 100,
  layerSpacing: 300,
  minimumGaps: {
    metadata: 24,
    snapshot: 20,
    manifest: 16,
    file: 12,
    row: 8,
  },
};

/** Fills unspecified fields from `DEFAULT_CONFIG`. */
export function resolveConfig(
  options: Partial<ExplorerConfig> = {},
  base: ExplorerConfig = DEFAULT_CONFIG,
): ExplorerConfig {
  return {
    includeRowSamples: options.includeRowSamples ?? base.includeRowSamples,
    includeErrorNodes: options.includeErrorNodes ?? base.includeErrorNodes,
    hiddenKinds: options.hiddenKinds ?? base.hiddenKinds,
    maxFilesPerManifest: options.maxFilesPerManifest ?? base.maxFilesPerManifest,
    maxRowsPerFile: options.maxRowsPerFile ?? base.maxRowsPerFile,
    sampleRowLimit: options.sampleRowLimit ?? base.sampleRowLimit,
    nodeSpacing: options.nodeSpacing ?? base.nodeSpacing,
    layerSpacing: options.layerSpacing ?? base.layerSpacing,
    minimumGaps: { ...base.minimumGaps, ...options.minimumGaps },
    onReadError: options.onReadError ?? base.onReadError,
  };
}
