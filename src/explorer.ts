import { resolveConfig, type ExplorerConfig } from "./config";
import { buildGraph } from "./graph/builder";
import { assignSimpleIds, SimpleIdRegistry } from "./graph/simple-ids";
import { filterVisible } from "./graph/visibility";
import { enforceChronologicalOrder } from "./layout/chronological-order";
import { applyLayout, dagreLayout, type LayoutAdapter } from "./layout/dag-layout";
import { routeEdges } from "./layout/edge-routing";
import { linkPositionDeletes } from "./layout/position-deletes";
import type { MetadataReader, RowSampler } from "./models/collaborators";
import type { Graph } from "./models/graph";
import type { Table } from "./models/unified";
import { loadTable } from "./unified/builder";

/**
 * Only the reader is required; every other field except `layout` is an
 * `ExplorerConfig` field and falls back to `DEFAULT_CONFIG`.
 */
export interface TableExplorerOptions extends Partial<ExplorerConfig> {
  reader: MetadataReader;
  sampler?: RowSampler;
  /** Defaults to dagre with the configured spacing. */
  layout?: LayoutAdapter;
}

export interface ExplorerSession {
  requestId: number;
  table: Table;
  graph: Graph;
  registry: SimpleIdRegistry;
  config: ExplorerConfig;
}

/**
 * Settings a relayout can change. Row sampling and read-error listeners are
 * bound to the model by `load`, so they keep the values of that load.
 */
export type RelayoutOverrides = Omit<Partial<ExplorerConfig>, "sampleRowLimit" | "onReadError">;

export type LoadOutcome =
  | { status: "loaded"; session: ExplorerSession }
  | { status: "superseded"; requestId: number };

export class TableExplorer {
  private readonly _reader: MetadataReader;
  private readonly _sampler: RowSampler | undefined;
  private readonly _layout: LayoutAdapter | undefined;
  private readonly _config: ExplorerConfig;
  private _requestCounter = 0;

  constructor(options: TableExplorerOptions) {
    const { reader, sampler, layout, ...config } = options;
    this._reader = reader;
    this._sampler = sampler;
    this._layout = layout;
    this._config = resolveConfig(config);
  }

  get config(): ExplorerConfig {
    return this._config;
  }

  /** Id of the most recently issued load or relayout. */
  get latestRequestId(): number {
    return this._requestCounter;
  }

  /**
   * Loads a table and produces its laid-out graph. When another load or
   * relayout is issued before this one completes, the result is discarded and
   * reported as superseded. Throws `ListingError` when the table directory
   * cannot be read.
   */
  async load(tablePath: string, overrides: Partial<ExplorerConfig> = {}): Promise<LoadOutcome> {
    const requestId = ++this._requestCounter;
    const config = resolveConfig(overrides, this._config);

    const table = await loadTable(tablePath, {
      reader: this._reader,
      sampler: this._sampler,
      sampleRowLimit: config.sampleRowLimit,
      onReadError: config.onReadError,
    });
    if (requestId !== this._requestCounter) {
      return this.superseded(requestId, tablePath);
    }
    return this.present(requestId, table, config, tablePath);
  }

  /**
   * Rebuilds the graph of an already loaded table, for example after a
   * configuration change. Sampled rows cached on the model are reused; rows
   * fetched for the first time use the sample limit of the original load.
   */
  async relayout(
    session: ExplorerSession,
    overrides: RelayoutOverrides = {},
  ): Promise<LoadOutcome> {
    const requestId = ++this._requestCounter;
    const config = resolveConfig(overrides, session.config);
    return this.present(requestId, session.table, config, session.table.path);
  }

  /** See the module-level `carryOverPositions`. */
  carryOverPositions(previous: ExplorerSession, next: ExplorerSession): Graph {
    return carryOverPositions(previous.graph, next.graph);
  }

  private async present(
    requestId: number,
    table: Table,
    config: ExplorerConfig,
    tablePath: string,
  ): Promise<LoadOutcome> {
    const registry = new SimpleIdRegistry();
    assignSimpleIds(table, registry);

    let graph = await buildGraph(table, registry, config);
    const adapter =
      this._layout ??
      dagreLayout({ nodeSpacing: config.nodeSpacing, layerSpacing: config.layerSpacing });
    graph = await applyLayout(graph, adapter);
    graph = enforceChronologicalOrder(graph, config.minimumGaps);
    graph = linkPositionDeletes(graph, config.minimumGaps.row);
    graph = routeEdges(graph);
    graph = filterVisible(graph, config.hiddenKinds);

    if (requestId !== this._requestCounter) {
      return this.superseded(requestId, tablePath);
    }
    return { status: "loaded", session: { requestId, table, graph, registry, config } };
  }

  private superseded(requestId: number, tablePath: string): LoadOutcome {
    console.debug(
      `Discarding load #${requestId} of ${tablePath}; #${this._requestCounter} is newer`,
    );
    return { status: "superseded", requestId };
  }
}

/**
 * Copies positions from `previous` onto nodes of `next` that have the same id,
 * so a reload keeps what the user already arranged.
 */
export function carryOverPositions(previous: Graph, next: Graph): Graph {
  const positions = new Map(previous.nodes.map((node) => [node.id, node.position]));
  for (const node of next.nodes) {
    const position = positions.get(node.id);
    if (position) {
      node.position = { x: position.x, y: position.y };
    }
  }
  return next;
}
