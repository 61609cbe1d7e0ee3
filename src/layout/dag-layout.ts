import dagre from "dagre";
import type { Graph, Position } from "../models/graph";

export interface LayoutNodeInput {
  id: string;
  width: number;
  height: number;
}

export interface LayoutEdgeInput {
  fromId: string;
  toId: string;
}

export interface LayoutResult {
  /** Top-left corner per node id. */
  positions: Map<string, Position>;
  canvasWidth: number;
  canvasHeight: number;
}

/**
 * Generic layered placement. Implementations guarantee non-overlapping boxes
 * and a left-to-right flow, nothing about vertical order.
 */
export interface LayoutAdapter {
  layout(
    nodes: readonly LayoutNodeInput[],
    edges: readonly LayoutEdgeInput[],
  ): LayoutResult | Promise<LayoutResult>;
}

export interface DagreLayoutOptions {
  nodeSpacing?: number;
  layerSpacing?: number;
}

/** Left-to-right dagre layout with fixed node boxes. */
export function dagreLayout(options: DagreLayoutOptions = {}): LayoutAdapter {
  return {
    layout(nodes, edges) {
      const g = new dagre.graphlib.Graph();
      g.setDefaultEdgeLabel(() => ({}));
      g.setGraph({
        rankdir: "LR",
        nodesep: options.nodeSpacing ?? 100,
        ranksep: options.layerSpacing ?? 300,
      });

      for (const node of nodes) {
        g.setNode(node.id, { width: node.width, height: node.height });
      }
      for (const edge of edges) {
        g.setEdge(edge.fromId, edge.toId);
      }

      dagre.layout(g);

      const positions = new Map<string, Position>();
      for (const node of nodes) {
        const pos = g.node(node.id);
        // dagre reports centres.
        positions.set(node.id, {
          x: pos.x - node.width / 2,
          y: pos.y - node.height / 2,
        });
      }

      const label = g.graph();
      return {
        positions,
        canvasWidth: label.width ?? 0,
        canvasHeight: label.height ?? 0,
      };
    },
  };
}

/**
 * Runs the adapter over all nodes and the hierarchy edges, then writes the
 * positions back onto the nodes. Sibling edges are ordering hints only and are
 * kept out of the layout.
 */
export async function applyLayout(graph: Graph, adapter: LayoutAdapter): Promise<Graph> {
  const result = await adapter.layout(
    graph.nodes.map((node) => ({ id: node.id, width: node.width, height: node.height })),
    graph.edges
      .filter((edge) => !edge.isSibling)
      .map((edge) => ({ fromId: edge.fromId, toId: edge.toId })),
  );

  for (const node of graph.nodes) {
    const pos = result.positions.get(node.id);
    if (pos) {
      node.position.x = pos.x;
      node.position.y = pos.y;
    }
  }

  return { ...graph, width: result.canvasWidth, height: result.canvasHeight };
}
