import type { Graph, GraphNodeKind } from "../models/graph";

/** Drops nodes of the hidden kinds and every edge touching one. */
export function filterVisible(graph: Graph, hiddenKinds: readonly GraphNodeKind[]): Graph {
  if (hiddenKinds.length === 0) return graph;
  const hidden = new Set(hiddenKinds);
  const nodes = graph.nodes.filter((node) => !hidden.has(node.kind));
  const visible = new Set(nodes.map((node) => node.id));
  const edges = graph.edges.filter((edge) => visible.has(edge.fromId) && visible.has(edge.toId));
  return { ...graph, nodes, edges };
}
