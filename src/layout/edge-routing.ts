import type { EdgeSection, Graph, GraphEdge, GraphNode } from "../models/graph";

const CANVAS_MARGIN = 50;

function section(edge: GraphEdge, from: GraphNode, to: GraphNode): EdgeSection {
  if (edge.isSibling) {
    return {
      startX: from.position.x + from.width / 2,
      startY: from.position.y + from.height,
      endX: to.position.x + to.width / 2,
      endY: to.position.y,
    };
  }
  return {
    startX: from.position.x + from.width,
    startY: from.position.y + from.height / 2,
    endX: to.position.x,
    endY: to.position.y + to.height / 2,
  };
}

/**
 * Recomputes edge sections and the canvas extent from the final node
 * positions. Reordering moves nodes after layout, so the sections the layout
 * engine would report no longer match.
 */
export function routeEdges(graph: Graph): Graph {
  const byId = new Map(graph.nodes.map((node) => [node.id, node]));

  const edges = graph.edges.map((edge) => {
    const from = byId.get(edge.fromId);
    const to = byId.get(edge.toId);
    if (!from || !to) return edge;
    return { ...edge, sections: [section(edge, from, to)] };
  });

  let right = 0;
  let bottom = 0;
  for (const node of graph.nodes) {
    right = Math.max(right, node.position.x + node.width);
    bottom = Math.max(bottom, node.position.y + node.height);
  }

  return {
    nodes: graph.nodes,
    edges,
    width: Math.max(graph.width, right + CANVAS_MARGIN),
    height: Math.max(graph.height, bottom + CANVAS_MARGIN),
  };
}
