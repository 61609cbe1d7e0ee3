import type { GraphNode, GraphNodeKind } from "../models/graph";

export type NodeOfKind<K extends GraphNodeKind> = Extract<GraphNode, { kind: K }>;

export function nodesOfKind<K extends GraphNodeKind>(
  nodes: readonly GraphNode[],
  kind: K,
): NodeOfKind<K>[] {
  return nodes.filter((node): node is NodeOfKind<K> => node.kind === kind);
}
