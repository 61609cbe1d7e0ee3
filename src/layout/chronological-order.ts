import type { OrderedKind } from "../config";
import { nodesOfKind } from "../graph/nodes";
import { compareKeys, dataFileSortKey, manifestSortKey, snapshotSortKey } from "../graph/ordering";
import type { Graph, GraphNode } from "../models/graph";
import { metadataVersionFromFileName } from "../paths";

/**
 * Restacks `nodes` in the given order over the y values they already occupy.
 * Each node takes `max(slot, previous + gap)`, so the group keeps its first
 * slot and consecutive nodes stay at least `gap` apart.
 */
export function assignSlots(ordered: readonly GraphNode[], gap: number): void {
  const slots = ordered.map((node) => node.position.y).sort((a, b) => a - b);
  let previous = Number.NEGATIVE_INFINITY;
  ordered.forEach((node, i) => {
    const y = Math.max(slots[i], previous + gap);
    node.position.y = y;
    previous = y;
  });
}

/** First hierarchy parent of every node, in edge order. */
export function primaryParents(graph: Graph): Map<string, string> {
  const parents = new Map<string, string>();
  for (const edge of graph.edges) {
    if (edge.isSibling || parents.has(edge.toId)) continue;
    parents.set(edge.toId, edge.fromId);
  }
  return parents;
}

function groupByParent<T extends GraphNode>(
  nodes: readonly T[],
  parents: Map<string, string>,
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const node of nodes) {
    const parent = parents.get(node.id);
    if (parent === undefined) continue;
    const group = groups.get(parent);
    if (group) group.push(node);
    else groups.set(parent, [node]);
  }
  return groups;
}

/** Hierarchy children of every node, in edge order. */
function childrenByParent(graph: Graph): Map<string, string[]> {
  const children = new Map<string, string[]>();
  for (const edge of graph.edges) {
    if (edge.isSibling) continue;
    const list = children.get(edge.fromId);
    if (list) list.push(edge.toId);
    else children.set(edge.fromId, [edge.toId]);
  }
  return children;
}

/**
 * Sibling groups among `nodes`, one per parent. Groups sharing a member are
 * merged, so a node listed under several parents is ordered once against all
 * of its siblings. Members keep build order.
 */
function siblingGroups<T extends GraphNode>(
  nodes: readonly T[],
  children: Map<string, string[]>,
): T[][] {
  const byId = new Map(nodes.map((node) => [node.id, node]));
  const buildOrder = new Map(nodes.map((node, index) => [node.id, index]));
  const groupOf = new Map<string, T[]>();
  for (const childIds of children.values()) {
    const merged = new Set<T>();
    for (const id of childIds) {
      const node = byId.get(id);
      if (!node) continue;
      for (const member of groupOf.get(id) ?? [node]) merged.add(member);
    }
    if (merged.size === 0) continue;
    const group = [...merged].sort(
      (a, b) => (buildOrder.get(a.id) ?? 0) - (buildOrder.get(b.id) ?? 0),
    );
    for (const member of group) groupOf.set(member.id, group);
  }
  return [...new Set(groupOf.values())];
}

function byY(a: GraphNode, b: GraphNode): number {
  return a.position.y - b.position.y;
}

/** Children of each `ordered` parent, concatenated in parent order. */
function childrenInParentOrder<T extends GraphNode>(
  ordered: readonly GraphNode[],
  children: Map<string, T[]>,
  compare: (a: T, b: T) => number,
): T[] {
  return ordered.flatMap((parent) => [...(children.get(parent.id) ?? [])].sort(compare));
}

/**
 * Rewrites y positions so that siblings read top to bottom in domain order:
 * metadata by file-name version, snapshots by time, manifests by sequence,
 * files and rows globally across their parents. A snapshot or manifest shared
 * by several parents joins every one of their groups. x is never touched.
 */
export function enforceChronologicalOrder(
  graph: Graph,
  gaps: Record<OrderedKind, number>,
): Graph {
  const parents = primaryParents(graph);
  const children = childrenByParent(graph);
  const nodes = graph.nodes;

  const metadata = nodesOfKind(nodes, "metadata");
  for (const group of siblingGroups(metadata, children)) {
    assignSlots(
      [...group].sort((a, b) =>
        compareKeys(
          [metadataVersionFromFileName(a.fileName)],
          [metadataVersionFromFileName(b.fileName)],
        ),
      ),
      gaps.metadata,
    );
  }

  const snapshots = nodesOfKind(nodes, "snapshot");
  for (const group of siblingGroups(snapshots, children)) {
    assignSlots(
      [...group].sort((a, b) => compareKeys(snapshotSortKey(a.data), snapshotSortKey(b.data))),
      gaps.snapshot,
    );
  }

  const manifests = nodesOfKind(nodes, "manifest");
  for (const group of siblingGroups(manifests, children)) {
    assignSlots(
      [...group].sort((a, b) => compareKeys(manifestSortKey(a.data), manifestSortKey(b.data))),
      gaps.manifest,
    );
  }

  const files = nodesOfKind(nodes, "file");
  const orderedFiles = childrenInParentOrder(
    [...manifests].sort(byY),
    groupByParent(files, parents),
    (a, b) =>
      compareKeys(
        dataFileSortKey(a.entry, a.manifestSequenceNumber),
        dataFileSortKey(b.entry, b.manifestSequenceNumber),
      ),
  );
  assignSlots(orderedFiles, gaps.file);

  const rows = nodesOfKind(nodes, "row");
  const orderedRows = childrenInParentOrder(
    [...files].sort(byY),
    groupByParent(rows, parents),
    (a, b) => a.rowIndex - b.rowIndex,
  );
  assignSlots(orderedRows, gaps.row);

  return graph;
}
