import { FILE_CONTENT } from "../constants";
import { deletePosition, deleteTargetPath } from "../graph/delete-rows";
import { nodesOfKind } from "../graph/nodes";
import type { FileNode, Graph, RowNode } from "../models/graph";
import { normalizeFilePath } from "../paths";
import { assignSlots } from "./chronological-order";

function anchorKey(filePath: string, snapshotId: number | null): string {
  return `${normalizeFilePath(filePath)}|${snapshotId ?? ""}`;
}

/**
 * Sampled rows of each data file, keyed by path and by every snapshot that
 * reaches the file. First file wins per key.
 */
function anchorLists(files: readonly FileNode[], rows: readonly RowNode[]): Map<string, RowNode[]> {
  const rowsByFile = new Map<string, RowNode[]>();
  for (const row of rows) {
    const list = rowsByFile.get(row.fileNodeId);
    if (list) list.push(row);
    else rowsByFile.set(row.fileNodeId, [row]);
  }

  const anchors = new Map<string, RowNode[]>();
  for (const file of files) {
    if ((file.data.content ?? FILE_CONTENT.DATA) > FILE_CONTENT.DATA) continue;
    const filePath = file.data.filePath;
    if (!filePath) continue;
    const list = [...(rowsByFile.get(file.id) ?? [])].sort((a, b) => a.rowIndex - b.rowIndex);
    for (const snapshotId of file.snapshotIds) {
      const key = anchorKey(filePath, snapshotId);
      if (!anchors.has(key)) anchors.set(key, list);
    }
  }
  return anchors;
}

/** Target row seen from the first of the delete file's snapshots that has one. */
function findAnchor(
  anchors: Map<string, RowNode[]>,
  target: string,
  position: number,
  snapshotIds: readonly (number | null)[],
): RowNode | undefined {
  for (const snapshotId of snapshotIds) {
    const anchor = anchors.get(anchorKey(target, snapshotId))?.[position];
    if (anchor) return anchor;
  }
  return undefined;
}

/**
 * Moves each position-delete row directly below the data row it removes, then
 * restacks all rows with `gap`. Deletes whose target row was not sampled keep
 * their place. Applying it twice changes nothing.
 */
export function linkPositionDeletes(graph: Graph, gap: number): Graph {
  const files = nodesOfKind(graph.nodes, "file");
  const rows = nodesOfKind(graph.nodes, "row");
  const filesById = new Map(files.map((file) => [file.id, file]));
  const anchors = anchorLists(files, rows);

  const ordered = [...rows].sort((a, b) => a.position.y - b.position.y);

  const linked = new Map<string, RowNode[]>();
  const moved = new Set<string>();
  for (const row of ordered) {
    if (row.content !== FILE_CONTENT.POSITION_DELETES) continue;
    const target = deleteTargetPath(row.cells);
    const position = deletePosition(row.cells);
    const owner = filesById.get(row.fileNodeId);
    if (target === null || position === null || !owner) continue;

    const anchor = findAnchor(anchors, target, position, owner.snapshotIds);
    if (!anchor) continue;
    const stack = linked.get(anchor.id);
    if (stack) stack.push(row);
    else linked.set(anchor.id, [row]);
    moved.add(row.id);
  }
  if (moved.size === 0) return graph;

  const relinked: RowNode[] = [];
  for (const row of ordered) {
    if (moved.has(row.id)) continue;
    relinked.push(row, ...(linked.get(row.id) ?? []));
  }
  assignSlots(relinked, gap);

  return graph;
}
