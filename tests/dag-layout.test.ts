import { describe, it, expect, vi } from "vitest";
import { applyLayout, dagreLayout, type LayoutAdapter } from "../src/layout/dag-layout";
import type { Graph } from "../src/models";
import { DEFAULT_CONFIG } from "../src/config";
import { buildGraph } from "../src/graph/builder";
import { assignSimpleIds, SimpleIdRegistry } from "../src/graph/simple-ids";
import { snapshot } from "./support/fixtures";
import { snapshotOf, tableOf, versionOf } from "./support/model";

async function twoVersionGraph(): Promise<Graph> {
  const table = tableOf([
    versionOf("v1.metadata.json", [snapshotOf(snapshot(1, 100))]),
    versionOf("v2.metadata.json", [snapshotOf(snapshot(2, 200))]),
  ]);
  const registry = new SimpleIdRegistry();
  assignSimpleIds(table, registry);
  return buildGraph(table, registry, DEFAULT_CONFIG);
}

describe("dagreLayout", () => {
  it("lays out layers left to right without overlap", async () => {
    const adapter = dagreLayout({ nodeSpacing: 100, layerSpacing: 300 });
    const result = await adapter.layout(
      [
        { id: "root", width: 200, height: 80 },
        { id: "a", width: 200, height: 80 },
        { id: "b", width: 200, height: 80 },
      ],
      [
        { fromId: "root", toId: "a" },
        { fromId: "root", toId: "b" },
      ],
    );

    const root = result.positions.get("root");
    const a = result.positions.get("a");
    const b = result.positions.get("b");
    expect(root && a && b).toBeTruthy();
    if (!root || !a || !b) return;
    expect(a.x).toBeGreaterThanOrEqual(root.x + 200);
    expect(a.x).toBe(b.x);
    expect(Math.abs(a.y - b.y)).toBeGreaterThanOrEqual(80);
    expect(result.canvasWidth).toBeGreaterThan(0);
    expect(result.canvasHeight).toBeGreaterThan(0);
  });
});

describe("applyLayout", () => {
  it("feeds only hierarchy edges to the adapter and writes positions back", async () => {
    const graph = await twoVersionGraph();
    const layout = vi.fn<LayoutAdapter["layout"]>((nodes) => ({
      positions: new Map(nodes.map((node, i) => [node.id, { x: i, y: i * 10 }])),
      canvasWidth: 640,
      canvasHeight: 480,
    }));

    const laidOut = await applyLayout(graph, { layout });

    const edges = layout.mock.calls[0][1];
    expect(edges).toHaveLength(graph.edges.filter((e) => !e.isSibling).length);
    expect(edges.some((e) => e.fromId === "meta_v1.metadata.json" && e.toId === "meta_v2.metadata.json")).toBe(
      false,
    );
    expect(laidOut.nodes.map((n) => n.position)).toEqual(graph.nodes.map((_, i) => ({ x: i, y: i * 10 })));
    expect([laidOut.width, laidOut.height]).toEqual([640, 480]);
  });
});
