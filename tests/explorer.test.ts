import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ListingError } from "../src/errors";
import { carryOverPositions, TableExplorer, type ExplorerSession, type LoadOutcome } from "../src/explorer";
import {
  JsonMetadataReader,
  TableFixture,
  fakeSampler,
  fileEntry,
  manifestRef,
  metadata,
  snapshot,
} from "./support/fixtures";
import { verticalOrder } from "./support/graph";

let fixture: TableFixture;

beforeEach(async () => {
  fixture = await TableFixture.create();
  await fixture.addMetadata("v1.metadata.json", metadata([snapshot(1, 1000, { sequenceNumber: 1 })]));
  await fixture.writeVersionHint("1");
  await fixture.addManifestList("snap-1.avro", [
    manifestRef("deletes.avro", { content: 1, sequenceNumber: 2, minSequenceNumber: 2 }),
    manifestRef("data.avro", { content: 0, sequenceNumber: 1, minSequenceNumber: 1 }),
  ]);
  await fixture.addManifest("data.avro", [fileEntry("data/a.parquet", 0)]);
  await fixture.addManifest("deletes.avro", [fileEntry("data/a-deletes.parquet", 1)]);
  await fixture.addDataFile("data/a.parquet");
  await fixture.addDataFile("data/a-deletes.parquet");
});

afterEach(async () => {
  await fixture.dispose();
  vi.restoreAllMocks();
});

function explorerWithRows() {
  const { sampler, sampleRows } = fakeSampler({
    "a.parquet": [{ id: 1 }, { id: 2 }, { id: 3 }],
    "a-deletes.parquet": [{ file_path: "data/a.parquet", pos: 0 }],
  });
  return { explorer: new TableExplorer({ reader: new JsonMetadataReader(), sampler }), sampleRows };
}

function loaded(outcome: LoadOutcome): ExplorerSession {
  if (outcome.status !== "loaded") throw new Error(`expected a loaded outcome, got ${outcome.status}`);
  return outcome.session;
}

describe("TableExplorer", () => {
  it("gives the first data file simple id 1", async () => {
    const { explorer } = explorerWithRows();

    const session = loaded(await explorer.load(fixture.root));

    expect(session.registry.lookup("data/a.parquet")).toBe(1);
    expect(session.registry.lookup("data/a-deletes.parquet")).toBe(2);
  });

  it("places the data manifest above the delete manifest", async () => {
    const { explorer } = explorerWithRows();

    const { graph } = loaded(await explorer.load(fixture.root));
    const manifests = graph.nodes
      .filter((n) => n.kind === "manifest")
      .sort((a, b) => a.position.y - b.position.y);

    expect(manifests.map((n) => (n.kind === "manifest" ? n.data.content : null))).toEqual([0, 1]);
  });

  it("places the delete row right after the row it removes", async () => {
    const { explorer } = explorerWithRows();

    const { graph } = loaded(await explorer.load(fixture.root));

    expect(verticalOrder(graph, "row")).toEqual([
      "row_file_1_0",
      "row_file_2_0",
      "row_file_1_1",
      "row_file_1_2",
    ]);
  });

  it("routes every edge", async () => {
    const { explorer } = explorerWithRows();

    const { graph } = loaded(await explorer.load(fixture.root));

    expect(graph.edges.every((e) => e.sections?.length === 1)).toBe(true);
    expect(graph.width).toBeGreaterThan(0);
  });

  it("reports an earlier load as superseded", async () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const { explorer } = explorerWithRows();

    const first = explorer.load(fixture.root);
    const second = explorer.load(fixture.root);

    expect(await first).toEqual({ status: "superseded", requestId: 1 });
    expect((await second).status).toBe("loaded");
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it("throws ListingError for a missing table", async () => {
    const { explorer } = explorerWithRows();

    await expect(explorer.load(path.join(fixture.root, "missing"))).rejects.toThrow(ListingError);
  });

  it("hides node kinds on request", async () => {
    const { explorer } = explorerWithRows();

    const { graph } = loaded(await explorer.load(fixture.root, { hiddenKinds: ["row", "error"] }));

    expect(graph.nodes.map((n) => n.kind)).not.toContain("row");
    expect(graph.edges.some((e) => e.toId.startsWith("row_"))).toBe(false);
  });

  it("reuses cached rows on relayout", async () => {
    const { explorer, sampleRows } = explorerWithRows();
    const session = loaded(await explorer.load(fixture.root));

    const next = loaded(await explorer.relayout(session, { maxRowsPerFile: 1 }));

    expect(next.requestId).toBe(2);
    expect(next.graph.nodes.filter((n) => n.kind === "row")).toHaveLength(2);
    expect(sampleRows).toHaveBeenCalledTimes(2);
  });

  it("samples with the load's row limit when a relayout first shows rows", async () => {
    const { sampler, sampleRows } = fakeSampler({
      "a.parquet": [{ id: 1 }, { id: 2 }, { id: 3 }],
      "a-deletes.parquet": [{ file_path: "data/a.parquet", pos: 0 }],
    });
    const explorer = new TableExplorer({ reader: new JsonMetadataReader(), sampler });
    const session = loaded(await explorer.load(fixture.root, { includeRowSamples: false, sampleRowLimit: 2 }));
    expect(sampleRows).not.toHaveBeenCalled();

    const next = loaded(await explorer.relayout(session, { includeRowSamples: true }));

    expect(next.config.sampleRowLimit).toBe(2);
    expect(sampleRows.mock.calls.map(([, limit]) => limit)).toEqual([2, 2]);
    expect(next.graph.nodes.filter((n) => n.kind === "row")).toHaveLength(3);
  });

  it("carries positions over to a new graph", async () => {
    const { explorer } = explorerWithRows();
    const session = loaded(await explorer.load(fixture.root));
    const snap = session.graph.nodes.find((n) => n.id === "snap_1");
    if (snap) snap.position = { x: -5, y: -7 };

    const next = loaded(await explorer.relayout(session));
    carryOverPositions(session.graph, next.graph);

    expect(next.graph.nodes.find((n) => n.id === "snap_1")?.position).toEqual({ x: -5, y: -7 });
  });

  it("records read errors as error nodes", async () => {
    await fixture.addManifestList("snap-1.avro", [manifestRef("gone.avro")]);
    const listener = vi.fn();
    const explorer = new TableExplorer({ reader: new JsonMetadataReader(), onReadError: [listener] });

    const { graph } = loaded(await explorer.load(fixture.root));

    expect(listener).toHaveBeenCalledTimes(1);
    const errorNode = graph.nodes.find((n) => n.kind === "error");
    expect(errorNode?.kind === "error" && errorNode.error.stage).toBe("resolve-manifest-file");
  });
});
