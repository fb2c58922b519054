import { afterEach, describe, expect, it, vi } from "vitest";
import { loadTopology, parseTopology } from "../network/topology";
import { MalformedTopologyError, ResourceNotFoundError } from "../errors";

const GRID_NET = `<?xml version="1.0" encoding="UTF-8"?>
<net version="1.9">
  <edge id=":J1_0" function="internal">
    <lane id=":J1_0_0" index="0" shape="98.4,-1.6 101.6,1.6"/>
  </edge>
  <edge id="E1" from="J0" to="J1" priority="1">
    <lane id="E1_0" index="0" shape="0.00,-1.60 50.00,-1.60 100.00,-1.60"/>
    <lane id="E1_1" index="1" shape="0.00,-4.80 100.00,-4.80"/>
  </edge>
  <edge id="E2" from="J1" to="J2"/>
  <edge id="E3" from="J2" to="GHOST"/>
  <junction id="J0" type="dead_end" x="0.00" y="0.00"/>
  <junction id="J1" type="traffic_light" x="100.00" y="0.00"/>
  <junction id="J2" type="priority" x="100.00" y="100.00"/>
  <junction id=":J1_0_0" type="internal" x="100.00" y="0.00"/>
  <connection from="E1" to="E2" fromLane="0" toLane="0"/>
  <connection from=":J1_0" to="E2" fromLane="0" toLane="0"/>
  <connection from="E1" to="MISSING" fromLane="0" toLane="0"/>
</net>`;

describe("parseTopology", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps only non-internal junctions and edges", () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { topology, stats } = parseTopology(GRID_NET);

    expect([...topology.nodes.keys()]).toEqual(["J0", "J1", "J2"]);
    expect([...topology.edges.keys()]).toEqual(["E1", "E2", "E3"]);
    expect(topology.nodes.get("J2")?.position).toEqual({ x: 100, y: 100 });
    expect(stats.skippedInternalNodes).toBe(1);
    expect(stats.skippedInternalEdges).toBe(1);
  });

  it("takes edge geometry from the first lane", () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { topology } = parseTopology(GRID_NET);

    expect(topology.edges.get("E1")?.shape).toEqual([
      { x: 0, y: -1.6 },
      { x: 50, y: -1.6 },
      { x: 100, y: -1.6 }
    ]);
  });

  it("falls back to endpoint positions, or to an empty shape when an endpoint is unknown", () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { topology } = parseTopology(GRID_NET);

    expect(topology.edges.get("E2")?.shape).toEqual([
      { x: 100, y: 0 },
      { x: 100, y: 100 }
    ]);
    expect(topology.edges.get("E3")?.shape).toEqual([]);
  });

  it("logs and drops connections touching internal or unknown edges", () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { topology, stats } = parseTopology(GRID_NET);

    expect(topology.connections).toEqual([{ fromEdge: "E1", toEdge: "E2", fromLane: 0, toLane: 0 }]);
    expect(stats.skippedConnections).toBe(2);
    expect(warn).toHaveBeenCalledWith(
      "[topology] Excluded 2 connection(s) referencing internal or unknown edges."
    );
  });

  it("gives every exposed edge either a lane shape of two or more points or its endpoint positions", () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { topology } = parseTopology(GRID_NET);

    for (const edge of topology.edges.values()) {
      const from = topology.nodes.get(edge.fromNode);
      const to = topology.nodes.get(edge.toNode);
      if (edge.id === "E1") {
        expect(edge.shape.length).toBeGreaterThanOrEqual(2);
      } else if (from && to) {
        expect(edge.shape).toEqual([from.position, to.position]);
      } else {
        expect(edge.shape).toEqual([]);
      }
    }
  });

  it("replaces an unusable lane shape with the straight segment", () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { topology } = parseTopology(`<net>
      <junction id="A" x="0" y="0"/>
      <junction id="B" x="10" y="0"/>
      <edge id="AB" from="A" to="B"><lane id="AB_0" shape="0,0 ten,0"/></edge>
    </net>`);

    expect(topology.edges.get("AB")?.shape).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 }
    ]);
    expect(warn).toHaveBeenCalledWith(
      "[topology] Edge AB has an unusable lane shape; using junction positions."
    );
  });

  it("accepts a single-junction network", () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const { topology } = parseTopology(`<net><junction id="solo" x="5" y="7"/></net>`);
    expect(topology.nodes.size).toBe(1);
    expect(topology.edges.size).toBe(0);
  });

  it("accepts an empty network", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    for (const xml of ["<net></net>", "<net/>", '<net version="1.9"></net>']) {
      const { topology } = parseTopology(xml);
      expect(topology.nodes.size).toBe(0);
      expect(topology.edges.size).toBe(0);
      expect(topology.connections).toEqual([]);
    }
    expect(info).toHaveBeenLastCalledWith("[topology] Parsed network with 0 nodes and 0 edges");
  });

  it("rejects missing ids, positions and endpoints", () => {
    expect(() => parseTopology(`<net><junction x="1" y="2"/></net>`)).toThrow(MalformedTopologyError);
    expect(() => parseTopology(`<net><junction id="A" x="abc" y="2"/></net>`)).toThrow(
      "Junction A has no valid x/y position."
    );
    expect(() => parseTopology(`<net><edge id="E" to="B"/></net>`)).toThrow(
      "Edge E is missing its from/to junction reference."
    );
  });

  it("rejects documents that are not network XML", () => {
    expect(() => parseTopology("<net><junction")).toThrow(MalformedTopologyError);
    expect(() => parseTopology("<routes></routes>")).toThrow(
      "Network document has no <net> root element."
    );
  });
});

describe("loadTopology", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports a missing resource", async () => {
    const fetchFn = vi.fn(async () => new Response("not found", { status: 404 }));
    await expect(loadTopology("/maps/missing.net.xml", fetchFn)).rejects.toBeInstanceOf(
      ResourceNotFoundError
    );
    expect(fetchFn).toHaveBeenCalledWith("/maps/missing.net.xml");
  });

  it("reports an unreachable resource", async () => {
    const fetchFn = vi.fn(async (): Promise<Response> => {
      throw new TypeError("fetch failed");
    });
    await expect(loadTopology("/maps/grid.net.xml", fetchFn)).rejects.toThrow(
      "Resource not found: /maps/grid.net.xml (fetch failed)"
    );
  });

  it("reports a body that fails while reading", async () => {
    const failingBody = () =>
      new ReadableStream<Uint8Array>({
        start(controller) {
          controller.error(new TypeError("terminated"));
        }
      });
    const fetchFn = vi.fn(async () => new Response(failingBody(), { status: 200 }));
    await expect(loadTopology("/maps/grid.net.xml", fetchFn)).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(loadTopology("/maps/grid.net.xml", fetchFn)).rejects.toThrow(
      "Resource not found: /maps/grid.net.xml ("
    );
  });

  it("parses the fetched document", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const fetchFn = vi.fn(async () => new Response(GRID_NET, { status: 200 }));
    const topology = await loadTopology("/maps/grid.net.xml", fetchFn);
    expect(topology.nodes.size).toBe(3);
    expect(topology.connections).toHaveLength(1);
  });
});
