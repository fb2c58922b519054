import type { Connection, JunctionNode, RoadSegment, Topology } from "../../network/types";

export function buildTopology(
  nodes: JunctionNode[],
  edges: RoadSegment[] = [],
  connections: Connection[] = []
): Topology {
  return {
    nodes: new Map(nodes.map((node) => [node.id, node])),
    edges: new Map(edges.map((edge) => [edge.id, edge])),
    connections
  };
}

/** Two junctions at (0,0) and (100,100) joined by one straight segment. */
export function diagonalTopology(): Topology {
  return buildTopology(
    [
      { id: "A", position: { x: 0, y: 0 } },
      { id: "B", position: { x: 100, y: 100 } }
    ],
    [
      {
        id: "AB",
        fromNode: "A",
        toNode: "B",
        shape: [
          { x: 0, y: 0 },
          { x: 100, y: 100 }
        ]
      }
    ]
  );
}
