import type { Point } from "../types";

export type NodeId = string;
export type EdgeId = string;

export interface JunctionNode {
  id: NodeId;
  position: Point;
}

export interface RoadSegment {
  id: EdgeId;
  fromNode: NodeId;
  toNode: NodeId;
  /** Polyline in simulation space. Empty when neither lane geometry nor both endpoints resolve. */
  shape: Point[];
}

export interface Connection {
  fromEdge: EdgeId;
  toEdge: EdgeId;
  fromLane: number;
  toLane: number;
}

export interface Topology {
  nodes: ReadonlyMap<NodeId, JunctionNode>;
  edges: ReadonlyMap<EdgeId, RoadSegment>;
  connections: readonly Connection[];
}

export interface TopologyParseStats {
  nodeCount: number;
  edgeCount: number;
  connectionCount: number;
  skippedInternalNodes: number;
  skippedInternalEdges: number;
  skippedConnections: number;
}
