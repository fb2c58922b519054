import { XMLParser, XMLValidator } from "fast-xml-parser";
import { createDebugLog } from "../debug";
import { MalformedTopologyError, ResourceNotFoundError, describeError } from "../errors";
import type { Point } from "../types";
import { parseShapeAttribute } from "./geometry";
import type {
  Connection,
  EdgeId,
  JunctionNode,
  NodeId,
  RoadSegment,
  Topology,
  TopologyParseStats
} from "./types";

const INTERNAL_ID_PREFIX = ":";
const REPEATED_TAGS = new Set(["junction", "edge", "lane", "connection"]);
const ATTR = "@_";

const debugLog = createDebugLog("topology");

type XmlRecord = Record<string, unknown>;

export interface TopologyParseResult {
  topology: Topology;
  stats: TopologyParseStats;
}

export type FetchLike = (input: string) => Promise<Response>;

export async function loadTopology(url: string, fetchFn: FetchLike = fetch): Promise<Topology> {
  let response: Response;
  try {
    response = await fetchFn(url);
  } catch (error) {
    throw new ResourceNotFoundError(url, describeError(error));
  }
  if (!response.ok) {
    throw new ResourceNotFoundError(url, `HTTP ${response.status}`);
  }
  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw new ResourceNotFoundError(url, describeError(error));
  }
  return parseTopology(text).topology;
}

export function parseTopology(xml: string): TopologyParseResult {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedTopologyError(`Network document is not well-formed XML (line ${line}): ${msg}`);
  }
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR,
    parseAttributeValue: false,
    parseTagValue: false,
    isArray: (tagName: string) => REPEATED_TAGS.has(tagName)
  });
  const doc: unknown = parser.parse(xml);
  const root = isRecord(doc) ? doc.net : undefined;
  // An empty <net/> parses to "".
  const net = root === "" ? {} : root;
  if (!isRecord(net)) {
    throw new MalformedTopologyError("Network document has no <net> root element.");
  }

  const stats: TopologyParseStats = {
    nodeCount: 0,
    edgeCount: 0,
    connectionCount: 0,
    skippedInternalNodes: 0,
    skippedInternalEdges: 0,
    skippedConnections: 0
  };

  const nodes = new Map<NodeId, JunctionNode>();
  for (const raw of recordList(net.junction)) {
    const id = requireId(raw, "junction");
    if (attr(raw, "type") === "internal" || id.startsWith(INTERNAL_ID_PREFIX)) {
      stats.skippedInternalNodes += 1;
      continue;
    }
    const x = Number(attr(raw, "x"));
    const y = Number(attr(raw, "y"));
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new MalformedTopologyError(`Junction ${id} has no valid x/y position.`);
    }
    nodes.set(id, { id, position: { x, y } });
  }

  const edges = new Map<EdgeId, RoadSegment>();
  for (const raw of recordList(net.edge)) {
    const id = requireId(raw, "edge");
    if (attr(raw, "function") === "internal" || id.startsWith(INTERNAL_ID_PREFIX)) {
      stats.skippedInternalEdges += 1;
      continue;
    }
    const fromNode = attr(raw, "from");
    const toNode = attr(raw, "to");
    if (!fromNode || !toNode) {
      throw new MalformedTopologyError(`Edge ${id} is missing its from/to junction reference.`);
    }
    edges.set(id, { id, fromNode, toNode, shape: resolveEdgeShape(id, raw, fromNode, toNode, nodes) });
  }

  const connections: Connection[] = [];
  for (const raw of recordList(net.connection)) {
    const connection = parseConnection(raw, edges);
    if (!connection) {
      stats.skippedConnections += 1;
      continue;
    }
    connections.push(connection);
  }

  stats.nodeCount = nodes.size;
  stats.edgeCount = edges.size;
  stats.connectionCount = connections.length;
  if (stats.skippedConnections > 0) {
    console.warn(
      `[topology] Excluded ${stats.skippedConnections} connection(s) referencing internal or unknown edges.`
    );
  }
  console.info(`[topology] Parsed network with ${nodes.size} nodes and ${edges.size} edges`);

  return { topology: { nodes, edges, connections }, stats };
}

function resolveEdgeShape(
  edgeId: EdgeId,
  raw: XmlRecord,
  fromNode: NodeId,
  toNode: NodeId,
  nodes: ReadonlyMap<NodeId, JunctionNode>
): Point[] {
  const firstLane = recordList(raw.lane)[0];
  const laneShape = firstLane ? attr(firstLane, "shape") : undefined;
  if (laneShape) {
    const points = parseShapeAttribute(laneShape);
    if (points && points.length >= 2) {
      return points;
    }
    console.warn(`[topology] Edge ${edgeId} has an unusable lane shape; using junction positions.`);
  }
  const from = nodes.get(fromNode);
  const to = nodes.get(toNode);
  if (!from || !to) {
    debugLog("edge endpoints unresolved", edgeId, fromNode, toNode);
    return [];
  }
  return [{ ...from.position }, { ...to.position }];
}

function parseConnection(raw: XmlRecord, edges: ReadonlyMap<EdgeId, RoadSegment>): Connection | null {
  const fromEdge = attr(raw, "from");
  const toEdge = attr(raw, "to");
  if (!fromEdge || !toEdge) {
    debugLog("connection without from/to", raw);
    return null;
  }
  if (fromEdge.startsWith(INTERNAL_ID_PREFIX) || toEdge.startsWith(INTERNAL_ID_PREFIX)) {
    debugLog("internal connection", fromEdge, toEdge);
    return null;
  }
  if (!edges.has(fromEdge) || !edges.has(toEdge)) {
    debugLog("connection references unknown edge", fromEdge, toEdge);
    return null;
  }
  const fromLane = Number(attr(raw, "fromLane"));
  const toLane = Number(attr(raw, "toLane"));
  if (!Number.isInteger(fromLane) || !Number.isInteger(toLane)) {
    debugLog("connection lanes invalid", fromEdge, toEdge);
    return null;
  }
  return { fromEdge, toEdge, fromLane, toLane };
}

function requireId(raw: XmlRecord, tag: string): string {
  const id = attr(raw, "id");
  if (!id) {
    throw new MalformedTopologyError(`Found <${tag}> without an id.`);
  }
  return id;
}

function attr(raw: XmlRecord, name: string): string | undefined {
  const value = raw[`${ATTR}${name}`];
  return typeof value === "string" ? value : undefined;
}

function recordList(value: unknown): XmlRecord[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRecord);
}

function isRecord(value: unknown): value is XmlRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
