import type { JunctionNode, Topology } from "../network/types";
import { describeError } from "../errors";
import type { Point } from "../types";
import type { SimulationEngine } from "./engine";

export type SignalResolution =
  | { kind: "exact"; position: Point; nodeId: string }
  | { kind: "prefix"; position: Point; nodeId: string }
  | { kind: "geometry"; position: Point; laneId: string }
  | { kind: "unresolved"; reason: string };

export interface SignalResolutionContext {
  topology: Topology;
  engine: SimulationEngine;
}

export type SignalResolutionStrategy = (
  signalId: string,
  context: SignalResolutionContext
) => SignalResolution | null;

export const exactMatch: SignalResolutionStrategy = (signalId, { topology }) => {
  const node = topology.nodes.get(signalId);
  return node ? { kind: "exact", position: { ...node.position }, nodeId: node.id } : null;
};

/**
 * First junction, in network order, whose id starts with the signal id; failing
 * that, the first whose id contains it. Overlapping ids can pick an unintended
 * junction, so ambiguous matches are reported.
 */
export const prefixMatch: SignalResolutionStrategy = (signalId, { topology }) => {
  if (!signalId) {
    return null;
  }
  const nodes = [...topology.nodes.values()];
  const byPrefix = nodes.filter((node) => node.id.startsWith(signalId));
  const candidates = byPrefix.length > 0 ? byPrefix : nodes.filter((node) => node.id.includes(signalId));
  const node: JunctionNode | undefined = candidates[0];
  if (!node) {
    return null;
  }
  if (candidates.length > 1) {
    console.warn(
      `[session] Signal ${signalId} matches ${candidates.length} junctions by id; using ${node.id}.`
    );
  }
  return { kind: "prefix", position: { ...node.position }, nodeId: node.id };
};

/** End of the first controlled incoming lane, i.e. the stop line. */
export const geometryDerived: SignalResolutionStrategy = (signalId, { engine }) => {
  const laneId = engine.signalControlledLanes(signalId)[0];
  if (!laneId) {
    return null;
  }
  const shape = engine.laneShape(laneId);
  const last = shape[shape.length - 1];
  return last ? { kind: "geometry", position: { x: last.x, y: last.y }, laneId } : null;
};

export const DEFAULT_SIGNAL_STRATEGIES: readonly SignalResolutionStrategy[] = [
  exactMatch,
  prefixMatch,
  geometryDerived
];

export function resolveSignalPosition(
  signalId: string,
  context: SignalResolutionContext,
  strategies: readonly SignalResolutionStrategy[] = DEFAULT_SIGNAL_STRATEGIES
): SignalResolution {
  const failures: string[] = [];
  for (const strategy of strategies) {
    try {
      const resolution = strategy(signalId, context);
      if (resolution) {
        return resolution;
      }
    } catch (error) {
      failures.push(describeError(error));
    }
  }
  return {
    kind: "unresolved",
    reason: failures.length > 0 ? failures.join("; ") : "no junction or controlled lane geometry"
  };
}
