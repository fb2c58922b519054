import { computeBounds } from "../network/geometry";
import type { EdgeId, NodeId, Topology } from "../network/types";
import type { Bounds, Point, Size } from "../types";

const DEFAULT_MARGIN = 50;
const FALLBACK_BOUNDS: Bounds = { minX: 0, minY: 0, maxX: 100, maxY: 100 };

export interface ViewState {
  panX: number;
  panY: number;
  zoom: number;
}

export interface ViewportOptions extends Size {
  margin?: number;
}

export interface Viewport {
  readonly size: Size;
  readonly margin: number;
  readonly minBound: Point;
  readonly maxBound: Point;
  readonly baseScale: number;
  readonly baseOffset: Point;
  /** Simulation space to window pixels, before pan and zoom. */
  projectBase(point: Point): Point;
  /** Simulation space to final screen pixels. */
  project(point: Point): Point;
  nodePosition(id: NodeId): Point | null;
  edgeShape(id: EdgeId): Point[] | null;
  getView(): ViewState;
  setView(view: Partial<ViewState>): void;
  panBy(dx: number, dy: number): void;
  zoomBy(factor: number): void;
  /** Pan that keeps the network centre fixed in the window at the given zoom. */
  centeredView(zoom: number): ViewState;
}

export const IDENTITY_VIEW: ViewState = { panX: 0, panY: 0, zoom: 1 };

export function networkBounds(topology: Topology): Bounds {
  const points: Point[] = [];
  for (const node of topology.nodes.values()) {
    points.push(node.position);
  }
  for (const edge of topology.edges.values()) {
    points.push(...edge.shape);
  }
  return computeBounds(points) ?? { ...FALLBACK_BOUNDS };
}

export function createViewport(topology: Topology, options: ViewportOptions): Viewport {
  const size: Size = { width: options.width, height: options.height };
  const margin = options.margin ?? DEFAULT_MARGIN;
  const bounds = networkBounds(topology);
  const boxWidth = bounds.maxX - bounds.minX;
  const boxHeight = bounds.maxY - bounds.minY;

  const availableWidth = Math.max(1, size.width - 2 * margin);
  const availableHeight = Math.max(1, size.height - 2 * margin);
  const scaleX = boxWidth > 0 ? availableWidth / boxWidth : 1;
  const scaleY = boxHeight > 0 ? availableHeight / boxHeight : 1;
  const baseScale = Math.min(scaleX, scaleY);
  const baseOffset: Point = {
    x: margin + (availableWidth - boxWidth * baseScale) / 2,
    y: margin + (availableHeight - boxHeight * baseScale) / 2
  };
  const minBound: Point = { x: bounds.minX, y: bounds.minY };
  const maxBound: Point = { x: bounds.maxX, y: bounds.maxY };

  const view: ViewState = { ...IDENTITY_VIEW };

  const projectBase = (point: Point): Point => ({
    x: baseOffset.x + (point.x - minBound.x) * baseScale,
    y: size.height - (baseOffset.y + (point.y - minBound.y) * baseScale)
  });

  const project = (point: Point): Point => {
    const base = projectBase(point);
    return {
      x: base.x * view.zoom + view.panX,
      y: base.y * view.zoom + view.panY
    };
  };

  return {
    size,
    margin,
    minBound,
    maxBound,
    baseScale,
    baseOffset,
    projectBase,
    project,
    nodePosition(id: NodeId) {
      const node = topology.nodes.get(id);
      return node ? project(node.position) : null;
    },
    edgeShape(id: EdgeId) {
      const edge = topology.edges.get(id);
      return edge ? edge.shape.map(project) : null;
    },
    getView() {
      return { ...view };
    },
    setView(next: Partial<ViewState>) {
      if (next.panX !== undefined && Number.isFinite(next.panX)) {
        view.panX = next.panX;
      }
      if (next.panY !== undefined && Number.isFinite(next.panY)) {
        view.panY = next.panY;
      }
      if (next.zoom !== undefined && Number.isFinite(next.zoom) && next.zoom > 0) {
        view.zoom = next.zoom;
      }
    },
    panBy(dx: number, dy: number) {
      view.panX += dx;
      view.panY += dy;
    },
    zoomBy(factor: number) {
      if (Number.isFinite(factor) && factor > 0) {
        view.zoom *= factor;
      }
    },
    centeredView(zoom: number) {
      const center = projectBase({
        x: (minBound.x + maxBound.x) / 2,
        y: (minBound.y + maxBound.y) / 2
      });
      return {
        panX: size.width / 2 - center.x * zoom,
        panY: size.height / 2 - center.y * zoom,
        zoom
      };
    }
  };
}
