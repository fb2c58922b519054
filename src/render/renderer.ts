import type { Topology, NodeId } from "../network/types";
import { dashSegments, segmentLength } from "../network/geometry";
import type { Point, Rgb } from "../types";
import type { Viewport, ViewState } from "../view/viewport";
import { isLitSignal, rgbaToCss, rgbToCss, signalColor, vehicleColor } from "./color";
import type { DrawingSurface } from "./surface";
import type { RenderTheme } from "./theme";
import type { VehicleCategory } from "./vehicleCategory";

const TAU = Math.PI * 2;

export interface LabelOptions {
  showIds: boolean;
  showSpeeds: boolean;
  showWaitingTimes: boolean;
}

export interface VehicleDrawing {
  id: string;
  /** Simulation-space position. */
  position: Point;
  heading: number;
  category: VehicleCategory;
  speed?: number;
  waitingTime?: number;
  label?: string;
}

/** An explicit road piece in simulation space, drawn instead of the topology. */
export interface NetworkSegment {
  start: Point;
  end: Point;
  width?: number;
  color?: Rgb;
}

export interface OverlayLine {
  label: string;
  value: string;
}

export interface FrameRenderer {
  setView(view: ViewState): void;
  getLabelOptions(): LabelOptions;
  setLabelOptions(options: Partial<LabelOptions>): void;
  clear(): void;
  renderNetwork(segments?: readonly NetworkSegment[]): void;
  renderVehicle(vehicle: VehicleDrawing): void;
  renderTrafficLight(id: string, position: Point, state: string): void;
  renderJunction(id: NodeId): boolean;
  renderOverlay(lines: readonly OverlayLine[], title?: string): void;
  renderHelp(lines: readonly string[]): void;
}

export interface FrameRendererOptions {
  surface: DrawingSurface;
  viewport: Viewport;
  topology: Topology;
  theme: RenderTheme;
  labels?: Partial<LabelOptions>;
  /** Millisecond clock driving the waiting-vehicle flash. */
  now?: () => number;
}

/** Counter-clockwise screen rotation, in degrees, for a simulation heading. */
export function headingToScreenRotation(headingDeg: number): number {
  return -headingDeg + 90;
}

/**
 * Vehicles waiting longer than the threshold flash, faster the longer they wait:
 * rate = clamp(wait / 5, 0.5, 5) Hz, lit for the second half of each cycle.
 */
export function isFlashing(waitingTime: number, nowMs: number, threshold: number): boolean {
  if (!(waitingTime > threshold)) {
    return false;
  }
  const rate = Math.max(0.5, Math.min(5, waitingTime / 5));
  return (nowMs / (500 / rate)) % 2 > 1;
}

export function createFrameRenderer(options: FrameRendererOptions): FrameRenderer {
  const { surface: ctx, viewport, topology, theme } = options;
  const now = options.now ?? (() => performance.now());
  const labels: LabelOptions = {
    showIds: true,
    showSpeeds: true,
    showWaitingTimes: true,
    ...options.labels
  };

  const zoom = () => viewport.getView().zoom;

  const strokeRoad = (a: Point, b: Point, width: number, color: Rgb) => {
    const z = zoom();
    ctx.strokeStyle = rgbToCss(color);
    ctx.lineWidth = width * z;
    ctx.lineCap = "round";
    ctx.beginPath();
    ctx.moveTo(a.x, a.y);
    ctx.lineTo(b.x, b.y);
    ctx.stroke();

    if (segmentLength(a, b) <= theme.laneMarkingMinLength * z) {
      return;
    }
    ctx.strokeStyle = rgbToCss(theme.laneMarking);
    ctx.lineWidth = Math.max(1, z);
    ctx.lineCap = "butt";
    for (const [start, end] of dashSegments(a, b, theme.laneDash * z, theme.laneGap * z)) {
      ctx.beginPath();
      ctx.moveTo(start.x, start.y);
      ctx.lineTo(end.x, end.y);
      ctx.stroke();
    }
  };

  const drawTag = (text: string, x: number, y: number, background: string) => {
    ctx.font = theme.labelFont;
    ctx.textAlign = "center";
    ctx.textBaseline = "middle";
    const width = ctx.measureText(text).width + 4;
    const height = 12;
    ctx.fillStyle = background;
    ctx.fillRect(x - width / 2, y - height / 2, width, height);
    ctx.fillStyle = rgbToCss(theme.labelText);
    ctx.fillText(text, x, y);
  };

  return {
    setView(view: ViewState) {
      viewport.setView(view);
    },
    getLabelOptions() {
      return { ...labels };
    },
    setLabelOptions(next: Partial<LabelOptions>) {
      Object.assign(labels, next);
    },
    clear() {
      const { width, height } = viewport.size;
      ctx.save();
      ctx.fillStyle = rgbToCss(theme.background);
      ctx.fillRect(0, 0, width, height);
      ctx.restore();
    },
    renderNetwork(segments?: readonly NetworkSegment[]) {
      ctx.save();
      if (segments && segments.length > 0) {
        for (const segment of segments) {
          strokeRoad(
            viewport.project(segment.start),
            viewport.project(segment.end),
            segment.width ?? theme.roadWidth,
            segment.color ?? theme.road
          );
        }
      } else {
        for (const edgeId of topology.edges.keys()) {
          const shape = viewport.edgeShape(edgeId);
          if (!shape || shape.length < 2) {
            continue;
          }
          for (let i = 0; i < shape.length - 1; i += 1) {
            strokeRoad(shape[i], shape[i + 1], theme.roadWidth, theme.road);
          }
        }
      }
      ctx.restore();
    },
    renderVehicle(vehicle: VehicleDrawing) {
      const z = zoom();
      const style = theme.vehicles[vehicle.category];
      const center = viewport.project(vehicle.position);
      const length = style.length * z;
      const width = style.width * z;
      const rotationRad = (headingToScreenRotation(vehicle.heading) * Math.PI) / 180;

      ctx.save();
      ctx.translate(center.x, center.y);
      // Canvas rotates clockwise for positive angles.
      ctx.rotate(-rotationRad);
      const flashing = isFlashing(vehicle.waitingTime ?? 0, now(), theme.flashWaitThreshold);
      ctx.fillStyle = rgbToCss(
        flashing ? theme.flashColor : vehicleColor(vehicle.category, theme, vehicle.speed, vehicle.waitingTime)
      );
      ctx.fillRect(-length / 2, -width / 2, length, width);
      ctx.fillStyle = rgbToCss(theme.headingIndicator);
      ctx.beginPath();
      ctx.moveTo(length * 0.3, 0);
      ctx.lineTo(0, -width * 0.3);
      ctx.lineTo(0, width * 0.3);
      ctx.closePath();
      ctx.fill();
      ctx.restore();

      ctx.save();
      if (vehicle.label) {
        drawTag(vehicle.label, center.x, center.y - 15 * z, theme.labelBackground);
      }
      let labelY = center.y + width / 2 + 8;
      if (labels.showIds) {
        drawTag(vehicle.id, center.x, labelY, theme.labelBackground);
        labelY += 14;
      }
      if (labels.showSpeeds && vehicle.speed !== undefined) {
        drawTag(`${vehicle.speed.toFixed(1)} m/s`, center.x, labelY, "rgba(0, 0, 100, 0.7)");
        labelY += 14;
      }
      const waiting = vehicle.waitingTime ?? 0;
      if (labels.showWaitingTimes && waiting > 0) {
        drawTag(`Wait: ${waiting.toFixed(1)}s`, center.x, labelY, "rgba(150, 0, 0, 0.7)");
      }
      ctx.restore();
    },
    renderTrafficLight(id: string, position: Point, state: string) {
      const z = zoom();
      const center = viewport.project(position);
      const housingWidth = theme.signalWidth * z;
      const housingHeight = (state.length * theme.signalSpacing + theme.signalPadding) * z;
      const top = center.y - housingHeight / 2;
      const radius = theme.signalRadius * z;
      const glowRadius = Math.min(
        theme.signalGlowRadius,
        Math.max(theme.signalGlowMinRadius, theme.signalGlowRadius * z)
      );

      ctx.save();
      ctx.fillStyle = rgbToCss(theme.signalHousingEdge);
      ctx.fillRect(center.x - housingWidth / 2, top, housingWidth, housingHeight);
      ctx.fillStyle = rgbToCss(theme.signalHousing);
      ctx.fillRect(center.x - housingWidth / 2 + 2, top + 2, housingWidth - 4, housingHeight - 4);

      ctx.font = theme.labelFont;
      ctx.textAlign = "center";
      ctx.textBaseline = "bottom";
      ctx.fillStyle = rgbToCss(theme.panelText);
      ctx.fillText(id, center.x, top - 4 * z);

      for (let i = 0; i < state.length; i += 1) {
        const y = top + (theme.signalPadding / 2 + (i + 0.5) * theme.signalSpacing) * z;
        const lamp = signalColor(state[i], theme);
        if (isLitSignal(state[i])) {
          ctx.fillStyle = rgbaToCss(lamp, theme.signalGlowAlpha);
          ctx.beginPath();
          ctx.arc(center.x, y, glowRadius, 0, TAU);
          ctx.fill();
        }
        ctx.fillStyle = "rgb(0, 0, 0)";
        ctx.beginPath();
        ctx.arc(center.x, y, radius + 1, 0, TAU);
        ctx.fill();
        ctx.fillStyle = rgbToCss(lamp);
        ctx.beginPath();
        ctx.arc(center.x, y, radius, 0, TAU);
        ctx.fill();
      }
      ctx.restore();
    },
    renderJunction(id: NodeId) {
      const position = viewport.nodePosition(id);
      if (!position) {
        return false;
      }
      const radius = Math.max(theme.junctionMinRadius, theme.junctionRadius * zoom());
      ctx.save();
      ctx.fillStyle = rgbToCss(theme.junctionFill);
      ctx.beginPath();
      ctx.arc(position.x, position.y, radius, 0, TAU);
      ctx.fill();
      ctx.strokeStyle = rgbToCss(theme.junctionStroke);
      ctx.lineWidth = 2;
      ctx.stroke();
      ctx.restore();
      return true;
    },
    renderOverlay(lines: readonly OverlayLine[], title = "Simulation Statistics") {
      const { width } = viewport.size;
      const panelWidth = 250;
      const panelHeight = 30 + lines.length * theme.lineHeight + 10;
      const originX = width - panelWidth - 10;
      const originY = 10;
      ctx.save();
      ctx.fillStyle = theme.panelFill;
      ctx.fillRect(originX, originY, panelWidth, panelHeight);
      ctx.strokeStyle = rgbToCss(theme.panelStroke);
      ctx.lineWidth = 2;
      ctx.strokeRect(originX, originY, panelWidth, panelHeight);

      ctx.font = theme.font;
      ctx.textBaseline = "top";
      ctx.fillStyle = rgbToCss(theme.panelText);
      ctx.textAlign = "center";
      ctx.fillText(title, originX + panelWidth / 2, originY + 5);
      ctx.textAlign = "left";
      for (let i = 0; i < lines.length; i += 1) {
        const line = lines[i];
        ctx.fillText(`${line.label}: ${line.value}`, originX + 10, originY + 30 + i * theme.lineHeight);
      }
      ctx.restore();
    },
    renderHelp(lines: readonly string[]) {
      const { height } = viewport.size;
      const originY = height - lines.length * theme.lineHeight - 10;
      ctx.save();
      ctx.font = theme.font;
      ctx.textAlign = "left";
      ctx.textBaseline = "top";
      ctx.fillStyle = rgbToCss(theme.helpText);
      for (let i = 0; i < lines.length; i += 1) {
        ctx.fillText(lines[i], 10, originY + i * theme.lineHeight);
      }
      ctx.restore();
    }
  };
}
