import type { Rgb } from "../types";
import type { VehicleCategory } from "./vehicleCategory";

export interface VehicleStyle {
  readonly color: Rgb;
  /** Glyph length along the heading, in pixels at zoom 1. */
  readonly length: number;
  readonly width: number;
}

export interface SignalPalette {
  readonly green: Rgb;
  readonly yellow: Rgb;
  readonly red: Rgb;
  readonly off: Rgb;
}

export interface RenderTheme {
  readonly background: Rgb;
  readonly road: Rgb;
  readonly roadWidth: number;
  readonly laneMarking: Rgb;
  readonly laneDash: number;
  readonly laneGap: number;
  readonly laneMarkingMinLength: number;
  readonly junctionFill: Rgb;
  readonly junctionStroke: Rgb;
  readonly junctionRadius: number;
  readonly junctionMinRadius: number;
  readonly signalHousing: Rgb;
  readonly signalHousingEdge: Rgb;
  readonly signalWidth: number;
  readonly signalSpacing: number;
  readonly signalRadius: number;
  readonly signalPadding: number;
  /** Glow behind lit lamps, in pixels at zoom 1; never drawn smaller than the minimum. */
  readonly signalGlowRadius: number;
  readonly signalGlowMinRadius: number;
  readonly signalGlowAlpha: number;
  readonly signals: SignalPalette;
  readonly vehicles: Readonly<Record<VehicleCategory, VehicleStyle>>;
  readonly headingIndicator: Rgb;
  readonly stoppedColor: Rgb;
  /** Waiting time, in seconds, after which a vehicle glyph starts flashing. */
  readonly flashWaitThreshold: number;
  readonly flashColor: Rgb;
  /** Share of the distance to white a vehicle at the speed ceiling is lightened by. */
  readonly speedLightening: number;
  readonly speedNormCeiling: number;
  readonly waitNormCeiling: number;
  readonly labelText: Rgb;
  readonly labelBackground: string;
  readonly font: string;
  readonly labelFont: string;
  readonly lineHeight: number;
  readonly panelFill: string;
  readonly panelStroke: Rgb;
  readonly panelText: Rgb;
  readonly helpText: Rgb;
}

export const DEFAULT_THEME: RenderTheme = {
  background: [240, 240, 240],
  road: [80, 80, 80],
  roadWidth: 12,
  laneMarking: [255, 255, 255],
  laneDash: 5,
  laneGap: 5,
  laneMarkingMinLength: 30,
  junctionFill: [100, 100, 100],
  junctionStroke: [50, 50, 50],
  junctionRadius: 9,
  junctionMinRadius: 4,
  signalHousing: [50, 50, 50],
  signalHousingEdge: [30, 30, 30],
  signalWidth: 22,
  signalSpacing: 15,
  signalRadius: 5,
  signalPadding: 8,
  signalGlowRadius: 12,
  signalGlowMinRadius: 6,
  signalGlowAlpha: 0.35,
  signals: {
    green: [0, 255, 0],
    yellow: [255, 255, 0],
    red: [255, 0, 0],
    off: [80, 80, 80]
  },
  vehicles: {
    passenger: { color: [0, 100, 200], length: 15, width: 7 },
    truck: { color: [120, 120, 120], length: 24, width: 12 },
    bus: { color: [0, 150, 0], length: 27, width: 10 },
    motorcycle: { color: [255, 0, 255], length: 9, width: 4 },
    bicycle: { color: [0, 200, 200], length: 6, width: 3 },
    emergency: { color: [255, 0, 0], length: 18, width: 9 }
  },
  headingIndicator: [0, 0, 0],
  stoppedColor: [255, 0, 0],
  flashWaitThreshold: 5,
  flashColor: [255, 255, 255],
  speedLightening: 0.5,
  speedNormCeiling: 30,
  waitNormCeiling: 60,
  labelText: [255, 255, 255],
  labelBackground: "rgba(0, 0, 0, 0.7)",
  font: "14px Arial, sans-serif",
  labelFont: "10px Arial, sans-serif",
  lineHeight: 20,
  panelFill: "rgba(240, 240, 255, 0.86)",
  panelStroke: [100, 100, 150],
  panelText: [0, 0, 0],
  helpText: [50, 50, 50]
};

export function createTheme(overrides: Partial<RenderTheme> = {}): RenderTheme {
  return { ...DEFAULT_THEME, ...overrides };
}
