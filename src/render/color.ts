import type { Rgb } from "../types";
import type { RenderTheme } from "./theme";
import type { VehicleCategory } from "./vehicleCategory";

export function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value < 0) return 0;
  if (value > 255) return 255;
  return value;
}

/** Linear per-channel blend: t = 0 keeps `from`, t = 1 yields `to`. */
export function blendRgb(from: Rgb, to: Rgb, t: number): Rgb {
  const k = Math.min(1, Math.max(0, t));
  return [
    clampChannel(from[0] * (1 - k) + to[0] * k),
    clampChannel(from[1] * (1 - k) + to[1] * k),
    clampChannel(from[2] * (1 - k) + to[2] * k)
  ];
}

export function rgbToCss(color: Rgb): string {
  const [r, g, b] = color.map((channel) => Math.round(clampChannel(channel)));
  return `rgb(${r}, ${g}, ${b})`;
}

export function rgbaToCss(color: Rgb, alpha: number): string {
  const [r, g, b] = color.map((channel) => Math.round(clampChannel(channel)));
  const a = Number.isFinite(alpha) ? Math.min(1, Math.max(0, alpha)) : 1;
  return `rgba(${r}, ${g}, ${b}, ${a})`;
}

const WHITE: Rgb = [255, 255, 255];

/**
 * Category base colour, lightened by speed and then pulled toward the theme's
 * stopped colour by waiting time.
 */
export function vehicleColor(
  category: VehicleCategory,
  theme: RenderTheme,
  speed?: number,
  waitingTime?: number
): Rgb {
  let color: Rgb = theme.vehicles[category].color;
  if (speed !== undefined && Number.isFinite(speed)) {
    const speedFactor = Math.min(1, Math.max(0, speed) / theme.speedNormCeiling);
    color = blendRgb(color, WHITE, speedFactor * theme.speedLightening);
  }
  if (waitingTime !== undefined && waitingTime > 0) {
    const waitFactor = Math.min(1, waitingTime / theme.waitNormCeiling);
    color = blendRgb(color, theme.stoppedColor, waitFactor);
  }
  return color;
}

/** Green, yellow and red lamps are lit; any other code shows the neutral lamp. */
export function isLitSignal(code: string): boolean {
  return code.length === 1 && "GgYyRr".includes(code);
}

export function signalColor(code: string, theme: RenderTheme): Rgb {
  switch (code) {
    case "G":
    case "g":
      return theme.signals.green;
    case "Y":
    case "y":
      return theme.signals.yellow;
    case "R":
    case "r":
      return theme.signals.red;
    default:
      return theme.signals.off;
  }
}
