import type { LabelOptions } from "../render/renderer";

export type InputCommand =
  | { type: "pan"; dx: number; dy: number }
  | { type: "zoom"; factor: number }
  | { type: "toggle"; flag: keyof LabelOptions }
  | { type: "quit" };

export interface InputSource {
  /** Drains every command received since the previous poll. */
  poll(): InputCommand[];
}

export interface InputQueue extends InputSource {
  push(command: InputCommand): void;
}

export interface KeyBindingOptions {
  panStep: number;
  zoomStep: number;
}

export function createInputQueue(): InputQueue {
  let pending: InputCommand[] = [];
  return {
    push(command: InputCommand) {
      pending.push(command);
    },
    poll() {
      const drained = pending;
      pending = [];
      return drained;
    }
  };
}

export function commandForKey(key: string, options: KeyBindingOptions): InputCommand | null {
  switch (key) {
    case "Escape":
    case "q":
    case "Q":
      return { type: "quit" };
    case "ArrowLeft":
      return { type: "pan", dx: options.panStep, dy: 0 };
    case "ArrowRight":
      return { type: "pan", dx: -options.panStep, dy: 0 };
    case "ArrowUp":
      return { type: "pan", dx: 0, dy: options.panStep };
    case "ArrowDown":
      return { type: "pan", dx: 0, dy: -options.panStep };
    case "+":
    case "=":
      return { type: "zoom", factor: options.zoomStep };
    case "-":
    case "_":
      return { type: "zoom", factor: 1 / options.zoomStep };
    case "i":
    case "I":
      return { type: "toggle", flag: "showIds" };
    case "s":
    case "S":
      return { type: "toggle", flag: "showSpeeds" };
    case "w":
    case "W":
      return { type: "toggle", flag: "showWaitingTimes" };
    default:
      return null;
  }
}

export const HELP_LINES: readonly string[] = [
  "Mouse Drag / Arrows: Pan view",
  "Mouse Wheel / + -: Zoom in/out",
  "I: Toggle vehicle IDs",
  "S: Toggle speed display",
  "W: Toggle waiting time display",
  "ESC / Q: Quit"
];
