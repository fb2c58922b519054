import type { Size } from "../types";

type PaintStyle = string | CanvasGradient | CanvasPattern;

/** The part of the Canvas 2D context the renderer draws with. */
export interface DrawingSurface {
  fillStyle: PaintStyle;
  strokeStyle: PaintStyle;
  lineWidth: number;
  lineCap: CanvasLineCap;
  font: string;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
  save(): void;
  restore(): void;
  translate(x: number, y: number): void;
  rotate(angle: number): void;
  beginPath(): void;
  closePath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
  fill(): void;
  stroke(): void;
  fillRect(x: number, y: number, width: number, height: number): void;
  strokeRect(x: number, y: number, width: number, height: number): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): { width: number };
}

/** A surface plus the window it belongs to. */
export interface FrameTarget {
  readonly surface: DrawingSurface;
  readonly size: Size;
  present(): Promise<void> | void;
  release(): void;
}
