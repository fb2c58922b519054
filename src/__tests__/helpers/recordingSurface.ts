import type { DrawingSurface, FrameTarget } from "../../render/surface";
import type { Size } from "../../types";

export interface SurfaceCall {
  op: string;
  args: unknown[];
  fillStyle: string;
  strokeStyle: string;
  lineWidth: number;
}

export class RecordingSurface implements DrawingSurface {
  fillStyle: string | CanvasGradient | CanvasPattern = "#000000";
  strokeStyle: string | CanvasGradient | CanvasPattern = "#000000";
  lineWidth = 1;
  lineCap: CanvasLineCap = "butt";
  font = "10px sans-serif";
  textAlign: CanvasTextAlign = "start";
  textBaseline: CanvasTextBaseline = "alphabetic";
  readonly calls: SurfaceCall[] = [];

  private record(op: string, args: unknown[]) {
    this.calls.push({
      op,
      args,
      fillStyle: String(this.fillStyle),
      strokeStyle: String(this.strokeStyle),
      lineWidth: this.lineWidth
    });
  }

  save() {
    this.record("save", []);
  }
  restore() {
    this.record("restore", []);
  }
  translate(x: number, y: number) {
    this.record("translate", [x, y]);
  }
  rotate(angle: number) {
    this.record("rotate", [angle]);
  }
  beginPath() {
    this.record("beginPath", []);
  }
  closePath() {
    this.record("closePath", []);
  }
  moveTo(x: number, y: number) {
    this.record("moveTo", [x, y]);
  }
  lineTo(x: number, y: number) {
    this.record("lineTo", [x, y]);
  }
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number) {
    this.record("arc", [x, y, radius, startAngle, endAngle]);
  }
  fill() {
    this.record("fill", []);
  }
  stroke() {
    this.record("stroke", []);
  }
  fillRect(x: number, y: number, width: number, height: number) {
    this.record("fillRect", [x, y, width, height]);
  }
  strokeRect(x: number, y: number, width: number, height: number) {
    this.record("strokeRect", [x, y, width, height]);
  }
  fillText(text: string, x: number, y: number) {
    this.record("fillText", [text, x, y]);
  }
  measureText(text: string) {
    return { width: text.length * 6 };
  }

  ops(name: string): SurfaceCall[] {
    return this.calls.filter((call) => call.op === name);
  }

  texts(): string[] {
    return this.ops("fillText").map((call) => String(call.args[0]));
  }

  reset() {
    this.calls.length = 0;
  }
}

export interface RecordingTarget extends FrameTarget {
  readonly surface: RecordingSurface;
  presented: number;
  released: number;
}

export function createRecordingTarget(size: Size, onPresent?: () => void): RecordingTarget {
  const target: RecordingTarget = {
    surface: new RecordingSurface(),
    size,
    presented: 0,
    released: 0,
    present() {
      target.presented += 1;
      onPresent?.();
    },
    release() {
      target.released += 1;
    }
  };
  return target;
}
