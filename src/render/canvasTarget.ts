import type { Size } from "../types";
import type { FrameTarget } from "./surface";

export interface CanvasTargetOptions extends Size {
  fps: number;
}

export function createCanvasTarget(canvas: HTMLCanvasElement, options: CanvasTargetOptions): FrameTarget {
  const { width, height } = options;
  const ctx = canvas.getContext("2d");
  if (!ctx) {
    throw new Error("Canvas 2D context unavailable");
  }
  canvas.width = width;
  canvas.height = height;
  const minFrameMs = 1000 / Math.max(1, options.fps);
  let lastFrameAt = Number.NEGATIVE_INFINITY;

  return {
    surface: ctx,
    size: { width, height },
    // Resolves on the first animation frame at least minFrameMs after the previous one.
    present() {
      return new Promise<void>((resolve) => {
        const tick = (now: number) => {
          if (now - lastFrameAt >= minFrameMs) {
            lastFrameAt = now;
            resolve();
            return;
          }
          requestAnimationFrame(tick);
        };
        requestAnimationFrame(tick);
      });
    },
    release() {
      ctx.clearRect(0, 0, width, height);
    }
  };
}
