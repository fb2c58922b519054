import { commandForKey, type InputQueue, type KeyBindingOptions } from "./input";

export function shouldIgnoreGlobalKeyEvents(activeEl: Element | null): boolean {
  if (!activeEl) {
    return false;
  }
  const tagName = activeEl.tagName?.toUpperCase() ?? "";
  if (tagName === "INPUT" || tagName === "TEXTAREA" || tagName === "SELECT") {
    return true;
  }
  if ("isContentEditable" in activeEl && activeEl.isContentEditable === true) {
    return true;
  }
  if (typeof activeEl.getAttribute === "function") {
    const attr = activeEl.getAttribute("contenteditable");
    if (attr && attr.toLowerCase() !== "false") {
      return true;
    }
  }
  return false;
}

/** Feeds keyboard, drag and wheel events into the queue. Returns an unbind function. */
export function bindDomInput(
  canvas: HTMLCanvasElement,
  queue: InputQueue,
  options: KeyBindingOptions
): () => void {
  let dragStart: { x: number; y: number } | null = null;

  const handleKeyDown = (ev: KeyboardEvent) => {
    if (shouldIgnoreGlobalKeyEvents(document.activeElement)) {
      return;
    }
    const command = commandForKey(ev.key, options);
    if (command) {
      ev.preventDefault();
      queue.push(command);
    }
  };

  const handleMouseDown = (ev: MouseEvent) => {
    if (ev.button === 0) {
      dragStart = { x: ev.clientX, y: ev.clientY };
    }
  };

  const handleMouseMove = (ev: MouseEvent) => {
    if (!dragStart) {
      return;
    }
    const dx = ev.clientX - dragStart.x;
    const dy = ev.clientY - dragStart.y;
    dragStart = { x: ev.clientX, y: ev.clientY };
    if (dx !== 0 || dy !== 0) {
      queue.push({ type: "pan", dx, dy });
    }
  };

  const endDrag = () => {
    dragStart = null;
  };

  const handleWheel = (ev: WheelEvent) => {
    ev.preventDefault();
    if (ev.deltaY === 0) {
      return;
    }
    queue.push({ type: "zoom", factor: ev.deltaY < 0 ? options.zoomStep : 1 / options.zoomStep });
  };

  window.addEventListener("keydown", handleKeyDown);
  canvas.addEventListener("mousedown", handleMouseDown);
  canvas.addEventListener("mousemove", handleMouseMove);
  canvas.addEventListener("mouseup", endDrag);
  canvas.addEventListener("mouseleave", endDrag);
  canvas.addEventListener("wheel", handleWheel, { passive: false });

  return () => {
    window.removeEventListener("keydown", handleKeyDown);
    canvas.removeEventListener("mousedown", handleMouseDown);
    canvas.removeEventListener("mousemove", handleMouseMove);
    canvas.removeEventListener("mouseup", endDrag);
    canvas.removeEventListener("mouseleave", endDrag);
    canvas.removeEventListener("wheel", handleWheel);
  };
}
