import { afterEach, describe, it, expect, vi } from "vitest";
import { bindDomInput, shouldIgnoreGlobalKeyEvents } from "../session/domInput";
import { commandForKey, createInputQueue } from "../session/input";

const KEYS = { panStep: 40, zoomStep: 1.25 };

describe("shouldIgnoreGlobalKeyEvents", () => {
  it("returns false when there is no active element", () => {
    expect(shouldIgnoreGlobalKeyEvents(null)).toBe(false);
  });

  it("ignores input and textarea elements", () => {
    const input = { tagName: "INPUT" } as unknown as Element;
    const textarea = { tagName: "textarea" } as unknown as Element;
    expect(shouldIgnoreGlobalKeyEvents(input)).toBe(true);
    expect(shouldIgnoreGlobalKeyEvents(textarea)).toBe(true);
  });

  it("ignores contenteditable elements", () => {
    const editable = { tagName: "DIV", isContentEditable: true } as unknown as Element;
    const attrEditable = {
      tagName: "DIV",
      getAttribute: (name: string) => (name === "contenteditable" ? "true" : null)
    } as unknown as Element;
    expect(shouldIgnoreGlobalKeyEvents(editable)).toBe(true);
    expect(shouldIgnoreGlobalKeyEvents(attrEditable)).toBe(true);
  });

  it("allows the canvas and other non-editable elements", () => {
    const canvas = {
      tagName: "CANVAS",
      isContentEditable: false,
      getAttribute: () => "false"
    } as unknown as Element;
    expect(shouldIgnoreGlobalKeyEvents(canvas)).toBe(false);
  });
});

describe("commandForKey", () => {
  it("maps quit keys", () => {
    expect(commandForKey("Escape", KEYS)).toEqual({ type: "quit" });
    expect(commandForKey("q", KEYS)).toEqual({ type: "quit" });
  });

  it("maps arrow keys to pan offsets", () => {
    expect(commandForKey("ArrowLeft", KEYS)).toEqual({ type: "pan", dx: 40, dy: 0 });
    expect(commandForKey("ArrowRight", KEYS)).toEqual({ type: "pan", dx: -40, dy: 0 });
    expect(commandForKey("ArrowUp", KEYS)).toEqual({ type: "pan", dx: 0, dy: 40 });
    expect(commandForKey("ArrowDown", KEYS)).toEqual({ type: "pan", dx: 0, dy: -40 });
  });

  it("zooms in and out by the configured step", () => {
    expect(commandForKey("+", KEYS)).toEqual({ type: "zoom", factor: 1.25 });
    expect(commandForKey("=", KEYS)).toEqual({ type: "zoom", factor: 1.25 });
    expect(commandForKey("-", KEYS)).toEqual({ type: "zoom", factor: 0.8 });
  });

  it("toggles labels", () => {
    expect(commandForKey("i", KEYS)).toEqual({ type: "toggle", flag: "showIds" });
    expect(commandForKey("S", KEYS)).toEqual({ type: "toggle", flag: "showSpeeds" });
    expect(commandForKey("w", KEYS)).toEqual({ type: "toggle", flag: "showWaitingTimes" });
  });

  it("ignores unbound keys", () => {
    expect(commandForKey("x", KEYS)).toBeNull();
    expect(commandForKey("Enter", KEYS)).toBeNull();
  });
});

describe("createInputQueue", () => {
  it("drains pending commands on poll", () => {
    const queue = createInputQueue();
    queue.push({ type: "quit" });
    queue.push({ type: "zoom", factor: 2 });
    expect(queue.poll()).toEqual([{ type: "quit" }, { type: "zoom", factor: 2 }]);
    expect(queue.poll()).toEqual([]);
  });
});

describe("bindDomInput", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function fakeEvent(type: string, fields: Record<string, number | string>) {
    return Object.assign(new Event(type, { cancelable: true }), fields);
  }

  function setupDom(activeElement: unknown = null) {
    const win = new EventTarget();
    vi.stubGlobal("window", win);
    vi.stubGlobal("document", { activeElement });
    const canvas = new EventTarget();
    const queue = createInputQueue();
    const unbind = bindDomInput(canvas as unknown as HTMLCanvasElement, queue, KEYS);
    return { win, canvas, queue, unbind };
  }

  it("turns key presses into commands", () => {
    const { win, queue } = setupDom();
    const event = fakeEvent("keydown", { key: "ArrowUp" });
    win.dispatchEvent(event);
    win.dispatchEvent(fakeEvent("keydown", { key: "x" }));
    expect(queue.poll()).toEqual([{ type: "pan", dx: 0, dy: 40 }]);
    expect(event.defaultPrevented).toBe(true);
  });

  it("leaves keys alone while a form field has focus", () => {
    const { win, queue } = setupDom({ tagName: "INPUT" });
    win.dispatchEvent(fakeEvent("keydown", { key: "q" }));
    expect(queue.poll()).toEqual([]);
  });

  it("pans while dragging with the primary button", () => {
    const { canvas, queue } = setupDom();
    canvas.dispatchEvent(fakeEvent("mousemove", { clientX: 5, clientY: 5 }));
    canvas.dispatchEvent(fakeEvent("mousedown", { button: 0, clientX: 10, clientY: 10 }));
    canvas.dispatchEvent(fakeEvent("mousemove", { clientX: 25, clientY: 4 }));
    canvas.dispatchEvent(fakeEvent("mouseup", {}));
    canvas.dispatchEvent(fakeEvent("mousemove", { clientX: 50, clientY: 50 }));
    expect(queue.poll()).toEqual([{ type: "pan", dx: 15, dy: -6 }]);
  });

  it("zooms with the wheel", () => {
    const { canvas, queue } = setupDom();
    canvas.dispatchEvent(fakeEvent("wheel", { deltaY: -100 }));
    canvas.dispatchEvent(fakeEvent("wheel", { deltaY: 100 }));
    expect(queue.poll()).toEqual([
      { type: "zoom", factor: 1.25 },
      { type: "zoom", factor: 0.8 }
    ]);
  });

  it("stops listening after unbind", () => {
    const { win, canvas, queue, unbind } = setupDom();
    unbind();
    win.dispatchEvent(fakeEvent("keydown", { key: "q" }));
    canvas.dispatchEvent(fakeEvent("wheel", { deltaY: -1 }));
    expect(queue.poll()).toEqual([]);
  });
});
