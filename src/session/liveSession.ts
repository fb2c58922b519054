import type { Topology } from "../network/types";
import {
  createFrameRenderer,
  type FrameRenderer,
  type LabelOptions,
  type OverlayLine,
  type VehicleDrawing
} from "../render/renderer";
import type { FrameTarget } from "../render/surface";
import { DEFAULT_THEME, type RenderTheme } from "../render/theme";
import { inferVehicleCategory } from "../render/vehicleCategory";
import { EngineUnavailableError, describeError } from "../errors";
import type { Point } from "../types";
import { createViewport, IDENTITY_VIEW, type Viewport, type ViewState } from "../view/viewport";
import type { SimulationEngine } from "./engine";
import { HELP_LINES, type InputCommand, type InputSource } from "./input";
import {
  DEFAULT_SIGNAL_STRATEGIES,
  resolveSignalPosition,
  type SignalResolution,
  type SignalResolutionStrategy
} from "./signalPositions";
import { StatsAccumulator, type StatsSeries, type StatsSnapshot } from "./stats";

export type SessionState = "uninitialized" | "started" | "closed";

export interface LiveSessionOptions {
  engine: SimulationEngine;
  /** Descriptor handed to the engine on start, e.g. a scenario configuration path. */
  resource: string;
  topology: Topology;
  target: FrameTarget;
  input?: InputSource;
  theme?: RenderTheme;
  margin?: number;
  initialZoom?: number;
  modeLabel?: string;
  showHelp?: boolean;
  signalStrategies?: readonly SignalResolutionStrategy[];
  sleep?: (ms: number) => Promise<void>;
}

export interface SignalFrame {
  id: string;
  state: string;
  position: Point;
}

export interface FrameSnapshot {
  vehicles: VehicleDrawing[];
  signals: SignalFrame[];
  skippedVehicles: number;
  skippedSignals: number;
}

export interface RunSummary {
  stepsCompleted: number;
  stats: StatsSnapshot;
  series: StatsSeries;
}

export interface LiveSession {
  getState(): SessionState;
  start(): Promise<void>;
  /** Resolves to false once the session should not continue. */
  step(delayMs?: number): Promise<boolean>;
  run(steps: number, delayMs?: number): Promise<RunSummary>;
  close(): Promise<void>;
  setModeLabel(text: string): void;
  getStats(): StatsSnapshot;
  getSeries(): StatsSeries;
  getView(): ViewState;
  getLastFrame(): FrameSnapshot | null;
  getSignalResolutions(): ReadonlyMap<string, SignalResolution>;
  readonly viewport: Viewport;
  readonly renderer: FrameRenderer;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createLiveSession(options: LiveSessionOptions): LiveSession {
  const { engine, topology, target } = options;
  const theme = options.theme ?? DEFAULT_THEME;
  const sleep = options.sleep ?? defaultSleep;
  const strategies = options.signalStrategies ?? DEFAULT_SIGNAL_STRATEGIES;
  const showHelp = options.showHelp ?? true;

  const viewport = createViewport(topology, { ...target.size, margin: options.margin });
  const renderer = createFrameRenderer({ surface: target.surface, viewport, topology, theme });
  const stats = new StatsAccumulator();
  const signalResolutions = new Map<string, SignalResolution>();
  let initialZoom = options.initialZoom ?? 1;
  if (!Number.isFinite(initialZoom) || initialZoom <= 0) {
    console.warn(`[session] Ignoring initial zoom ${initialZoom}; using 1.`);
    initialZoom = 1;
  }
  let view: ViewState = initialZoom === 1 ? { ...IDENTITY_VIEW } : viewport.centeredView(initialZoom);
  let state: SessionState = "uninitialized";
  let modeLabel = options.modeLabel ?? "Fixed Timing";
  let lastFrame: FrameSnapshot | null = null;

  const resolveSignal = (signalId: string): SignalResolution => {
    const known = signalResolutions.get(signalId);
    if (known) {
      return known;
    }
    const resolution = resolveSignalPosition(signalId, { topology, engine }, strategies);
    if (resolution.kind === "unresolved") {
      console.warn(`[session] No position for signal ${signalId}; it will not be drawn (${resolution.reason}).`);
    }
    signalResolutions.set(signalId, resolution);
    return resolution;
  };

  const pullFrame = (): FrameSnapshot => {
    const frame: FrameSnapshot = { vehicles: [], signals: [], skippedVehicles: 0, skippedSignals: 0 };
    for (const id of engine.currentVehicleIds()) {
      try {
        frame.vehicles.push({
          id,
          position: engine.vehiclePosition(id),
          heading: engine.vehicleHeading(id),
          category: inferVehicleCategory(engine.vehicleType(id)),
          speed: engine.vehicleSpeed(id),
          waitingTime: engine.vehicleWaitingTime(id)
        });
      } catch (error) {
        frame.skippedVehicles += 1;
        console.warn(`[session] Skipping vehicle ${id} this frame: ${describeError(error)}`);
      }
    }
    for (const id of engine.currentSignalIds()) {
      const resolution = resolveSignal(id);
      if (resolution.kind === "unresolved") {
        continue;
      }
      try {
        frame.signals.push({ id, state: engine.signalState(id), position: resolution.position });
      } catch (error) {
        frame.skippedSignals += 1;
        console.warn(`[session] Skipping signal ${id} this frame: ${describeError(error)}`);
      }
    }
    return frame;
  };

  const applyInput = (command: InputCommand): boolean => {
    switch (command.type) {
      case "pan":
        view = { ...view, panX: view.panX + command.dx, panY: view.panY + command.dy };
        return true;
      case "zoom":
        if (Number.isFinite(command.factor) && command.factor > 0) {
          view = { ...view, zoom: view.zoom * command.factor };
        }
        return true;
      case "toggle": {
        const current = renderer.getLabelOptions()[command.flag];
        const next: Partial<LabelOptions> = {};
        next[command.flag] = !current;
        renderer.setLabelOptions(next);
        console.info(`[session] ${command.flag}: ${current ? "off" : "on"}`);
        return true;
      }
      case "quit":
        return false;
    }
  };

  const overlayLines = (): OverlayLine[] => {
    const current = stats.snapshot();
    return [
      {
        label: "Vehicles",
        value:
          current.skippedVehicles > 0
            ? `${current.vehicleCount} (${current.skippedVehicles} unreadable)`
            : String(current.vehicleCount)
      },
      { label: "Avg Speed", value: `${current.avgSpeed.toFixed(2)} m/s` },
      { label: "Avg Wait Time", value: `${current.avgWaitingTime.toFixed(2)} s` },
      { label: "Throughput", value: String(current.throughput) },
      { label: "Simulation Time", value: `${current.simulationTime.toFixed(1)} s` },
      { label: "Mode", value: modeLabel }
    ];
  };

  const drawFrame = (frame: FrameSnapshot) => {
    renderer.clear();
    renderer.setView(view);
    renderer.renderNetwork();
    for (const vehicle of frame.vehicles) {
      try {
        renderer.renderVehicle(vehicle);
      } catch (error) {
        console.warn(`[session] Failed to draw vehicle ${vehicle.id}: ${describeError(error)}`);
      }
    }
    for (const signal of frame.signals) {
      try {
        renderer.renderTrafficLight(signal.id, signal.position, signal.state);
      } catch (error) {
        console.warn(`[session] Failed to draw signal ${signal.id}: ${describeError(error)}`);
      }
    }
    for (const nodeId of topology.nodes.keys()) {
      renderer.renderJunction(nodeId);
    }
    renderer.renderOverlay(overlayLines());
    if (showHelp) {
      renderer.renderHelp(HELP_LINES);
    }
  };

  const session: LiveSession = {
    viewport,
    renderer,
    getState: () => state,
    async start() {
      if (state === "started") {
        return;
      }
      if (state === "closed") {
        throw new Error("Session is closed and cannot be restarted.");
      }
      try {
        await engine.start(options.resource);
      } catch (error) {
        await session.close();
        if (error instanceof EngineUnavailableError) {
          throw error;
        }
        throw new EngineUnavailableError(`Simulation engine failed to start: ${describeError(error)}`);
      }
      state = "started";
      let signalIds: readonly string[] = [];
      try {
        signalIds = engine.currentSignalIds();
      } catch (error) {
        console.warn(`[session] Signal list unavailable at start: ${describeError(error)}`);
      }
      if (signalIds.length === 0) {
        console.warn("[session] No traffic signals reported by the engine.");
      }
      let placed = 0;
      for (const signalId of signalIds) {
        if (resolveSignal(signalId).kind !== "unresolved") {
          placed += 1;
        }
      }
      console.info(`[session] Started; placed ${placed} of ${signalIds.length} signals.`);
    },
    async step(delayMs = 0) {
      if (state !== "started") {
        return false;
      }
      try {
        if (delayMs > 0) {
          await sleep(delayMs);
          if (state !== "started") {
            return false;
          }
        }
        await engine.stepOnce();
        // close() may have run while the engine was stepping.
        if (state !== "started") {
          return false;
        }

        const frame = pullFrame();
        stats.record({
          vehicleCount: frame.vehicles.length + frame.skippedVehicles,
          skippedVehicles: frame.skippedVehicles,
          speeds: frame.vehicles.map((vehicle) => vehicle.speed ?? 0),
          waitingTimes: frame.vehicles.map((vehicle) => vehicle.waitingTime ?? 0),
          arrived: engine.arrivedCountThisStep(),
          simulationTime: engine.simulationTime()
        });

        for (const command of options.input?.poll() ?? []) {
          if (!applyInput(command)) {
            await session.close();
            return false;
          }
        }

        drawFrame(frame);
        lastFrame = frame;
        await target.present();
        return true;
      } catch (error) {
        console.error("[session] Step failed; closing session.", error);
        await session.close();
        throw error;
      }
    },
    async run(steps: number, delayMs = 0) {
      await session.start();
      let stepsCompleted = 0;
      try {
        for (let i = 0; i < steps; i += 1) {
          if (!(await session.step(delayMs))) {
            break;
          }
          stepsCompleted += 1;
        }
      } finally {
        await session.close();
      }
      return { stepsCompleted, stats: stats.snapshot(), series: stats.series() };
    },
    async close() {
      if (state === "closed") {
        return;
      }
      const wasStarted = state === "started";
      state = "closed";
      if (wasStarted) {
        try {
          await engine.close();
        } catch (error) {
          console.error("[session] Engine did not close cleanly.", error);
        }
      }
      target.release();
      console.info("[session] Closed.");
    },
    setModeLabel(text: string) {
      modeLabel = text;
    },
    getStats: () => stats.snapshot(),
    getSeries: () => stats.series(),
    getView: () => ({ ...view }),
    getLastFrame: () => lastFrame,
    getSignalResolutions: () => signalResolutions
  };

  return session;
}
