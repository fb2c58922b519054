import { EngineUnavailableError, EntityLookupError, describeError } from "../errors";
import type { Point } from "../types";
import type { SimulationEngine } from "./engine";

export type EngineFetch = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpEngineOptions {
  /** Base URL of the bridge, e.g. "/engine". */
  baseUrl: string;
  fetchFn?: EngineFetch;
}

interface VehicleRecord {
  position?: Point;
  heading?: number;
  type?: string;
  speed?: number;
  waitingTime?: number;
}

export interface EngineState {
  time: number;
  arrived: number;
  vehicles: Map<string, VehicleRecord>;
  signals: Map<string, string | undefined>;
}

export interface StartPayload {
  time: number;
  signalLanes: Map<string, string[]>;
  laneShapes: Map<string, Point[]>;
}

export function createHttpEngine(options: HttpEngineOptions): SimulationEngine {
  const base = options.baseUrl.replace(/\/+$/, "");
  const fetchFn = options.fetchFn ?? fetch;
  let running = false;
  let signalLanes = new Map<string, string[]>();
  let laneShapes = new Map<string, Point[]>();
  let current: EngineState = { time: 0, arrived: 0, vehicles: new Map(), signals: new Map() };

  const post = async (path: string, body?: unknown): Promise<unknown> => {
    let response: Response;
    try {
      response = await fetchFn(`${base}${path}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body)
      });
    } catch (error) {
      throw new EngineUnavailableError(
        `Simulation bridge unreachable at ${base}: ${describeError(error)}`
      );
    }
    if (!response.ok) {
      throw new EngineUnavailableError(
        `Simulation bridge ${path} failed (${response.status}).`,
        response.status
      );
    }
    try {
      return await response.json();
    } catch {
      throw new EngineUnavailableError(`Simulation bridge ${path} returned invalid JSON.`, response.status);
    }
  };

  const vehicle = (id: string, attribute: keyof VehicleRecord) => {
    const record = current.vehicles.get(id);
    const value = record?.[attribute];
    if (value === undefined) {
      throw new EntityLookupError(id, attribute);
    }
    return value;
  };

  return {
    async start(resource: string) {
      const payload = parseStartPayload(await post("/start", { resource }));
      signalLanes = payload.signalLanes;
      laneShapes = payload.laneShapes;
      current = {
        time: payload.time,
        arrived: 0,
        vehicles: new Map(),
        signals: new Map(
          [...signalLanes.keys()].map((id): [string, string | undefined] => [id, undefined])
        )
      };
      running = true;
      console.info(`[engine] Bridge session started for ${resource}`);
    },
    async stepOnce() {
      if (!running) {
        throw new EngineUnavailableError("Simulation bridge session is not running.");
      }
      current = parseStepPayload(await post("/step"));
    },
    async close() {
      if (!running) {
        return;
      }
      running = false;
      try {
        await post("/close");
      } catch (error) {
        console.warn(`[engine] Bridge close failed: ${describeError(error)}`);
      }
    },
    simulationTime: () => current.time,
    arrivedCountThisStep: () => current.arrived,
    currentVehicleIds: () => [...current.vehicles.keys()],
    vehiclePosition(id: string) {
      const position = vehicle(id, "position");
      return typeof position === "object" ? { ...position } : failLookup(id, "position");
    },
    vehicleHeading(id: string) {
      const heading = vehicle(id, "heading");
      return typeof heading === "number" ? heading : failLookup(id, "heading");
    },
    vehicleType(id: string) {
      const type = vehicle(id, "type");
      return typeof type === "string" ? type : failLookup(id, "type");
    },
    vehicleSpeed(id: string) {
      const speed = vehicle(id, "speed");
      return typeof speed === "number" ? speed : failLookup(id, "speed");
    },
    vehicleWaitingTime(id: string) {
      const waitingTime = vehicle(id, "waitingTime");
      return typeof waitingTime === "number" ? waitingTime : failLookup(id, "waitingTime");
    },
    currentSignalIds: () => [...current.signals.keys()],
    signalState(id: string) {
      const state = current.signals.get(id);
      if (state === undefined) {
        throw new EntityLookupError(id, "state");
      }
      return state;
    },
    signalControlledLanes(id: string) {
      const lanes = signalLanes.get(id);
      if (!lanes) {
        throw new EntityLookupError(id, "controlled lanes");
      }
      return [...lanes];
    },
    laneShape(laneId: string) {
      const shape = laneShapes.get(laneId);
      if (!shape) {
        throw new EntityLookupError(laneId, "shape");
      }
      return shape.map((point) => ({ ...point }));
    }
  };
}

function failLookup(id: string, attribute: string): never {
  throw new EntityLookupError(id, attribute);
}

export function parseStartPayload(raw: unknown): StartPayload {
  if (!isRecord(raw)) {
    throw new EngineUnavailableError("Simulation bridge start response is not an object.");
  }
  const signalLanes = new Map<string, string[]>();
  if (isRecord(raw.signals)) {
    for (const [id, lanes] of Object.entries(raw.signals)) {
      signalLanes.set(
        id,
        Array.isArray(lanes) ? lanes.filter((lane): lane is string => typeof lane === "string") : []
      );
    }
  }
  const laneShapes = new Map<string, Point[]>();
  if (isRecord(raw.lanes)) {
    for (const [id, shape] of Object.entries(raw.lanes)) {
      const points = parsePointList(shape);
      if (points) {
        laneShapes.set(id, points);
      }
    }
  }
  return { time: isFiniteNumber(raw.time) ? raw.time : 0, signalLanes, laneShapes };
}

/** Unusable records stay listed so per-entity lookups fail and the frame skips them. */
export function parseStepPayload(raw: unknown): EngineState {
  if (!isRecord(raw)) {
    throw new EngineUnavailableError("Simulation bridge step response is not an object.");
  }
  const vehicles = new Map<string, VehicleRecord>();
  if (Array.isArray(raw.vehicles)) {
    for (const entry of raw.vehicles) {
      if (!isRecord(entry) || typeof entry.id !== "string") {
        continue;
      }
      const record: VehicleRecord = {};
      if (isFiniteNumber(entry.x) && isFiniteNumber(entry.y)) {
        record.position = { x: entry.x, y: entry.y };
      }
      if (isFiniteNumber(entry.angle)) {
        record.heading = entry.angle;
      }
      if (typeof entry.type === "string") {
        record.type = entry.type;
      }
      if (isFiniteNumber(entry.speed) && entry.speed >= 0) {
        record.speed = entry.speed;
      }
      if (isFiniteNumber(entry.waitingTime) && entry.waitingTime >= 0) {
        record.waitingTime = entry.waitingTime;
      }
      vehicles.set(entry.id, record);
    }
  }
  const signals = new Map<string, string | undefined>();
  if (Array.isArray(raw.signals)) {
    for (const entry of raw.signals) {
      if (!isRecord(entry) || typeof entry.id !== "string") {
        continue;
      }
      signals.set(entry.id, typeof entry.state === "string" ? entry.state : undefined);
    }
  }
  const arrived = isFiniteNumber(raw.arrived) ? Math.max(0, Math.floor(raw.arrived)) : 0;
  return { time: isFiniteNumber(raw.time) ? raw.time : 0, arrived, vehicles, signals };
}

function parsePointList(raw: unknown): Point[] | null {
  if (!Array.isArray(raw)) {
    return null;
  }
  const points: Point[] = [];
  for (const pair of raw) {
    if (!Array.isArray(pair) || !isFiniteNumber(pair[0]) || !isFiniteNumber(pair[1])) {
      return null;
    }
    points.push({ x: pair[0], y: pair[1] });
  }
  return points;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
