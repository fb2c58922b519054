import type { Point } from "../types";

/**
 * Boundary to the external simulation. `start`, `stepOnce` and `close` may
 * suspend; every per-entity query is a synchronous read of the state captured
 * by the latest step and throws `EntityLookupError` for ids it cannot answer.
 */
export interface SimulationEngine {
  /** Throws `EngineUnavailableError` when the session cannot be opened. */
  start(resource: string): Promise<void>;
  stepOnce(): Promise<void>;
  close(): Promise<void>;

  simulationTime(): number;
  arrivedCountThisStep(): number;

  currentVehicleIds(): readonly string[];
  vehiclePosition(id: string): Point;
  vehicleHeading(id: string): number;
  /** Free-text vehicle type tag, e.g. "city_bus". */
  vehicleType(id: string): string;
  vehicleSpeed(id: string): number;
  vehicleWaitingTime(id: string): number;

  currentSignalIds(): readonly string[];
  signalState(id: string): string;
  /** Incoming lanes of the links a signal controls, in link order. */
  signalControlledLanes(id: string): readonly string[];
  laneShape(laneId: string): readonly Point[];
}
