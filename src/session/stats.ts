export interface StepSample {
  /** Every vehicle the engine reported, including unreadable ones. */
  vehicleCount: number;
  /** Vehicles left out of the averages because their attributes could not be read. */
  skippedVehicles?: number;
  speeds: readonly number[];
  waitingTimes: readonly number[];
  arrived: number;
  simulationTime: number;
}

export interface StatsSnapshot {
  step: number;
  vehicleCount: number;
  skippedVehicles: number;
  avgSpeed: number;
  avgWaitingTime: number;
  throughput: number;
  simulationTime: number;
}

export interface StatsSeries {
  simulationTime: number[];
  vehicleCount: number[];
  skippedVehicles: number[];
  avgSpeed: number[];
  avgWaitingTime: number[];
  arrivals: number[];
  throughput: number[];
}

function average(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total / values.length;
}

export class StatsAccumulator {
  private current: StatsSnapshot;
  private readonly history: StatsSeries;

  constructor() {
    this.current = {
      step: 0,
      vehicleCount: 0,
      skippedVehicles: 0,
      avgSpeed: 0,
      avgWaitingTime: 0,
      throughput: 0,
      simulationTime: 0
    };
    this.history = {
      simulationTime: [],
      vehicleCount: [],
      skippedVehicles: [],
      avgSpeed: [],
      avgWaitingTime: [],
      arrivals: [],
      throughput: []
    };
  }

  record(sample: StepSample): StatsSnapshot {
    const arrived = Number.isFinite(sample.arrived) ? Math.max(0, Math.floor(sample.arrived)) : 0;
    this.current = {
      step: this.current.step + 1,
      vehicleCount: sample.vehicleCount,
      skippedVehicles: sample.skippedVehicles ?? 0,
      avgSpeed: average(sample.speeds),
      avgWaitingTime: average(sample.waitingTimes),
      throughput: this.current.throughput + arrived,
      simulationTime: sample.simulationTime
    };
    this.history.simulationTime.push(this.current.simulationTime);
    this.history.vehicleCount.push(this.current.vehicleCount);
    this.history.skippedVehicles.push(this.current.skippedVehicles);
    this.history.avgSpeed.push(this.current.avgSpeed);
    this.history.avgWaitingTime.push(this.current.avgWaitingTime);
    this.history.arrivals.push(arrived);
    this.history.throughput.push(this.current.throughput);
    return this.snapshot();
  }

  snapshot(): StatsSnapshot {
    return { ...this.current };
  }

  series(): StatsSeries {
    return {
      simulationTime: [...this.history.simulationTime],
      vehicleCount: [...this.history.vehicleCount],
      skippedVehicles: [...this.history.skippedVehicles],
      avgSpeed: [...this.history.avgSpeed],
      avgWaitingTime: [...this.history.avgWaitingTime],
      arrivals: [...this.history.arrivals],
      throughput: [...this.history.throughput]
    };
  }
}
