export interface VisualizerSettings {
  width: number;
  height: number;
  margin: number;
  /** Upper bound on presented frames per second. */
  fps: number;
  initialZoom: number;
  zoomStep: number;
  panStep: number;
  delayMs: number;
  steps: number;
  engineUrl: string;
  /** Scenario descriptor handed to the engine on start. */
  scenario: string;
  netUrl: string | null;
  configUrl: string | null;
  modeLabel: string;
}

export const DEFAULT_SETTINGS: Readonly<VisualizerSettings> = {
  width: 1024,
  height: 768,
  margin: 50,
  fps: 30,
  initialZoom: 1,
  zoomStep: 1.1,
  panStep: 40,
  delayMs: 100,
  steps: 1000,
  engineUrl: "/engine",
  scenario: "config/scenarios/default.sumocfg",
  netUrl: null,
  configUrl: null,
  modeLabel: "Fixed Timing"
};

interface NumericRule {
  key: "width" | "height" | "margin" | "fps" | "initialZoom" | "zoomStep" | "panStep" | "delayMs" | "steps";
  min: number;
  max: number;
  integer?: boolean;
}

const NUMERIC_RULES: NumericRule[] = [
  { key: "width", min: 200, max: 8192, integer: true },
  { key: "height", min: 200, max: 8192, integer: true },
  { key: "margin", min: 0, max: 1000 },
  { key: "fps", min: 1, max: 240, integer: true },
  { key: "initialZoom", min: 0.01, max: 100 },
  { key: "zoomStep", min: 1.001, max: 4 },
  { key: "panStep", min: 1, max: 2000 },
  { key: "delayMs", min: 0, max: 60_000, integer: true },
  { key: "steps", min: 1, max: 10_000_000, integer: true }
];

const STRING_KEYS = ["engineUrl", "scenario", "modeLabel"] as const;

/** Overlays URL search parameters on the defaults. Invalid numbers keep their default. */
export function resolveSettings(
  params: URLSearchParams,
  defaults: Readonly<VisualizerSettings> = DEFAULT_SETTINGS
): VisualizerSettings {
  const settings: VisualizerSettings = { ...defaults };
  for (const rule of NUMERIC_RULES) {
    const raw = params.get(rule.key);
    if (raw === null || raw.trim() === "") {
      continue;
    }
    const value = Number(raw);
    const valid =
      Number.isFinite(value) &&
      value >= rule.min &&
      value <= rule.max &&
      (!rule.integer || Number.isInteger(value));
    if (!valid) {
      console.warn(`[settings] Ignoring ${rule.key}=${raw}; using ${defaults[rule.key]}.`);
      continue;
    }
    settings[rule.key] = value;
  }
  for (const key of STRING_KEYS) {
    const raw = params.get(key);
    if (raw !== null && raw.trim()) {
      settings[key] = raw.trim();
    }
  }
  const netUrl = params.get("net");
  if (netUrl && netUrl.trim()) {
    settings.netUrl = netUrl.trim();
  }
  const configUrl = params.get("config");
  if (configUrl && configUrl.trim()) {
    settings.configUrl = configUrl.trim();
  }
  return settings;
}
