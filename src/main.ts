import { describeError, ResourceNotFoundError } from "./errors";
import { resolveNetFileUrl } from "./network/simConfig";
import { loadTopology } from "./network/topology";
import { createCanvasTarget } from "./render/canvasTarget";
import { bindDomInput } from "./session/domInput";
import { createHttpEngine } from "./session/httpEngine";
import { createInputQueue } from "./session/input";
import { createLiveSession } from "./session/liveSession";
import { resolveSettings } from "./settings";

async function init() {
  const canvas = document.getElementById("viewport");
  const status = document.getElementById("status");
  if (!(canvas instanceof HTMLCanvasElement) || !status) {
    throw new Error("Missing core DOM elements");
  }
  const setStatus = (text: string) => {
    status.textContent = text;
  };

  const settings = resolveSettings(new URLSearchParams(window.location.search));
  let netUrl = settings.netUrl;
  if (!netUrl && settings.configUrl) {
    netUrl = await resolveNetFileUrl(settings.configUrl);
  }
  if (!netUrl) {
    throw new ResourceNotFoundError("network", "pass ?net=<file.net.xml> or ?config=<file.sumocfg>");
  }

  setStatus(`Loading network ${netUrl}…`);
  const topology = await loadTopology(netUrl);
  const target = createCanvasTarget(canvas, {
    width: settings.width,
    height: settings.height,
    fps: settings.fps
  });
  const input = createInputQueue();
  const unbindInput = bindDomInput(canvas, input, settings);
  const session = createLiveSession({
    engine: createHttpEngine({ baseUrl: settings.engineUrl }),
    resource: settings.configUrl ?? settings.scenario,
    topology,
    target,
    input,
    margin: settings.margin,
    initialZoom: settings.initialZoom,
    modeLabel: settings.modeLabel
  });

  setStatus("Running");
  try {
    const summary = await session.run(settings.steps, settings.delayMs);
    setStatus(
      `Finished after ${summary.stepsCompleted} steps; throughput ${summary.stats.throughput}, ` +
        `avg wait ${summary.stats.avgWaitingTime.toFixed(2)} s`
    );
    console.log("[session] Time series", summary.series);
  } finally {
    unbindInput();
  }
}

init().catch((err) => {
  console.error(err);
  const status = document.getElementById("status");
  if (status) {
    status.textContent = `Error: ${describeError(err)}`;
  }
});
