const DEBUG_STORAGE_KEY = "trafficview-debug";

const DEBUG_ENABLED = (() => {
  try {
    if (typeof window !== "undefined" && window.localStorage) {
      return window.localStorage.getItem(DEBUG_STORAGE_KEY) === "1";
    }
  } catch {
    return false;
  }
  return false;
})();

export function createDebugLog(tag: string): (...args: unknown[]) => void {
  return (...args: unknown[]) => {
    if (DEBUG_ENABLED) {
      console.debug(`[${tag}]`, ...args);
    }
  };
}
