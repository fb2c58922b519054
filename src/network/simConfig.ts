import { XMLParser } from "fast-xml-parser";
import { ResourceNotFoundError, describeError } from "../errors";
import type { FetchLike } from "./topology";

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Reads the network file reference out of a simulation configuration document
 * (`<configuration><input><net-file value="..."/></input></configuration>`).
 */
export function findNetFileReference(configXml: string): string | null {
  const parser = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: "@_" });
  let doc: unknown;
  try {
    doc = parser.parse(configXml);
  } catch (error) {
    console.warn("[topology] Simulation configuration could not be parsed.", describeError(error));
    return null;
  }
  const configuration = child(doc, "configuration");
  const netFile = child(child(configuration, "input"), "net-file") ?? child(configuration, "net-file");
  const value = netFile && typeof netFile === "object" ? Reflect.get(netFile, "@_value") : undefined;
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

export function resolveRelativeTo(baseUrl: string, reference: string): string {
  if (reference.startsWith("/") || SCHEME_PATTERN.test(reference)) {
    return reference;
  }
  const slash = baseUrl.lastIndexOf("/");
  const directory = slash >= 0 ? baseUrl.slice(0, slash + 1) : "";
  const segments: string[] = [];
  for (const segment of `${directory}${reference}`.split("/")) {
    if (segment === "..") {
      if (segments.length > 0 && segments[segments.length - 1] !== "" && segments[segments.length - 1] !== "..") {
        segments.pop();
        continue;
      }
    } else if (segment === ".") {
      continue;
    }
    segments.push(segment);
  }
  return segments.join("/");
}

export async function resolveNetFileUrl(configUrl: string, fetchFn: FetchLike = fetch): Promise<string> {
  let response: Response;
  try {
    response = await fetchFn(configUrl);
  } catch (error) {
    throw new ResourceNotFoundError(configUrl, describeError(error));
  }
  if (!response.ok) {
    throw new ResourceNotFoundError(configUrl, `HTTP ${response.status}`);
  }
  let configXml: string;
  try {
    configXml = await response.text();
  } catch (error) {
    throw new ResourceNotFoundError(configUrl, describeError(error));
  }
  const reference = findNetFileReference(configXml);
  if (!reference) {
    throw new ResourceNotFoundError(configUrl, "configuration names no net-file");
  }
  return resolveRelativeTo(configUrl, reference);
}

function child(value: unknown, key: string): unknown {
  if (!value || typeof value !== "object") {
    return undefined;
  }
  return Reflect.get(value, key);
}
