/**
 * Application Paths
 */

import * as os from "os";
import * as path from "path";
import { getStore } from "./store";

/**
 * Directory holding settings.json (and the logs folder)
 */
export function getConfigDirectory(): string {
  return path.dirname(getStore().path);
}

export function getLogDirectory(): string {
  return path.join(getConfigDirectory(), "logs");
}

/**
 * Fallback output folder when none is configured
 */
export function getDefaultOutputDirectory(): string {
  return os.homedir();
}
