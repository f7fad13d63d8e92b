/**
 * Platform Detection
 */

export const PLATFORM = {
  IS_WINDOWS: process.platform === "win32",
} as const;

/**
 * Executable name for a tool on this platform
 */
export function executableName(tool: string): string {
  return PLATFORM.IS_WINDOWS ? `${tool}.exe` : tool;
}
