/**
 * Debug Logger Utility
 *
 * Provides conditional logging that can be enabled/disabled.
 * Verbose per-row output only appears when debug mode is on.
 */

export const DEBUG_ENV_VAR = "NOVADAX_DEBUG";

// Evaluated once at module load; the CLI can still switch it on with --debug
function isDebugEnabled(): boolean {
  return process.env[DEBUG_ENV_VAR] === "true";
}

let debugEnabled = isDebugEnabled();

/**
 * Debug logger - only logs when NOVADAX_DEBUG=true or debug mode was enabled at runtime
 */
export const debug = {
  /**
   * Log debug message (only when debug mode is enabled)
   */
  log: (message: string, ...args: unknown[]): void => {
    if (debugEnabled) {
      console.log(message, ...args);
    }
  },

  /**
   * Log user-facing progress (always logged)
   */
  info: (message: string, ...args: unknown[]): void => {
    console.log(message, ...args);
  },

  /**
   * Log warning (always logged - warnings are important)
   */
  warn: (message: string, ...args: unknown[]): void => {
    console.warn(message, ...args);
  },

  /**
   * Log error (always logged - errors are important)
   */
  error: (message: string, ...args: unknown[]): void => {
    console.error(message, ...args);
  },

  /**
   * Log a group of related debug messages
   */
  group: (label: string, fn: () => void): void => {
    if (debugEnabled) {
      console.group(label);
      fn();
      console.groupEnd();
    }
  },

  /**
   * Turn debug output on or off for the rest of the process
   */
  setEnabled: (enabled: boolean): void => {
    debugEnabled = enabled;
  },

  /**
   * Check if debug mode is enabled
   */
  isEnabled: (): boolean => debugEnabled,
};
