/**
 * Status Icons
 *
 * Terminal symbols for progress and summary lines.
 * - Unicode symbols for most modern terminals
 * - ASCII as fallback for legacy consoles
 *
 * @module theme/icons
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Icon set used by progress and summary output.
 */
export type IconSet = {
  success: string;
  update: string;
  error: string;
  info: string;
  arrow: string;
  bullet: string;
};

/**
 * Icon support level.
 */
export type IconSupport = "unicode" | "ascii";

// =============================================================================
// Icon Sets
// =============================================================================

export const unicodeIcons: IconSet = {
  success: "✓",
  update: "⚠",
  error: "✗",
  info: "ℹ",
  arrow: "→",
  bullet: "-",
};

/**
 * ASCII fallback (100% compatible with all terminals).
 */
export const asciiIcons: IconSet = {
  success: "+",
  update: "!",
  error: "x",
  info: "i",
  arrow: "->",
  bullet: "-",
};

// =============================================================================
// Detection
// =============================================================================

/**
 * Detect the best icon support level for the current environment.
 */
function detectIconSupport(): IconSupport {
  const explicit = process.env.DEPSYNC_ICONS;
  if (explicit === "ascii") return "ascii";
  if (explicit === "unicode") return "unicode";

  // Windows Terminal and any terminal advertising itself support Unicode
  if (process.env.WT_SESSION || process.env.TERM_PROGRAM) return "unicode";

  const isLegacyWindows = process.platform === "win32";
  return isLegacyWindows ? "ascii" : "unicode";
}

// =============================================================================
// API
// =============================================================================

let currentIconSet: IconSet | null = null;

/**
 * Get the current icon set based on auto-detection.
 * The result is cached after the first call.
 */
export function getIcons(): IconSet {
  if (!currentIconSet) {
    currentIconSet = detectIconSupport() === "ascii" ? asciiIcons : unicodeIcons;
  }
  return currentIconSet;
}

/**
 * Force a specific icon set.
 */
export function setIconSet(set: IconSupport): void {
  currentIconSet = set === "ascii" ? asciiIcons : unicodeIcons;
}

/**
 * Reset icon detection (useful for testing).
 */
export function resetIconDetection(): void {
  currentIconSet = null;
}
