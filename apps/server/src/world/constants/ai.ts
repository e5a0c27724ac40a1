/**
 * Arena AI tuning constants.
 *
 * Keep server-side spawn and replanning knobs here for quick tuning.
 * Movement and navigation constants remain in packages/shared.
 */

// -- Spawning

/** Delay before the first spawn of a level. */
export const SPAWN_INITIAL_DELAY_MS = 1500;

/** Delay before the first spawn when the level opens with a message. */
export const SPAWN_MESSAGE_DELAY_MS = 7500;

// -- Path assignment

/**
 * Global cooldown after a failed assignment, before any agent without a path plans again.
 */
export const PATH_GATE_MS = 500;

// -- Re-validation

/** Interval at which agents with a path re-plan it. */
export const REROUTE_INTERVAL_MS = 500;

/** Per-agent wait after a failed re-validation before trying again. */
export const REPLAN_COOLDOWN_MS = 250;
