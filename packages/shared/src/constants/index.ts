// Shared game constants
// Tuning values used by the surface builder, the planner and the arena host

// World
export const CELL_SIZE = 4; // World units per grid cell
export const CORNER_OFFSET = 1; // Corner displacement toward walls, in world units

// Movement
export const AGENT_MAX_SPEED = 8; // Units per second
export const WAYPOINT_REACHED_DISTANCE = AGENT_MAX_SPEED / 10;
export const GOAL_ARRIVAL_RADIUS = 1.0;
export const HOME_ARRIVAL_RADIUS = 1.5;
export const OVERSHOOT_DAMPING = 0.9; // Per-tick velocity factor near the final waypoint
export const VELOCITY_EPSILON = 0.0001;

// Navigation
export const BASE_AVOIDANCE_DELTA = 0.1;
export const AVOIDANCE_DELTA_GROWTH = 3;
export const AVOIDANCE_DELTA_CEILING = 10;
export const SEAM_CLEARANCE_MAX_RATIO = 0.45; // Share of a seam edge the clearance may eat from each end
export const PLACEHOLDER_LAYER_ORIGIN = -150; // Far outside any arena
