// Shared timing constants
// Used by the arena host and by collaborators that sample its state

// Timing
export const TICK_RATE = 20; // Simulation ticks per second
export const TICK_MS = 1000 / TICK_RATE; // Milliseconds per tick (50ms)
