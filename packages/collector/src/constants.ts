// Reservoir caps. A full reservoir stops accepting samples; nothing is evicted.
export const DAMAGE_SAMPLE_CAP = 100;
export const DAMAGE_TAKEN_CAP = 500;
export const POSITION_SAMPLE_CAP = 20;

// Spatial sampling
export const MIN_POSITION_SPACING_SQ = 25; // dx² + dz², vertical axis ignored
export const POSITION_DECIMALS = 2;

export const UNKNOWN_ZONE = "Unknown Zone";
export const UNKNOWN_ENTITY_NAME = "Unknown";
