// Blend: 35% all-time shape, 65% similarity-weighted historical years
export const OVERALL_BLEND_WEIGHT = 0.35;
export const HISTORICAL_BLEND_WEIGHT = 0.65;

// Added to the mean relative error before inverting it into a weight
export const SIMILARITY_EPSILON = 0.01;

// Fixed heuristic band around every projected value
export const MARGIN_FRACTION = 0.15;

// Organic floor percentile and the context shown around an extraction window
export const ORGANIC_FLOOR_QUANTILE = 0.1;
export const SIGNATURE_CONTEXT_DAYS = 14;

export const NEUTRAL_INDEX = 1.0;

export const DEFAULT_LIFT_PERCENT = 25;

// Delayed-peak Gaussian, in fractions of the shock duration
export const DELAYED_PEAK_CENTER = 0.4;
export const DELAYED_PEAK_SPREAD = 0.3;

// Front-loaded decay rate
export const FRONT_LOADED_DECAY = 3.0;
