export const METERS_TO_FEET = 3.28084;
export const NM_TO_METERS = 1852;
export const KMH_TO_KNOTS = 1 / 1.852;
// ISA sea level speed of sound (340.294 m/s) in knots.
export const MACH_ONE_KNOTS = 340.294 * 1.943844;

export const STANDARD_PRESSURE_HPA = 1013.25;
export const FEET_PER_HPA = 27;

// Boundary arcs and circles are sampled with this many points per 90 degrees.
export const ARC_POINTS_PER_QUADRANT = 6;
// Crossings closer than this along the route collapse into one.
export const CROSSING_DEDUP_METERS = 1;

export const AIRAC_CYCLE_DAYS = 28;
// Cycle 2001 became effective on this date.
export const AIRAC_EPOCH = Date.UTC(2020, 0, 2);
