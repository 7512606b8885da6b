// Trapezoidal sub-intervals used when integrating arc length.
export const N_ARC_LENGTH_SAMPLES = 1024
