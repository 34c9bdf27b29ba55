/**
 * ROLLING STATISTICS - TYPE DEFINITIONS
 */

/**
 * Sliding window for one sensor id
 */
export interface SensorWindow {
	values: number[];                // Circular buffer of values
	timestamps: number[];            // Corresponding timestamps
	size: number;                    // Current size (≤ maxSize)
	maxSize: number;                 // Window size N
	head: number;                    // Index of next insertion

	// Running sums, adjusted on every insert/evict
	sum: number;
	sumSquares: number;
}

/**
 * Statistics over the current window contents
 */
export interface WindowStats {
	mean: number;
	stdDev: number;
	count: number;
}
