/**
 * Gateway error taxonomy
 *
 * Only StateInvariantViolation is fatal; every other error is recovered
 * inside the execution unit that raised it and counted.
 */

/**
 * Malformed inbound frame (bad JSON, schema violation, oversized line)
 */
export class ParseError extends Error {
	constructor(
		message: string,
		public readonly frame: string,
		public readonly sensorId?: string
	) {
		super(message);
		this.name = 'ParseError';
	}
}

/**
 * Sensor peer disconnected or socket failed
 */
export class ConnectionError extends Error {
	constructor(
		message: string,
		public readonly remoteAddress: string,
		public readonly sensorIds: string[] = [],
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = 'ConnectionError';
	}
}

/**
 * Send to the central server failed
 */
export class UplinkError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'UplinkError';
	}
}

/**
 * Enqueue attempted at capacity. Returned as a value, never thrown.
 */
export class QueueOverflowError extends Error {
	constructor(
		public readonly capacity: number,
		public readonly policy: 'drop-oldest' | 'reject-new'
	) {
		super(`Outbound queue at capacity (${capacity}), policy: ${policy}`);
		this.name = 'QueueOverflowError';
	}
}

/**
 * Programming defect in the battery/flight state machine
 */
export class StateInvariantViolation extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'StateInvariantViolation';
	}
}

/**
 * Get human-readable error type for counters and logs
 */
export function getGatewayErrorType(error: unknown): string {
	if (error instanceof ParseError) return 'PARSE_ERROR';
	if (error instanceof ConnectionError) return 'CONNECTION_ERROR';
	if (error instanceof UplinkError) return 'UPLINK_ERROR';
	if (error instanceof QueueOverflowError) return 'QUEUE_OVERFLOW';
	if (error instanceof StateInvariantViolation) return 'STATE_INVARIANT_VIOLATION';
	return 'UNKNOWN';
}
