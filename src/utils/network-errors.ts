/**
 * Network error classification utilities
 * Used to label uplink failures in logs and status
 */

function errorCode(error: unknown): string | undefined {
	if (!(error instanceof Error)) {
		return undefined;
	}
	if ('code' in error && typeof error.code === 'string') {
		return error.code;
	}
	if (error.cause instanceof Error) {
		return errorCode(error.cause);
	}
	return undefined;
}

/**
 * Connection refused (central server down)
 */
export function isConnectionRefused(error: unknown): boolean {
	return errorCode(error) === 'ECONNREFUSED';
}

/**
 * Timeout errors
 */
export function isTimeout(error: unknown): boolean {
	const code = errorCode(error);
	if (code === 'ETIMEDOUT') {
		return true;
	}
	return error instanceof Error && error.message.toLowerCase().includes('timed out');
}

/**
 * Peer closed the connection under us
 */
export function isConnectionReset(error: unknown): boolean {
	const code = errorCode(error);
	return code === 'ECONNRESET' || code === 'EPIPE' || code === 'ERR_STREAM_DESTROYED';
}

/**
 * Network unreachable
 */
export function isNetworkUnreachable(error: unknown): boolean {
	const code = errorCode(error);
	return code === 'ENETUNREACH' || code === 'EHOSTUNREACH' || code === 'ENOTFOUND' || code === 'EAI_AGAIN';
}

/**
 * Get human-readable error type
 */
export function getNetworkErrorType(error: unknown): string {
	if (isConnectionRefused(error)) return 'CONNECTION_REFUSED';
	if (isTimeout(error)) return 'TIMEOUT';
	if (isConnectionReset(error)) return 'CONNECTION_RESET';
	if (isNetworkUnreachable(error)) return 'NETWORK_UNREACHABLE';
	return 'UNKNOWN';
}
