/**
 * Error handling middleware
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import type { Logger } from '../../logging/types';
import { LogComponents } from '../../logging/types';

export class NotFoundError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'NotFoundError';
	}
}

export default function errors(logger: Logger): ErrorRequestHandler {
	return (err: Error, req: Request, res: Response, next: NextFunction) => {
		const context = {
			component: LogComponents.STATUS_API,
			method: req.method,
			path: req.path,
			error: err.message,
		};
		if (err instanceof NotFoundError) {
			logger.warn('Status API request failed', context);
		} else {
			logger.error('Status API error', context);
		}

		// Check if response already sent
		if (res.headersSent) {
			return next(err);
		}

		if (err instanceof NotFoundError) {
			return res.status(404).json({
				error: 'Not found',
				message: err.message,
			});
		}

		// Default to 500 internal server error
		return res.status(500).json({
			error: 'Internal server error',
			message: err.message,
		});
	};
}
