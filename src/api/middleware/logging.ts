/**
 * Request logging middleware
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from '../../logging/types';
import { LogComponents } from '../../logging/types';

export default function logging(logger: Logger): RequestHandler {
	return (req: Request, res: Response, next: NextFunction) => {
		const start = Date.now();

		res.on('finish', () => {
			const duration = Date.now() - start;
			const logMessage = `${req.method} ${req.path}`;
			const context = {
				component: LogComponents.STATUS_API,
				statusCode: res.statusCode,
				duration: `${duration}ms`,
			};

			if (res.statusCode >= 500) {
				logger.error(logMessage, context);
			} else if (res.statusCode >= 400) {
				logger.warn(logMessage, context);
			} else {
				logger.debug(logMessage, context);
			}
		});

		next();
	};
}
