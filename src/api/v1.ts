/**
 * Status API v1 Router
 * Read-only view of the gateway for dashboards
 */

import express from 'express';
import type { Request, Response, NextFunction, Router } from 'express';
import { NotFoundError } from './middleware';
import type { GatewayStatus, SensorStatus } from '../gateway-status';

/**
 * What the router needs from the gateway
 */
export interface StatusProvider {
	getStatus(): GatewayStatus;
	getSensorStatus(sensorId: string): SensorStatus | undefined;
}

export function createV1Router(provider: StatusProvider): Router {
	const router = express.Router();

	/**
	 * GET /v1/status
	 * Drone state, queue and counters
	 */
	router.get('/v1/status', (req: Request, res: Response, next: NextFunction) => {
		try {
			res.status(200).json(provider.getStatus());
		} catch (error) {
			next(error);
		}
	});

	/**
	 * GET /v1/drone
	 * Current drone state snapshot
	 */
	router.get('/v1/drone', (req: Request, res: Response, next: NextFunction) => {
		try {
			const status = provider.getStatus();
			res.status(200).json({ ...status.drone, uplinkPermitted: status.uplinkPermitted });
		} catch (error) {
			next(error);
		}
	});

	/**
	 * GET /v1/queue
	 * Outbound queue length and delivery counters
	 */
	router.get('/v1/queue', (req: Request, res: Response, next: NextFunction) => {
		try {
			res.status(200).json(provider.getStatus().relay);
		} catch (error) {
			next(error);
		}
	});

	/**
	 * GET /v1/sensors
	 * Per-sensor last-seen and window statistics
	 */
	router.get('/v1/sensors', (req: Request, res: Response, next: NextFunction) => {
		try {
			res.status(200).json({ sensors: provider.getStatus().sensors });
		} catch (error) {
			next(error);
		}
	});

	/**
	 * GET /v1/sensors/:sensorId
	 */
	router.get('/v1/sensors/:sensorId', (req: Request, res: Response, next: NextFunction) => {
		try {
			const sensor = provider.getSensorStatus(req.params.sensorId);
			if (!sensor) {
				throw new NotFoundError(`Sensor ${req.params.sensorId} not found`);
			}
			res.status(200).json(sensor);
		} catch (error) {
			next(error);
		}
	});

	return router;
}
