/**
 * Status API server
 */

import express from 'express';
import type { Express } from 'express';
import http from 'http';
import type { AddressInfo } from 'net';
import { createV1Router } from './v1';
import type { StatusProvider } from './v1';
import { errors, logging } from './middleware';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/types';

export function createStatusApp(provider: StatusProvider, logger: Logger): Express {
	const app = express();

	app.use(logging(logger));

	app.get('/health', (req, res) => {
		res.json({ status: 'ok', service: 'drone-gateway' });
	});

	app.use(createV1Router(provider));
	app.use(errors(logger));

	return app;
}

export class StatusApiServer {
	private server?: http.Server;

	constructor(
		private readonly provider: StatusProvider,
		private readonly logger: Logger
	) {}

	async listen(port: number, host: string): Promise<AddressInfo> {
		const server = http.createServer(createStatusApp(this.provider, this.logger));
		this.server = server;

		await new Promise<void>((resolve, reject) => {
			server.once('error', reject);
			server.listen(port, host, () => {
				server.off('error', reject);
				resolve();
			});
		});

		const address = server.address();
		if (!address || typeof address !== 'object') {
			throw new Error('Status API is not bound');
		}
		this.logger.info(`Status API listening on ${address.address}:${address.port}`, {
			component: LogComponents.STATUS_API,
		});
		return address;
	}

	async close(): Promise<void> {
		const server = this.server;
		if (!server) {
			return;
		}
		this.server = undefined;
		await new Promise<void>((resolve, reject) => {
			server.close(error => (error ? reject(error) : resolve()));
			server.closeAllConnections();
		});
	}
}
