import { TcpUplinkClient, encodeRecord } from '../../../src/relay/uplink-client';
import { UplinkError } from '../../../src/errors';
import { createMockLogger } from '../../helpers/mock-logger';
import { createRecord } from '../../helpers/fixtures';
import { CentralServerStandIn, unusedPort, waitFor } from '../../helpers/loopback';

describe('encodeRecord', () => {
	it('writes snake_case keys and an ISO timestamp on one line', () => {
		const line = encodeRecord(createRecord({
			sensorId: 'therm-7',
			classification: 'ANOMALY',
			score: 4.5,
			anomalyCount: 2,
			timestamp: Date.UTC(2024, 0, 15, 12, 0, 0),
		}));

		expect(line).toBe(
			'{"sensor_id":"therm-7","unit":"TEMPERATURE","window_mean":21.5,"window_stddev":0.4,'
			+ '"classification":"ANOMALY","score":4.5,"anomaly_count":2,"sample_count":10,'
			+ '"timestamp":"2024-01-15T12:00:00.000Z"}\n'
		);
	});
});

describe('TcpUplinkClient', () => {
	let central: CentralServerStandIn;

	beforeEach(() => {
		central = new CentralServerStandIn();
	});

	afterEach(async () => {
		await central.close();
	});

	it('connects lazily and delivers records over one connection', async () => {
		const port = await central.listen();
		const client = new TcpUplinkClient({ host: '127.0.0.1', port, connectTimeoutMs: 1000 }, createMockLogger());
		expect(client.isConnected()).toBe(false);

		await client.send(createRecord({ timestamp: 1 }));
		await client.send(createRecord({ timestamp: 2 }));
		await waitFor(() => central.lines.length === 2, 2000, 'two records');

		expect(client.isConnected()).toBe(true);
		expect(central.connections).toBe(1);
		expect(central.records().map(r => r.timestamp)).toEqual([
			'1970-01-01T00:00:00.001Z',
			'1970-01-01T00:00:00.002Z',
		]);

		await client.close();
		expect(client.isConnected()).toBe(false);
	});

	it('raises an UplinkError when the central server is unreachable', async () => {
		const port = await unusedPort();
		const client = new TcpUplinkClient({ host: '127.0.0.1', port, connectTimeoutMs: 1000 }, createMockLogger());

		await expect(client.send(createRecord())).rejects.toBeInstanceOf(UplinkError);
		expect(client.isConnected()).toBe(false);
		await client.close();
	});

	it('reconnects after the central server drops the connection', async () => {
		const port = await central.listen();
		const client = new TcpUplinkClient({ host: '127.0.0.1', port, connectTimeoutMs: 1000 }, createMockLogger());

		await client.send(createRecord({ timestamp: 1 }));
		await waitFor(() => central.lines.length === 1, 2000, 'first record');

		central.dropConnections();
		await waitFor(() => !client.isConnected(), 2000, 'disconnect');

		await client.send(createRecord({ timestamp: 2 }));
		await waitFor(() => central.lines.length === 2, 2000, 'second record');
		expect(central.connections).toBe(2);

		await client.close();
	});

	it('refuses to send after close()', async () => {
		const client = new TcpUplinkClient({ host: '127.0.0.1', port: 9, connectTimeoutMs: 100 }, createMockLogger());
		await client.close();

		await expect(client.send(createRecord())).rejects.toThrow('Uplink client is closed');
	});
});
