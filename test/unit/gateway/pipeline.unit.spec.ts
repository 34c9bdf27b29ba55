import { DroneGateway } from '../../../src/gateway';
import { createMockLogger } from '../../helpers/mock-logger';
import { createTestConfig, frame } from '../../helpers/fixtures';
import { CentralServerStandIn, connectSensor, waitFor } from '../../helpers/loopback';

describe('sensor to central server pipeline', () => {
	let central: CentralServerStandIn;
	let gateway: DroneGateway;

	beforeEach(async () => {
		central = new CentralServerStandIn();
		const serverPort = await central.listen();
		gateway = new DroneGateway(
			createTestConfig({ serverPort, windowSize: 3, uplinkConnectTimeoutMs: 1000 }),
			{ logger: createMockLogger() }
		);
	});

	afterEach(async () => {
		await gateway.stop();
		await central.close();
	});

	it('relays aggregated records for readings received over TCP', async () => {
		const address = await gateway.start();
		expect(gateway.isRunning()).toBe(true);

		const sensor = await connectSensor(address);
		sensor.write(frame({ sensor_id: 'temp-1', timestamp: '2024-01-15T12:00:00Z', value: 20, unit: 'TEMPERATURE' }));
		sensor.write(frame({ sensor_id: 'temp-1', timestamp: '2024-01-15T12:00:01Z', value: 22, unit: 'TEMPERATURE' }));
		sensor.write('garbage\n');

		await waitFor(() => central.lines.length === 2, 3000, 'two records at the central server');
		await waitFor(() => gateway.getStatus().counters.parseErrors === 1, 2000, 'parse error');
		sensor.destroy();

		expect(central.records()[1]).toEqual({
			sensor_id: 'temp-1',
			unit: 'TEMPERATURE',
			window_mean: 21,
			window_stddev: 1,
			classification: 'NORMAL',
			score: 2,
			anomaly_count: 0,
			sample_count: 2,
			timestamp: '2024-01-15T12:00:01.000Z',
		});
		expect(gateway.getStatus().counters).toMatchObject({ parseErrors: 1, readingsAccepted: 2 });
	});

	it('stops cleanly and reports it is no longer running', async () => {
		await gateway.start();
		await gateway.stop();

		expect(gateway.isRunning()).toBe(false);
		expect(gateway.address()).toBeNull();
	});
});
