import { SensorNode, SensorValueGenerator, buildSensorFleet } from '../../../src/simulation';
import type { GeneratorConfig } from '../../../src/simulation';
import { decodeReading } from '../../../src/ingest/frame-decoder';
import { createMockLogger } from '../../helpers/mock-logger';
import { CentralServerStandIn, waitFor } from '../../helpers/loopback';

describe('SensorValueGenerator', () => {
	const base: GeneratorConfig = {
		baseValue: 20,
		variance: 2,
		pattern: 'realistic',
		spikeProbability: 0.1,
		spikeMagnitude: 3,
	};

	it('is reproducible with an injected random source', () => {
		const generator = new SensorValueGenerator(base, () => 0.5);
		expect(generator.next()).toBe(17.65);
		expect(generator.next()).toBe(17.65);
	});

	it('spikes when the random draw falls under the spike probability', () => {
		const draws = [0.05];
		const generator = new SensorValueGenerator({ ...base, pattern: 'spike' }, () => draws.shift() ?? 0.5);
		expect(generator.next()).toBe(26);
	});

	it('follows a sine wave in cyclic mode', () => {
		const generator = new SensorValueGenerator({ ...base, pattern: 'cyclic' }, () => 0.5);
		expect(generator.next()).toBe(20.2);
	});

	it('clamps to the configured range', () => {
		const generator = new SensorValueGenerator({ ...base, min: 18 }, () => 0.5);
		expect(generator.next()).toBe(18);
	});
});

describe('buildSensorFleet', () => {
	it('numbers sensors from the base id and cycles units', () => {
		const fleet = buildSensorFleet({
			baseId: 'node',
			count: 5,
			host: '127.0.0.1',
			port: 9000,
			intervalMs: 1000,
			reconnectDelayMs: 1000,
			pattern: 'realistic',
		});

		expect(fleet.map(c => `${c.sensorId}:${c.unit}`)).toEqual([
			'node1:TEMPERATURE',
			'node2:HUMIDITY',
			'node3:PRESSURE',
			'node4:AIR_QUALITY',
			'node5:TEMPERATURE',
		]);
		expect(fleet[1].generator).toMatchObject({ baseValue: 50, variance: 5, min: 30, max: 70 });
	});

	it('rejects a non-positive count', () => {
		expect(() => buildSensorFleet({
			baseId: 'node',
			count: 0,
			host: '127.0.0.1',
			port: 9000,
			intervalMs: 1000,
			reconnectDelayMs: 1000,
			pattern: 'realistic',
		})).toThrow('Sensor count must be a positive integer, got 0');
	});
});

describe('SensorNode', () => {
	let gatewayStandIn: CentralServerStandIn;
	let node: SensorNode | undefined;

	beforeEach(() => {
		gatewayStandIn = new CentralServerStandIn();
	});

	afterEach(async () => {
		await node?.stop();
		await gatewayStandIn.close();
	});

	async function startNode(): Promise<SensorNode> {
		const port = await gatewayStandIn.listen();
		const [config] = buildSensorFleet({
			baseId: 'sim',
			count: 1,
			host: '127.0.0.1',
			port,
			intervalMs: 10,
			reconnectDelayMs: 20,
			pattern: 'realistic',
			units: ['HUMIDITY'],
		});
		const created = new SensorNode(config, createMockLogger(), { random: () => 0.5, clock: () => 1_000 });
		created.start();
		return created;
	}

	it('streams readings in the gateway wire format', async () => {
		node = await startNode();
		await waitFor(() => gatewayStandIn.lines.length >= 3, 2000, 'three readings');

		const reading = decodeReading(gatewayStandIn.lines[0]);
		expect(reading).toEqual({ sensorId: 'sim1', timestamp: 1_000, value: 44.11, unit: 'HUMIDITY' });
		expect(node.getStatus()).toMatchObject({ sensorId: 'sim1', connected: true, running: true });
	});

	it('reconnects after the connection drops', async () => {
		node = await startNode();
		await waitFor(() => gatewayStandIn.lines.length >= 1, 2000, 'first reading');

		gatewayStandIn.dropConnections();
		await waitFor(() => gatewayStandIn.connections === 2, 2000, 'reconnect');

		expect(node.getStatus().reconnects).toBe(1);
	});

	it('stops sending after stop()', async () => {
		node = await startNode();
		await waitFor(() => gatewayStandIn.lines.length >= 1, 2000, 'first reading');

		await node.stop();
		const count = gatewayStandIn.lines.length;
		await new Promise(resolve => setTimeout(resolve, 50));

		expect(gatewayStandIn.lines.length).toBe(count);
		expect(node.getStatus()).toMatchObject({ running: false, connected: false });
	});
});
