import { AnomalyClassifier } from '../../../src/anomaly/classifier';
import { createReading } from '../../helpers/fixtures';

describe('AnomalyClassifier', () => {
	const classifier = new AnomalyClassifier({
		zScoreThreshold: 3,
		minStdDev: 0.05,
		absoluteDeviationThreshold: 5,
		minSamples: 2,
	});

	it('treats the first reading of a sensor as warmup', () => {
		const event = classifier.classify('therm-1', createReading({ value: 999 }), 0, 0, 0);
		expect(event).toMatchObject({
			classification: 'NORMAL',
			score: 0,
			severity: 'info',
			reason: 'warmup',
		});
	});

	it('flags 100 against a flat window of 10 through the variance floor', () => {
		const event = classifier.classify('therm-1', createReading({ value: 100 }), 10, 0, 5);
		expect(event).toEqual({
			sensorId: 'therm-1',
			timestamp: createReading().timestamp,
			value: 100,
			classification: 'ANOMALY',
			score: 90,
			severity: 'critical',
			reason: 'variance_floor',
		});
	});

	it('keeps small deviations NORMAL below the variance floor', () => {
		const event = classifier.classify('therm-1', createReading({ value: 14 }), 10, 0.01, 8);
		expect(event.classification).toBe('NORMAL');
		expect(event.score).toBe(4);
		expect(event.reason).toBe('variance_floor');
	});

	it('uses the absolute rule while the window holds fewer than minSamples values', () => {
		const event = classifier.classify('therm-1', createReading({ value: 17 }), 10, 2, 1);
		expect(event.reason).toBe('variance_floor');
		expect(event.classification).toBe('ANOMALY');
		expect(event.severity).toBe('warning');
	});

	it('applies the z-score rule above the floor', () => {
		const normal = classifier.classify('therm-1', createReading({ value: 25 }), 20, 2, 10);
		expect(normal).toMatchObject({ classification: 'NORMAL', score: 2.5, reason: 'zscore', severity: 'info' });

		const warning = classifier.classify('therm-1', createReading({ value: 28 }), 20, 2, 10);
		expect(warning).toMatchObject({ classification: 'ANOMALY', score: 4, severity: 'warning' });

		const critical = classifier.classify('therm-1', createReading({ value: 8 }), 20, 2, 10);
		expect(critical).toMatchObject({ classification: 'ANOMALY', score: 6, severity: 'critical' });
	});

	it('does not flag a z-score exactly at the threshold', () => {
		const event = classifier.classify('therm-1', createReading({ value: 26 }), 20, 2, 10);
		expect(event.score).toBe(3);
		expect(event.classification).toBe('NORMAL');
	});

	it('is deterministic and returns frozen events', () => {
		const reading = createReading({ value: 31.7 });
		const a = classifier.classify('therm-1', reading, 22.4, 1.3, 10);
		const b = classifier.classify('therm-1', reading, 22.4, 1.3, 10);

		expect(b).toEqual(a);
		expect(Object.isFrozen(a)).toBe(true);
	});
});
