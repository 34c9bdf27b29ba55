/**
 * Line framing and payload validation for sensor streams
 */

import { ParseError } from '../errors';
import { SensorFrameSchema } from './types';
import type { SensorReading } from './types';

/**
 * Splits a byte stream into newline-delimited frames.
 *
 * A partial line is kept until its terminator arrives. A line that grows past
 * maxFrameBytes is discarded up to its terminator and reported once.
 */
export class LineFramer {
  private buffer = '';
  private discarding = false;

  constructor(private readonly maxFrameBytes: number) {}

  /**
   * Feed a chunk; returns complete frames and oversize notices in arrival order
   */
  push(chunk: string): Array<{ frame: string } | { oversized: string }> {
    const out: Array<{ frame: string } | { oversized: string }> = [];
    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);

      if (this.discarding) {
        this.discarding = false;
      } else if (Buffer.byteLength(line) > this.maxFrameBytes) {
        out.push({ oversized: line.slice(0, 64) });
      } else if (line.trim().length > 0) {
        out.push({ frame: line });
      }
      newline = this.buffer.indexOf('\n');
    }

    if (!this.discarding && Buffer.byteLength(this.buffer) > this.maxFrameBytes) {
      out.push({ oversized: this.buffer.slice(0, 64) });
      this.buffer = '';
      this.discarding = true;
    } else if (this.discarding) {
      this.buffer = '';
    }

    return out;
  }

  /**
   * Bytes held for an incomplete frame
   */
  pendingBytes(): number {
    return Buffer.byteLength(this.buffer);
  }
}

/**
 * Parse one frame into a frozen SensorReading
 * @throws ParseError on malformed JSON or schema violation
 */
export function decodeReading(frame: string): SensorReading {
  let payload: unknown;
  try {
    payload = JSON.parse(frame);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Invalid JSON: ${reason}`, frame);
  }

  const result = SensorFrameSchema.safeParse(payload);
  if (!result.success) {
    const sensorId = extractSensorId(payload);
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || 'frame'}: ${issue.message}`)
      .join('; ');
    throw new ParseError(`Invalid reading: ${issues}`, frame, sensorId);
  }

  const data = result.data;
  return Object.freeze({
    sensorId: data.sensor_id,
    timestamp: typeof data.timestamp === 'number' ? data.timestamp : Date.parse(data.timestamp),
    value: data.value,
    unit: data.unit,
  });
}

/**
 * Best-effort sensor id from an invalid payload, for log context
 */
function extractSensorId(payload: unknown): string | undefined {
  if (payload && typeof payload === 'object' && 'sensor_id' in payload) {
    const id = payload.sensor_id;
    return typeof id === 'string' ? id : undefined;
  }
  return undefined;
}

/**
 * Encode a reading as a wire frame (used by the sensor simulator)
 */
export function encodeReading(reading: SensorReading): string {
  return JSON.stringify({
    sensor_id: reading.sensorId,
    timestamp: new Date(reading.timestamp).toISOString(),
    value: reading.value,
    unit: reading.unit,
  }) + '\n';
}
