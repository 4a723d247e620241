import { encodeFrame } from '@codec/frame';
import { createSensorData } from '@codec/payload';
import type { SensorData } from '@codec/payload';
import { createLogger } from '@logging';
import type { LogLevels } from '@logging';
import { readFrames } from '@stream/reader';
import { EmptyTrainingWindowError, TruncatedStreamError } from '$types/errors';

import { encodeRowsToFrames, runPipeline, simulateNetworkLayer } from './pipeline';
import type { PipelineConfig } from './types';

const LOG_LEVELS: LogLevels = { DEBUG: 0, INFO: 1, WARNING: 2, CRITICAL: 3 };

const CONFIG: PipelineConfig = {
  SOURCE_ADDRESS: '013A5B',
  ACTUATOR_ADDRESS: '025C8H',
  TRAINING_WINDOW_SIZE: 24,
  MID_BAND_TOLERANCE: 1.5,
};

const BASE = Date.UTC(2023, 5, 1, 0, 0, 0);

function reading(hour: number, temperature: number, humidity: number): SensorData {
  return createSensorData(new Date(BASE + hour * 3600000), temperature, humidity);
}

// Hour 1 is the coldest and driest, hour 2 the hottest and most humid,
// hours 3-24 sit on the midpoints; 25 and 26 repeat the extremes
function dayPlusTwo(): SensorData[] {
  const readings: SensorData[] = [reading(1, 18, 40), reading(2, 30, 80)];
  for (let hour = 3; hour <= 24; hour++) {
    readings.push(reading(hour, 24, 60));
  }
  readings.push(reading(25, 30, 80));
  readings.push(reading(26, 18, 40));
  return readings;
}

function setup() {
  const lines: string[] = [];
  const logger = createLogger(
    { level: LOG_LEVELS.DEBUG },
    { sinks: [{ sink: { write: (line: string) => { lines.push(line); } }, minLevel: LOG_LEVELS.DEBUG }], consoleApi: console },
    LOG_LEVELS
  );
  return { lines: lines, logger: logger };
}

function stream(readings: SensorData[]): Buffer {
  return Buffer.concat(encodeRowsToFrames(readings).map(encodeFrame));
}

describe('pipeline', () => {
  describe('encodeRowsToFrames', () => {
    it('should number frames from 1 with default addresses', () => {
      const frames = encodeRowsToFrames([reading(1, 20, 50), reading(2, 21, 51)]);

      expect(frames.map((f) => f.sequence)).toEqual([1, 2]);
      expect(frames[0].source).toBe('013A5B');
      expect(frames[0].destination).toBe('014D8E');
    });

    it('should apply header options', () => {
      const frames = encodeRowsToFrames([reading(1, 20, 50)], { source: 'NODE01', destination: 'GATE01' });

      expect(frames[0].source).toBe('NODE01');
      expect(frames[0].destination).toBe('GATE01');
    });

    it('should return nothing for no readings', () => {
      expect(encodeRowsToFrames([])).toEqual([]);
    });
  });

  describe('simulateNetworkLayer', () => {
    const stats = { lt: 18, ht: 30, mt: 24, lh: 40, hh: 80, mh: 60 };

    it('should collect essentials and signals in order', () => {
      const frames = encodeRowsToFrames([reading(1, 30, 80), reading(2, 25, 75), reading(3, 17, 39)]);

      const result = simulateNetworkLayer(frames, stats, { tolerance: 1.5 });

      expect(result.classified.map((c) => c.flag)).toEqual(['HTHH', null, 'LTLH']);
      expect(result.essentials.map((f) => f.sequence)).toEqual([1, 3]);
      expect(result.signals.map((f) => f.payload.signal)).toEqual(['Low', 'High']);
      expect(result.signals.map((f) => f.sequence)).toEqual([1, 3]);
    });

    it('should keep essentials that map to no signal', () => {
      const frames = encodeRowsToFrames([reading(1, 24, 60)]);

      const result = simulateNetworkLayer(frames, stats, { tolerance: 1.5 });

      expect(result.essentials).toHaveLength(1);
      expect(result.signals).toHaveLength(0);
    });

    it('should return the starting statistics for no frames', () => {
      const result = simulateNetworkLayer([], stats, { tolerance: 1.5 });

      expect(result.stats).toEqual(stats);
      expect(result.essentials).toEqual([]);
    });
  });

  describe('runPipeline', () => {
    it('should train on the first day and classify every frame', () => {
      const { logger } = setup();

      const result = runPipeline(readFrames('sensor', stream(dayPlusTwo())), CONFIG, logger);

      expect(result.frames).toHaveLength(26);
      expect(result.trained).toEqual({ lt: 18, ht: 30, mt: 24, lh: 40, hh: 80, mh: 60 });
      expect(result.essentials).toHaveLength(24);
      expect(result.classified.slice(0, 5).map((c) => c.flag)).toEqual(['LTLH', 'HTHH', null, null, 'MTMH']);
      expect(result.signals.map((f) => f.sequence)).toEqual([1, 2, 25, 26]);
      expect(result.signals.map((f) => f.payload.signal)).toEqual(['High', 'Low', 'Low', 'High']);
      expect(result.signals.every((f) => f.destination === '025C8H')).toBe(true);
      expect(result.final.mt).toBeCloseTo(22.5, 5);
      expect(result.final.mh).toBeCloseTo(55, 5);
    });

    it('should log training, essentials and the summary', () => {
      const { lines, logger } = setup();

      runPipeline(readFrames('sensor', stream(dayPlusTwo())), CONFIG, logger);

      expect(lines[0]).toBe('[DEBUG]    Trained on 24 frames: T 18.00/24.00/30.00 H 40.00/60.00/80.00');
      expect(lines[1]).toBe('[DEBUG]    #1 2023-06-01 01:00:00 18.00C 40.00% LTLH');
      expect(lines[lines.length - 1]).toBe('ℹ️ [INFO]     Classified 26 frames: 24 essential, 4 signal');
    });

    it('should abort before classifying when the stream is truncated', () => {
      const { lines, logger } = setup();
      const bytes = Buffer.concat([stream(dayPlusTwo()), Buffer.alloc(10)]);

      expect(() => runPipeline(readFrames('sensor', bytes), CONFIG, logger)).toThrow(TruncatedStreamError);
      expect(lines).toEqual([
        '🚨 [CRITICAL] Frame stream rejected (TruncatedStream): stream ends with 10 stray bytes, sensor frames are 67 bytes'
      ]);
    });

    it('should abort on a corrupted frame', () => {
      const { logger } = setup();
      const bytes = stream(dayPlusTwo());
      bytes[67 * 5 + 40] ^= 0x04;

      expect(() => runPipeline(readFrames('sensor', bytes), CONFIG, logger)).toThrow('checksum mismatch in frame 6');
    });

    it('should throw for an empty stream', () => {
      const { logger } = setup();

      expect(() => runPipeline(readFrames('sensor', Buffer.alloc(0)), CONFIG, logger)).toThrow(EmptyTrainingWindowError);
    });

    it('should warn and train on everything when the stream is shorter than the window', () => {
      const { lines, logger } = setup();

      const result = runPipeline(readFrames('sensor', stream([reading(1, 20, 50), reading(2, 22, 54)])), CONFIG, logger);

      expect(lines[0]).toBe('⚠️ [WARNING]  Only 2 frames, shorter than the 24-frame training window');
      expect(result.trained).toEqual({ lt: 20, ht: 22, mt: 21, lh: 50, hh: 54, mh: 52 });
    });

    it('should reject a non-positive tolerance', () => {
      const { logger } = setup();

      expect(() => runPipeline([], { ...CONFIG, MID_BAND_TOLERANCE: 0 }, logger))
        .toThrow('tolerance must be a positive finite number, got 0');
    });
  });
});
