import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { RowParseError } from '$types/errors';

import { parseSensorRows, readSensorRowFile } from './rows';

describe('sensor rows', () => {
  describe('parseSensorRows', () => {
    it('should parse one reading per line', () => {
      const readings = parseSensorRows('2023-01-01 00:00:00,18.0,72.0\n2023-01-01 01:00:00,17.5,75\n');

      expect(readings).toEqual([
        { kind: 'sensor', timestamp: Date.UTC(2023, 0, 1, 0, 0, 0), temperature: 18, humidity: 72 },
        { kind: 'sensor', timestamp: Date.UTC(2023, 0, 1, 1, 0, 0), temperature: 17.5, humidity: 75 },
      ]);
    });

    it('should accept CRLF endings, blank lines and padded fields', () => {
      const readings = parseSensorRows('\r\n2023-01-01 00:00:00 , -2.5 , 1e1\r\n\r\n');

      expect(readings).toHaveLength(1);
      expect(readings[0].temperature).toBe(-2.5);
      expect(readings[0].humidity).toBe(10);
    });

    it('should return nothing for empty text', () => {
      expect(parseSensorRows('')).toEqual([]);
    });

    it('should reject a wrong field count with the line number', () => {
      expect(() => parseSensorRows('2023-01-01 00:00:00,18.0,72.0\n2023-01-01 01:00:00,17.5\n'))
        .toThrow('line 2: expected 3 fields (timestamp, temperature, humidity), got 2');
    });

    it('should reject an unparseable timestamp', () => {
      expect(() => parseSensorRows('2023-02-30 00:00:00,18.0,72.0'))
        .toThrow('line 1: unparseable timestamp "2023-02-30 00:00:00"');
    });

    it('should reject non-numeric values', () => {
      expect(() => parseSensorRows('2023-01-01 00:00:00,warm,72.0'))
        .toThrow('line 1: temperature is not a number: "warm"');
      expect(() => parseSensorRows('2023-01-01 00:00:00,18,'))
        .toThrow('line 1: humidity is not a number: ""');
    });

    it('should reject values that overflow a double', () => {
      expect(() => parseSensorRows('2023-01-01 00:00:00,1e400,72.0'))
        .toThrow('line 1: temperature is out of range: "1e400"');
    });

    it('should carry the line number on the error', () => {
      try {
        parseSensorRows('\n\nbad');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(RowParseError);
        expect(err instanceof RowParseError && err.line).toBe(3);
      }
    });
  });

  describe('readSensorRowFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'rows-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should read rows from disk', () => {
      const path = join(dir, 'data.csv');
      writeFileSync(path, '2023-01-01 00:00:00,18.0,72.0\n');

      expect(readSensorRowFile(path)).toHaveLength(1);
    });

    it('should throw when the file is missing', () => {
      expect(() => readSensorRowFile(join(dir, 'missing.csv'))).toThrow();
    });
  });
});
