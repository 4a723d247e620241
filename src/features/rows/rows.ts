/**
 * Sensor row reader
 *
 * Reads comma-separated rows of `timestamp,temperature,humidity` with no
 * header, one reading per line. Blank lines are skipped; any other
 * malformed line fails the whole read with the line number.
 */

import { readFileSync } from 'fs';

import { createSensorData } from '@codec/payload';
import type { SensorData } from '@codec/payload';
import { RowParseError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';
import { parseTimestamp } from '@utils/time';

const FIELD_COUNT = 3;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseDecimal(text: string, field: string, line: number): number {
  if (!DECIMAL_PATTERN.test(text)) {
    throw new RowParseError(line, field + ' is not a number: "' + text + '"');
  }
  const value = Number(text);
  if (!isFiniteNumber(value)) {
    throw new RowParseError(line, field + ' is out of range: "' + text + '"');
  }
  return value;
}

/**
 * Parse sensor rows from text
 *
 * @param text - File contents; LF or CRLF line endings
 * @returns Readings in file order
 * @throws {RowParseError} On a wrong field count, bad timestamp or bad number
 *
 * @example
 * ```typescript
 * parseSensorRows("2023-01-01 00:00:00,18.0,72.0\n");
 * // [{ kind: 'sensor', timestamp: 1672531200000, temperature: 18, humidity: 72 }]
 * ```
 */
export function parseSensorRows(text: string): SensorData[] {
  const readings: SensorData[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = lines[i].trim();
    if (line === '') {
      continue;
    }

    const fields = line.split(',').map(function(field) {
      return field.trim();
    });
    if (fields.length !== FIELD_COUNT) {
      throw new RowParseError(
        lineNumber,
        'expected ' + FIELD_COUNT + ' fields (timestamp, temperature, humidity), got ' + fields.length
      );
    }

    const timestamp = parseTimestamp(fields[0]);
    if (timestamp === null) {
      throw new RowParseError(lineNumber, 'unparseable timestamp "' + fields[0] + '"');
    }

    const temperature = parseDecimal(fields[1], 'temperature', lineNumber);
    const humidity = parseDecimal(fields[2], 'humidity', lineNumber);
    readings.push(createSensorData(timestamp, temperature, humidity));
  }

  return readings;
}

/**
 * Read and parse a sensor row file
 * @param path - UTF-8 text file
 * @throws {RowParseError} On a malformed line
 * @throws {Error} From fs when the file cannot be read
 */
export function readSensorRowFile(path: string): SensorData[] {
  return parseSensorRows(readFileSync(path, 'utf8'));
}
