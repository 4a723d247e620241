export { parseSensorRows, readSensorRowFile } from './rows';
