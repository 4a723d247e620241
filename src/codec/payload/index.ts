export {
  PAYLOAD_CODECS,
  PAYLOAD_SIZES,
  createSensorData,
  createSignalData,
  decodePayload,
  decodeSensorData,
  decodeSignalData,
  describePayload,
  encodePayload,
  encodeSensorData,
  encodeSignalData
} from './payload';
export type { PayloadCodec } from './payload';
export { SIGNAL_CODES, signalFromCode } from './helpers';
export type { Payload, PayloadKind, PayloadOf, SensorData, Signal, SignalData } from './types';
