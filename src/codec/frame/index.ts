export { FRAME_SIZES, createFrame, decodeFrame, encodeFrame, frameSize } from './frame';
export {
  ADDRESS_LENGTH,
  CHECKSUM_LENGTH,
  DEFAULT_ACTUATOR_ADDRESS,
  DEFAULT_DESTINATION_ADDRESS,
  DEFAULT_SOURCE_ADDRESS,
  HEADER_SIZE,
  calculateChecksum,
  checksumToString,
  isValidAddress,
  validateAddress
} from './helpers';
export type { Frame, FrameOptions, SensorFrame, SignalFrame } from './types';
