export type { DecodeResult } from './common';
export type { IotUserConfig, IotAppConstants, IotConfig } from './config';
export * from './errors';
