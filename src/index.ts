export * from './codec';
export * from './constants';
export * from './errors';
export { AutoReader, type AutoReadHandlers, type AutoReadOptions } from './auto-reader';
export * from './schema';
export { ConnectionManager, type ClientFactory } from './connection-manager';
export { DeviceManager, type Device } from './device-manager';
export { isController, isMeter, probe, withDevice, type DeviceKind } from './discovery';
export { FlowController, isControlPoint, type ControllerState, type PidSettings, type PidValues } from './flow-controller';
export { FlowMeter, type FlowMeterOptions } from './flow-meter';
export { createLogger, type Logger } from './logger';
export { Client, createClient, SerialClient, TcpClient, type ClientOptions, type SerialOptions, type TransportOptions } from './transport';
export { parseEndpoint, type Endpoint } from './utils';
