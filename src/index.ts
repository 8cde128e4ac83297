/**
 * budlink - TypeScript library for Bluetooth earbuds over SPP
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { EarbudsDevice } from './device';
export type { EarbudsDeviceOptions, InstallOptions } from './device';

// Transport
export { DeviceConnection } from './transport/connection';
export type { ConnectionEvents, ConnectOptions } from './transport/connection';
export { ConnectionStateManager } from './transport/connection-state';
export { ConnectionDiagnostics } from './transport/diagnostics';
export type { DiagnosticEvent, DiagnosticsEvents } from './transport/diagnostics';
export { DeviceStatusStore } from './transport/device-status';
export type { Transport, TransportEvents } from './transport/transport';

// Firmware
export * from './firmware/binary';
export * from './firmware/integrity';
export * from './firmware/version';
export { FirmwareTransferManager } from './firmware/transfer';
export type { TransferDependencies, TransferEvents } from './firmware/transfer';
export { RecoveryManager } from './firmware/recovery';
export * from './firmware/recovery-store';

// Protocol, models and configuration
export * from './protocol';
export * from './models';
export * from './config';

// Exceptions
export * from './exceptions';

export { TypedEventEmitter } from './events';
export type { EventMap } from './events';
