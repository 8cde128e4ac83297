/**
 * Exception classes for the budlink library.
 */

export class BudLinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BudLinkError';
  }
}

/**
 * Failure categories reported by a transport or by the connection layer.
 */
export enum TransportErrorCode {
  Unknown = 'Unknown',
  AdapterUnavailable = 'AdapterUnavailable',
  DeviceNotFound = 'DeviceNotFound',
  PermissionDenied = 'PermissionDenied',
  ConnectFailed = 'ConnectFailed',
  SendFailed = 'SendFailed',
  NotConnected = 'NotConnected',
  Timeout = 'Timeout',
}

export class TransportError extends BudLinkError {
  constructor(
    message: string,
    readonly code: TransportErrorCode = TransportErrorCode.Unknown
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class TimeoutError extends BudLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class ProtocolError extends BudLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export enum FrameDecodeErrorCode {
  TooSmall = 'TooSmall',
  InvalidStartMarker = 'InvalidStartMarker',
  InvalidEndMarker = 'InvalidEndMarker',
  SizeMismatch = 'SizeMismatch',
  ChecksumInvalid = 'ChecksumInvalid',
  IndexOutOfRange = 'IndexOutOfRange',
  /** Header could not be converted; the device likely runs newer firmware. */
  Overflow = 'Overflow',
}

export class FrameDecodeError extends ProtocolError {
  /**
   * @param requiredLength - Bytes the frame header declares, when the failure
   *   was caused by the input ending early
   */
  constructor(
    message: string,
    readonly code: FrameDecodeErrorCode,
    readonly requiredLength?: number
  ) {
    super(message);
    this.name = 'FrameDecodeError';
  }
}

export class InvalidResponseError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidResponseError';
  }
}

export enum FirmwareParseErrorCode {
  InvalidMagic = 'InvalidMagic',
  InternalBuild = 'InternalBuild',
  SizeZero = 'SizeZero',
  NoSegmentsFound = 'NoSegmentsFound',
  Unknown = 'Unknown',
}

export class FirmwareParseError extends BudLinkError {
  constructor(
    message: string,
    readonly code: FirmwareParseErrorCode
  ) {
    super(message);
    this.name = 'FirmwareParseError';
  }
}

export enum FirmwareTransferErrorCode {
  SessionTimeout = 'SessionTimeout',
  ControlTimeout = 'ControlTimeout',
  TransferTimeout = 'TransferTimeout',
  SessionFail = 'SessionFail',
  CopyFail = 'CopyFail',
  VerifyFail = 'VerifyFail',
  IntegrityCheckFail = 'IntegrityCheckFail',
  BatteryTooLow = 'BatteryTooLow',
  DeviceInUse = 'DeviceInUse',
  InvalidBinary = 'InvalidBinary',
  Disconnected = 'Disconnected',
  DeviceBusy = 'DeviceBusy',
  RecoveryFailed = 'RecoveryFailed',
  InProgress = 'InProgress',
  ParseFail = 'ParseFail',
  BluetoothError = 'BluetoothError',
  Unknown = 'Unknown',
}

const TRANSFER_ERROR_MESSAGES: Record<FirmwareTransferErrorCode, string> = {
  [FirmwareTransferErrorCode.SessionTimeout]:
    'The earbuds did not answer the update session request in time.',
  [FirmwareTransferErrorCode.ControlTimeout]:
    'The earbuds did not negotiate the transfer parameters in time.',
  [FirmwareTransferErrorCode.TransferTimeout]:
    'The firmware transfer took too long and was stopped.',
  [FirmwareTransferErrorCode.SessionFail]:
    'The earbuds refused to open an update session.',
  [FirmwareTransferErrorCode.CopyFail]:
    'The earbuds failed to copy the firmware into flash.',
  [FirmwareTransferErrorCode.VerifyFail]:
    'The earbuds rejected the transferred firmware.',
  [FirmwareTransferErrorCode.IntegrityCheckFail]:
    'The firmware file failed its integrity check.',
  [FirmwareTransferErrorCode.BatteryTooLow]:
    'Charge the earbuds before updating the firmware.',
  [FirmwareTransferErrorCode.DeviceInUse]:
    'Stop audio playback and end any call before updating the firmware.',
  [FirmwareTransferErrorCode.InvalidBinary]:
    'The firmware file is empty or too large.',
  [FirmwareTransferErrorCode.Disconnected]:
    'The earbuds disconnected during the firmware update.',
  [FirmwareTransferErrorCode.DeviceBusy]:
    'The earbuds did not report their status in time.',
  [FirmwareTransferErrorCode.RecoveryFailed]:
    'The interrupted firmware update could not be recovered.',
  [FirmwareTransferErrorCode.InProgress]:
    'A firmware update is already in progress.',
  [FirmwareTransferErrorCode.ParseFail]:
    'The firmware file could not be read.',
  [FirmwareTransferErrorCode.BluetoothError]:
    'A Bluetooth error interrupted the firmware update.',
  [FirmwareTransferErrorCode.Unknown]:
    'The firmware update failed for an unknown reason.',
};

/**
 * Get the user-facing message for a transfer error code.
 */
export function describeTransferError(code: FirmwareTransferErrorCode): string {
  return TRANSFER_ERROR_MESSAGES[code];
}

export class FirmwareTransferError extends BudLinkError {
  constructor(
    readonly code: FirmwareTransferErrorCode,
    message: string = describeTransferError(code)
  ) {
    super(message);
    this.name = 'FirmwareTransferError';
  }
}

export class ConfigError extends BudLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
