/**
 * Enums shared across the protocol, transport and firmware layers.
 */

/**
 * Frame direction flag.
 */
export enum MessageType {
  Request = 0,
  Response = 1,
}

/**
 * Supported earbud models.
 *
 * Declaration order matters: firmware model detection returns the first
 * model whose signature occurs in an image.
 */
export enum DeviceModel {
  Buds = 'Buds',
  BudsPlus = 'BudsPlus',
  BudsLive = 'BudsLive',
  BudsPro = 'BudsPro',
  Buds2 = 'Buds2',
  Buds2Pro = 'Buds2Pro',
  BudsFe = 'BudsFe',
  Buds3 = 'Buds3',
  Buds3Pro = 'Buds3Pro',
}

/**
 * Optional capabilities a model may have.
 */
export enum DeviceFeature {
  /** 1-byte type + 1-byte size header instead of the packed 16-bit header */
  LegacyHeader = 'LegacyHeader',
  FragmentedMessages = 'FragmentedMessages',
  FirmwareUpdates = 'FirmwareUpdates',
  AlternativeProtocol = 'AlternativeProtocol',
}

/**
 * Status flag bits reported in STATUS_UPDATED.
 */
export enum DeviceStatusFlag {
  AudioPlaying = 0x01,
  CallActive = 0x02,
  FirmwareUpdateInProgress = 0x04,
}

/**
 * Transport connection lifecycle.
 */
export enum ConnectionState {
  Disconnected = 'Disconnected',
  Connecting = 'Connecting',
  Connected = 'Connected',
  Disconnecting = 'Disconnecting',
  Error = 'Error',
  Reconnecting = 'Reconnecting',
}

/**
 * Firmware transfer phases.
 */
export enum TransferState {
  Ready = 'Ready',
  PreparingUpdate = 'PreparingUpdate',
  VerifyingFirmware = 'VerifyingFirmware',
  CheckingDeviceHealth = 'CheckingDeviceHealth',
  BackingUpFirmware = 'BackingUpFirmware',
  InitializingSession = 'InitializingSession',
  Uploading = 'Uploading',
  VerifyingUpdate = 'VerifyingUpdate',
  Finalizing = 'Finalizing',
  RecoveryMode = 'RecoveryMode',
}

/**
 * Control block identifiers in FOTA_CONTROL.
 */
export enum ControlId {
  SendMtu = 0x00,
  ReadyToDownload = 0x01,
}

/**
 * Update identifiers in FOTA_UPDATE.
 */
export enum UpdateId {
  Percent = 0x00,
  StateChange = 0x01,
}

/**
 * Diagnostic event categories.
 */
export enum DiagnosticEventType {
  ConnectionAttempt = 'ConnectionAttempt',
  ConnectionSuccess = 'ConnectionSuccess',
  ConnectionFailure = 'ConnectionFailure',
  Disconnection = 'Disconnection',
  TransportError = 'TransportError',
  MessageSent = 'MessageSent',
  MessageReceived = 'MessageReceived',
  InvalidMessage = 'InvalidMessage',
  SendFailure = 'SendFailure',
  HeartbeatSuccess = 'HeartbeatSuccess',
  HeartbeatMissed = 'HeartbeatMissed',
  ConnectionDead = 'ConnectionDead',
}
