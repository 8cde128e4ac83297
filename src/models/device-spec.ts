/**
 * Per-model protocol constants.
 */

import { DeviceFeature, DeviceModel } from './enums';

export interface DeviceSpec {
  model: DeviceModel;
  /** Human readable name */
  displayName: string;
  /** Start-of-message marker */
  som: number;
  /** End-of-message marker */
  eom: number;
  /** SPP service UUID used to open the stream */
  serviceUuid: string;
  /** ASCII signature embedded in this model's firmware images */
  firmwareSignature: string;
  features: ReadonlySet<DeviceFeature>;
}

/**
 * Secondary protocol profile used in alternative mode.
 *
 * Alternative mode always uses the packed 16-bit header.
 */
export interface ProtocolProfile {
  som: number;
  eom: number;
  serviceUuid: string;
}

export const LEGACY_SOM = 0xfe;
export const LEGACY_EOM = 0xee;
export const SOM = 0xfd;
export const EOM = 0xdd;

export const LEGACY_SERVICE_UUID = '00001102-0000-1000-8000-00805f9b34fd';
export const SERVICE_UUID = '2e73a4ad-332d-41fc-90e2-16bef06523f2';

export const ALTERNATIVE_PROFILE: ProtocolProfile = {
  som: 0xfc,
  eom: 0xcc,
  serviceUuid: 'f8620674-a1ed-41ab-a8b9-de9ad655729d',
};

const MODERN_FEATURES = [
  DeviceFeature.FragmentedMessages,
  DeviceFeature.FirmwareUpdates,
];

function modernSpec(
  model: DeviceModel,
  displayName: string,
  firmwareSignature: string,
  extra: DeviceFeature[] = []
): DeviceSpec {
  return {
    model,
    displayName,
    som: SOM,
    eom: EOM,
    serviceUuid: SERVICE_UUID,
    firmwareSignature,
    features: new Set([...MODERN_FEATURES, ...extra]),
  };
}

const DEVICE_SPECS: Record<DeviceModel, DeviceSpec> = {
  [DeviceModel.Buds]: {
    model: DeviceModel.Buds,
    displayName: 'Buds',
    som: LEGACY_SOM,
    eom: LEGACY_EOM,
    serviceUuid: LEGACY_SERVICE_UUID,
    firmwareSignature: 'R170',
    features: new Set([DeviceFeature.LegacyHeader]),
  },
  [DeviceModel.BudsPlus]: modernSpec(DeviceModel.BudsPlus, 'Buds+', 'R175'),
  [DeviceModel.BudsLive]: modernSpec(DeviceModel.BudsLive, 'Buds Live', 'R180'),
  [DeviceModel.BudsPro]: modernSpec(DeviceModel.BudsPro, 'Buds Pro', 'R190'),
  [DeviceModel.Buds2]: modernSpec(DeviceModel.Buds2, 'Buds2', 'R177'),
  [DeviceModel.Buds2Pro]: modernSpec(DeviceModel.Buds2Pro, 'Buds2 Pro', 'R510', [
    DeviceFeature.AlternativeProtocol,
  ]),
  [DeviceModel.BudsFe]: modernSpec(DeviceModel.BudsFe, 'Buds FE', 'R400'),
  [DeviceModel.Buds3]: modernSpec(DeviceModel.Buds3, 'Buds3', 'R530', [
    DeviceFeature.AlternativeProtocol,
  ]),
  [DeviceModel.Buds3Pro]: modernSpec(DeviceModel.Buds3Pro, 'Buds3 Pro', 'R630', [
    DeviceFeature.AlternativeProtocol,
  ]),
};

/**
 * Look up the protocol constants of a model.
 */
export function getDeviceSpec(model: DeviceModel): DeviceSpec {
  return DEVICE_SPECS[model];
}

/**
 * Check whether a model supports a feature.
 */
export function supports(spec: DeviceSpec, feature: DeviceFeature): boolean {
  return spec.features.has(feature);
}

/**
 * All device specs in model declaration order.
 */
export function allDeviceSpecs(): DeviceSpec[] {
  return Object.values(DeviceModel).map((model) => DEVICE_SPECS[model]);
}
