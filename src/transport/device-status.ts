/**
 * Latest device status reported over the link.
 */

import { TypedEventEmitter } from '../events';
import type { DeviceStatus } from '../models/status';

export interface DeviceStatusEvents {
  statusChanged: [status: DeviceStatus];
}

export class DeviceStatusStore extends TypedEventEmitter<DeviceStatusEvents> {
  private _status: DeviceStatus = { flags: 0 };

  /**
   * Snapshot of the current status.
   */
  get status(): DeviceStatus {
    return { ...this._status };
  }

  /**
   * Merge reported fields into the current status.
   */
  update(status: Partial<DeviceStatus>): void {
    this._status = { ...this._status, ...status };
    this.emit('statusChanged', this.status);
  }

  reset(): void {
    this._status = { flags: 0 };
  }
}
