/**
 * On-disk record of an in-flight firmware transfer.
 *
 * Directory layout:
 *   recovery_info.json         metadata of the last started transfer
 *   firmware_<sha256>.bin      copy of the image being installed
 *   backup_info.json           device firmware present before the update
 */

import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { defaultRecoveryDirectory } from '../config';
import { createLogger, errorMessage } from '../logger';
import { DeviceModel } from '../models/enums';
import type { FirmwareBinary } from './binary';

const log = createLogger('recovery');

export const RecoveryRecordSchema = z.object({
  timestamp: z.string().datetime(),
  buildName: z.string().min(1),
  version: z.string(),
  model: z.nativeEnum(DeviceModel).nullable(),
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
  binaryPath: z.string().min(1),
});

export type RecoveryRecord = z.infer<typeof RecoveryRecordSchema>;

export const BackupInfoSchema = z.object({
  timestamp: z.string().datetime(),
  model: z.nativeEnum(DeviceModel),
  version: z.string(),
});

export type BackupInfo = z.infer<typeof BackupInfoSchema>;

export interface SavedRecovery {
  record: RecoveryRecord;
  data: Uint8Array;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Persistence for recovery metadata and image copies.
 */
export class RecoveryStore {
  static readonly RECORD_FILE = 'recovery_info.json';
  static readonly BACKUP_FILE = 'backup_info.json';
  static readonly BINARY_PREFIX = 'firmware_';
  static readonly BINARY_SUFFIX = '.bin';

  constructor(readonly directory: string = defaultRecoveryDirectory()) {}

  private get recordPath(): string {
    return join(this.directory, RecoveryStore.RECORD_FILE);
  }

  /**
   * Persist the image and its metadata before a transfer starts.
   */
  async save(binary: FirmwareBinary): Promise<RecoveryRecord> {
    await mkdir(this.directory, { recursive: true });

    const binaryPath = join(
      this.directory,
      `${RecoveryStore.BINARY_PREFIX}${binary.checksum}${RecoveryStore.BINARY_SUFFIX}`
    );
    await writeFile(binaryPath, binary.data);

    const record: RecoveryRecord = {
      timestamp: new Date().toISOString(),
      buildName: binary.buildName,
      version: binary.version,
      model: binary.detectedModel ?? null,
      checksum: binary.checksum,
      binaryPath,
    };
    await writeFile(this.recordPath, JSON.stringify(record, null, 2), 'utf8');

    log.info('Saved recovery data for %s', binary.buildName);
    return record;
  }

  /**
   * Load the saved record and image.
   *
   * @returns null when nothing is saved, the record is invalid or the image is missing
   */
  async load(): Promise<SavedRecovery | null> {
    let raw: string;
    try {
      raw = await readFile(this.recordPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log.warn('Recovery record is not valid JSON: %s', errorMessage(error));
      return null;
    }

    const parsed = RecoveryRecordSchema.safeParse(json);
    if (!parsed.success) {
      log.warn('Recovery record is invalid: %s', parsed.error.message);
      return null;
    }

    try {
      const data = await readFile(parsed.data.binaryPath);
      return { record: parsed.data, data: new Uint8Array(data) };
    } catch (error) {
      if (isMissingFile(error)) {
        log.warn('Recovery image %s is missing', parsed.data.binaryPath);
        return null;
      }
      throw error;
    }
  }

  async hasRecord(): Promise<boolean> {
    try {
      await stat(this.recordPath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Delete the record and every saved image.
   */
  async clear(): Promise<void> {
    await rm(this.recordPath, { force: true });

    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }

    const images = entries.filter(
      (name) =>
        name.startsWith(RecoveryStore.BINARY_PREFIX) && name.endsWith(RecoveryStore.BINARY_SUFFIX)
    );
    await Promise.all(images.map((name) => rm(join(this.directory, name), { force: true })));
    log.info('Cleared recovery data (%d images)', images.length);
  }

  /**
   * Record the firmware installed before an update.
   */
  async writeBackupInfo(model: DeviceModel, version: string): Promise<BackupInfo> {
    await mkdir(this.directory, { recursive: true });
    const info: BackupInfo = { timestamp: new Date().toISOString(), model, version };
    await writeFile(
      join(this.directory, RecoveryStore.BACKUP_FILE),
      JSON.stringify(info, null, 2),
      'utf8'
    );
    return info;
  }

  /**
   * Last backup info, or null when none is saved or it is invalid.
   */
  async readBackupInfo(): Promise<BackupInfo | null> {
    try {
      const raw = await readFile(join(this.directory, RecoveryStore.BACKUP_FILE), 'utf8');
      const parsed = BackupInfoSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      if (isMissingFile(error) || error instanceof SyntaxError) {
        return null;
      }
      throw error;
    }
  }
}
