/**
 * Best-effort version and build date extraction from firmware build names.
 */

import type { FirmwareVersionInfo } from '../models/firmware';

export const UNKNOWN_VERSION = 'Unknown';

const LETTERCODE_OFFSET = 8;
const LETTERCODE_LENGTH = 12;
const FIRST_YEAR = 2001; // year letter 'A'

function isLetter(char: string): boolean {
  return char >= 'A' && char <= 'Z';
}

/**
 * `R175XXU0AUA1` style build names.
 *
 * Characters from offset 8: [revision][year letter][month letter A-L][build].
 * Gives version "A.U.A1" and build date 2021-01-01.
 */
function fromLettercode(buildName: string): FirmwareVersionInfo | null {
  if (buildName.length < LETTERCODE_LENGTH) {
    return null;
  }

  const revision = buildName[LETTERCODE_OFFSET];
  const year = buildName[LETTERCODE_OFFSET + 1];
  const month = buildName[LETTERCODE_OFFSET + 2];
  const build = buildName[LETTERCODE_OFFSET + 3];

  if (!isLetter(revision) || !isLetter(year) || !(month >= 'A' && month <= 'L')) {
    return null;
  }
  if (!/^[0-9A-Z]$/.test(build)) {
    return null;
  }

  const yearValue = FIRST_YEAR + year.charCodeAt(0) - 'A'.charCodeAt(0);
  const monthIndex = month.charCodeAt(0) - 'A'.charCodeAt(0);

  return {
    version: `${revision}.${year}.${month}${build}`,
    buildDate: new Date(Date.UTC(yearValue, monthIndex, 1)),
  };
}

/**
 * `R175_200720` style build names: an underscore followed by YYMMDD.
 */
function fromUnderscoreDate(buildName: string): FirmwareVersionInfo | null {
  const match = /_(\d{2})(\d{2})(\d{2})(?!\d)/.exec(buildName);
  if (!match) {
    return null;
  }

  const [, yy, mm, dd] = match;
  const year = 2000 + Number(yy);
  const month = Number(mm);
  const day = Number(dd);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return { version: `${yy}${mm}${dd}`, buildDate: date };
}

/**
 * Plain dotted numeric versions such as `1.2.3`.
 */
function fromDottedNumber(buildName: string): FirmwareVersionInfo | null {
  const match = /(?:^|[^\d.])(\d+(?:\.\d+)+)(?![\d.])/.exec(buildName);
  return match ? { version: match[1] } : null;
}

/**
 * Extract version information from a build name.
 *
 * Never throws; unrecognized names give version "Unknown" and no date.
 */
export function extractVersionInfo(buildName: string): FirmwareVersionInfo {
  const normalized = buildName.trim().toUpperCase();
  return (
    fromLettercode(normalized) ??
    fromUnderscoreDate(normalized) ??
    fromDottedNumber(normalized) ?? { version: UNKNOWN_VERSION }
  );
}

/**
 * Version string usable with {@link compareFirmwareVersions}, or undefined
 * when none can be derived.
 */
export function comparableVersion(buildName: string | undefined): string | undefined {
  if (buildName === undefined) {
    return undefined;
  }
  const { version } = extractVersionInfo(buildName);
  return version === UNKNOWN_VERSION ? undefined : version;
}

/**
 * Compare two version strings.
 *
 * Digit runs compare numerically, letter runs lexically; a version that is a
 * prefix of another is lower.
 *
 * @returns negative if a < b, zero if equal, positive if a > b
 */
export function compareFirmwareVersions(a: string, b: string): number {
  const left = tokenize(a);
  const right = tokenize(b);

  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    if (i >= left.length) {
      return -1;
    }
    if (i >= right.length) {
      return 1;
    }

    const l = left[i];
    const r = right[i];
    const bothNumeric = /^\d/.test(l) && /^\d/.test(r);

    if (bothNumeric) {
      const diff = Number(l) - Number(r);
      if (diff !== 0) {
        return diff < 0 ? -1 : 1;
      }
    } else if (l !== r) {
      return l < r ? -1 : 1;
    }
  }

  return 0;
}

function tokenize(version: string): string[] {
  return version.toUpperCase().match(/\d+|[A-Z]+/g) ?? [];
}
