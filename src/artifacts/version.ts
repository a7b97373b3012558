import { ArtifactError } from "./errors.js";

export const INITIAL_VERSION = "1.0.0";

export interface SemVer {
  major: number;
  minor: number;
  patch: number;
}

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export function isVersionString(value: string): boolean {
  return VERSION_PATTERN.test(value);
}

/**
 * @throws ArtifactError INVALID_VERSION unless `value` is MAJOR.MINOR.PATCH
 */
export function parseVersion(value: string): SemVer {
  const match = VERSION_PATTERN.exec(value);
  if (!match) {
    throw new ArtifactError(
      "INVALID_VERSION",
      `Invalid version "${value}": expected MAJOR.MINOR.PATCH`,
    );
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

export function formatVersion(v: SemVer): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

/** "1.0.4" -> "1.0.5". MAJOR and MINOR bumps are left to callers. */
export function bumpPatch(value: string): string {
  const v = parseVersion(value);
  return formatVersion({ ...v, patch: v.patch + 1 });
}

export function compareVersions(a: string, b: string): number {
  const va = parseVersion(a);
  const vb = parseVersion(b);
  return va.major - vb.major || va.minor - vb.minor || va.patch - vb.patch;
}
