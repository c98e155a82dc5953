import * as semver from 'semver';

export function isValidVersion(version: string): boolean {
  return semver.valid(version) !== null;
}

/** Empty means "not pinned"; anything else must be a semver version. */
export function isValidPinnedVersion(version: string): boolean {
  return version === '' || isValidVersion(version);
}
