/**
 * UMA Protocol: version parsing and negotiation.
 *
 * Versions are "major.minor" strings ordered by major, then minor. Peers only
 * need to share a major version; each major maps back to the one canonical
 * minor this implementation speaks for it.
 */

import { UmaError, UmaErrorCode, UnsupportedVersionError } from "./types/errors.js";
import { Err, Ok, type Result } from "./types/result.js";

export const MAJOR_VERSION = 1;
export const MINOR_VERSION = 0;
export const UMA_VERSION_STRING = `${MAJOR_VERSION}.${MINOR_VERSION}`;
export const BACK_COMPAT_VERSIONS: readonly string[] = ["0.3"];

/** A parsed protocol version. */
export interface Version {
  major: number;
  minor: number;
}

/** The versions an implementation speaks. */
export interface VersionConfig {
  /** Current version string, e.g. "1.0". */
  current: string;
  /** One canonical version string per older major still accepted, e.g. ["0.3"]. */
  backCompat: readonly string[];
}

export const DEFAULT_VERSION_CONFIG: VersionConfig = {
  current: UMA_VERSION_STRING,
  backCompat: BACK_COMPAT_VERSIONS,
};

const COMPONENT = /^\d+$/;

/** Parse "major.minor". Any other shape, or a non-numeric component, is INVALID_INPUT. */
export function parseVersion(versionString: string): Result<Version, UmaError> {
  const parts = versionString.split(".");
  if (parts.length !== 2 || !COMPONENT.test(parts[0]) || !COMPONENT.test(parts[1])) {
    return Err(
      new UmaError(UmaErrorCode.INVALID_INPUT, `Invalid version string: ${versionString}`, {
        version: versionString,
      }),
    );
  }
  return Ok({ major: Number(parts[0]), minor: Number(parts[1]) });
}

/** Like {@link parseVersion}, throwing the INVALID_INPUT error. */
export function parseVersionOrThrow(versionString: string): Version {
  const parsed = parseVersion(versionString);
  if (!parsed.ok) throw parsed.error;
  return parsed.value;
}

export function versionToString(version: Version): string {
  return `${version.major}.${version.minor}`;
}

/** Negative, zero or positive as `a` sorts before, equal to, or after `b`. */
export function compareVersions(a: Version, b: Version): number {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1;
  if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1;
  return 0;
}

/** Current major plus every back-compat major. */
export function supportedMajorVersions(config: VersionConfig = DEFAULT_VERSION_CONFIG): Set<number> {
  const majors = new Set<number>([parseVersionOrThrow(config.current).major]);
  for (const v of config.backCompat) {
    majors.add(parseVersionOrThrow(v).major);
  }
  return majors;
}

export function isVersionSupported(
  versionString: string,
  config: VersionConfig = DEFAULT_VERSION_CONFIG,
): boolean {
  const parsed = parseVersion(versionString);
  return parsed.ok && supportedMajorVersions(config).has(parsed.value.major);
}

/** Throw {@link UnsupportedVersionError} unless `versionString` is supported. */
export function assertVersionSupported(
  versionString: string,
  config: VersionConfig = DEFAULT_VERSION_CONFIG,
): void {
  if (!isVersionSupported(versionString, config)) {
    throw new UnsupportedVersionError(versionString, supportedMajorVersions(config));
  }
}

/**
 * Highest version both sides can speak, given the majors the peer offered.
 * @returns the canonical version string for that major, or undefined when
 *   there is no shared major.
 */
export function selectHighestSupportedVersion(
  peerMajorVersions: readonly number[],
  config: VersionConfig = DEFAULT_VERSION_CONFIG,
): string | undefined {
  const ours = supportedMajorVersions(config);
  const shared = peerMajorVersions.filter((major) => ours.has(major));
  if (shared.length === 0) return undefined;
  return versionForMajor(Math.max(...shared), config);
}

function versionForMajor(major: number, config: VersionConfig): string | undefined {
  if (parseVersionOrThrow(config.current).major === major) return config.current;
  return config.backCompat.find((v) => parseVersionOrThrow(v).major === major);
}

/**
 * Version to answer a request with: the smaller of the requested version and
 * the current one, compared as (major, minor) pairs. Major and minor are not
 * minimised independently, so "0.9" against "1.0" answers "0.9".
 */
export function selectResponseVersion(
  requestedVersion: string,
  config: VersionConfig = DEFAULT_VERSION_CONFIG,
): string {
  const requested = parseVersionOrThrow(requestedVersion);
  const current = parseVersionOrThrow(config.current);
  return versionToString(compareVersions(requested, current) <= 0 ? requested : current);
}

/** Major of a version string; used to pick the V0 or V1 layout. */
export function majorVersionOf(versionString: string): number {
  return parseVersionOrThrow(versionString).major;
}

/** True when `versionString` selects the V1 field layout (major >= 1). */
export function usesV1Layout(versionString: string): boolean {
  return majorVersionOf(versionString) >= 1;
}
