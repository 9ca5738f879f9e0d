import {
  ConfigurationError,
  ErrorCode,
  type RunOptions,
} from '@fiducial-bench/core';

export type SpeedProfileId = 'fast' | 'balanced' | 'accurate';

export const SPEED_PROFILES: Record<SpeedProfileId, RunOptions> = {
  fast: { decimate: 2, blur: 0, refineEdges: false },
  balanced: { decimate: 1, refineEdges: true },
  accurate: {
    decimate: 1,
    blur: 0.8,
    refineEdges: true,
    refineDecode: true,
    refinePose: true,
  },
};

export function parseSpeedProfile(raw: unknown): SpeedProfileId | undefined {
  if (raw === undefined || raw === null || raw === '') {
    return undefined;
  }
  const value = String(raw).toLowerCase();
  if (value === 'fast' || value === 'balanced' || value === 'accurate') {
    return value;
  }
  throw new ConfigurationError({
    message: `Invalid --profile value "${String(
      raw
    )}". Expected one of: fast, balanced, accurate.`,
    errorCode: ErrorCode.INVALID_OPTION,
    context: { option: '--profile', value: raw },
  });
}

/**
 * Layer a speed profile between the config file and explicit flags.
 *
 * Rules:
 * - profile values override the config file (`base`)
 * - explicit flags always take precedence over the profile; `explicit`
 *   must only carry the flags the user actually gave
 */
export function applySpeedProfile(
  base: RunOptions,
  rawProfile: unknown,
  explicit: RunOptions = {}
): RunOptions {
  const profile = parseSpeedProfile(rawProfile);
  const layered: RunOptions = profile
    ? { ...base, ...SPEED_PROFILES[profile] }
    : { ...base };
  return { ...layered, ...explicit };
}
