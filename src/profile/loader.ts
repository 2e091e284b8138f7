import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { ProfileValidationError, validateProfile } from './schema.js';
import type { InstrumentProfile, ProfileValidationResult } from './types.js';

export type ProfileLoadResult =
  | {
      readonly kind: 'success';
      readonly profile: InstrumentProfile;
      readonly issues: ProfileValidationResult['issues'];
      readonly sourceName?: string;
    }
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: ProfileValidationError['issues'] | undefined;
      readonly sourceName?: string;
    };

export function loadProfileFromJson(json: string, sourceName?: string): ProfileLoadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse JSON profile',
      issues: undefined,
      sourceName,
    };
  }

  try {
    const { profile, issues } = validateProfile(parsed);
    return { kind: 'success', profile, issues, sourceName };
  } catch (error) {
    if (error instanceof ProfileValidationError) {
      return {
        kind: 'error',
        message: error.message,
        issues: error.issues,
        sourceName,
      };
    }
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Unknown profile validation error',
      issues: undefined,
      sourceName,
    };
  }
}

export async function loadProfileFromPath(path: string): Promise<ProfileLoadResult> {
  const json = await readFile(resolve(process.cwd(), path), 'utf8');
  return loadProfileFromJson(json, path);
}
