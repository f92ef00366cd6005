/**
 * Checks for what a skill declares under `requires`
 */

import { accessSync, constants, statSync } from 'fs';
import { delimiter, isAbsolute, join } from 'path';

export interface MissingRequirements {
  /** Required environment variables that are unset or empty */
  env: string[];
  /** Required executables not found on PATH */
  bins: string[];
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate an executable the way a shell would: absolute paths as given,
 * bare names through each PATH entry in order
 */
export function findExecutable(bin: string, env: Record<string, string | undefined>): string | null {
  if (isAbsolute(bin)) {
    return isExecutableFile(bin) ? bin : null;
  }

  for (const dir of (env.PATH ?? '').split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, bin);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function missingRequirements(
  requires: { env: string[]; bins: string[] },
  env: Record<string, string | undefined>
): MissingRequirements {
  return {
    env: requires.env.filter((variable) => !env[variable]),
    bins: requires.bins.filter((bin) => findExecutable(bin, env) === null),
  };
}

export function hasMissing(missing: MissingRequirements): boolean {
  return missing.env.length > 0 || missing.bins.length > 0;
}
