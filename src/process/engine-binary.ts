/**
 * Engine Binary
 *
 * Locates the engine executable.
 */

import { existsSync } from 'node:fs';
import { delimiter, isAbsolute, join } from 'node:path';
import { LaunchError } from '../shared/errors/index.js';

const EXECUTABLE_NAME = process.platform === 'win32' ? 'phantomjs.exe' : 'phantomjs';

/**
 * Install locations checked after PATH, by platform
 */
export const WELL_KNOWN_ENGINE_PATHS: Record<string, string[]> = {
  linux: ['/usr/local/bin/phantomjs', '/usr/bin/phantomjs', '/opt/phantomjs/bin/phantomjs'],
  darwin: ['/usr/local/bin/phantomjs', '/opt/homebrew/bin/phantomjs'],
  win32: ['C:\\Program Files\\phantomjs\\bin\\phantomjs.exe'],
};

/**
 * Resolve the engine executable.
 *
 * A configured path containing a directory is used as-is if it exists; a bare
 * name is looked up on PATH. Without one, PATH is searched for the default
 * name and then the well-known install locations.
 *
 * @param binPath - Configured executable (option or PHANTOMJS_BIN)
 * @param env - Environment providing PATH
 * @param wellKnown - Install locations tried last
 * @throws LaunchError with BINARY_NOT_FOUND listing every location tried
 */
export function resolveEngineBinary(
  binPath: string | undefined,
  env: Record<string, string | undefined> = process.env,
  wellKnown: string[] = WELL_KNOWN_ENGINE_PATHS[process.platform] ?? []
): string {
  const searched: string[] = [];
  const check = (candidate: string): boolean => {
    searched.push(candidate);
    return existsSync(candidate);
  };

  if (binPath && (isAbsolute(binPath) || binPath.includes('/') || binPath.includes('\\'))) {
    if (check(binPath)) {
      return binPath;
    }
    throw LaunchError.binaryNotFound(searched);
  }

  const name = binPath ?? EXECUTABLE_NAME;
  const pathDirs = (env.PATH ?? '').split(delimiter).filter((dir) => dir !== '');
  for (const dir of pathDirs) {
    const candidate = join(dir, name);
    if (check(candidate)) {
      return candidate;
    }
  }

  if (binPath === undefined) {
    for (const candidate of wellKnown) {
      if (check(candidate)) {
        return candidate;
      }
    }
  }

  throw LaunchError.binaryNotFound(searched);
}
