/**
 * Path Definitions
 *
 * Directory structure:
 * ~/.sectionpick/        (or $SECTIONPICK_HOME)
 * └── config.toml        (User configuration)
 *
 * Resolved on every call so the environment override can change at runtime.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const APP_DIR_NAME = '.sectionpick';
export const CONFIG_FILE_NAME = 'config.toml';
export const HOME_ENV_VAR = 'SECTIONPICK_HOME';

/**
 * Application directory: $SECTIONPICK_HOME, or ~/.sectionpick
 */
export function getAppDir(): string {
  const override = process.env[HOME_ENV_VAR];
  return override && override.trim() !== '' ? override : join(homedir(), APP_DIR_NAME);
}

export function getConfigPath(): string {
  return join(getAppDir(), CONFIG_FILE_NAME);
}
