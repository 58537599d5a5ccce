/**
 * XDG Base Directory compliant paths for termbars.
 *
 * - Config: ~/.config/termbars/ (or $XDG_CONFIG_HOME/termbars/)
 * - State: ~/.local/state/termbars/ (or $XDG_STATE_HOME/termbars/), log files
 * - Project: .termbars/ in the working directory
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_NAME = 'termbars';

/**
 * Uses $XDG_CONFIG_HOME if set, otherwise ~/.config/termbars/
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_NAME) : join(homedir(), '.config', APP_NAME);
}

/**
 * Uses $XDG_STATE_HOME if set, otherwise ~/.local/state/termbars/
 */
export function getStateDir(): string {
  const xdg = process.env.XDG_STATE_HOME;
  return xdg ? join(xdg, APP_NAME) : join(homedir(), '.local', 'state', APP_NAME);
}

/**
 * Project-specific directory, always `.termbars/` under `cwd`.
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_NAME}`);
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

export function getDefaultLogPath(): string {
  return join(getStateDir(), 'termbars.log');
}
