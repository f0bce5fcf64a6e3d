import * as os from 'os';
import * as path from 'path';

/**
 * Where the monitored application keeps its data and logs, and where the watchdog may
 * write its own logs, per platform. Every value can be overridden from the environment.
 */
export interface HostPlatform {
  readonly platform: NodeJS.Platform;
  readonly tmpdir: string;
  readonly homedir: string;
  readonly cwd: string;
}

export function currentHost(): HostPlatform {
  return { platform: process.platform, tmpdir: os.tmpdir(), homedir: os.homedir(), cwd: process.cwd() };
}

const WINDOWS_APP_ROOT = 'C:\\ProgramData\\Physio-Control\\MobileTouch';

export function defaultAppRoot(host: HostPlatform): string {
  return host.platform === 'win32' ? WINDOWS_APP_ROOT : path.join(host.cwd, 'MobileTouch');
}

export function defaultLogFiles(host: HostPlatform): readonly string[] {
  if (host.platform === 'win32') {
    return [path.win32.join(WINDOWS_APP_ROOT, 'logging', 'mobiletouch.log')];
  }
  return [path.join(host.cwd, 'mobiletouch.log')];
}

/**
 * Ranked candidate directories for the watchdog's own logs.
 * Explicit directories come first; the temp directory is always tried before the
 * machine-wide fallbacks.
 */
export function defaultLogCandidates(host: HostPlatform, explicit: readonly string[] = []): readonly string[] {
  const fallbacks =
    host.platform === 'win32'
      ? [path.win32.join('C:\\Logs', 'repairwatch'), path.win32.join('C:\\Windows\\Temp', 'repairwatch')]
      : [path.join(host.homedir, '.repairwatch', 'logs')];

  const ranked = [...explicit, path.join(host.tmpdir, 'repairwatch'), ...fallbacks];
  return ranked.filter((dir, index) => ranked.indexOf(dir) === index);
}
