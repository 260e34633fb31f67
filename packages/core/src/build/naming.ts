import { ConfigError } from '@foundry/shared';

export interface Platform {
  os: string;
  arch: string;
}

export function parsePlatform(targetName: string): Platform {
  const [os, arch, ...rest] = targetName.split('/');
  if (!os || !arch || rest.length > 0) {
    throw new ConfigError(`Invalid build target "${targetName}": expected "<os>/<arch>"`);
  }
  return { os, arch };
}

/** Last path segment of the package identifier */
export function binaryPrefix(packageName: string): string {
  const parts = packageName.split('/').filter(Boolean);
  return parts.length > 0 ? parts[parts.length - 1] : packageName;
}

/**
 * Cross-compiler output name: `<prefix>_<os>_<arch>`.
 * Must match the compiler's own naming exactly.
 */
export function binaryName(packageName: string, targetName: string): string {
  const { os, arch } = parsePlatform(targetName);
  return `${binaryPrefix(packageName)}_${os}_${arch}`;
}
