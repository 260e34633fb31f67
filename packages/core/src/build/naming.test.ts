import { describe, it, expect } from 'vitest';
import { ConfigError } from '@foundry/shared';
import { binaryName, binaryPrefix, parsePlatform } from './naming';

describe('naming', () => {
  it('uses the last package segment as prefix', () => {
    expect(binaryPrefix('acme/widget')).toBe('widget');
    expect(binaryPrefix('github.com/acme/widget/')).toBe('widget');
    expect(binaryPrefix('widget')).toBe('widget');
  });

  it('builds <prefix>_<os>_<arch> names', () => {
    expect(binaryName('acme/widget', 'linux/amd64')).toBe('widget_linux_amd64');
    expect(binaryName('github.com/acme/widget', 'darwin/arm64')).toBe('widget_darwin_arm64');
  });

  it('splits platform strings', () => {
    expect(parsePlatform('windows/386')).toEqual({ os: 'windows', arch: '386' });
  });

  it('rejects malformed platform strings', () => {
    expect(() => parsePlatform('linux')).toThrow(ConfigError);
    expect(() => parsePlatform('linux/amd64/v3')).toThrow(ConfigError);
    expect(() => parsePlatform('/amd64')).toThrow(ConfigError);
  });
});
