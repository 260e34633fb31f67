import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import {
  ConfigError,
  MissingFieldError,
  PackageDescriptor,
  PackageDescriptorSchema,
  ParseError,
  UserConfig,
  UserConfigSchema,
  formatIssues,
} from '@foundry/shared';

/** Fixed descriptor name, read from the caller's working directory */
export const DESCRIPTOR_FILENAME = 'metadata.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MetadataLoader {
  static userConfigPath(homeDir: string): string {
    return path.join(homeDir, '.foundry', 'config.yaml');
  }

  /**
   * Parses a structured text file. `.json` files are read as strict JSON,
   * everything else as YAML.
   */
  static parseDocument(filePath: string, content: string): unknown {
    if (path.extname(filePath) === '.json') {
      try {
        return JSON.parse(content);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ParseError(`Error parsing JSON file: ${filePath}\n${message}`, { cause: error });
      }
    }
    try {
      return yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ParseError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static loadDescriptor(filePath: string): PackageDescriptor {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Descriptor not found: ${filePath}`);
    }
    const raw = this.parseDocument(filePath, fs.readFileSync(filePath, 'utf8'));
    if (!isRecord(raw)) {
      throw new ParseError(`Descriptor must be a mapping: ${filePath}`);
    }

    const pkg = raw.package;
    if (pkg === undefined || pkg === null || (typeof pkg === 'string' && pkg.trim() === '')) {
      throw new MissingFieldError('package', `Descriptor ${filePath} is missing required field "package"`);
    }

    const result = PackageDescriptorSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Descriptor validation failed: ${filePath}\n${formatIssues(result.error)}`);
    }
    return result.data;
  }

  /**
   * Reads the per-user override file. A missing or empty file is an empty config.
   */
  static loadUserConfig(homeDir: string): UserConfig {
    const filePath = this.userConfigPath(homeDir);
    if (!fs.existsSync(filePath)) {
      return {};
    }
    const raw = this.parseDocument(filePath, fs.readFileSync(filePath, 'utf8'));
    if (raw === undefined || raw === null) {
      return {};
    }
    if (!isRecord(raw)) {
      throw new ParseError(`User config must be a mapping: ${filePath}`);
    }

    const result = UserConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`User config validation failed: ${filePath}\n${formatIssues(result.error)}`);
    }
    return result.data;
  }
}
