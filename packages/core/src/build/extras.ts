import { promises as fs } from 'fs';
import path from 'path';
import {
  ConfigError,
  FileIOError,
  Logger,
  PackageDescriptor,
  SilentLogger,
  atomicWrite,
} from '@foundry/shared';

export const EXECUTABLE_MODE = 0o755;
export const REGULAR_MODE = 0o644;

const PLACEHOLDER = /\{\{\s*\.(\w+)\s*\}\}/g;

export interface ExtrasLayout {
  /** Checked-out package holding the templates */
  sourceDir: string;
  /** Directory receiving rendered artifacts */
  outputDir: string;
}

/**
 * Substitutes `{{.Package}}`, `{{.Version}}` and `{{.Description}}`.
 * Any other placeholder is rejected.
 */
export function renderTemplate(template: string, descriptor: PackageDescriptor): string {
  const values: Record<string, string> = {
    Package: descriptor.package,
    Version: descriptor.version,
    Description: descriptor.description,
  };
  return template.replace(PLACEHOLDER, (match: string, key: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, key)) {
      throw new ConfigError(`Unknown template placeholder ${match}`);
    }
    return values[key];
  });
}

export class ExtrasGenerator {
  constructor(private readonly logger: Logger = new SilentLogger()) {}

  async generate(descriptor: PackageDescriptor, layout: ExtrasLayout): Promise<string[]> {
    const written: string[] = [];

    for (const extra of descriptor.buildInfo.extras) {
      const templatePath = path.join(layout.sourceDir, extra.template);
      const outputPath = path.join(layout.outputDir, extra.fileName);

      let template: string;
      try {
        template = await fs.readFile(templatePath, 'utf-8');
      } catch (error: unknown) {
        throw new FileIOError(templatePath, `Failed to read template ${extra.template}`, {
          cause: error,
        });
      }

      const rendered = renderTemplate(template, descriptor);
      const mode = extra.executable ? EXECUTABLE_MODE : REGULAR_MODE;
      try {
        await atomicWrite(outputPath, rendered, { mode });
      } catch (error: unknown) {
        throw new FileIOError(outputPath, `Failed to write ${extra.fileName}`, { cause: error });
      }

      await this.logger.debug(`Rendered ${extra.template} -> ${outputPath} (${mode.toString(8)})`);
      written.push(outputPath);
    }

    return written;
  }
}
