import { ConfigError, Logger, PackageDescriptor, SilentLogger } from '@foundry/shared';
import { CommandRunner, runOrThrow } from '@foundry/exec';

/**
 * Ships finished artifacts somewhere. Returns the files it published.
 */
export interface Publisher {
  publish(files: string[], descriptor: PackageDescriptor, outputDir: string): Promise<string[]>;
}

/**
 * Hands the artifacts to the program named in the descriptor's `publishing` section.
 */
export class CommandPublisher implements Publisher {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger = new SilentLogger(),
  ) {}

  async publish(files: string[], descriptor: PackageDescriptor, outputDir: string): Promise<string[]> {
    const publishing = descriptor.publishing;
    if (!publishing) {
      throw new ConfigError(`No publishing section in the descriptor for ${descriptor.package}`);
    }
    if (files.length === 0) {
      await this.logger.warn('Nothing to publish');
      return [];
    }

    await this.logger.info(`Publishing ${files.length} file(s) with ${publishing.program}`);
    const result = await runOrThrow(
      this.runner,
      { program: publishing.program, args: [...publishing.args, ...files], cwd: outputDir },
      'Publishing',
    );
    if (result.output) await this.logger.debug(result.output);
    return [...files];
  }
}
