import path from 'path';
import { pathExists } from 'fs-extra';
import {
  FileIOError,
  Logger,
  ResolutionError,
  SigningOptions,
  SilentLogger,
} from '@foundry/shared';
import { CommandRunner, runOrThrow } from '@foundry/exec';

export const SIGNATURE_SUFFIX = '.asc';

export interface VerificationResult {
  ok: boolean;
  error?: string;
}

/** Detached armored signature stored beside the artifact */
export function signatureFile(artifact: string): string {
  return `${artifact}${SIGNATURE_SUFFIX}`;
}

/** Arguments selecting an alternate keyring, empty when none is configured */
export function trustStoreArgs(options: SigningOptions): string[] {
  if (!options.keyring || !options.trustdb) return [];
  return ['--trustdb', options.trustdb, '--no-default-keyring', '--keyring', options.keyring];
}

/**
 * Produces and checks detached signatures by shelling out to a gpg-compatible program.
 */
export class SigningEngine {
  constructor(
    private readonly runner: CommandRunner,
    readonly program: string,
    private readonly logger: Logger = new SilentLogger(),
  ) {}

  async sign(artifact: string, identity: string, options: SigningOptions = {}): Promise<string> {
    if (!identity) {
      throw new ResolutionError(`No signing identity for ${artifact}`);
    }

    await this.logger.debug(`Signing ${artifact} as ${identity}`);
    await runOrThrow(
      this.runner,
      {
        program: this.program,
        args: [...trustStoreArgs(options), '-bau', identity, artifact],
        cwd: path.dirname(artifact),
      },
      `Signing ${path.basename(artifact)}`,
    );

    const signature = signatureFile(artifact);
    if (!(await pathExists(signature))) {
      throw new FileIOError(signature, `Signer reported success but ${signature} was not written`);
    }
    return signature;
  }

  async verify(artifact: string, options: SigningOptions = {}): Promise<VerificationResult> {
    const signature = signatureFile(artifact);
    if (!(await pathExists(signature))) {
      return { ok: false, error: `Signature not found: ${signature}` };
    }

    const result = await this.runner.run({
      program: this.program,
      args: [...trustStoreArgs(options), '--verify', signature],
      cwd: path.dirname(artifact),
    });
    if (result.exitCode !== 0) {
      await this.logger.debug(result.output);
      return {
        ok: false,
        error: `Verification of ${signature} failed with exit code ${result.exitCode}`,
      };
    }
    return { ok: true };
  }
}
