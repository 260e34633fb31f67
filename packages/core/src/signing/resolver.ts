import {
  DEFAULT_SIGNING_PROGRAM,
  ResolutionError,
  SigningPolicy,
  UserConfig,
} from '@foundry/shared';

export interface ResolvedSigning {
  program: string;
  identity: string;
}

/** Per-user program, then the descriptor's, then the default */
export function resolveSigningProgram(policy: SigningPolicy, userConfig: UserConfig = {}): string {
  return userConfig.signing?.program || policy.program || DEFAULT_SIGNING_PROGRAM;
}

/**
 * Determines which program signs and under which identity.
 * Non-empty per-user values override the descriptor.
 */
export function resolveSigning(policy: SigningPolicy, userConfig: UserConfig = {}): ResolvedSigning {
  const identity = userConfig.user?.email || policy.email;
  if (!identity) {
    throw new ResolutionError(
      'No signing identity found: set signing.email in metadata.json or user.email in ~/.foundry/config.yaml',
    );
  }
  return { program: resolveSigningProgram(policy, userConfig), identity };
}
