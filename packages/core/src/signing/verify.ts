import fs from 'fs';
import path from 'path';
import { SigningOptionsSchema, SigningPolicySchema } from '@foundry/shared';
import { ExecutionContext } from '../context';
import { DESCRIPTOR_FILENAME, MetadataLoader } from '../config/loader';
import { SigningEngine, VerificationResult } from './engine';
import { resolveSigningProgram } from './resolver';

export interface ArtifactVerification extends VerificationResult {
  artifact: string;
}

/**
 * Checks the detached signatures of already-built artifacts. The descriptor
 * supplies the signer and keyring options when present.
 */
export async function verifyArtifacts(
  ctx: ExecutionContext,
  artifacts: string[],
  descriptorPath?: string,
): Promise<ArtifactVerification[]> {
  const descriptorFile = descriptorPath ?? path.join(ctx.cwd, DESCRIPTOR_FILENAME);
  // An explicit descriptor must exist; the implicit one is optional
  const descriptor =
    descriptorPath !== undefined || fs.existsSync(descriptorFile)
      ? MetadataLoader.loadDescriptor(descriptorFile)
      : undefined;
  const signing = descriptor?.signing ?? SigningPolicySchema.parse(undefined);
  const options = descriptor?.options ?? SigningOptionsSchema.parse(undefined);
  const userConfig = MetadataLoader.loadUserConfig(ctx.homeDir);
  const engine = new SigningEngine(ctx.runner, resolveSigningProgram(signing, userConfig), ctx.logger);

  const results: ArtifactVerification[] = [];
  for (const artifact of artifacts) {
    const resolved = path.resolve(ctx.cwd, artifact);
    const verification = await engine.verify(resolved, options);
    results.push({ artifact: resolved, ...verification });
  }
  return results;
}
