import { z } from 'zod';

/** Default program used to produce detached signatures */
export const DEFAULT_SIGNING_PROGRAM = 'gpg';

export const BuildTargetSchema = z.object({
  name: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, 'target name must be an "<os>/<arch>" pair'),
  cgo: z.boolean().default(false),
  flags: z.record(z.string(), z.string()).default({}),
});
export type BuildTarget = z.infer<typeof BuildTargetSchema>;

export const ExtraArtifactSchema = z.object({
  template: z.string().min(1),
  fileName: z.string().min(1),
  executable: z.boolean().default(false),
});
export type ExtraArtifact = z.infer<typeof ExtraArtifactSchema>;

export const BuildInfoSchema = z
  .object({
    targets: z.array(BuildTargetSchema).default([]),
    extras: z.array(ExtraArtifactSchema).default([]),
  })
  .default({ targets: [], extras: [] });
export type BuildInfo = z.infer<typeof BuildInfoSchema>;

export const SigningPolicySchema = z
  .object({
    program: z.string().default(''),
    email: z.string().default(''),
  })
  .default({ program: '', email: '' });
export type SigningPolicy = z.infer<typeof SigningPolicySchema>;

export const PublishingSchema = z.object({
  program: z.string().min(1),
  args: z.array(z.string()).default([]),
});
export type Publishing = z.infer<typeof PublishingSchema>;

/**
 * Alternate trust store for the signer, used by test suites.
 * Both halves must be given together.
 */
export const SigningOptionsSchema = z
  .object({
    keyring: z.string().min(1).optional(),
    trustdb: z.string().min(1).optional(),
  })
  .default({})
  .refine((data) => (data.keyring === undefined) === (data.trustdb === undefined), {
    message: 'keyring and trustdb must be set together',
    path: ['keyring'],
  });
export type SigningOptions = z.infer<typeof SigningOptionsSchema>;

export const PackageDescriptorSchema = z.object({
  version: z.string().default(''),
  package: z.string().min(1),
  description: z.string().default(''),
  buildInfo: BuildInfoSchema,
  signing: SigningPolicySchema,
  publishing: PublishingSchema.optional(),
  options: SigningOptionsSchema,
});
export type PackageDescriptor = z.infer<typeof PackageDescriptorSchema>;

/**
 * Per-operator overrides read from outside the package tree.
 */
export const UserConfigSchema = z.object({
  user: z
    .object({
      email: z.string().optional(),
    })
    .optional(),
  signing: z
    .object({
      program: z.string().optional(),
    })
    .optional(),
});
export type UserConfig = z.infer<typeof UserConfigSchema>;
