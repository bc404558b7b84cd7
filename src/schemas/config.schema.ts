import { z } from 'zod';

/** What happens to the artifacts of a `create` that fails midway */
export const createFailurePolicySchema = z.enum(['keep', 'rollback']);

export const filesystemSchema = z.enum(['ext4', 'ext3', 'ext2', 'xfs', 'btrfs']);

export const cofferConfigSchema = z.object({
  paths: z
    .object({
      /** Root of the key store (<keysDir>/<name>/{priv,pub}) */
      keysDir: z.string().min(1).optional(),
      /** Directory holding container files */
      containerRoot: z.string().min(1).optional(),
      /** Directory under which containers are mounted */
      mountRoot: z.string().min(1).optional(),
      /** Append-only operation log */
      logFile: z.string().min(1).optional(),
    })
    .default({}),

  container: z
    .object({
      /** Suffix of container files in containerRoot */
      suffix: z
        .string()
        .regex(/^\.[A-Za-z0-9]+$/, 'suffix must look like ".img"')
        .default('.img'),
      /** Filesystem applied to a freshly opened container */
      filesystem: filesystemSchema.default('ext4'),
    })
    .default({}),

  keys: z
    .object({
      /** RSA modulus length for container and master key pairs */
      bits: z.number().int().min(2048).max(8192).default(2048),
    })
    .default({}),

  create: z
    .object({
      onFailure: createFailurePolicySchema.default('keep'),
    })
    .default({}),

  privilege: z
    .object({
      /** Prefix block-device and mount commands with sudo */
      sudo: z.boolean().default(true),
    })
    .default({}),

  ui: z
    .object({
      colors: z.boolean().default(true),
      verbose: z.boolean().default(false),
    })
    .default({}),
});

export type CofferConfigInput = z.input<typeof cofferConfigSchema>;
export type CofferConfigOutput = z.output<typeof cofferConfigSchema>;
export type CreateFailurePolicy = z.infer<typeof createFailurePolicySchema>;
export type Filesystem = z.infer<typeof filesystemSchema>;

/** Configuration with every path resolved to an absolute location */
export type ResolvedConfig = Omit<CofferConfigOutput, 'paths'> & {
  paths: Required<CofferConfigOutput['paths']>;
};
