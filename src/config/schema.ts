import { z } from 'zod';

const stringList = z
  .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
  .transform((v) => (typeof v === 'string' ? [v] : v));

export const EnvironmentSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[^/\\\0]+$/, 'must be usable as a single directory name')
    .refine((n) => n !== '.' && n !== '..', 'must be usable as a single directory name'),
  patterns: stringList,
  trigger: stringList,
});

export const HotdropConfigSchema = z
  .object({
    hotFolderName: z.string().min(1).default('hot'),
    outputFolderName: z.string().min(1).default('out'),
    batchDelaySeconds: z.number().positive().default(5),
    cleanInputs: z.boolean().default(false),
    pendingBatchesOnExit: z.enum(['flush', 'drop']).default('flush'),
    initialScan: z.boolean().default(true),
    environments: z.array(EnvironmentSchema).min(1),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.environments.forEach((env, i) => {
      if (seen.has(env.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['environments', i, 'name'],
          message: `duplicate environment name '${env.name}'`,
        });
      }
      seen.add(env.name);
    });
    if (config.hotFolderName === config.outputFolderName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['outputFolderName'],
        message: 'must differ from hotFolderName',
      });
    }
  });

export type EnvironmentConfig = z.infer<typeof EnvironmentSchema>;
export type HotdropConfig = z.infer<typeof HotdropConfigSchema>;
export type PendingBatchPolicy = HotdropConfig['pendingBatchesOnExit'];
