import { z } from 'zod';

export const DEFAULT_EXCLUDES = ['node_modules'];

export const DEFAULT_UPLOAD_ARGS = [
  'repo',
  'create',
  '{target}',
  '--source',
  '{path}',
  '--push',
  '--private',
];

export const ScanConfigSchema = z.object({
  root: z.string().min(1).optional().describe('Default root for `show` when no path is given'),
  daysToShow: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Only report repositories with a commit within this many days'),
  exclude: z
    .array(z.string())
    .default(DEFAULT_EXCLUDES)
    .describe('gitignore-style patterns pruned from the walk'),
  maxDepth: z.number().int().min(0).optional(),
  concurrency: z.number().int().min(1).max(64).default(8),
});
export type ScanConfig = z.infer<typeof ScanConfigSchema>;

export const InspectConfigSchema = z.object({
  remoteName: z.string().min(1).default('origin'),
  includeUntracked: z
    .boolean()
    .default(true)
    .describe('Whether untracked files mark a repository as dirty'),
});
export type InspectConfig = z.infer<typeof InspectConfigSchema>;

export const CloneConfigSchema = z.object({
  command: z.string().min(1).default('git'),
  searchRoot: z
    .string()
    .min(1)
    .optional()
    .describe('Look for an existing clone of the same remote under this root first'),
});
export type CloneConfig = z.infer<typeof CloneConfigSchema>;

export const UploadConfigSchema = z
  .object({
    command: z.string().min(1).default('gh'),
    args: z.array(z.string()).default(DEFAULT_UPLOAD_ARGS),
  })
  .refine((data) => data.args.some((arg) => arg.includes('{path}')), {
    message: 'upload.args must reference {path}',
    path: ['args'],
  });
export type UploadConfig = z.infer<typeof UploadConfigSchema>;

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  scan: ScanConfigSchema.default(ScanConfigSchema.parse({})),
  inspect: InspectConfigSchema.default(InspectConfigSchema.parse({})),
  clone: CloneConfigSchema.default(CloneConfigSchema.parse({})),
  upload: UploadConfigSchema.default(UploadConfigSchema.parse({})),
});

export type Config = z.infer<typeof ConfigSchema>;
