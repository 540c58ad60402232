import { z } from 'zod';

export const DEFAULT_BRANCH = 'main';

const CONTROL_CHAR_REGEX = /[\u0000-\u001f\u007f]/;

const optionalSecret = z.string().min(1).optional();

export const RepositoryUrlSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => !value.startsWith('-') && !CONTROL_CHAR_REGEX.test(value), {
    message: 'Repository URL contains invalid characters.',
  });

export const BranchSchema = z
  .string()
  .trim()
  .min(1)
  .max(200)
  .refine((value) => !value.startsWith('-') && !/\s/.test(value) && !value.includes('..'), {
    message: 'Branch name contains invalid characters.',
  })
  .default(DEFAULT_BRANCH);

export const CommitSchema = z
  .string()
  .trim()
  .regex(/^[0-9a-fA-F]{4,64}$/, { message: 'Commit must be a hexadecimal object id.' });

/**
 * Subdirectory inside the repository. Relative, no traversal, trailing slashes dropped.
 */
export const SubdirectorySchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.replace(/\/+$/, ''))
  .refine(
    (value) =>
      value.length > 0 &&
      !value.startsWith('/') &&
      !value.startsWith('-') &&
      !value.includes('\\') &&
      !CONTROL_CHAR_REGEX.test(value) &&
      value.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..'),
    { message: 'Path must be a relative subdirectory without traversal segments.' },
  );

/**
 * Where a plugin's code lives. `commit`, when set, is what gets checked out;
 * `branch` still names the ref the shallow clone starts from.
 */
export const GitSourceSchema = z.object({
  type: z.literal('git').default('git'),
  repoUrl: RepositoryUrlSchema,
  branch: BranchSchema,
  commit: CommitSchema.optional(),
  path: SubdirectorySchema.optional(),
  // Token/PAT, preferred when set
  token: optionalSecret,
  // Username + password (or PAT used as password)
  username: optionalSecret,
  password: optionalSecret,
});

export type GitSourceInput = z.input<typeof GitSourceSchema>;
export type GitSource = Readonly<z.infer<typeof GitSourceSchema>>;

export const ManifestRequestSchema = z.object({
  source: GitSourceSchema,
});

export const DownloadRequestSchema = z.object({
  source: GitSourceSchema,
  outputDir: z.string().trim().min(1),
});

export type DownloadRequest = z.infer<typeof DownloadRequestSchema>;

/**
 * Directory name a source is materialized under: the last segment of the
 * subdirectory, else the repository name without `.git`.
 */
export function getSourceName(source: Pick<GitSource, 'repoUrl' | 'path'>): string {
  if (source.path) {
    const segments = source.path.split('/').filter(Boolean);
    return segments[segments.length - 1] ?? source.path;
  }
  const segments = source.repoUrl.split(/[/:]/).filter(Boolean);
  const repoName = segments[segments.length - 1] ?? source.repoUrl;
  return repoName.replace(/\.git$/, '');
}
