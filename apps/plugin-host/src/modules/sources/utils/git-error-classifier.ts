export type GitFailureCategory =
  | 'authentication_failure'
  | 'repository_not_found'
  | 'network_unreachable'
  | 'unknown';

export interface GitErrorClassification {
  category: GitFailureCategory;
  /** The text as received, not case-folded. */
  rawText: string;
}

const AUTHENTICATION_PATTERNS = [
  'authentication',
  'could not read username',
  'invalid credentials',
  'permission denied',
  'access denied',
] as const;

const NETWORK_PATTERNS = ['could not resolve host'] as const;

// "unable to access" also prefixes DNS failures, so network patterns are checked first
const NOT_FOUND_PATTERNS = [
  'not found',
  'does not exist',
  '404',
  'unable to access',
  'no such repository',
] as const;

const RULES: ReadonlyArray<{ category: GitFailureCategory; patterns: readonly string[] }> = [
  { category: 'authentication_failure', patterns: AUTHENTICATION_PATTERNS },
  { category: 'network_unreachable', patterns: NETWORK_PATTERNS },
  { category: 'repository_not_found', patterns: NOT_FOUND_PATTERNS },
];

export function classifyGitError(rawText: string): GitErrorClassification {
  const folded = rawText.toLowerCase();
  const rule = RULES.find(({ patterns }) => patterns.some((pattern) => folded.includes(pattern)));
  return { category: rule?.category ?? 'unknown', rawText };
}

/** Joins the streams of a failed git command the way they are classified. */
export function gitErrorText(stderr?: string, stdout?: string): string {
  return [stderr, stdout]
    .filter((part): part is string => typeof part === 'string' && part.length > 0)
    .join(' ')
    .trim();
}
