/**
 * Resource policy configuration for the governor.
 *
 * Platform budgets use hourly windows to stay under each ATS's detection
 * thresholds. LLM budgets use per-minute windows. Candidate budgets cap how
 * many applications go out per candidate per day.
 * A value of -1 means unlimited.
 */

export type Platform =
  | 'linkedin'
  | 'greenhouse'
  | 'lever'
  | 'workday'
  | 'amazon'
  | 'icims'
  | 'taleo'
  | 'smartrecruiters'
  | 'other';

export const PLATFORMS: readonly Platform[] = [
  'linkedin',
  'greenhouse',
  'lever',
  'workday',
  'amazon',
  'icims',
  'taleo',
  'smartrecruiters',
  'other',
];

export interface ResourcePolicy {
  /** Requests allowed per window (-1 = unlimited) */
  capacity: number;
  windowMs: number;
  /** Simultaneous leases (-1 = unlimited) */
  maxConcurrent: number;
  /** Leases older than this are reclaimed even if never released */
  leaseTtlMs: number;
}

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
export const DEFAULT_LEASE_TTL_MS = 10 * MINUTE;

export const RESOURCE_POLICIES = {
  /** Per-platform submission limits to avoid detection */
  platforms: {
    linkedin: { capacity: 5, windowMs: HOUR, maxConcurrent: 1, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
    workday: { capacity: 20, windowMs: HOUR, maxConcurrent: 2, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
    amazon: { capacity: 20, windowMs: HOUR, maxConcurrent: 2, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
    greenhouse: { capacity: 30, windowMs: HOUR, maxConcurrent: 3, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
    lever: { capacity: 30, windowMs: HOUR, maxConcurrent: 3, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
    icims: { capacity: 30, windowMs: HOUR, maxConcurrent: 2, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
    taleo: { capacity: 20, windowMs: HOUR, maxConcurrent: 2, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
    smartrecruiters: { capacity: 30, windowMs: HOUR, maxConcurrent: 3, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
    other: { capacity: 50, windowMs: HOUR, maxConcurrent: 3, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
  } satisfies Record<Platform, ResourcePolicy>,

  /** Per-provider LLM request budgets */
  llm: {
    anthropic: { capacity: 50, windowMs: MINUTE, maxConcurrent: 4, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
    default: { capacity: 30, windowMs: MINUTE, maxConcurrent: 2, leaseTtlMs: DEFAULT_LEASE_TTL_MS },
  } satisfies Record<string, ResourcePolicy>,

  /** Per-candidate daily application cap */
  candidate: { capacity: 25, windowMs: DAY, maxConcurrent: -1, leaseTtlMs: DEFAULT_LEASE_TTL_MS },

  /** Discovery sweeps against job boards */
  discovery: { capacity: 60, windowMs: HOUR, maxConcurrent: 1, leaseTtlMs: DEFAULT_LEASE_TTL_MS },

  /** Browser sessions: the session pool enforces the ceiling, the governor only tracks expiry */
  session: { capacity: -1, windowMs: HOUR, maxConcurrent: -1, leaseTtlMs: DEFAULT_LEASE_TTL_MS },

  /** Sessions allowed per platform; concurrent sessions on one platform risk bans */
  sessionsPerPlatform: {
    linkedin: 1,
    default: 2,
  },
} as const;

function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((p) => p === value);
}

/**
 * Resolve the policy for a resource id of the form `<kind>:<name>`.
 * Exact overrides win over the built-in defaults.
 */
export function resolveResourcePolicy(
  resourceId: string,
  overrides: Record<string, Partial<ResourcePolicy>> = {},
): ResourcePolicy | undefined {
  const [kind, name = ''] = splitResourceId(resourceId);
  let base: ResourcePolicy | undefined;

  switch (kind) {
    case 'platform':
      base = RESOURCE_POLICIES.platforms[isPlatform(name) ? name : 'other'];
      break;
    case 'llm':
      base = name === 'anthropic' ? RESOURCE_POLICIES.llm.anthropic : RESOURCE_POLICIES.llm.default;
      break;
    case 'candidate':
      base = RESOURCE_POLICIES.candidate;
      break;
    case 'discovery':
      base = RESOURCE_POLICIES.discovery;
      break;
    case 'session':
      base = RESOURCE_POLICIES.session;
      break;
    default:
      base = undefined;
  }

  const override = overrides[resourceId];
  if (!base && !override) return undefined;
  return { ...(base ?? RESOURCE_POLICIES.llm.default), ...override };
}

export function splitResourceId(resourceId: string): [string, string | undefined] {
  const idx = resourceId.indexOf(':');
  if (idx === -1) return [resourceId, undefined];
  return [resourceId.slice(0, idx), resourceId.slice(idx + 1)];
}

export function sessionLimitFor(platform: string): number {
  return platform === 'linkedin'
    ? RESOURCE_POLICIES.sessionsPerPlatform.linkedin
    : RESOURCE_POLICIES.sessionsPerPlatform.default;
}

/** Detect the applicant-tracking platform from a posting URL. */
export function detectPlatform(url: string): Platform {
  if (url.includes('greenhouse.io')) return 'greenhouse';
  if (url.includes('linkedin.com')) return 'linkedin';
  if (url.includes('lever.co')) return 'lever';
  if (url.includes('myworkdayjobs.com') || url.includes('workday.com')) return 'workday';
  if (url.includes('icims.com')) return 'icims';
  if (url.includes('taleo.net')) return 'taleo';
  if (url.includes('smartrecruiters.com')) return 'smartrecruiters';
  if (url.includes('amazon.jobs')) return 'amazon';
  return 'other';
}
