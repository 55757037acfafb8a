import { InvalidConfigError } from './errors';
import type { DiscoveryConfig, DiscoveryConfigInput } from './types';

// ==========================================================================================
// Constants - קבועים
// ==========================================================================================
export const DEFAULT_SEARCH_TARGET = 'ssdp:all';
export const DEFAULT_MAX_WAIT_SECONDS = 2;
export const DEFAULT_RETRY_COUNT = 3;
export const DEFAULT_MAX_WAIT_LIMIT = 5;
export const DEFAULT_MULTICAST_TTL = 4;
export const MIN_MAX_WAIT_SECONDS = 1;

/**
 * @hebrew בודק את ערכי MX ו-ST ומחזיר רשימת בעיות (ריקה אם הכל תקין).
 * משותף לבונה ההודעות ולאימות התצורה המלא.
 */
export function collectSearchIssues(
  searchTarget: string,
  maxWaitSeconds: number,
  maxWaitLimit: number = DEFAULT_MAX_WAIT_LIMIT
): string[] {
  const issues: string[] = [];

  if (searchTarget.trim() === '') {
    issues.push('searchTarget must be a non-empty string');
  } else if (/[\r\n]/.test(searchTarget)) {
    issues.push('searchTarget must not contain line breaks');
  }

  if (!Number.isInteger(maxWaitLimit) || maxWaitLimit < MIN_MAX_WAIT_SECONDS) {
    issues.push(`maxWaitLimit must be an integer >= ${MIN_MAX_WAIT_SECONDS} (got ${maxWaitLimit})`);
  } else if (!Number.isInteger(maxWaitSeconds) || maxWaitSeconds < MIN_MAX_WAIT_SECONDS || maxWaitSeconds > maxWaitLimit) {
    issues.push(`maxWaitSeconds must be an integer between ${MIN_MAX_WAIT_SECONDS} and ${maxWaitLimit} (got ${maxWaitSeconds})`);
  }

  return issues;
}

/**
 * @hebrew משלים ברירות מחדל ומאמת את פרמטרי הגילוי.
 * כל הבעיות נאספות ונזרקות יחד ב-InvalidConfigError אחת, לפני שנפתח סוקט כלשהו.
 *
 * @returns תצורה מוקפאת (Object.freeze).
 * @throws {InvalidConfigError}
 */
export function createDiscoveryConfig(input: DiscoveryConfigInput = {}): DiscoveryConfig {
  const searchTarget = input.searchTarget ?? DEFAULT_SEARCH_TARGET;
  const maxWaitSeconds = input.maxWaitSeconds ?? DEFAULT_MAX_WAIT_SECONDS;
  const maxWaitLimit = input.maxWaitLimit ?? DEFAULT_MAX_WAIT_LIMIT;
  const timeoutSeconds = input.timeoutSeconds ?? maxWaitSeconds + 1;
  const retryCount = input.retryCount ?? DEFAULT_RETRY_COUNT;
  const ipVersion = input.ipVersion ?? 4;
  const multicastTtl = input.multicastTtl ?? DEFAULT_MULTICAST_TTL;

  const issues = collectSearchIssues(searchTarget, maxWaitSeconds, maxWaitLimit);

  if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
    issues.push(`timeoutSeconds must be a positive number (got ${timeoutSeconds})`);
  } else if (Number.isFinite(maxWaitSeconds) && timeoutSeconds < maxWaitSeconds) {
    issues.push(`timeoutSeconds (${timeoutSeconds}) must be >= maxWaitSeconds (${maxWaitSeconds})`);
  }

  if (!Number.isInteger(retryCount) || retryCount < 0) {
    issues.push(`retryCount must be a non-negative integer (got ${retryCount})`);
  }

  if (ipVersion !== 4 && ipVersion !== 6) {
    issues.push(`ipVersion must be 4 or 6 (got ${String(ipVersion)})`);
  }

  if (!Number.isInteger(multicastTtl) || multicastTtl < 1 || multicastTtl > 255) {
    issues.push(`multicastTtl must be an integer between 1 and 255 (got ${multicastTtl})`);
  }

  if (input.userAgent !== undefined && /[\r\n]/.test(input.userAgent)) {
    issues.push('userAgent must not contain line breaks');
  }

  if (issues.length > 0) {
    throw new InvalidConfigError(issues);
  }

  return Object.freeze({
    searchTarget,
    maxWaitSeconds,
    timeoutSeconds,
    retryCount,
    verbose: input.verbose ?? false,
    ipVersion,
    maxWaitLimit,
    userAgent: input.userAgent,
    multicastInterface: input.multicastInterface,
    multicastTtl,
  });
}
