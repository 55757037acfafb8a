// בניית הודעת ה-M-SEARCH שנשלחת לקבוצת המולטיקאסט של SSDP

import { collectSearchIssues } from './discoveryConfig';
import { InvalidConfigError } from './errors';
import type { IpVersion } from './types';

export const SSDP_PORT = 1900;
export const SSDP_MULTICAST_ADDRESS_IPV4 = '239.255.255.250';
export const SSDP_MULTICAST_ADDRESS_IPV6_LINK_LOCAL = 'FF02::C';
const M_SEARCH_REQUEST_START_LINE = 'M-SEARCH * HTTP/1.1';

export interface MSearchOptions {
  /** @default 4 */
  ipVersion?: IpVersion;
  /** Upper bound accepted for MX. @default 5 */
  maxWaitLimit?: number;
  userAgent?: string;
}

export function multicastAddressFor(ipVersion: IpVersion): string {
  return ipVersion === 6 ? SSDP_MULTICAST_ADDRESS_IPV6_LINK_LOCAL : SSDP_MULTICAST_ADDRESS_IPV4;
}

/**
 * ערך כותרת HOST: `239.255.255.250:1900`, או `[FF02::C]:1900` ב-IPv6.
 */
export function multicastHostHeader(ipVersion: IpVersion): string {
  const address = multicastAddressFor(ipVersion);
  return ipVersion === 6 ? `[${address}]:${SSDP_PORT}` : `${address}:${SSDP_PORT}`;
}

/**
 * @hebrew בונה את הבתים של בקשת M-SEARCH. פונקציה טהורה.
 * @param searchTarget - ערך ה-ST.
 * @param maxWaitSeconds - ערך ה-MX, מספר שלם בטווח 1..maxWaitLimit.
 * @throws {InvalidConfigError} אם ST ריק או ש-MX מחוץ לטווח.
 */
export function buildMSearchMessage(
  searchTarget: string,
  maxWaitSeconds: number,
  options: MSearchOptions = {}
): Buffer {
  const issues = collectSearchIssues(searchTarget, maxWaitSeconds, options.maxWaitLimit);
  if (issues.length > 0) {
    throw new InvalidConfigError(issues);
  }

  const ipVersion = options.ipVersion ?? 4;
  const lines = [
    M_SEARCH_REQUEST_START_LINE,
    `HOST: ${multicastHostHeader(ipVersion)}`,
    `MAN: "ssdp:discover"`,
    `MX: ${maxWaitSeconds}`,
    `ST: ${searchTarget}`,
  ];
  if (options.userAgent) {
    lines.push(`USER-AGENT: ${options.userAgent}`);
  }

  // שורה ריקה בסוף הכותרות
  return Buffer.from([...lines, '', ''].join('\r\n'), 'utf-8');
}
