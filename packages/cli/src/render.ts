import type { DiscoveryResult, ServiceRecord } from 'ssdp-core';

export const NO_SERVICES_MESSAGE = 'No SSDP services found.';

const MISSING_FIELD = '-';

export function formatServiceLine(record: ServiceRecord): string {
  return `${record.serviceType ?? MISSING_FIELD}  ${record.location ?? MISSING_FIELD}`;
}

/**
 * שורה לכל שירות בסדר הגילוי, או הודעה אחת כשלא נמצא דבר.
 */
export function renderText(result: DiscoveryResult): string[] {
  if (result.length === 0) {
    return [NO_SERVICES_MESSAGE];
  }
  return result.map(formatServiceLine);
}

export function renderJson(result: DiscoveryResult): string {
  return JSON.stringify(result, null, 2);
}
