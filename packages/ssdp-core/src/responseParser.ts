// המרת תגובת M-SEARCH גולמית לרשומת שירות. פונקציה טהורה: אין כאן I/O ואין לוגים.

import { parseHttpResponse } from './genericHttpParser';
import type { DatagramSource, ParseDiagnostic, ParseOutcome, ServiceRecord } from './types';

const STATUS_LINE_EXP = /^HTTP\/1\.1 200(?:[ \t]|$)/;
// שם כותרת לפי תווי token של HTTP, רווחים מסביב לנקודתיים מותרים
const HEADER_LINE_EXP = /^([!#$%&'*+.^_`|~0-9A-Za-z-]+)[ \t]*:[ \t]*(.*?)[ \t]*$/;
const MAX_AGE_EXP = /(?:^|[\s,;])max-age[ \t]*=[ \t]*(\d+)[ \t]*(?:[,;]|$)/i;

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * @hebrew סריקה סלחנית של הכותרות: שורות שאינן בצורת `Name: value` מדולגות ולא מפילות את הניתוח.
 * הסריקה נעצרת בשורה הריקה הראשונה או בסוף הבאפר.
 */
export function scanHeadersTolerantly(lines: readonly string[], diagnostics: ParseDiagnostic[]): Record<string, string> {
  const headers: Record<string, string> = {};

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === '') break;

    const match = HEADER_LINE_EXP.exec(line);
    if (!match) {
      diagnostics.push({
        code: 'malformed-header-line',
        message: `Skipped line that is not a "Name: value" header: ${JSON.stringify(line)}`,
        line: i + 1,
      });
      continue;
    }
    headers[match[1].toLowerCase()] = match[2];
  }

  return headers;
}

/**
 * מחלץ את ערך ה-max-age מכותרת CACHE-CONTROL. ערך שאינו בצורה `max-age=<int>` מחזיר undefined.
 */
export function parseCacheControlMaxAge(value: string): number | undefined {
  const match = MAX_AGE_EXP.exec(value.trim());
  if (!match) return undefined;
  const maxAge = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(maxAge) ? maxAge : undefined;
}

/**
 * @hebrew מנתח דאטגרם אחד שהתקבל בתגובה ל-M-SEARCH.
 *
 * שורת הסטטוס חייבת להיות `HTTP/1.1 200`. הכותרות נקראות קודם עם http-parser-js,
 * ואם המסגור הקפדני נכשל (התקנים רבים אינם תואמים לתקן) עוברים לסריקה סלחנית.
 * תגובה ללא LOCATION וללא USN נדחית.
 *
 * @param datagram - הבתים הגולמיים.
 * @param source - כתובת ופורט השולח.
 * @param receivedAt - זמן הקבלה (epoch ms).
 * @returns רשומה (אם התקבלה) ורשימת אבחונים.
 */
export function parseSsdpResponse(datagram: Buffer, source: DatagramSource, receivedAt: number = Date.now()): ParseOutcome {
  const diagnostics: ParseDiagnostic[] = [];
  const lines = splitLines(datagram.toString('utf-8'));
  const statusLine = lines[0];

  if (!STATUS_LINE_EXP.test(statusLine)) {
    diagnostics.push({
      code: 'invalid-status-line',
      message: `Not an HTTP/1.1 200 reply: ${JSON.stringify(statusLine.slice(0, 40))}`,
      line: 1,
    });
    return { diagnostics };
  }

  let headers: Record<string, string>;
  const strict = parseHttpResponse(datagram);
  if (strict.ok) {
    headers = strict.response.headers;
  } else {
    diagnostics.push({
      code: 'tolerant-fallback',
      message: `Strict HTTP framing rejected the reply (${strict.reason}); using tolerant header scan`,
    });
    headers = scanHeadersTolerantly(lines, diagnostics);
  }

  const location = nonEmpty(headers['location']);
  const usn = nonEmpty(headers['usn']);

  if (!location && !usn) {
    diagnostics.push({
      code: 'missing-identity',
      message: 'Reply has neither LOCATION nor USN',
    });
    return { diagnostics };
  }

  const serviceType = nonEmpty(headers['st']) ?? nonEmpty(headers['nt']);
  if (!serviceType) {
    diagnostics.push({
      code: 'missing-service-type',
      message: 'Reply has neither ST nor NT',
    });
  }

  let cacheControl: number | undefined;
  const cacheControlHeader = nonEmpty(headers['cache-control']);
  if (cacheControlHeader) {
    cacheControl = parseCacheControlMaxAge(cacheControlHeader);
    if (cacheControl === undefined) {
      diagnostics.push({
        code: 'invalid-cache-control',
        message: `Ignoring CACHE-CONTROL without a max-age=<int> directive: ${JSON.stringify(cacheControlHeader)}`,
      });
    }
  }

  const record: ServiceRecord = Object.freeze({
    location,
    serviceType,
    usn,
    server: nonEmpty(headers['server']),
    cacheControl,
    sourceAddress: source.address,
    sourcePort: source.port,
    headers: Object.freeze({ ...headers }),
    receivedAt,
  });

  return { record, diagnostics };
}
