import { HTTPParser } from 'http-parser-js';
import { describeError } from './errors';

export interface ParsedHttpResponse {
  statusCode: number;
  statusMessage: string;
  versionMajor: number;
  versionMinor: number;
  /** Header names are lower-cased; a repeated header keeps its last value. */
  headers: Record<string, string>;
}

export type HttpParseResult =
  | { ok: true; response: ParsedHttpResponse }
  | { ok: false; reason: string };

/**
 * @hebrew מנתח תגובת HTTP גולמית באמצעות http-parser-js.
 * זהו הניתוח ה"קפדני": כל חריגה ממסגור HTTP תקין מחזירה ok: false עם הסיבה.
 * @param messageBuffer - הבאפר המכיל את תגובת ה-HTTP.
 */
export function parseHttpResponse(messageBuffer: Buffer): HttpParseResult {
  const parser = new HTTPParser(HTTPParser.RESPONSE);

  // הקולבקים ממלאים את המצב במהלך execute()
  const state: { response?: ParsedHttpResponse; complete: boolean } = { complete: false };

  parser[HTTPParser.kOnHeadersComplete] = (info) => {
    const headers: Record<string, string> = {};
    const rawHeaders = info.headers;
    for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
      headers[rawHeaders[i].toLowerCase()] = rawHeaders[i + 1];
    }

    state.response = {
      statusCode: info.statusCode,
      statusMessage: info.statusMessage,
      versionMajor: info.versionMajor,
      versionMinor: info.versionMinor,
      headers,
    };
  };

  // לתגובות SSDP אין גוף; מה שמגיע אחרי הכותרות לא נשמר
  parser[HTTPParser.kOnBody] = () => undefined;

  parser[HTTPParser.kOnMessageComplete] = () => {
    state.complete = true;
  };

  try {
    const executeResult = parser.execute(messageBuffer);
    if (executeResult instanceof Error) {
      return { ok: false, reason: `execute() failed: ${executeResult.message}` };
    }

    const finishResult = parser.finish();
    if (finishResult instanceof Error) {
      return { ok: false, reason: `finish() failed: ${finishResult.message}` };
    }
  } catch (err) {
    // http-parser-js מחזיר בדרך כלל שגיאות כערך, אך קולבקים עלולים לזרוק
    return { ok: false, reason: `exception during parsing: ${describeError(err)}` };
  }

  const { response, complete } = state;
  if (response === undefined) {
    return { ok: false, reason: 'header section was not terminated' };
  }
  if (!complete) {
    return { ok: false, reason: 'message did not complete' };
  }

  return { ok: true, response };
}
