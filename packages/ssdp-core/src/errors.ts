// שגיאות מותאמות של מנוע הגילוי. תקלות פרסור של תגובות בודדות אינן שגיאות (ראו ParseDiagnostic).

export type SsdpErrorCode = 'INVALID_CONFIG' | 'SOCKET_ERROR' | 'TRANSPORT_ERROR';

/**
 * @hebrew מחלקת בסיס לכל השגיאות שמנוע הגילוי זורק או מדווח.
 */
export class SsdpDiscoveryError extends Error {
  readonly code: SsdpErrorCode;

  constructor(code: SsdpErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SsdpDiscoveryError';
    this.code = code;
    // שחזור הפרוטוטייפ כדי ש-instanceof יעבוד כראוי עם מחלקות מובנות
    Object.setPrototypeOf(this, SsdpDiscoveryError.prototype);
  }
}

/**
 * @hebrew פרמטרי גילוי לא תקינים. נזרקת לפני כל פעולת רשת.
 */
export class InvalidConfigError extends SsdpDiscoveryError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_CONFIG', `Invalid discovery configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}

/**
 * @hebrew לא ניתן לפתוח, לקשור או להגדיר את סוקט המולטיקאסט. קטלנית לסשן.
 */
export class SocketError extends SsdpDiscoveryError {
  constructor(message: string, cause?: unknown) {
    super('SOCKET_ERROR', message, cause);
    this.name = 'SocketError';
    Object.setPrototypeOf(this, SocketError.prototype);
  }
}

/**
 * @hebrew שליחת M-SEARCH נכשלה אחרי שהסוקט כבר הוקם. לא קטלנית: הסבב ממשיך להאזנה.
 */
export class TransportError extends SsdpDiscoveryError {
  /** 0-based search round, set once the session knows which round failed. */
  readonly round?: number;

  constructor(message: string, round?: number, cause?: unknown) {
    super('TRANSPORT_ERROR', message, cause);
    this.name = 'TransportError';
    this.round = round;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
