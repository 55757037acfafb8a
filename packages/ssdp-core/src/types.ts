// קובץ זה מכיל את הגדרות הממשקים והטיפוסים של מנוע הגילוי.
import type { RemoteInfo } from 'node:dgram';
import type * as os from 'node:os';
import type { TransportError } from './errors';

export type IpVersion = 4 | 6;

/**
 * @hebrew פרמטרי הגילוי כפי שהמשתמש מספק אותם. כל השדות מלבד searchTarget אופציונליים.
 */
export interface DiscoveryConfigInput {
  /**
   * @hebrew ערך ה-ST לחיפוש.
   * @default "ssdp:all"
   */
  searchTarget?: string;
  /**
   * @hebrew ערך ה-MX: הזמן המקסימלי (בשניות) שהתקן ימתין באקראי לפני שיענה.
   * @default 2
   */
  maxWaitSeconds?: number;
  /**
   * @hebrew חלון ההאזנה (בשניות) אחרי כל שליחה. חייב להיות לפחות maxWaitSeconds.
   * @default maxWaitSeconds + 1
   */
  timeoutSeconds?: number;
  /**
   * @hebrew מספר סבבי החיפוש הנוספים אחרי הסבב הראשון.
   * @default 3
   */
  retryCount?: number;
  verbose?: boolean;
  /** @default 4 */
  ipVersion?: IpVersion;
  /**
   * @hebrew הרחבת הגבול העליון של MX (ברירת מחדל 5, כמומלץ בפרוטוקול).
   */
  maxWaitLimit?: number;
  /** USER-AGENT header value; omitted from the request when not set. */
  userAgent?: string;
  /** Local interface address for outgoing multicast (IPv4 address or `::%iface` for IPv6). */
  multicastInterface?: string;
  /** @default 4 */
  multicastTtl?: number;
}

/**
 * @hebrew תצורת גילוי מאומתת. נבנית פעם אחת לכל הפעלה ולא משתנה אחר כך.
 */
export interface DiscoveryConfig {
  readonly searchTarget: string;
  readonly maxWaitSeconds: number;
  readonly timeoutSeconds: number;
  readonly retryCount: number;
  readonly verbose: boolean;
  readonly ipVersion: IpVersion;
  readonly maxWaitLimit: number;
  readonly userAgent?: string;
  readonly multicastInterface?: string;
  readonly multicastTtl: number;
}

/**
 * @hebrew רשומת שירות שנבנתה מתגובה אחת ל-M-SEARCH, לפני איחוד כפילויות.
 */
export interface ServiceRecord {
  readonly location?: string;
  /** `ST` header, or `NT` when the device sent no `ST`. */
  readonly serviceType?: string;
  readonly usn?: string;
  readonly server?: string;
  /** max-age in seconds from CACHE-CONTROL. */
  readonly cacheControl?: number;
  readonly sourceAddress: string;
  readonly sourcePort: number;
  /** All parsed headers, lower-case names. */
  readonly headers: Readonly<Record<string, string>>;
  readonly receivedAt: number;
}

export type DiscoveryResult = readonly ServiceRecord[];

export interface DatagramSource {
  address: string;
  port: number;
}

export type ParseDiagnosticCode =
  | 'invalid-status-line'
  | 'tolerant-fallback'
  | 'malformed-header-line'
  | 'missing-identity'
  | 'missing-service-type'
  | 'invalid-cache-control';

export interface ParseDiagnostic {
  code: ParseDiagnosticCode;
  message: string;
  /** 1-based line number inside the datagram, when the diagnostic concerns a single line. */
  line?: number;
}

export interface ParseOutcome {
  record?: ServiceRecord;
  diagnostics: ParseDiagnostic[];
}

/**
 * @hebrew דאטגרם שהתקבל מהרשת.
 */
export interface ReceivedDatagram {
  message: Buffer;
  remoteInfo: Pick<RemoteInfo, 'address' | 'port' | 'family'>;
}

/**
 * @hebrew ממשק התעבורה של סשן גילוי: סוקט אחד, שליחה וקבלה מסודרות.
 * המימוש האמיתי נמצא ב-ssdpSocketManager, ובבדיקות משתמשים בכפיל.
 */
export interface SsdpTransport {
  open(): Promise<void>;
  send(message: Buffer): Promise<void>;
  /**
   * Resolves with the next datagram, or `null` once `timeoutMs` elapsed or `signal` aborted.
   */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<ReceivedDatagram | null>;
  close(): Promise<void>;
}

export interface TransportOptions {
  ipVersion: IpVersion;
  multicastTtl: number;
  multicastInterface?: string;
  /** Used instead of `os.networkInterfaces()` when picking an IPv6 scope. */
  networkInterfaces?: NodeJS.Dict<os.NetworkInterfaceInfo[]>;
}

export type TransportFactory = (options: TransportOptions) => SsdpTransport;

export interface Clock {
  now(): number;
}

export enum DiscoveryState {
  Idle = 'idle',
  Sending = 'sending',
  Listening = 'listening',
  Done = 'done',
}

export interface DiscoverySessionOptions {
  transportFactory?: TransportFactory;
  clock?: Clock;
  networkInterfaces?: NodeJS.Dict<os.NetworkInterfaceInfo[]>;
}

export interface DiscoverySessionEvents {
  statechange: [state: DiscoveryState, round: number];
  servicefound: [record: ServiceRecord];
  diagnostic: [diagnostics: ParseDiagnostic[], source: DatagramSource];
  transporterror: [error: TransportError];
}

export interface SessionStats {
  roundsStarted: number;
  sendFailures: number;
  datagramsReceived: number;
  /** Datagrams the parser rejected. */
  datagramsDropped: number;
  duplicatesDiscarded: number;
}
