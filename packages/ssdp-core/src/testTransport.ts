// כפילי בדיקה: שעון מדומה ותעבורה מתוסרטת שמחקה סוקט UDP בלי רשת.

import type { Clock, ReceivedDatagram, SsdpTransport, TransportFactory, TransportOptions } from './types';

export class FakeClock implements Clock {
  constructor(private current = 1_000) {}

  now(): number {
    return this.current;
  }

  set(time: number): void {
    this.current = time;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface ScriptedReply {
  /** Milliseconds after the round's M-SEARCH was sent. */
  delayMs: number;
  message: Buffer | string;
  address?: string;
  port?: number;
}

interface PendingReply {
  arrivesAt: number;
  datagram: ReceivedDatagram;
}

/**
 * תעבורה מתוסרטת: כל שליחה מתזמנת את התגובות של אותו סבב, ו-receive מקדם את השעון המדומה
 * עד התגובה הבאה או עד סוף הזמן הקצוב.
 */
export class ScriptedTransport implements SsdpTransport {
  readonly sent: Buffer[] = [];
  opened = false;
  closed = false;
  closeCalls = 0;
  openError?: unknown;
  /** Indexed by send attempt; a defined entry makes that send reject. */
  sendErrors: Array<Error | undefined> = [];
  options?: TransportOptions;
  readonly receiveTimeouts: number[] = [];

  private pending: PendingReply[] = [];

  constructor(
    private readonly clock: FakeClock,
    private readonly repliesByRound: ScriptedReply[][] = []
  ) {}

  async open(): Promise<void> {
    if (this.openError !== undefined) throw this.openError;
    this.opened = true;
  }

  async send(message: Buffer): Promise<void> {
    const attempt = this.sent.length;
    this.sent.push(message);
    const error = this.sendErrors[attempt];
    if (error) throw error;

    const now = this.clock.now();
    for (const reply of this.repliesByRound[attempt] ?? []) {
      this.pending.push({
        arrivesAt: now + reply.delayMs,
        datagram: {
          message: typeof reply.message === 'string' ? Buffer.from(reply.message) : reply.message,
          remoteInfo: { address: reply.address ?? '192.168.1.20', port: reply.port ?? 1900, family: 'IPv4' },
        },
      });
    }
    this.pending.sort((a, b) => a.arrivesAt - b.arrivesAt);
  }

  async receive(timeoutMs: number, signal?: AbortSignal): Promise<ReceivedDatagram | null> {
    this.receiveTimeouts.push(timeoutMs);
    if (signal?.aborted) return null;
    const now = this.clock.now();
    const next = this.pending[0];
    if (next && next.arrivesAt <= now + timeoutMs) {
      this.pending.shift();
      this.clock.set(Math.max(now, next.arrivesAt));
      return next.datagram;
    }
    this.clock.advance(timeoutMs);
    return null;
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.closed = true;
  }
}

export function scriptedFactory(transport: ScriptedTransport): TransportFactory & { calls: number } {
  const factory = Object.assign(
    (options: TransportOptions): SsdpTransport => {
      factory.calls++;
      transport.options = options;
      return transport;
    },
    { calls: 0 }
  );
  return factory;
}

export function ssdpReply(headers: Record<string, string>, statusLine = 'HTTP/1.1 200 OK'): string {
  const lines = [statusLine, ...Object.entries(headers).map(([name, value]) => `${name}: ${value}`)];
  return `${lines.join('\r\n')}\r\n\r\n`;
}
