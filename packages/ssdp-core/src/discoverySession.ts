// סשן גילוי: מחזיק את הסוקט, מנהל את סבבי השליחה וההאזנה ומרכיב את התוצאה הסופית.

import { EventEmitter } from 'node:events';

import { ServiceDeduplicator } from './deduplicator';
import { createDiscoveryConfig } from './discoveryConfig';
import { describeError, SocketError, TransportError } from './errors';
import { createModuleLogger } from './logger';
import { buildMSearchMessage } from './messageBuilder';
import { parseSsdpResponse } from './responseParser';
import { createUdpTransport, MAX_RECEIVE_WAIT_MS } from './ssdpSocketManager';
import {
  DiscoveryState,
  type Clock,
  type DatagramSource,
  type DiscoveryConfig,
  type DiscoveryConfigInput,
  type DiscoveryResult,
  type DiscoverySessionEvents,
  type DiscoverySessionOptions,
  type ParseDiagnostic,
  type ReceivedDatagram,
  type SessionStats,
  type SsdpTransport,
  type TransportFactory,
} from './types';

const logger = createModuleLogger('discoverySession');

const systemClock: Clock = { now: () => Date.now() };

export interface DiscoverySession {
  on<E extends keyof DiscoverySessionEvents>(event: E, listener: (...args: DiscoverySessionEvents[E]) => void): this;
  once<E extends keyof DiscoverySessionEvents>(event: E, listener: (...args: DiscoverySessionEvents[E]) => void): this;
  off<E extends keyof DiscoverySessionEvents>(event: E, listener: (...args: DiscoverySessionEvents[E]) => void): this;
  emit<E extends keyof DiscoverySessionEvents>(event: E, ...args: DiscoverySessionEvents[E]): boolean;
}

/**
 * @hebrew סשן גילוי SSDP אקטיבי יחיד.
 *
 * מכונת מצבים: Idle → Sending → Listening → (Sending | Done), סבב אחד לכל ניסיון.
 * הסשן הוא הבעלים הבלעדי של הסוקט: שליחה וקבלה מתבצעות ברצף בתוך run() בלבד,
 * ולכן אין צורך בנעילות. סשנים מקבילים אינם חולקים מצב.
 *
 * אירועים: `statechange`, `servicefound` (רשומה ייחודית חדשה), `diagnostic`, `transporterror`.
 */
export class DiscoverySession extends EventEmitter {
  readonly config: DiscoveryConfig;

  private readonly message: Buffer;
  private readonly transportFactory: TransportFactory;
  private readonly clock: Clock;
  private readonly networkInterfaces: DiscoverySessionOptions['networkInterfaces'];
  private readonly deduplicator = new ServiceDeduplicator();
  private readonly counters: SessionStats = {
    roundsStarted: 0,
    sendFailures: 0,
    datagramsReceived: 0,
    datagramsDropped: 0,
    duplicatesDiscarded: 0,
  };
  private currentState = DiscoveryState.Idle;
  private currentRound = 0;
  private started = false;

  /**
   * @throws {InvalidConfigError} לפני שנוצר סוקט כלשהו.
   */
  constructor(config: DiscoveryConfigInput, options: DiscoverySessionOptions = {}) {
    super();
    this.config = createDiscoveryConfig(config);
    this.message = buildMSearchMessage(this.config.searchTarget, this.config.maxWaitSeconds, {
      ipVersion: this.config.ipVersion,
      maxWaitLimit: this.config.maxWaitLimit,
      userAgent: this.config.userAgent,
    });
    this.transportFactory = options.transportFactory ?? createUdpTransport;
    this.clock = options.clock ?? systemClock;
    this.networkInterfaces = options.networkInterfaces;
  }

  get state(): DiscoveryState {
    return this.currentState;
  }

  get round(): number {
    return this.currentRound;
  }

  get stats(): Readonly<SessionStats> {
    return { ...this.counters };
  }

  /**
   * @hebrew מריץ את כל סבבי הגילוי ומחזיר את הרשומות הייחודיות לפי סדר ההגעה.
   *
   * משך הריצה חסום ב-(retryCount + 1) * timeoutSeconds. ביטול דרך `signal` נבדק בין הסבבים,
   * ובאמצע האזנה הוא מקצר את הזמן שנותר לאפס. הסוקט נסגר תמיד, גם אחרי שגיאה.
   *
   * @throws {SocketError} אם לא ניתן לפתוח את הסוקט. במקרה זה אין תוצאות.
   */
  async run(signal?: AbortSignal): Promise<DiscoveryResult> {
    if (this.started) {
      throw new Error('DiscoverySession.run() can only be called once per session');
    }
    this.started = true;

    if (signal?.aborted) {
      logger.info('Discovery cancelled before the first search.');
      this.transition(DiscoveryState.Done);
      return this.deduplicator.toResult();
    }

    const transport = this.transportFactory({
      ipVersion: this.config.ipVersion,
      multicastTtl: this.config.multicastTtl,
      multicastInterface: this.config.multicastInterface,
      networkInterfaces: this.networkInterfaces,
    });

    try {
      await this.openTransport(transport);

      for (let round = 0; round <= this.config.retryCount; round++) {
        if (round > 0 && signal?.aborted) {
          logger.info(`Discovery cancelled after ${round} of ${this.config.retryCount + 1} rounds.`);
          break;
        }
        this.currentRound = round;
        this.counters.roundsStarted++;
        await this.sendSearch(transport, round);
        await this.listen(transport, signal);
      }
    } finally {
      await this.closeTransport(transport);
      this.transition(DiscoveryState.Done);
    }

    logger.debug(`Discovery finished with ${this.deduplicator.size} unique services.`, { stats: this.counters });
    return this.deduplicator.toResult();
  }

  private transition(next: DiscoveryState): void {
    if (this.currentState === next) return;
    logger.trace(`State ${this.currentState} -> ${next} (round ${this.currentRound + 1})`);
    this.currentState = next;
    this.emit('statechange', next, this.currentRound);
  }

  private async openTransport(transport: SsdpTransport): Promise<void> {
    try {
      await transport.open();
    } catch (err) {
      const error = err instanceof SocketError
        ? err
        : new SocketError(`Failed to open the SSDP socket: ${describeError(err)}`, err);
      logger.error(error.message);
      throw error;
    }
  }

  private async closeTransport(transport: SsdpTransport): Promise<void> {
    try {
      await transport.close();
    } catch (err) {
      logger.warn(`Error while closing the SSDP socket: ${describeError(err)}`);
    }
  }

  private async sendSearch(transport: SsdpTransport, round: number): Promise<void> {
    this.transition(DiscoveryState.Sending);
    try {
      await transport.send(this.message);
      logger.debug(`SSDP discovery message sent (attempt ${round + 1}/${this.config.retryCount + 1}).`, {
        searchTarget: this.config.searchTarget,
      });
    } catch (err) {
      // כשל שליחה אינו קטלני: ייתכן שחלק מהחבילה יצא, ממשיכים להאזנה ולסבב הבא
      this.counters.sendFailures++;
      const error = new TransportError(`M-SEARCH send failed in round ${round + 1}: ${describeError(err)}`, round, err);
      if (this.config.verbose) {
        logger.warn(error.message);
      } else {
        logger.debug(error.message);
      }
      this.emit('transporterror', error);
    }
  }

  private async listen(transport: SsdpTransport, signal?: AbortSignal): Promise<void> {
    this.transition(DiscoveryState.Listening);
    const deadline = this.clock.now() + this.config.timeoutSeconds * 1000;

    for (;;) {
      const remaining = signal?.aborted ? 0 : deadline - this.clock.now();
      if (remaining <= 0) break;

      // חלון ארוך מהמקסימום נקרא בכמה המתנות
      const wait = Math.min(remaining, MAX_RECEIVE_WAIT_MS);
      const datagram = await transport.receive(wait, signal);
      if (!datagram) {
        if (wait < remaining) continue;
        break;
      }

      this.handleDatagram(datagram);
    }
  }

  private handleDatagram(datagram: ReceivedDatagram): void {
    this.counters.datagramsReceived++;
    const source: DatagramSource = { address: datagram.remoteInfo.address, port: datagram.remoteInfo.port };
    const outcome = parseSsdpResponse(datagram.message, source, this.clock.now());

    if (outcome.diagnostics.length > 0) {
      this.reportDiagnostics(outcome.diagnostics, source);
    }

    if (!outcome.record) {
      this.counters.datagramsDropped++;
      return;
    }

    if (this.deduplicator.add(outcome.record)) {
      logger.debug(`New service from ${source.address}:${source.port}`, {
        usn: outcome.record.usn,
        st: outcome.record.serviceType,
        location: outcome.record.location,
      });
      this.emit('servicefound', outcome.record);
    } else {
      this.counters.duplicatesDiscarded++;
      logger.trace(`Duplicate reply from ${source.address}:${source.port} discarded`, { usn: outcome.record.usn });
    }
  }

  private reportDiagnostics(diagnostics: ParseDiagnostic[], source: DatagramSource): void {
    this.emit('diagnostic', diagnostics, source);
    for (const diagnostic of diagnostics) {
      const text = `Reply from ${source.address}:${source.port}: ${diagnostic.message}`;
      if (this.config.verbose) {
        logger.info(text, { code: diagnostic.code });
      } else {
        logger.trace(text, { code: diagnostic.code });
      }
    }
  }
}
