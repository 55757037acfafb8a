// קובץ זה מכיל את הלוגיקה לניהול סוקט ה-UDP של סשן גילוי SSDP

import * as dgram from 'node:dgram';
import * as os from 'node:os';

import { describeError, SocketError, TransportError } from './errors';
import { createModuleLogger } from './logger';
import { multicastAddressFor, SSDP_PORT } from './messageBuilder';
import type { IpVersion, ReceivedDatagram, SsdpTransport, TransportOptions } from './types';

const logger = createModuleLogger('ssdpSocketManager');

const APIPA_ADDRESS_v4 = '169.254.';
const LINK_LOCAL_ADDRESS_v6 = 'fe80::';

// setTimeout מקצר כל השהיה ארוכה מזו ל-1ms
export const MAX_RECEIVE_WAIT_MS = 2_147_483_647;

export interface NetworkInterface {
  name: string;
  address: string;
  family: 'IPv4' | 'IPv6';
  scopeId?: number;
  ipv6FullAddress?: string;
}

/**
 * @hebrew מאתרת ממשקי רשת רלוונטיים עבור גילוי SSDP.
 * @param allNetworkInterfaces - כל ממשקי הרשת הזמינים (כמו זה המוחזר מ-os.networkInterfaces()).
 * @param ipVersion - איזו משפחת כתובות לחפש.
 * @param platform - מערכת ההפעלה; משפיעה על צורת כתובת ה-IPv6 המלאה.
 * @returns מערך של ממשקי רשת רלוונטיים.
 */
export function findRelevantNetworkInterfaces(
  allNetworkInterfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]>,
  ipVersion: IpVersion,
  platform: NodeJS.Platform = process.platform
): NetworkInterface[] {
  const relevantInterfaces: NetworkInterface[] = [];

  for (const interfaceName of Object.keys(allNetworkInterfaces)) {
    const interfaceDetails = allNetworkInterfaces[interfaceName];
    if (!interfaceDetails) continue;

    for (const iface of interfaceDetails) {
      // דלג על ממשקים פנימיים ועל כתובות APIPA
      if (iface.internal || iface.address.startsWith(APIPA_ADDRESS_v4)) continue;

      if (ipVersion === 4 && iface.family === 'IPv4') {
        relevantInterfaces.push({
          name: interfaceName,
          address: iface.address,
          family: 'IPv4',
        });
      } else if (
        ipVersion === 6 &&
        iface.family === 'IPv6' &&
        iface.address.toLowerCase().startsWith(LINK_LOCAL_ADDRESS_v6) &&
        iface.scopeid !== undefined && iface.scopeid > 0
      ) {
        // בווינדוס הסקופ הוא המספר, בשאר המערכות שם הממשק
        const ipv6FullAddress = platform === 'win32'
          ? `${iface.address}%${iface.scopeid}`
          : `${iface.address}%${interfaceName}`;

        relevantInterfaces.push({
          name: interfaceName,
          address: iface.address,
          family: 'IPv6',
          scopeId: iface.scopeid,
          ipv6FullAddress,
        });
      }
    }
  }

  return relevantInterfaces;
}

/**
 * בוחר את ממשק היציאה של המולטיקאסט. ב-IPv6 link-local חייבים סקופ,
 * לכן נבחר הממשק הרלוונטי הראשון; ב-IPv4 משאירים למערכת ההפעלה.
 */
export function resolveMulticastInterface(options: TransportOptions): string | undefined {
  if (options.multicastInterface) return options.multicastInterface;
  if (options.ipVersion !== 6) return undefined;

  const [first] = findRelevantNetworkInterfaces(options.networkInterfaces ?? os.networkInterfaces(), 6);
  if (!first) {
    logger.warn('No IPv6 link-local interface found; leaving the multicast interface to the operating system.');
    return undefined;
  }
  // setMulticastInterface מצפה לכתובת "::%scope" ולא לכתובת הממשק עצמה
  const scope = first.ipv6FullAddress?.split('%')[1];
  return scope ? `::%${scope}` : undefined;
}

/**
 * @hebrew יוצר תעבורת UDP לסשן גילוי אחד: סוקט בודד על פורט אקראי,
 * תור של דאטגרמים שהגיעו ו-receive עם זמן קצוב.
 *
 * הסוקט שייך לסשן בלבד; קריאה ל-receive בזמן שקריאה אחרת ממתינה נדחית.
 */
export function createUdpTransport(options: TransportOptions): SsdpTransport {
  const type = options.ipVersion === 6 ? 'udp6' : 'udp4';
  const bindAddress = options.ipVersion === 6 ? '::' : '0.0.0.0';
  const multicastAddress = multicastAddressFor(options.ipVersion);
  const socketIdentifier = `msearchIPv${options.ipVersion}`;

  const queue: ReceivedDatagram[] = [];
  let waiter: ((datagram: ReceivedDatagram | null) => void) | null = null;
  let socket: dgram.Socket | null = null;
  let closed = false;

  const deliver = (datagram: ReceivedDatagram) => {
    if (waiter) {
      const resolve = waiter;
      waiter = null;
      resolve(datagram);
    } else {
      queue.push(datagram);
    }
  };

  const closeSocketQuietly = (target: dgram.Socket) => {
    try {
      target.close();
    } catch (closeError) {
      logger.warn(`Error trying to close socket ${socketIdentifier}. It might already be closed.`, { error: closeError });
    }
  };

  const open = (): Promise<void> => new Promise<void>((resolve, reject) => {
    if (socket || closed) {
      reject(new SocketError(`Socket ${socketIdentifier} was already opened`));
      return;
    }

    let created: dgram.Socket;
    try {
      created = dgram.createSocket({ type, reuseAddr: true });
    } catch (err) {
      reject(new SocketError(`Failed to create ${type} socket: ${describeError(err)}`, err));
      return;
    }
    socket = created;
    let ready = false;

    created.on('error', (err) => {
      if (!ready) {
        logger.error(`Socket error during setup of ${socketIdentifier}`, { error: err });
        closeSocketQuietly(created);
        socket = null;
        reject(new SocketError(`Failed to bind ${socketIdentifier} on ${bindAddress}: ${err.message}`, err));
        return;
      }
      // שגיאות אחרי ההקמה אינן קטלניות; הסשן ממשיך עד סוף חלון ההאזנה
      logger.warn(`Socket error on ${socketIdentifier}`, { error: err });
    });

    created.on('message', (msg, rinfo) => {
      deliver({ message: msg, remoteInfo: { address: rinfo.address, port: rinfo.port, family: rinfo.family } });
    });

    created.bind(0, bindAddress, () => {
      try {
        created.setMulticastTTL(options.multicastTtl);
        created.setMulticastLoopback(true);
        const multicastInterface = resolveMulticastInterface(options);
        if (multicastInterface) {
          created.setMulticastInterface(multicastInterface);
          logger.debug(`Socket ${socketIdentifier} sends multicast through ${multicastInterface}`);
        }
        ready = true;
        logger.info(`Socket ${socketIdentifier} listening on ${bindAddress}:${created.address().port}`);
        resolve();
      } catch (setupError) {
        logger.error(`Error during socket setup (post-bind) for ${socketIdentifier}`, { error: setupError });
        closeSocketQuietly(created);
        socket = null;
        reject(new SocketError(`Failed to configure multicast on ${socketIdentifier}: ${describeError(setupError)}`, setupError));
      }
    });
  });

  const send = (message: Buffer): Promise<void> => new Promise<void>((resolve, reject) => {
    const target = socket;
    if (!target || closed) {
      reject(new TransportError(`Socket ${socketIdentifier} is not open`));
      return;
    }
    target.send(message, 0, message.length, SSDP_PORT, multicastAddress, (err) => {
      if (err) {
        reject(new TransportError(`Error sending M-SEARCH to ${multicastAddress}:${SSDP_PORT}: ${err.message}`, undefined, err));
      } else {
        logger.debug(`M-SEARCH sent over IPv${options.ipVersion} to ${multicastAddress}:${SSDP_PORT}`);
        resolve();
      }
    });
  });

  const receive = (timeoutMs: number, signal?: AbortSignal): Promise<ReceivedDatagram | null> => {
    const queued = queue.shift();
    if (queued) return Promise.resolve(queued);
    if (waiter) return Promise.reject(new Error(`receive() is already pending on ${socketIdentifier}`));
    if (closed || !socket || timeoutMs <= 0 || signal?.aborted) return Promise.resolve(null);

    return new Promise<ReceivedDatagram | null>((resolve) => {
      let settled = false;
      const finish = (datagram: ReceivedDatagram | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (waiter === finish) waiter = null;
        resolve(datagram);
      };
      // ביטול באמצע ההמתנה מקצר את הזמן שנותר לאפס
      const onAbort = () => finish(null);
      const timer = setTimeout(() => finish(null), Math.min(timeoutMs, MAX_RECEIVE_WAIT_MS));
      signal?.addEventListener('abort', onAbort, { once: true });
      waiter = finish;
    });
  };

  const close = (): Promise<void> => {
    if (closed) return Promise.resolve();
    closed = true;
    queue.length = 0;
    if (waiter) {
      const release = waiter;
      waiter = null;
      release(null);
    }

    const target = socket;
    socket = null;
    if (!target) return Promise.resolve();

    return new Promise<void>((resolve) => {
      try {
        target.close(() => {
          logger.debug(`Socket ${socketIdentifier} closed.`);
          resolve();
        });
      } catch (err) {
        logger.warn(`Error trying to initiate close for socket ${socketIdentifier}. It might already be closed or in an error state.`, { error: err });
        resolve();
      }
    });
  };

  return { open, send, receive, close };
}
