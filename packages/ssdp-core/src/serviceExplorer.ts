// נקודות הכניסה הנוחות לגילוי: Promise שמחזיר את כל התוצאה, ו-AsyncIterable שמניב רשומות בזמן אמת.

import { DiscoverySession } from './discoverySession';
import { createModuleLogger } from './logger';
import type {
  DiscoveryConfigInput,
  DiscoveryResult,
  DiscoverySessionOptions,
  ServiceRecord,
} from './types';

const logger = createModuleLogger('serviceExplorer');

export interface DiscoverServicesOptions extends DiscoverySessionOptions {
  abortSignal?: AbortSignal;
  /** Called once per unique service, in arrival order. */
  onServiceFound?: (record: ServiceRecord) => void;
}

/**
 * @hebrew מריץ סשן גילוי אחד ומחזיר את כל השירותים הייחודיים שנמצאו.
 *
 * @example
 * const services = await discoverServices({ searchTarget: 'upnp:rootdevice', maxWaitSeconds: 2 });
 *
 * @throws {InvalidConfigError} אם הפרמטרים אינם תקינים (לפני כל פעולת רשת).
 * @throws {SocketError} אם לא ניתן לפתוח את הסוקט.
 */
export async function discoverServices(
  config: DiscoveryConfigInput,
  options: DiscoverServicesOptions = {}
): Promise<DiscoveryResult> {
  const session = new DiscoverySession(config, options);
  const { onServiceFound } = options;

  session.on('servicefound', (record) => {
    logger.info(`Found service at ${record.sourceAddress}:${record.sourcePort} - Location: ${record.location ?? '-'}`, {
      st: record.serviceType,
      usn: record.usn,
    });
    onServiceFound?.(record);
  });

  const result = await session.run(options.abortSignal);

  if (result.length === 0) {
    logger.info('No SSDP services found.');
  } else {
    logger.info(`Found ${result.length} SSDP services.`);
  }
  return result;
}

/**
 * @hebrew מגלה שירותים ומניב כל שירות ייחודי מיד כשהוא מתגלה.
 * הלולאה מסתיימת כשהסשן מסיים את כל הסבבים, או כשהצרכן יוצא ממנה (ואז הסשן מבוטל והסוקט נסגר).
 *
 * @throws {InvalidConfigError | SocketError} מועברות לצרכן מתוך האיטרציה.
 */
export async function* discoverServicesIterable(
  config: DiscoveryConfigInput,
  options: DiscoverServicesOptions = {}
): AsyncGenerator<ServiceRecord, void, undefined> {
  const session = new DiscoverySession(config, options);
  const controller = new AbortController();
  const externalAbortHandler = () => controller.abort();

  if (options.abortSignal?.aborted) {
    controller.abort();
  } else {
    options.abortSignal?.addEventListener('abort', externalAbortHandler, { once: true });
  }

  const serviceBuffer: ServiceRecord[] = [];
  let wakeUp: (() => void) | null = null;
  let finished = false;
  let sessionError: unknown;

  const notify = () => {
    if (wakeUp) {
      const resolve = wakeUp;
      wakeUp = null;
      resolve();
    }
  };

  session.on('servicefound', (record) => {
    serviceBuffer.push(record);
    options.onServiceFound?.(record);
    notify();
  });

  const running = session.run(controller.signal).then(
    () => {
      finished = true;
      notify();
    },
    (err: unknown) => {
      sessionError = err;
      finished = true;
      notify();
    }
  );

  try {
    for (;;) {
      const next = serviceBuffer.shift();
      if (next) {
        yield next;
        continue;
      }
      if (finished) break;
      await new Promise<void>((resolve) => {
        wakeUp = resolve;
      });
    }
    if (sessionError !== undefined) {
      throw sessionError;
    }
  } finally {
    // יציאה מוקדמת של הצרכן מבטלת את הסשן; ממתינים לסגירת הסוקט
    controller.abort();
    options.abortSignal?.removeEventListener('abort', externalAbortHandler);
    await running;
    logger.debug('discoverServicesIterable: cleanup complete.');
  }
}
