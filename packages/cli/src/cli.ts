import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  createModuleLogger,
  discoverServices,
  InvalidConfigError,
  raiseLogLevel,
  SocketError,
  type DiscoveryConfigInput,
} from 'ssdp-core';

import { resolveDiscoveryDefaults, type DiscoveryDefaults } from './config';
import type { ProcessedEnv } from './envLoader';
import { renderJson, renderText } from './render';

const logger = createModuleLogger('cli');

export const PROGRAM_NAME = 'ssdp-discover';

// דגלים דו-אותיות עם מקף יחיד, שאינם נתמכים ב-commander
const LEGACY_FLAGS: Readonly<Record<string, string>> = {
  '-st': '--search-target',
  '-mx': '--max-wait',
};

export interface CliOptions {
  searchTarget: string;
  maxWait: number;
  timeout?: number;
  retries: number;
  verbose?: boolean;
  ipv6?: boolean;
  json?: boolean;
}

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface RunCliOptions {
  discover?: typeof discoverServices;
  env?: ProcessedEnv;
  io?: CliIo;
  abortSignal?: AbortSignal;
}

const processIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

/**
 * ממיר את `-st` ו-`-mx` (כולל הצורה `-st=value`) לדגלים הארוכים.
 * שאר הארגומנטים, וכל מה שאחרי `--`, נשארים כפי שהם.
 */
export function normalizeLegacyFlags(argv: readonly string[]): string[] {
  const normalized: string[] = [];
  let passthrough = false;

  for (const arg of argv) {
    if (passthrough || arg === '--') {
      passthrough = true;
      normalized.push(arg);
      continue;
    }
    const [flag, ...rest] = arg.split('=');
    const longFlag = LEGACY_FLAGS[flag];
    if (longFlag === undefined) {
      normalized.push(arg);
    } else {
      normalized.push(rest.length > 0 ? `${longFlag}=${rest.join('=')}` : longFlag);
    }
  }
  return normalized;
}

function parseNumberArgument(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function buildProgram(defaults: DiscoveryDefaults, io: CliIo = processIo): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Discover UPnP/SSDP services on the local network with M-SEARCH')
    .option('--search-target <st>', 'SSDP search target, also -st', defaults.searchTarget)
    .option('--max-wait <seconds>', 'MX value sent to responders (1-5), also -mx', parseNumberArgument, defaults.maxWait)
    .option('-t, --timeout <seconds>', 'listen window per round (default: max-wait + 1)', parseNumberArgument, defaults.timeout)
    .option('-r, --retries <count>', 'additional search rounds', parseNumberArgument, defaults.retries)
    .option('-v, --verbose', 'log skipped replies and per-round progress')
    .option('-6, --ipv6', 'search the IPv6 link-local group FF02::C')
    .option('--json', 'print the result as a JSON array')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str.trimEnd()),
      writeErr: (str) => io.stderr(str.trimEnd()),
    });

  return program;
}

export function toDiscoveryConfig(options: CliOptions): DiscoveryConfigInput {
  return {
    searchTarget: options.searchTarget,
    maxWaitSeconds: options.maxWait,
    timeoutSeconds: options.timeout,
    retryCount: options.retries,
    verbose: options.verbose === true,
    ipVersion: options.ipv6 === true ? 6 : 4,
  };
}

/**
 * @hebrew מריץ את ה-CLI על ארגומנטים של המשתמש (ללא node ושם הסקריפט).
 * @returns קוד היציאה: 0 לכל ריצה שהסתיימה (גם בלי תוצאות), 1 לתצורה שגויה או לכשל סוקט.
 */
export async function runCli(argv: readonly string[], options: RunCliOptions = {}): Promise<number> {
  const io = options.io ?? processIo;
  const discover = options.discover ?? discoverServices;
  const program = buildProgram(resolveDiscoveryDefaults(options.env), io);

  try {
    program.parse(normalizeLegacyFlags(argv), { from: 'user' });
  } catch (err) {
    // עזרה, דגל לא מוכר וארגומנט לא תקין מגיעים לכאן בזכות exitOverride
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const cliOptions = program.opts<CliOptions>();
  // -v לא מוריד רמה מפורטת יותר שהוגדרה ב-LOG_LEVEL
  if (cliOptions.verbose) {
    raiseLogLevel('debug');
  }

  try {
    const result = await discover(toDiscoveryConfig(cliOptions), { abortSignal: options.abortSignal });
    if (cliOptions.json) {
      io.stdout(renderJson(result));
    } else {
      renderText(result).forEach((line) => io.stdout(line));
    }
    return 0;
  } catch (err) {
    if (err instanceof InvalidConfigError || err instanceof SocketError) {
      logger.debug(`Discovery aborted: ${err.code}`);
      io.stderr(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
