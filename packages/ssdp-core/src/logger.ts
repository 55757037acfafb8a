import * as winston from 'winston';

/*
```sh
LOG_LEVEL=debug LOG_MODULES=discoverySession,responseParser npm run discover
LOG_TO_FILE=true LOG_FILE_PATH=logs/discovery.log npm run discover
```
*/

// רמות לוג מותאמות: trace מחליף את http, verbose ו-silly של winston
const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export type LogLevel = keyof typeof logLevels;

// הרחבת הטיפוס של winston.Logger כך ש-TypeScript יכיר את trace() ושאר הרמות
export type CustomLogger = winston.Logger & {
  [level in LogLevel]: winston.LeveledLogMethod;
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'magenta',
};

winston.addColors(logColors);

// כל הלוגרים שנוצרו, כדי ש-setLogLevel ישפיע גם על מודולים שכבר נטענו
const createdLoggers = new Set<CustomLogger>();
let levelOverride: LogLevel | undefined;

const RESERVED_INFO_KEYS = new Set(['level', 'message', 'timestamp', 'label', 'module', 'environment', 'stack']);

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(logLevels, value);
}

function splitModuleList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(m => m.trim()).filter(m => m);
}

// --- פורמטים ---

// הסתרת מודולים לפי LOG_HIDE_MODULES
const hideByModuleNameFormat = winston.format((info) => {
  const hiddenModules = splitModuleList(process.env.LOG_HIDE_MODULES);
  if (hiddenModules.length > 0 && typeof info.label === 'string' && hiddenModules.includes(info.label)) {
    return false;
  }
  return info;
});

// הצגה סלקטיבית לפי LOG_MODULES ("*" או ריק = הכל)
const filterByModuleNameFormat = winston.format((info) => {
  const logModulesEnv = process.env.LOG_MODULES;
  if (!logModulesEnv || logModulesEnv.trim() === '' || logModulesEnv.trim() === '*') {
    return info;
  }
  const allowedModules = splitModuleList(logModulesEnv);
  if (allowedModules.length > 0 && typeof info.label === 'string' && !allowedModules.includes(info.label)) {
    return false;
  }
  return info;
});

/**
 * @hebrew מפרמט את המטא-דאטה של רשומת לוג, כולל טיפול בשגיאות ובשגיאות סוקט של Node.
 * @param metadata - שדות הרשומה שאינם חלק מהכותרת.
 * @returns מחרוזת מפורמטת, עם רווח מוביל אם יש תוכן.
 */
export function formatLogMetadata(metadata: Record<string, unknown>): string {
  const entries = Object.entries(metadata).filter(([key]) => !RESERVED_INFO_KEYS.has(key));
  if (entries.length === 0) {
    return '';
  }

  const metaString = entries
    .map(([key, value]) => {
      if (value instanceof Error) {
        const code = 'code' in value && value.code !== undefined ? ` (code: ${String(value.code)})` : '';
        return `${key}=${value.name}: ${value.message}${code}`;
      }
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=[UnstringifiableObject]`;
      }
    })
    .join(' ');

  return metaString ? ` ${metaString}` : '';
}

function renderLine(info: winston.Logform.TransformableInfo, levelText: string): string {
  const environment = typeof info.environment === 'string' ? info.environment.toUpperCase() : 'UNKNOWN';
  let logMessage = `${String(info.timestamp)} [${environment}] [${levelText}]`;
  if (typeof info.module === 'string') {
    logMessage += ` (${info.module})`;
  }
  logMessage += `: ${String(info.message)}`;
  logMessage += formatLogMetadata({ ...info });
  if (typeof info.stack === 'string') {
    logMessage += `\n${info.stack}`;
  }
  return logMessage;
}

// פורמט טקסט ללא צבעים (משמש לקובץ)
const createTextFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => renderLine(info, info.level.toUpperCase())),
);

export const consoleFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => renderLine(info, info.level.toUpperCase().padEnd(5))),
  winston.format.colorize({ colors: logColors, message: true, level: true, all: true }),
);

export const fileFormat = () => createTextFormat();

const createFileTransport = (filename: string) => new winston.transports.File({
  filename,
  format: fileFormat(),
  maxsize: 5242880, // 5MB
  maxFiles: 5,
  tailable: true,
});

// --- יצירת לוגר ---

// מתגי הקונסול והקובץ נקראים מהסביבה בכל בנייה, לא רק בטעינת המודול
const buildTransports = (): winston.transport[] => {
  const activeTransports: winston.transport[] = [];

  if (process.env.LOG_TO_CONSOLE === 'true' || process.env.LOG_TO_CONSOLE === undefined) {
    activeTransports.push(new winston.transports.Console({
      format: consoleFormat(),
      // הלוגים נכתבים ל-stderr כדי שלא יתערבבו עם הפלט של ה-CLI
      stderrLevels: Object.keys(logLevels),
    }));
  }

  if (process.env.LOG_TO_FILE === 'true') {
    activeTransports.push(createFileTransport(process.env.LOG_FILE_PATH || 'logs/app.log'));
  }

  return activeTransports;
};

// --- יצירת לוגר ---

const createModuleLogger = (moduleName: string): CustomLogger => {
  const environment = process.env.NODE_ENV || 'unknown';
  const activeTransports = buildTransports();
  const logToFile = process.env.LOG_TO_FILE === 'true';

  const logger = winston.createLogger({
    level: currentLogLevel(),
    levels: logLevels,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format((info) => {
        info.environment = environment;
        info.module = moduleName;
        // hideByModuleNameFormat ו-filterByModuleNameFormat מסננים לפי label
        info.label = moduleName;
        return info;
      })(),
      winston.format.errors({ stack: true }),
    ),
    transports: activeTransports,
    // קבצי exceptions/rejections נוצרים רק כשרישום לקובץ מופעל
    exceptionHandlers: logToFile
      ? [createFileTransport(process.env.LOG_EXCEPTIONS_PATH || 'logs/exceptions.log')]
      : undefined,
    rejectionHandlers: logToFile
      ? [createFileTransport(process.env.LOG_REJECTIONS_PATH || 'logs/rejections.log')]
      : undefined,
    silent: activeTransports.length === 0,
    exitOnError: false,
  }) as CustomLogger;

  createdLoggers.add(logger);
  return logger;
};

/**
 * @hebrew הרמה האפקטיבית: זו שנקבעה ב-setLogLevel, אחרת LOG_LEVEL, אחרת info.
 */
export function currentLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  return levelOverride ?? (isLogLevel(envLevel) ? envLevel : 'info');
}

/**
 * @hebrew משנה את רמת הלוג של כל הלוגרים הקיימים ושל אלה שייווצרו בהמשך.
 */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  for (const logger of createdLoggers) {
    logger.level = level;
  }
}

/**
 * מעלה את רמת הלוג רק אם היא מפורטת יותר מהנוכחית.
 */
export function raiseLogLevel(level: LogLevel): void {
  if (logLevels[level] > logLevels[currentLogLevel()]) {
    setLogLevel(level);
  }
}

/**
 * @hebrew בונה מחדש את ה-transports ואת הרמה של כל הלוגרים הקיימים לפי משתני הסביבה.
 * נחוץ כש-.env נטען אחרי שהמודולים כבר יצרו את הלוגרים שלהם.
 */
export function configureLoggersFromEnv(): void {
  for (const logger of createdLoggers) {
    const activeTransports = buildTransports();
    logger.clear();
    activeTransports.forEach((transport) => logger.add(transport));
    logger.silent = activeTransports.length === 0;
    logger.level = currentLogLevel();
  }
}

export default createModuleLogger;

export { createTextFormat, createModuleLogger };
