import { DEFAULT_MAX_WAIT_SECONDS, DEFAULT_RETRY_COUNT, DEFAULT_SEARCH_TARGET } from 'ssdp-core';
import { getProcessedEnv, type ProcessedEnv } from './envLoader';

/**
 * ערכי ברירת המחדל של ה-CLI. כל ערך ניתן לדריסה במשתנה סביבה בשם
 * DISCOVERY_<KEY> (למשל maxWait ← DISCOVERY_MAX_WAIT); דגלי שורת הפקודה גוברים על שניהם.
 */
export interface DiscoveryDefaults {
  searchTarget: string;
  maxWait: number;
  /** Undefined means MX + 1, decided when the configuration is validated. */
  timeout?: number;
  retries: number;
}

const defaultConfig: DiscoveryDefaults = {
  searchTarget: DEFAULT_SEARCH_TARGET,
  maxWait: DEFAULT_MAX_WAIT_SECONDS,
  timeout: undefined,
  retries: DEFAULT_RETRY_COUNT,
};

// פונקציית עזר להמרת camelCase ל-SNAKE_CASE
const camelToSnakeCase = (str: string) => str.replace(/[A-Z]/g, letter => `_${letter}`).toUpperCase();

export const envVarNameFor = (key: keyof DiscoveryDefaults): string => ['discovery', key].map(camelToSnakeCase).join('_');

// ערך שאינו מספר הופך ל-NaN ונדחה בהמשך באימות התצורה
const toNumber = (value: string | number | undefined): number | undefined => {
  if (value === undefined || value === '') return undefined;
  return typeof value === 'number' ? value : Number(value);
};

/**
 * @hebrew מחשב את ברירות המחדל של ה-CLI ממשתני הסביבה.
 */
export function resolveDiscoveryDefaults(env: ProcessedEnv = getProcessedEnv()): DiscoveryDefaults {
  const searchTarget = env[envVarNameFor('searchTarget')];

  return {
    searchTarget: searchTarget === undefined || searchTarget === '' ? defaultConfig.searchTarget : String(searchTarget),
    maxWait: toNumber(env[envVarNameFor('maxWait')]) ?? defaultConfig.maxWait,
    timeout: toNumber(env[envVarNameFor('timeout')]) ?? defaultConfig.timeout,
    retries: toNumber(env[envVarNameFor('retries')]) ?? defaultConfig.retries,
  };
}
