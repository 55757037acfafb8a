import dotenv from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';

// אין לייבא כאן את ssdp-core: הלוגרים שלו קוראים את LOG_TO_FILE ו-LOG_TO_CONSOLE בזמן הטעינה

export type ProcessedEnv = Record<string, string | number | undefined>;

// נתיב לקובץ .env בשורש המאגר
const rootEnvPath = path.resolve(__dirname, '../../../.env');

/**
 * טוען קובץ .env אם הוא קיים.
 * @returns true אם הקובץ נטען.
 */
export const loadEnvFile = (filePath: string, override: boolean = false): boolean => {
  if (!fs.existsSync(filePath)) {
    return false;
  }
  const result = dotenv.config({ path: filePath, override });
  if (result.error) {
    console.warn(`[EnvLoader] Error loading .env file from ${filePath}:`, result.error.message);
    return false;
  }
  return true;
};

/**
 * @hebrew טוען את קובץ ה-.env של שורש המאגר, ואחריו את זה של תיקיית העבודה
 * (עם override, כך שערכים מקומיים דורסים את הגלובליים).
 */
export function loadEnvironment(workingDirectory: string = process.cwd()): void {
  loadEnvFile(rootEnvPath);
  const localEnvPath = path.resolve(workingDirectory, '.env');
  if (localEnvPath !== rootEnvPath) {
    loadEnvFile(localEnvPath, true);
  }
}

/**
 * בודק אם מחרוזת ניתנת להמרה למספר ללא איבוד מידע ("1" ו-"1.0" נחשבים שווים).
 */
export function isStringLosslesslyNumeric(value: unknown): value is string {
  if (typeof value !== 'string' || value.trim() === '') {
    return false;
  }

  const num = Number(value);
  if (!Number.isFinite(num)) {
    return false;
  }

  return String(num) === value || num === Number.parseFloat(value);
}

/**
 * @hebrew מחזיר עותק של משתני הסביבה שבו ערכים מספריים הומרו למספרים.
 */
export const getProcessedEnv = (source: NodeJS.ProcessEnv = process.env): ProcessedEnv => {
  const processed: ProcessedEnv = {};

  for (const [key, value] of Object.entries(source)) {
    processed[key] = isStringLosslesslyNumeric(value) ? Number(value) : value;
  }
  return processed;
};
