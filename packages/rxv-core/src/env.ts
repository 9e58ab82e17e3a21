import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

// טעינת .env מתיקיית העבודה, אם קיים. ערכים שכבר מוגדרים בסביבה לא נדרסים.
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    console.warn(`[EnvLoader] Error loading .env file from ${envPath}:`, result.error.message);
  }
}

/**
 * בודק אם מחרוזת ניתנת להמרה למספר ללא איבוד מידע
 * (מספר סופי, וייצוגים כמו "1" ו-"1.0" נחשבים זהים).
 */
export function isStringLosslesslyNumeric(value: string | undefined): value is string {
  if (value === undefined || value.trim() === '') {
    return false;
  }
  const num = Number(value);
  if (!isFinite(num)) {
    return false;
  }
  return String(num) === value || num === parseFloat(value);
}

export type EnvValue = string | number | undefined;

/**
 * מעבד את process.env וממיר ערכים מספריים למספרים.
 * נקרא מחדש בכל פעם כדי לשקף שינויים בסביבה (למשל בבדיקות).
 */
export const getProcessedEnv = (): Record<string, EnvValue> => {
  const processed: Record<string, EnvValue> = {};
  for (const [key, value] of Object.entries(process.env)) {
    processed[key] = isStringLosslesslyNumeric(value) ? Number(value) : value;
  }
  return processed;
};
