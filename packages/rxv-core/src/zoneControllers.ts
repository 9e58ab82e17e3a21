import type { RxvSession } from './session';

/**
 * # Zone Controllers
 * בקר עצמאי לכל אזור. כל הבקרים חולקים את סט היכולות ואת ערוץ השליטה,
 * וכל אחד מחזיק את בחירת האזור שלו.
 */

/**
 * @hebrew יוצר בקר לאזור הנתון.
 * @throws ValidationError אם האזור אינו קיים בסט היכולות.
 */
export function createZoneController(session: RxvSession, zone: string): RxvSession {
  return session.forZone(zone);
}

/**
 * @hebrew בקר אחד לכל אזור שהתגלה, לפי סדר האזורים בקובץ התיאור.
 */
export function createZoneControllers(session: RxvSession): Map<string, RxvSession> {
  return new Map(session.capabilities.zones.map(zone => [zone, createZoneController(session, zone)] as const));
}
