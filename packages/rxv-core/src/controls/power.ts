import type { RxvSession } from '../session';
import { Commands, decodeBasicStatus } from '../commandCodec';
import { ValidationError } from '../errors';
import { SLEEP_TIMER_VALUES, type BasicStatus, type SleepTimer } from '../types';

/**
 * # Power Control
 * הפעלה, המתנה (Standby), טיימר שינה ומצב בסיסי של האזור.
 */

/**
 * מחזיר האם האזור דולק.
 * @param session - בקר האזור.
 */
export async function getPower(session: RxvSession): Promise<boolean> {
    const response = await session.request(Commands.getPower());
    return response.requireText([session.zone, 'Power_Control', 'Power']) === 'On';
}

/**
 * מדליק את האזור או מעביר אותו להמתנה.
 * @param session - בקר האזור.
 * @param on - `true` להדלקה, `false` ל-Standby.
 */
export async function setPower(session: RxvSession, on: boolean): Promise<void> {
    await session.request(Commands.setPower(on));
}

export async function getSleep(session: RxvSession): Promise<string> {
    const response = await session.request(Commands.getSleep());
    return response.requireText([session.zone, 'Power_Control', 'Sleep']);
}

/**
 * @param value - אחד מערכי הטיימר הנתמכים (`Off`, `30 min` ... `Last`).
 */
export async function setSleep(session: RxvSession, value: SleepTimer): Promise<void> {
    if (!SLEEP_TIMER_VALUES.some(allowed => allowed === value)) {
        throw new ValidationError(`Invalid sleep timer "${value}". Allowed: ${SLEEP_TIMER_VALUES.join(', ')}`);
    }
    await session.request(Commands.setSleep(value));
}

/**
 * מחזיר את המצב הבסיסי של האזור בבקשה אחת: הפעלה, עוצמה, השתקה וקלט.
 */
export async function getBasicStatus(session: RxvSession): Promise<BasicStatus> {
    const response = await session.request(Commands.basicStatus());
    return decodeBasicStatus(response, session.zone);
}
