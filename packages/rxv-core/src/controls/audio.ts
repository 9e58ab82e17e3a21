import type { RxvSession } from '../session';
import { Commands, decodeVolumeLevel } from '../commandCodec';
import { ValidationError } from '../errors';
import { createModuleLogger } from '../logger';
import { delay } from '../utils';
import { levelToVolume } from '../volumeScale';

const logger = createModuleLogger('AudioControl');

/**
 * # Audio Control
 * עוצמה והשתקה של האזור.
 */

/**
 * מחזיר את העוצמה הנוכחית בדציבלים.
 * @param session - בקר האזור.
 */
export async function getVolume(session: RxvSession): Promise<number> {
    const response = await session.request(Commands.getVolume());
    return decodeVolumeLevel(response, [session.zone, 'Volume', 'Lvl']);
}

/**
 * מגדיר עוצמה בדציבלים. הערך נחתך לצעד חצי dB לפני השליחה.
 * @param session - בקר האזור.
 * @param db - עוצמת היעד (בדרך כלל -80.0 עד +15.0).
 */
export async function setVolume(session: RxvSession, db: number): Promise<void> {
    if (!Number.isFinite(db)) {
        throw new ValidationError(`Volume must be a finite number, got ${db}`);
    }
    await session.request(Commands.setVolume(db));
}

/**
 * מגדיר עוצמה מנורמלת (0..1) על פני הטווח הפיזי של המקלט.
 */
export async function setVolumeLevel(session: RxvSession, level: number): Promise<void> {
    if (!Number.isFinite(level)) {
        throw new ValidationError(`Volume level must be a finite number, got ${level}`);
    }
    await setVolume(session, levelToVolume(level));
}

/**
 * מעביר את העוצמה ליעד בצעדים של 1 dB, עם השהיה בין צעד לצעד.
 */
export async function fadeVolume(session: RxvSession, targetDb: number): Promise<void> {
    if (!Number.isFinite(targetDb)) {
        throw new ValidationError(`Volume must be a finite number, got ${targetDb}`);
    }
    const start = Math.floor(await getVolume(session));
    const step = targetDb > start ? 1 : -1;
    logger.debug(`fadeVolume: ${start} dB -> ${targetDb} dB`, { zone: session.zone });
    for (let value = start + step; step > 0 ? value < targetDb : value > targetDb; value += step) {
        await setVolume(session, value);
        await delay(session.settings.volumeFadeStepDelayMs, session.signal);
    }
    await setVolume(session, targetDb);
}

export async function getMute(session: RxvSession): Promise<boolean> {
    const response = await session.request(Commands.getMute());
    return response.requireText([session.zone, 'Volume', 'Mute']) === 'On';
}

/**
 * @param muted - `true` להשתקה, `false` לביטול.
 */
export async function setMute(session: RxvSession, muted: boolean): Promise<void> {
    await session.request(Commands.setMute(muted));
}
