import type { RxvSession } from '../session';
import { Commands, resolveSoundProgram } from '../commandCodec';
import { UnsupportedOperationError, ValidationError } from '../errors';
import { createModuleLogger } from '../logger';

const logger = createModuleLogger('SoundControl');

export const DIRECT = 'Direct';
export const STRAIGHT = 'Straight';

/**
 * # Sound Control
 * תוכניות סראונד, מצב Direct, Adaptive DRC ורמת דיאלוג.
 * מצב Direct מסתיר את בורר התוכנית, ולכן כל שינוי תוכנית מכבה אותו קודם.
 */

export function getSurroundPrograms(session: RxvSession): readonly string[] {
    return session.capabilities.surroundPrograms(session.zone);
}

/**
 * מחזיר האם מצב Direct פעיל. אזור שאינו מצהיר על Direct מחזיר `false` בלי לפנות להתקן.
 */
export async function getDirectMode(session: RxvSession): Promise<boolean> {
    if (!getSurroundPrograms(session).includes(DIRECT)) {
        return false;
    }
    const response = await session.request(Commands.getDirectMode());
    return response.requireText([session.zone, 'Sound_Video', 'Direct', 'Mode']) === 'On';
}

export async function setDirectMode(session: RxvSession, on: boolean): Promise<void> {
    if (!getSurroundPrograms(session).includes(DIRECT)) {
        throw new UnsupportedOperationError(session.zone, 'Direct mode');
    }
    await session.request(Commands.setDirectMode(on));
}

/**
 * מחזיר את התוכנית הפעילה, בסדר עדיפות Direct, Straight ואז שם התוכנית.
 */
export async function getSurroundProgram(session: RxvSession): Promise<string | undefined> {
    if (await getDirectMode(session)) {
        return DIRECT;
    }
    const response = await session.request(Commands.getSurroundProgram());
    const current = [session.zone, 'Surround', 'Program_Sel', 'Current'];
    return resolveSoundProgram({
        straight: response.text([...current, 'Straight']),
        program: response.text([...current, 'Sound_Program']),
    });
}

/**
 * בוחר תוכנית סראונד. אם Direct פעיל ומבוקשת תוכנית אחרת, Direct מכובה קודם.
 * @param program - אחת התוכניות של האזור, כולל `Straight` ו-`Direct`.
 * @throws ValidationError אם התוכנית אינה מוצהרת עבור האזור.
 */
export async function setSurroundProgram(session: RxvSession, program: string): Promise<void> {
    const programs = getSurroundPrograms(session);
    if (!programs.includes(program)) {
        throw new ValidationError(`Zone ${session.zone} has no surround program "${program}"`);
    }

    if (program === DIRECT) {
        await session.request(Commands.setDirectMode(true));
        return;
    }

    if (await getDirectMode(session)) {
        logger.debug(`setSurroundProgram: Clearing Direct mode before selecting ${program}`, { zone: session.zone });
        await session.request(Commands.setDirectMode(false));
    }

    await session.request(program === STRAIGHT ? Commands.setStraight() : Commands.setSoundProgram(program));
}

/**
 * @returns `true` כאשר Adaptive DRC במצב Auto.
 */
export async function getAdaptiveDrc(session: RxvSession): Promise<boolean> {
    const response = await session.request(Commands.getAdaptiveDrc());
    return response.requireText([session.zone, 'Sound_Video', 'Adaptive_DRC']) !== 'Off';
}

export async function setAdaptiveDrc(session: RxvSession, auto: boolean): Promise<void> {
    await session.request(Commands.setAdaptiveDrc(auto ? 'Auto' : 'Off'));
}

const assertDialogueSupported = (session: RxvSession): void => {
    if (!session.capabilities.supportsCommand(session.zone, 'Sound_Video', 'Dialogue_Adjust', 'Dialogue_Lvl')) {
        throw new UnsupportedOperationError(session.zone, 'Dialogue_Lvl');
    }
};

export async function getDialogueLevel(session: RxvSession): Promise<number> {
    assertDialogueSupported(session);
    const response = await session.request(Commands.getDialogueLevel());
    const text = response.requireText([session.zone, 'Sound_Video', 'Dialogue_Adjust', 'Dialogue_Lvl']);
    return parseInt(text, 10);
}

/**
 * @param level - 0 (כבוי) עד 3.
 */
export async function setDialogueLevel(session: RxvSession, level: number): Promise<void> {
    assertDialogueSupported(session);
    if (!Number.isInteger(level) || level < 0 || level > 3) {
        throw new ValidationError(`Dialogue level must be an integer between 0 and 3, got ${level}`);
    }
    await session.request(Commands.setDialogueLevel(level));
}
