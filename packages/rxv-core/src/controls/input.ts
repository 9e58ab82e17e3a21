import type { RxvSession } from '../session';
import { Commands } from '../commandCodec';

/**
 * # Input Control
 * בחירת קלט, מיפוי קלט למקור פנימי וסצנות.
 */

export function getInputs(session: RxvSession): readonly string[] {
    return session.capabilities.inputs;
}

export async function getInput(session: RxvSession): Promise<string> {
    const response = await session.request(Commands.getInput());
    return response.requireText([session.zone, 'Input', 'Input_Sel']);
}

/**
 * בוחר קלט. קלט שאינו ידוע נדחה מקומית, בלי בקשה להתקן.
 * @param name - שם הקלט כפי שההתקן מציג אותו (למשל `NET RADIO`).
 * @throws ValidationError אם הקלט אינו קיים.
 */
export async function setInput(session: RxvSession, name: string): Promise<void> {
    session.capabilities.assertInput(name);
    await session.request(Commands.setInput(name));
}

/**
 * ממפה קלט לצומת המקור שמקבל את פקודות הניגון והתפריט שלו.
 * קלטי HDMI מנותבים דרך האזור עצמו (פקודות CEC).
 * @returns שם המקור, או undefined לקלט לא ידוע או לקלט ללא צומת מקור.
 */
export function sourceForInput(session: RxvSession, name: string): string | undefined {
    if (!session.capabilities.hasInput(name)) {
        return undefined;
    }
    if (name.toUpperCase().startsWith('HDMI')) {
        return session.zone;
    }
    return session.capabilities.sourceOfInput(name);
}

/**
 * מחזיר את הקלט הנוכחי ואת המקור שלו.
 * @param name - קלט ידוע מראש (למשל מתוך המצב הבסיסי) כדי לחסוך בקשה.
 */
export async function getCurrentSource(
    session: RxvSession,
    name?: string,
): Promise<{ input: string; source: string | undefined }> {
    const input = name ?? await getInput(session);
    return { input, source: sourceForInput(session, input) };
}

/**
 * מחזיר האם המקור של הקלט הנוכחי מוכן (Feature_Availability).
 * קלט ללא צומת מקור משלו (כולל HDMI) מוכן מיד.
 */
export async function isReady(session: RxvSession): Promise<boolean> {
    const input = await getInput(session);
    const source = session.capabilities.hasInput(input) ? session.capabilities.sourceOfInput(input) : undefined;
    if (!source) {
        return true;
    }
    const response = await session.request(Commands.getSourceConfig(source));
    return response.requireFirstText('Feature_Availability') === 'Ready';
}

export function getScenes(session: RxvSession): readonly string[] {
    return session.capabilities.scenes;
}

/**
 * מפעיל סצנה לפי שמה.
 * @throws ValidationError אם הסצנה אינה קיימת.
 */
export async function setScene(session: RxvSession, scene: string): Promise<void> {
    const code = session.capabilities.sceneCode(scene);
    await session.request(Commands.setScene(code));
}
