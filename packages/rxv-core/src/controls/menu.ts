import type { RxvSession } from '../session';
import { Commands, decodeMenuStatus, type Command } from '../commandCodec';
import { MenuTraversalError, UnsupportedOperationError, ValidationError } from '../errors';
import { createModuleLogger } from '../logger';
import { CursorAction, type MenuStatus } from '../types';
import { delay } from '../utils';
import { getCurrentSource, setInput, sourceForInput } from './input';

const logger = createModuleLogger('MenuControl');

/**
 * # Menu Control
 * ניווט בתפריט ההיררכי של מקורות רשת (NET RADIO, SERVER) ופקודות סמן.
 */

export const NET_RADIO_INPUT = 'NET RADIO';
export const SERVER_INPUT = 'SERVER';
export const PATH_SEPARATOR = '>';

const CURSOR_ACTIONS: readonly string[] = Object.values(CursorAction);

export interface MenuNavigationResult {
    /** מספר דגימות מצב התפריט שנדרשו אחרי האיפוס. */
    attempts: number;
    /** מצב התפריט בשכבה האחרונה, לפני הבחירה בה. */
    menu: MenuStatus;
}

async function requireCurrentSource(session: RxvSession): Promise<string> {
    const { input, source } = await getCurrentSource(session);
    if (!source) {
        throw new UnsupportedOperationError(input, 'menu navigation');
    }
    return source;
}

async function getMenuStatusFor(session: RxvSession, source: string): Promise<MenuStatus> {
    const response = await session.request(Commands.getListInfo(source));
    return decodeMenuStatus(response);
}

/**
 * מחזיר את מצב התפריט של המקור הנוכחי.
 */
export async function getMenuStatus(session: RxvSession): Promise<MenuStatus> {
    return getMenuStatusFor(session, await requireCurrentSource(session));
}

export async function getCursorActions(session: RxvSession): Promise<readonly string[]> {
    const source = await requireCurrentSource(session);
    return session.capabilities.hasCursorSource(source) ? session.capabilities.cursorActions(source) : [];
}

async function sendCursor(session: RxvSession, source: string, action: CursorAction): Promise<void> {
    if (!CURSOR_ACTIONS.includes(action)) {
        throw new ValidationError(`Unknown cursor action "${action}"`);
    }
    const { capabilities } = session;
    let command: Command;
    if (capabilities.supportsCommand(source, 'List_Control', 'Cursor')) {
        command = Commands.listCursor(source, action);
    } else if (capabilities.supportsCommand(source, 'Cursor_Control', 'Cursor')) {
        command = Commands.cursorControl(source, action);
    } else {
        throw new UnsupportedOperationError(source, 'menu cursor');
    }
    if (!capabilities.supportsCursorAction(source, action)) {
        throw new UnsupportedOperationError(source, `menu cursor ${action}`);
    }
    await session.request(command);
}

/**
 * שולח פעולת סמן למקור הנוכחי (List_Control או Cursor_Control, לפי רשימת הפקודות).
 * @throws UnsupportedOperationError כשהמקור אינו תומך בסמן או בפעולה הזו.
 */
export async function menuCursor(session: RxvSession, action: CursorAction): Promise<void> {
    await sendCursor(session, await requireCurrentSource(session), action);
}

/**
 * @param line - מספר השורה ברשימה (מתחיל ב-1).
 */
export async function menuJumpLine(session: RxvSession, line: number): Promise<void> {
    if (!Number.isInteger(line) || line < 1) {
        throw new ValidationError(`Menu line must be a positive integer, got ${line}`);
    }
    await session.request(Commands.jumpLine(await requireCurrentSource(session), line));
}

async function resetMenuFor(session: RxvSession, source: string): Promise<MenuStatus> {
    const maxAttempts = session.settings.menuMaxAttempts;
    let status = await getMenuStatusFor(session, source);
    for (let attempt = 0; status.layer > 1; attempt++) {
        if (attempt >= maxAttempts) {
            throw new MenuTraversalError('(menu root)', attempt, status);
        }
        await sendCursor(session, source, CursorAction.Return);
        status = await getMenuStatusFor(session, source);
    }
    return status;
}

/**
 * מחזיר את התפריט לשכבה הראשונה על ידי "Return" חוזר.
 */
export async function menuReset(session: RxvSession): Promise<MenuStatus> {
    return resetMenuFor(session, await requireCurrentSource(session));
}

const lineNumber = (lineId: string): number | undefined => {
    const match = /(\d+)$/.exec(lineId);
    return match ? parseInt(match[1] ?? '', 10) : undefined;
};

/**
 * מנווט לפריט בתפריט לפי נתיב שכבות, למשל `Bookmarks>Internet>Radio Paradise`.
 * בכל דגימה: אם התפריט לא מוכן ממתינים; אם מוכן מחפשים בעמוד הנוכחי שורה שהטקסט שלה
 * זהה למקטע של השכבה הנוכחית ובוחרים בה. אין גלילה לעמודים נוספים.
 * @param inputName - קלט הרשת (למשל `NET RADIO`).
 * @param path - שמות השכבות, מופרדים ב-`>`.
 * @throws MenuTraversalError אם השכבה האחרונה לא נבחרה בתוך מספר הניסיונות.
 */
export async function navigateMenuPath(
    session: RxvSession,
    inputName: string,
    path: string,
): Promise<MenuNavigationResult> {
    const layers = path.split(PATH_SEPARATOR);
    if (layers.some(layer => layer === '')) {
        throw new ValidationError(`Invalid menu path "${path}"`);
    }
    session.capabilities.assertInput(inputName);
    const source = sourceForInput(session, inputName);
    if (!source) {
        throw new UnsupportedOperationError(inputName, 'menu navigation');
    }

    await setInput(session, inputName);
    await resetMenuFor(session, source);

    const { menuMaxAttempts, menuRetryDelayMs } = session.settings;
    let lastStatus: MenuStatus | null = null;

    for (let attempt = 1; attempt <= menuMaxAttempts; attempt++) {
        const status = await getMenuStatusFor(session, source);
        lastStatus = status;

        if (!status.ready) {
            logger.trace(`navigateMenuPath: Menu not ready (attempt ${attempt}/${menuMaxAttempts})`);
            await delay(menuRetryDelayMs, session.signal);
            continue;
        }

        const target = layers[status.layer - 1];
        const match = [...status.currentList].find(([, text]) => text === target);
        const line = match ? lineNumber(match[0]) : undefined;
        if (line === undefined) {
            logger.debug(`navigateMenuPath: "${target ?? ''}" not on the current page of layer ${status.layer}`);
            continue;
        }

        logger.debug(`navigateMenuPath: Selecting "${target ?? ''}" (line ${line}) at layer ${status.layer}`);
        await session.request(Commands.directSelect(source, line));
        if (status.layer === layers.length) {
            logger.info(`navigateMenuPath: Reached "${path}" after ${attempt} attempts`);
            return { attempts: attempt, menu: status };
        }
    }

    logger.warn(`navigateMenuPath: Gave up on "${path}" after ${menuMaxAttempts} attempts`, {
        layer: lastStatus?.layer,
        ready: lastStatus?.ready,
    });
    throw new MenuTraversalError(path, menuMaxAttempts, lastStatus);
}

export const setNetRadio = (session: RxvSession, path: string): Promise<MenuNavigationResult> =>
    navigateMenuPath(session, NET_RADIO_INPUT, path);

export const setServer = (session: RxvSession, path: string): Promise<MenuNavigationResult> =>
    navigateMenuPath(session, SERVER_INPUT, path);
