import type { RxvSession } from '../session';
import { Commands, decodePlayStatus } from '../commandCodec';
import { UnsupportedOperationError, ValidationError } from '../errors';
import { PlaybackAction, type PlaybackSupport, type PlayStatus } from '../types';
import { getCurrentSource } from './input';

/**
 * # Playback Control
 * מצב ניגון ופקודות ניגון, לפי המקור של הקלט הנוכחי.
 */

const PLAYBACK_ACTIONS: readonly string[] = Object.values(PlaybackAction);

const supportsPlayInfo = (session: RxvSession, source: string | undefined): source is string =>
    source !== undefined && session.capabilities.supportsCommand(source, 'Play_Info');

/**
 * מחזיר את מצב הניגון של הקלט הנוכחי, או null כשהמקור אינו תומך ב-Play_Info.
 * @param inputName - הקלט הנוכחי אם כבר ידוע.
 */
export async function getPlayStatus(session: RxvSession, inputName?: string): Promise<PlayStatus | null> {
    const { source } = await getCurrentSource(session, inputName);
    if (!supportsPlayInfo(session, source)) {
        return null;
    }
    const response = await session.request(Commands.getPlayInfo(source));
    return decodePlayStatus(response, source);
}

/**
 * מחזיר אילו פקודות ניגון המקור הנוכחי מצהיר עליהן.
 */
export async function getPlaybackSupport(session: RxvSession, inputName?: string): Promise<PlaybackSupport> {
    const { source } = await getCurrentSource(session, inputName);
    // מקור ללא Play_Info לא מקבל פקודות ניגון (ראו playbackControl)
    const supports = (action: PlaybackAction) =>
        supportsPlayInfo(session, source) && session.capabilities.supportsPlayMethod(source, action);
    return {
        play: supports(PlaybackAction.Play),
        pause: supports(PlaybackAction.Pause),
        stop: supports(PlaybackAction.Stop),
        skipForward: supports(PlaybackAction.SkipForward),
        skipReverse: supports(PlaybackAction.SkipReverse),
    };
}

/**
 * שולח פקודת ניגון למקור הנוכחי.
 * @throws UnsupportedOperationError כשהמקור אינו תומך ב-Play_Info או אינו מצהיר על הפעולה; במקרה זה לא נשלחת פקודה.
 */
export async function playbackControl(session: RxvSession, action: PlaybackAction): Promise<void> {
    if (!PLAYBACK_ACTIONS.includes(action)) {
        throw new ValidationError(`Unknown playback action "${action}"`);
    }
    const { input, source } = await getCurrentSource(session);
    if (!supportsPlayInfo(session, source)) {
        throw new UnsupportedOperationError(input, 'playback');
    }
    if (!session.capabilities.supportsPlayMethod(source, action)) {
        throw new UnsupportedOperationError(source, action);
    }
    await session.request(Commands.playback(source, action));
}

export const play = (session: RxvSession): Promise<void> => playbackControl(session, PlaybackAction.Play);
export const pause = (session: RxvSession): Promise<void> => playbackControl(session, PlaybackAction.Pause);
export const stop = (session: RxvSession): Promise<void> => playbackControl(session, PlaybackAction.Stop);
export const next = (session: RxvSession): Promise<void> => playbackControl(session, PlaybackAction.SkipForward);
export const previous = (session: RxvSession): Promise<void> => playbackControl(session, PlaybackAction.SkipReverse);
