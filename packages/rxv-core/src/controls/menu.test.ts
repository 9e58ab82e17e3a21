import { describe, expect, it } from 'vitest';
import { MenuTraversalError, UnsupportedOperationError, ValidationError } from '../errors';
import type { FakeMenuState, FakeReceiver } from '../testUtils/fakeReceiver';
import { createTestDevice } from '../testUtils/testDevice';
import { CursorAction } from '../types';

const listInfoPolls = (receiver: FakeReceiver, source: string) =>
    receiver.log.filter(entry => entry === `GET ${source},List_Info`).length;

const enterLayer = (menu: FakeMenuState, ...names: string[]) => {
    for (const name of names) {
        const current = menu.stack[menu.stack.length - 1] ?? menu.root;
        const next = current.children?.find(child => child.name === name);
        if (!next) {
            throw new Error(`No menu item ${name}`);
        }
        menu.stack.push(next);
    }
};

describe('Menu Control', () => {
    describe('navigateMenuPath', () => {
        it('בוחר פריט אחד בכל שכבה עד סוף הנתיב', async () => {
            const { session, receiver } = await createTestDevice();

            const result = await session.setNetRadio('Bookmarks>Internet>Radio Paradise');

            expect(result.attempts).toBe(3);
            expect(result.menu).toMatchObject({ layer: 3, name: 'Internet' });
            expect(receiver.menus.NET_RADIO.selected).toBe('Radio Paradise');
            expect(receiver.log).toEqual([
                'PUT Main_Zone,Input,Input_Sel=NET RADIO',
                'GET NET_RADIO,List_Info',
                'GET NET_RADIO,List_Info',
                'PUT NET_RADIO,List_Control,Direct_Sel=Line_1',
                'GET NET_RADIO,List_Info',
                'PUT NET_RADIO,List_Control,Direct_Sel=Line_1',
                'GET NET_RADIO,List_Info',
                'PUT NET_RADIO,List_Control,Direct_Sel=Line_2',
            ]);
        });

        it('מאפס את התפריט לשכבה הראשונה לפני הניווט', async () => {
            const { session, receiver } = await createTestDevice();
            enterLayer(receiver.menus.NET_RADIO, 'Locations');

            await session.setNetRadio('Bookmarks');

            expect(receiver.log.slice(0, 4)).toEqual([
                'PUT Main_Zone,Input,Input_Sel=NET RADIO',
                'GET NET_RADIO,List_Info',
                'PUT NET_RADIO,List_Control,Cursor=Return',
                'GET NET_RADIO,List_Info',
            ]);
            expect(receiver.menus.NET_RADIO.stack.map(node => node.name)).toEqual(['Bookmarks']);
        });

        it('ממתין כשהתפריט עסוק ומונה כל דגימה כניסיון', async () => {
            const { session, receiver } = await createTestDevice();
            receiver.menus.NET_RADIO.busyAfterSelect = 2;

            const result = await session.setNetRadio('Bookmarks>Internet>Jazz FM');

            expect(result.attempts).toBe(7);
            expect(receiver.menus.NET_RADIO.selected).toBe('Jazz FM');
        });

        it('תפריט שלעולם אינו מוכן מוותר אחרי 20 ניסיונות', async () => {
            const { session, receiver } = await createTestDevice();
            receiver.menus.NET_RADIO.neverReady = true;

            const error = await session.setNetRadio('Bookmarks>Internet').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(MenuTraversalError);
            expect(error).toMatchObject({ path: 'Bookmarks>Internet', attempts: 20 });
            // דגימה אחת של האיפוס ועוד אחת לכל ניסיון
            expect(listInfoPolls(receiver, 'NET_RADIO')).toBe(21);
            expect(receiver.puts).toEqual(['Main_Zone,Input,Input_Sel=NET RADIO']);
        });

        it('פריט שאינו בעמוד הנוכחי ממצה את הניסיונות', async () => {
            const { session, receiver } = await createTestDevice();

            const error = await session.setNetRadio('Bookmarks>Podcasts').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(MenuTraversalError);
            expect(error).toMatchObject({ attempts: 20, lastMenuStatus: { layer: 2, name: 'Bookmarks' } });
            expect(receiver.puts).toEqual([
                'Main_Zone,Input,Input_Sel=NET RADIO',
                'NET_RADIO,List_Control,Direct_Sel=Line_1',
            ]);
        });

        it('לא בוחר שורות Unselectable', async () => {
            const { session } = await createTestDevice();

            await expect(session.setNetRadio('Help')).rejects.toBeInstanceOf(MenuTraversalError);
        });

        it('מנווט בתפריט SERVER', async () => {
            const { session, receiver } = await createTestDevice();

            const result = await session.setServer('NAS>Music>Albums');

            expect(result.attempts).toBe(3);
            expect(receiver.menus.SERVER.selected).toBe('Albums');
            expect(receiver.zones.Main_Zone.input).toBe('SERVER');
        });

        it('דוחה נתיב עם שכבה ריקה בלי לשלוח בקשה', async () => {
            const { session, receiver } = await createTestDevice();

            await expect(session.setNetRadio('Bookmarks>>Jazz FM')).rejects.toBeInstanceOf(ValidationError);
            await expect(session.navigateMenu('PHONO', 'Bookmarks')).rejects.toBeInstanceOf(ValidationError);
            await expect(session.navigateMenu('AV1', 'Bookmarks')).rejects.toBeInstanceOf(UnsupportedOperationError);
            expect(receiver.requests).toEqual([]);
        });
    });

    describe('cursor and status', () => {
        it('מחזיר את מצב התפריט של המקור הנוכחי', async () => {
            const { session, receiver } = await createTestDevice();
            receiver.zones.Main_Zone.input = 'NET RADIO';

            const status = await session.getMenuStatus();

            expect(status).toMatchObject({ ready: true, layer: 1, name: 'NET RADIO', currentLine: 1, maxLine: 3 });
            expect([...status.currentList]).toEqual([['Line_1', 'Bookmarks'], ['Line_2', 'Locations']]);
        });

        it('שולח סמן דרך List_Control כשהמקור מצהיר עליו', async () => {
            const { session, receiver } = await createTestDevice();
            receiver.zones.Main_Zone.input = 'NET RADIO';

            await session.menuCursor(CursorAction.Down);

            expect(receiver.puts).toEqual(['NET_RADIO,List_Control,Cursor=Down']);
            expect(await session.getCursorActions()).toEqual(['Up', 'Down', 'Return', 'Sel', 'Return to Home']);
        });

        it('שולח סמן דרך Cursor_Control לקלט HDMI', async () => {
            const { session, receiver } = await createTestDevice();

            await session.menuCursor(CursorAction.Up);

            expect(receiver.puts).toEqual(['Main_Zone,Cursor_Control,Cursor=Up']);
        });

        it('דוחה פעולת סמן שאינה מוצהרת', async () => {
            const { session, receiver } = await createTestDevice();
            receiver.zones.Main_Zone.input = 'NET RADIO';

            await expect(session.menuCursor(CursorAction.Left)).rejects.toThrow('NET_RADIO does not support menu cursor Left');
            expect(receiver.puts).toEqual([]);
        });

        it('מקור ללא פקודות סמן נדחה', async () => {
            const { session, receiver } = await createTestDevice();
            receiver.zones.Main_Zone.input = 'TUNER';

            await expect(session.menuCursor(CursorAction.Up)).rejects.toThrow('Tuner does not support menu cursor');
            expect(await session.getCursorActions()).toEqual([]);
        });

        it('קופץ לשורה בתפריט', async () => {
            const { session, receiver } = await createTestDevice();
            receiver.zones.Main_Zone.input = 'NET RADIO';

            await session.menuJumpLine(3);
            await expect(session.menuJumpLine(0)).rejects.toBeInstanceOf(ValidationError);

            expect(receiver.puts).toEqual(['NET_RADIO,List_Control,Jump_Line=3']);
        });

        it('menuReset חוזר לשכבה הראשונה', async () => {
            const { session, receiver } = await createTestDevice();
            receiver.zones.Main_Zone.input = 'NET RADIO';
            enterLayer(receiver.menus.NET_RADIO, 'Bookmarks', 'Internet');

            const status = await session.menuReset();

            expect(status.layer).toBe(1);
            expect(receiver.puts).toEqual([
                'NET_RADIO,List_Control,Cursor=Return',
                'NET_RADIO,List_Control,Cursor=Return',
            ]);
        });
    });
});
