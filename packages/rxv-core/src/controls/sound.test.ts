import { describe, expect, it } from 'vitest';
import { UnsupportedOperationError, ValidationError } from '../errors';
import { createTestDevice } from '../testUtils/testDevice';

describe('Sound Control', () => {
    it('מחזיר את תוכניות הסראונד של האזור', async () => {
        const { session } = await createTestDevice();

        expect(session.getSurroundPrograms()).toEqual([
            'Straight', 'Direct', 'Hall in Munich', 'Hall in Vienna', 'Standard', '2ch Stereo',
        ]);
    });

    it('בוחר תוכנית רגילה כש-Direct כבוי', async () => {
        const { session, receiver } = await createTestDevice();

        await session.setSurroundProgram('Hall in Vienna');

        expect(receiver.log).toEqual([
            'GET Main_Zone,Sound_Video,Direct,Mode',
            'PUT Main_Zone,Surround,Program_Sel,Current,Sound_Program=Hall in Vienna',
        ]);
        expect(await session.getSurroundProgram()).toBe('Hall in Vienna');
    });

    it('מכבה Direct לפני בחירת תוכנית אחרת', async () => {
        const { session, receiver } = await createTestDevice();
        receiver.zones.Main_Zone.direct = 'On';

        await session.setSurroundProgram('Straight');

        expect(receiver.log).toEqual([
            'GET Main_Zone,Sound_Video,Direct,Mode',
            'PUT Main_Zone,Sound_Video,Direct,Mode=Off',
            'PUT Main_Zone,Surround,Program_Sel,Current,Straight=On',
        ]);
        expect(await session.getSurroundProgram()).toBe('Straight');
    });

    it('בחירת Direct שולחת פקודה אחת בלבד', async () => {
        const { session, receiver } = await createTestDevice();

        await session.setSurroundProgram('Direct');

        expect(receiver.log).toEqual(['PUT Main_Zone,Sound_Video,Direct,Mode=On']);
        expect(await session.getDirectMode()).toBe(true);
        expect(await session.getSurroundProgram()).toBe('Direct');
    });

    it('דוחה תוכנית שאינה מוצהרת בלי לשלוח בקשה', async () => {
        const { session, receiver } = await createTestDevice();

        await expect(session.setSurroundProgram('Stadium')).rejects.toBeInstanceOf(ValidationError);
        expect(receiver.requests).toEqual([]);
    });

    it('אזור ללא Direct מחזיר false בלי לפנות להתקן', async () => {
        const { session, receiver } = await createTestDevice('Zone_2');

        expect(await session.getDirectMode()).toBe(false);
        expect(receiver.requests).toEqual([]);
        await expect(session.setDirectMode(true)).rejects.toBeInstanceOf(UnsupportedOperationError);
        await expect(session.setSurroundProgram('Standard')).rejects.toBeInstanceOf(ValidationError);
    });

    it('קורא ומשנה Adaptive DRC', async () => {
        const { session, receiver } = await createTestDevice();

        expect(await session.getAdaptiveDrc()).toBe(true);
        await session.setAdaptiveDrc(false);

        expect(receiver.puts).toEqual(['Main_Zone,Sound_Video,Adaptive_DRC=Off']);
        expect(await session.getAdaptiveDrc()).toBe(false);
    });

    it('קורא ומשנה רמת דיאלוג בטווח 0..3', async () => {
        const { session, receiver } = await createTestDevice();

        expect(await session.getDialogueLevel()).toBe(1);
        await session.setDialogueLevel(3);
        await expect(session.setDialogueLevel(4)).rejects.toBeInstanceOf(ValidationError);

        expect(receiver.puts).toEqual(['Main_Zone,Sound_Video,Dialogue_Adjust,Dialogue_Lvl=3']);
    });

    it('רמת דיאלוג לא נתמכת באזור שאינו מצהיר עליה', async () => {
        const { session, receiver } = await createTestDevice('Zone_2');

        await expect(session.getDialogueLevel()).rejects.toThrow('Zone_2 does not support Dialogue_Lvl');
        expect(receiver.requests).toEqual([]);
    });
});
