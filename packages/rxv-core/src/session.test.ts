import { describe, expect, it } from 'vitest';
import { ControlChannel } from './controlChannel';
import { Capabilities } from './capabilities';
import { ProtocolError, TransportError, ValidationError } from './errors';
import { RxvSession } from './session';
import { CONTROL_URL, FakeReceiver } from './testUtils/fakeReceiver';
import { createTestDevice } from './testUtils/testDevice';

describe('RxvSession', () => {
  it('בוחר את האזור הראשון כברירת מחדל', async () => {
    const { session } = await createTestDevice();

    expect(session.zone).toBe('Main_Zone');
    expect(session.controlUrl).toBe(CONTROL_URL);
  });

  it('דוחה אזור לא ידוע בלי לשלוח בקשה', async () => {
    const { session, receiver } = await createTestDevice();

    expect(() => session.setZone('Zone_3')).toThrow(ValidationError);
    expect(session.zone).toBe('Main_Zone');
    expect(receiver.requests).toEqual([]);
  });

  it('לא ניתן ליצור בקר למכשיר ללא אזורים', () => {
    const channel = new ControlChannel(CONTROL_URL, { transport: new FakeReceiver(), timeoutMs: 1000 });
    const capabilities = Capabilities.from({
      zones: [],
      zoneSurroundPrograms: {},
      commands: [],
      sourcePlayMethods: {},
      sourceCursorActions: {},
      inputsSource: {},
      scenesNumber: {},
    });

    expect(() => new RxvSession({ channel, capabilities })).toThrow('Cannot create a session for a device without zones');
  });

  describe('power', () => {
    it('קורא ומשנה מצב הפעלה', async () => {
      const { session, receiver } = await createTestDevice();

      expect(await session.getPower()).toBe(true);
      await session.turnOff();

      expect(receiver.puts).toEqual(['Main_Zone,Power_Control,Power=Standby']);
      expect(await session.getPower()).toBe(false);
    });

    it('מגדיר טיימר שינה', async () => {
      const { session, receiver } = await createTestDevice();

      await session.setSleep('90 min');

      expect(receiver.puts).toEqual(['Main_Zone,Power_Control,Sleep=90 min']);
      expect(await session.getSleep()).toBe('90 min');
    });

    it('מחזיר מצב בסיסי בבקשה אחת', async () => {
      const { session, receiver } = await createTestDevice();

      const status = await session.getBasicStatus();

      expect(status).toEqual({ on: true, volume: -45, muted: false, input: 'HDMI1', soundProgram: 'Standard' });
      expect(receiver.log).toEqual(['GET Main_Zone,Basic_Status']);
    });
  });

  describe('audio', () => {
    it('מגדיר עוצמה בדציבלים', async () => {
      const { session, receiver } = await createTestDevice();

      await session.setVolume(-30.5);

      expect(receiver.puts).toEqual(['Main_Zone,Volume,Lvl,Val=-305']);
      expect(await session.getVolume()).toBe(-30.5);
    });

    it('עוצמה שאינה על צעד חצי dB נחתכת ונקראת חזרה בתוך חצי dB', async () => {
      const { session, receiver } = await createTestDevice();
      const requested = -30.3;

      await session.setVolume(requested);
      const readBack = await session.getVolume();

      expect(receiver.puts).toEqual(['Main_Zone,Volume,Lvl,Val=-300']);
      expect(readBack).toBe(-30);
      expect(Math.abs(readBack - Math.round(requested * 2) / 2)).toBeLessThanOrEqual(0.5);
    });

    it('דוחה עוצמה שאינה מספר סופי', async () => {
      const { session, receiver } = await createTestDevice();

      await expect(session.setVolume(Number.NaN)).rejects.toBeInstanceOf(ValidationError);
      expect(receiver.requests).toEqual([]);
    });

    it('ממיר עוצמה מנורמלת לדציבלים', async () => {
      const { session, receiver } = await createTestDevice();

      await session.setVolumeLevel(0.5);

      expect(receiver.puts).toEqual(['Main_Zone,Volume,Lvl,Val=-325']);
    });

    it('מעביר עוצמה בהדרגה בצעדים של 1 dB', async () => {
      const { session, receiver } = await createTestDevice();

      await session.fadeVolume(-42.5);

      expect(receiver.puts).toEqual([
        'Main_Zone,Volume,Lvl,Val=-440',
        'Main_Zone,Volume,Lvl,Val=-430',
        'Main_Zone,Volume,Lvl,Val=-425',
      ]);
    });

    it('משתיק ומבטל השתקה', async () => {
      const { session, receiver } = await createTestDevice();

      await session.setMute(true);
      expect(await session.getMute()).toBe(true);
      await session.setMute(false);

      expect(receiver.puts).toEqual(['Main_Zone,Volume,Mute=On', 'Main_Zone,Volume,Mute=Off']);
    });
  });

  describe('input', () => {
    it('מחזיר את רשימת הקלטים מסט היכולות בלי לפנות להתקן', async () => {
      const { session, receiver } = await createTestDevice();

      expect(session.getInputs()).toEqual(['HDMI1', 'TUNER', 'NET RADIO', 'SERVER', 'AV1']);
      expect(receiver.requests).toEqual([]);
    });

    it('בוחר קלט ידוע', async () => {
      const { session, receiver } = await createTestDevice();

      await session.setInput('NET RADIO');

      expect(receiver.puts).toEqual(['Main_Zone,Input,Input_Sel=NET RADIO']);
      expect(await session.getInput()).toBe('NET RADIO');
    });

    it('דוחה קלט לא ידוע בלי לשלוח בקשה', async () => {
      const { session, receiver } = await createTestDevice();

      await expect(session.setInput('PHONO')).rejects.toThrow(ValidationError);
      expect(receiver.requests).toEqual([]);
    });

    it('isReady מחזיר true לקלט ללא צומת מקור', async () => {
      const { session, receiver } = await createTestDevice();

      expect(await session.isReady()).toBe(true);
      expect(receiver.log).toEqual(['GET Main_Zone,Input,Input_Sel']);
    });

    it('isReady קורא את Feature_Availability של המקור', async () => {
      const { session, receiver } = await createTestDevice();

      await session.setInput('SERVER');
      expect(await session.isReady()).toBe(false);
      await session.setInput('NET RADIO');
      expect(await session.isReady()).toBe(true);
      expect(receiver.log).toContain('GET SERVER,Config');
    });

    it('מפעיל סצנה לפי שם', async () => {
      const { session, receiver } = await createTestDevice();

      expect(session.getScenes()).toEqual(['BD/DVD', 'TV']);
      await session.setScene('TV');

      expect(receiver.puts).toEqual(['Main_Zone,Scene,Scene_Sel=Scene 2']);
    });

    it('דוחה סצנה לא ידועה', async () => {
      const { session, receiver } = await createTestDevice();

      await expect(session.setScene('Game')).rejects.toBeInstanceOf(ValidationError);
      expect(receiver.requests).toEqual([]);
    });
  });

  describe('system', () => {
    it('קורא ומשנה Party Mode', async () => {
      const { session, receiver } = await createTestDevice();

      expect(await session.getPartyMode()).toBe(false);
      await session.setPartyMode(true);

      expect(receiver.puts).toEqual(['System,Party_Mode,Mode=On']);
      expect(await session.getPartyMode()).toBe(true);
    });

    it('מחזיר את מצב יציאות ה-HDMI המוצהרות', async () => {
      const { session } = await createTestDevice();

      expect(await session.getOutputs()).toEqual({ hdmi1: 'on', hdmi2: 'off' });
    });

    it('מפעיל יציאה לפי שם', async () => {
      const { session, receiver } = await createTestDevice();

      await session.enableOutput('HDMI2', true);

      expect(receiver.puts).toEqual(['System,Sound_Video,HDMI,Output,OUT_2=On']);
      await expect(session.enableOutput('optical', true)).rejects.toThrow('Unknown output port "optical"');
    });
  });

  describe('errors', () => {
    it('מעביר ProtocolError מהתקן', async () => {
      const { session, receiver } = await createTestDevice();
      receiver.nextResultCode = '3';

      await expect(session.setPower(true)).rejects.toBeInstanceOf(ProtocolError);
    });

    it('מעביר TransportError, והערוץ ממשיך לעבוד אחריו', async () => {
      const { session, receiver } = await createTestDevice();
      receiver.transportFailures = 1;

      await expect(session.getPower()).rejects.toBeInstanceOf(TransportError);
      expect(await session.getPower()).toBe(true);
    });
  });
});
