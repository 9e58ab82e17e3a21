import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { deviceDescriptionUrl, discoverDevice } from './discovery';
import { DescriptorError, ProtocolError, TransportError } from './errors';
import { DEVICE_DESCRIPTION_URL, FakeReceiver, UNIT_DESCRIPTION_URL } from './testUtils/fakeReceiver';

const config = loadConfig({ discovery: { retries: 3, retryDelayMs: 0 } });

describe('deviceDescriptionUrl', () => {
  it('בונה את כתובת קובץ התיאור לפי המארח', () => {
    expect(deviceDescriptionUrl('192.168.1.50', config)).toBe(DEVICE_DESCRIPTION_URL);
    expect(deviceDescriptionUrl('receiver.local', loadConfig({ endpoints: { deviceDescriptionPort: 49154 } })))
      .toBe('http://receiver.local:49154/MediaRenderer/desc.xml');
  });
});

describe('discoverDevice', () => {
  it('בונה רשומת התקן מלאה ממארח', async () => {
    const receiver = new FakeReceiver();

    const info = await discoverDevice('192.168.1.50', { transport: receiver, config });

    expect(info.version).toBe(1);
    expect(info.descriptor.deviceId).toBe('5f9ec1b3-ed59-1900-4530-00a0deadbeef');
    expect(info.capabilities.zones).toEqual(['Main_Zone', 'Zone_2']);
    expect(info.capabilities.inputsSource).toEqual({
      HDMI1: '',
      TUNER: 'Tuner',
      'NET RADIO': 'NET_RADIO',
      SERVER: 'SERVER',
      AV1: '',
    });
    expect(info.capabilities.scenesNumber).toEqual({ 'BD/DVD': 'Scene 1', TV: 'Scene 2' });
    expect(receiver.gets).toEqual([DEVICE_DESCRIPTION_URL, UNIT_DESCRIPTION_URL]);
    expect(receiver.log).toEqual(['GET Main_Zone,Input,Input_Sel_Item', 'GET Main_Zone,Config']);
  });

  it('מחזיר רשומה מוקפאת', async () => {
    const info = await discoverDevice(DEVICE_DESCRIPTION_URL, { transport: new FakeReceiver(), config });

    expect(Object.isFrozen(info)).toBe(true);
    expect(Object.isFrozen(info.capabilities.zones)).toBe(true);
    expect(Object.isFrozen(info.descriptor.iconUrls)).toBe(true);
  });

  it('מנסה שוב כשלי רשת זמניים', async () => {
    const receiver = new FakeReceiver();
    receiver.transportFailures = 2;

    const info = await discoverDevice('192.168.1.50', { transport: receiver, config });

    expect(info.descriptor.modelName).toBe('RX-V675');
    expect(receiver.gets).toEqual([
      DEVICE_DESCRIPTION_URL,
      DEVICE_DESCRIPTION_URL,
      DEVICE_DESCRIPTION_URL,
      UNIT_DESCRIPTION_URL,
    ]);
  });

  it('נכשל כשהניסיונות נגמרים', async () => {
    const receiver = new FakeReceiver();
    receiver.transportFailures = 3;

    await expect(discoverDevice('192.168.1.50', { transport: receiver, config })).rejects.toBeInstanceOf(TransportError);
    expect(receiver.gets).toHaveLength(3);
  });

  it('לא מנסה שוב שגיאת פרוטוקול', async () => {
    const receiver = new FakeReceiver();
    receiver.nextResultCode = '2';

    await expect(discoverDevice('192.168.1.50', { transport: receiver, config })).rejects.toBeInstanceOf(ProtocolError);
    expect(receiver.requests).toHaveLength(1);
  });

  it('קובץ תיאור פגום עוצר את הגילוי', async () => {
    const receiver = new FakeReceiver();
    receiver.documents.set(UNIT_DESCRIPTION_URL, '<html><body>Not Found</body></html>');

    await expect(discoverDevice('192.168.1.50', { transport: receiver, config })).rejects.toBeInstanceOf(DescriptorError);
    expect(receiver.requests).toEqual([]);
  });
});
