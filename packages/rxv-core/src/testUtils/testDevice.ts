import { loadConfig } from '../config';
import { discoverDevice } from '../discovery';
import { openSession } from '../session';
import { DEVICE_DESCRIPTION_URL, FakeReceiver } from './fakeReceiver';

/**
 * מגלה את המקלט המדומה ופותח בקר ללא השהיות, כך שהבדיקות רצות מיד.
 */
export async function createTestDevice(zone?: string) {
  const receiver = new FakeReceiver();
  const config = loadConfig({
    discovery: { retryDelayMs: 0 },
    menu: { retryDelayMs: 0 },
    volumeFade: { stepDelayMs: 0 },
  });
  const info = await discoverDevice(DEVICE_DESCRIPTION_URL, { transport: receiver, config });
  receiver.clear();
  const session = openSession(info, { transport: receiver, config, zone });
  return { receiver, info, session, config };
}
