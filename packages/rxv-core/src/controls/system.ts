import type { RxvSession } from '../session';
import { Commands } from '../commandCodec';
import { ValidationError } from '../errors';

/**
 * # System Control
 * פקודות ברמת ההתקן (לא תלויות אזור): Party Mode ויציאות HDMI.
 */

const HDMI_OUTPUT_PREFIX = 'System,Sound_Video,HDMI,Output';

export async function getPartyMode(session: RxvSession): Promise<boolean> {
    const response = await session.request(Commands.getPartyMode());
    return response.requireText(['System', 'Party_Mode', 'Mode']) === 'On';
}

export async function setPartyMode(session: RxvSession, on: boolean): Promise<void> {
    await session.request(Commands.setPartyMode(on));
}

/**
 * מחזיר את מצב יציאות ה-HDMI שההתקן מצהיר עליהן.
 * @returns מפה משם היציאה (`hdmi1`) למצבה באותיות קטנות (`on` / `off`).
 */
export async function getOutputs(session: RxvSession): Promise<Record<string, string>> {
    const outputs: Record<string, string> = {};
    for (const command of session.capabilities.findCommands(HDMI_OUTPUT_PREFIX)) {
        // למשל System,Sound_Video,HDMI,Output,OUT_1
        const match = /_(\d+)$/.exec(command);
        if (!match) {
            continue;
        }
        const port = parseInt(match[1] ?? '', 10);
        const response = await session.request(Commands.getHdmiOutput(port));
        outputs[`hdmi${port}`] = response.requireText(command.split(',')).toLowerCase();
    }
    return outputs;
}

/**
 * @param port - שם היציאה, למשל `hdmi1`.
 * @throws ValidationError עבור שם יציאה לא תקין.
 */
export async function enableOutput(session: RxvSession, port: string, enabled: boolean): Promise<void> {
    const match = /^hdmi(\d+)$/.exec(port.toLowerCase());
    if (!match) {
        throw new ValidationError(`Unknown output port "${port}"`);
    }
    await session.request(Commands.setHdmiOutput(parseInt(match[1] ?? '', 10), enabled));
}
