import {
    JsonFileStore,
    StatusPoller,
    createZoneControllers,
    discoverDevice,
    loadConfig,
    loadDeviceInfo,
    openSession,
    saveDeviceInfo,
    type StatusSnapshot,
} from "rxv-core";

// RXV_HOST=192.168.1.50 npm run example:status
(async () => {

    const host = process.env.RXV_HOST;
    if (!host) {
        console.error('Set RXV_HOST to the receiver host name or IP address.');
        process.exitCode = 1;
        return;
    }

    const config = loadConfig();
    const store = new JsonFileStore(config.storage.directory);
    const key = host.replace(/[^A-Za-z0-9_-]/g, '_');

    try {

        let info = await loadDeviceInfo(store, key);
        if (!info) {
            info = await discoverDevice(host, { config });
            await saveDeviceInfo(store, info, key);
        }

        const session = openSession(info, { config });
        console.log(`${info.descriptor.friendlyName} (${info.descriptor.modelName}) at ${session.controlUrl}`);

        for (const [zone, controller] of createZoneControllers(session)) {
            const status = await controller.getBasicStatus();
            console.log(`${zone}: ${status.on ? 'on' : 'standby'}, ${status.volume} dB${status.muted ? ' (muted)' : ''}, input ${status.input}`);
        }

        const poller = new StatusPoller(session);
        poller.on('update', (snapshot: StatusSnapshot) => {
            const playing = snapshot.playStatus?.playing ? ` - ${snapshot.playStatus.artist ?? ''} ${snapshot.playStatus.song ?? ''}` : '';
            console.log(`[${snapshot.updatedAt.toISOString()}] ${snapshot.input} ${snapshot.volume} dB${playing}`);
        });
        poller.on('updateFailed', (error: Error) => {
            console.error(`Status update failed: ${error.message}`);
        });
        poller.start();

        process.once('SIGINT', () => {
            poller.stop();
        });

    } catch (error) {
        console.error('Error:', error);
        process.exitCode = 1;
    }

})();
