// From logger.ts
export {
    createModuleLogger,
    type ModuleLogger,
} from './logger';

// From types.ts
export * from './types';

// From errors.ts
export * from './errors';

// From config.ts
export {
    defaultConfig,
    loadConfig,
    type RxvConfig,
    type RxvConfigOverrides,
} from './config';

// From descriptorParser.ts
export {
    deviceIdFromUdn,
    parseDeviceDescriptor,
    parseUnitDescriptor,
} from './descriptorParser';

// From capabilities.ts
export {
    Capabilities
} from './capabilities';

// From commandCodec.ts
export {
    Commands,
    decodeResponse,
    encodeCommand,
    encodeVolume,
    decodeVolume,
    ResponseDocument,
    type Command,
    type CommandMethod,
    type XmlFragment,
} from './commandCodec';

// From httpTransport.ts
export {
    createAxiosTransport,
    toTransportError,
} from './httpTransport';

// From controlChannel.ts
export {
    ControlChannel,
    type ControlChannelOptions,
} from './controlChannel';

// From session.ts
export {
    RxvSession,
    openSession,
    type OpenSessionOptions,
    type RxvSessionInit,
    type SessionSettings,
} from './session';

export {
    NET_RADIO_INPUT,
    SERVER_INPUT,
    type MenuNavigationResult,
} from './controls/menu';

// From zoneControllers.ts
export {
    createZoneController,
    createZoneControllers,
} from './zoneControllers';

// From statusPoller.ts
export {
    StatusPoller,
    type StatusPollerOptions,
} from './statusPoller';

// From discovery.ts
export {
    deviceDescriptionUrl,
    discoverDevice,
    type DiscoveryOptions,
} from './discovery';

// From deviceInfoStore.ts
export {
    JsonFileStore,
    MemoryStore,
    isRxvDeviceInfo,
    loadDeviceInfo,
    removeDeviceInfo,
    saveDeviceInfo,
} from './deviceInfoStore';

// From volumeScale.ts
export {
    MAX_VOLUME_DB,
    MIN_VOLUME_DB,
    levelToVolume,
    volumeToLevel,
} from './volumeScale';
