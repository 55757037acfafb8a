// From types.ts
export * from './types';

// From errors.ts
export {
    SsdpDiscoveryError,
    InvalidConfigError,
    SocketError,
    TransportError,
    describeError,
    type SsdpErrorCode,
} from './errors';

// From logger.ts
export {
    default as createLogger,
    createModuleLogger,
    setLogLevel,
    raiseLogLevel,
    currentLogLevel,
    configureLoggersFromEnv,
    isLogLevel,
    type LogLevel,
    type CustomLogger,
} from './logger';

// From discoveryConfig.ts
export {
    createDiscoveryConfig,
    DEFAULT_SEARCH_TARGET,
    DEFAULT_MAX_WAIT_SECONDS,
    DEFAULT_RETRY_COUNT,
    DEFAULT_MAX_WAIT_LIMIT,
    DEFAULT_MULTICAST_TTL,
} from './discoveryConfig';

// From messageBuilder.ts
export {
    buildMSearchMessage,
    multicastHostHeader,
    SSDP_PORT,
    SSDP_MULTICAST_ADDRESS_IPV4,
    SSDP_MULTICAST_ADDRESS_IPV6_LINK_LOCAL,
    type MSearchOptions,
} from './messageBuilder';

// From responseParser.ts
export {
    parseSsdpResponse,
    parseCacheControlMaxAge,
} from './responseParser';

// From deduplicator.ts
export {
    ServiceDeduplicator
} from './deduplicator';

// From ssdpSocketManager.ts
export {
    createUdpTransport,
    findRelevantNetworkInterfaces,
    MAX_RECEIVE_WAIT_MS,
} from './ssdpSocketManager';

// From discoverySession.ts
export {
    DiscoverySession
} from './discoverySession';

// From serviceExplorer.ts
export {
    discoverServices,
    discoverServicesIterable,
    type DiscoverServicesOptions,
} from './serviceExplorer';
