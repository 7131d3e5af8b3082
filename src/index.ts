export * from './services';
export * from './types/station_structs';
export { checksum8, classifyFrame, inspectFrame, formatHexPretty } from './utils/frameValidator';
export { decodeReading } from './utils/fieldDecoder';
export * from './utils/weatherDescriptions';
export { createStationStore, createEmptyChannels, storeSinks } from './store/stationStore';
export type { ChannelValues, ConnectionState, FrameOutcome, StationState, StationStore } from './store/stationStore';
export {
    DEFAULT_STATION_CONFIG,
    assertStationConfig,
    loadStationConfig,
    resolveStationConfig
} from './config';
export type { StationConfig } from './config';
export { createLogger } from './lib/logger';
export type { Logger, LogLevel, LoggerOptions } from './lib/logger';
