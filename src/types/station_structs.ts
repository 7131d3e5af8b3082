// ============================================================================
// ENUMS - Sensor head protocol constants
// ============================================================================

export enum PacketVariant {
    INVALID = -1,
    BASIC = 0,
    BASIC_WITH_PRESSURE = 1
}

/**
 * Why a buffer was classified the way it was. Only used for diagnostics,
 * the variant alone drives decoding.
 */
export type FrameVerdict =
    | 'ok'
    | 'too_short'
    | 'bad_sync'
    | 'bad_checksum'
    | 'extension_short'
    | 'extension_checksum';

export interface FrameInspection {
    variant: PacketVariant;
    verdict: FrameVerdict;
}

export enum DiagnosticKind {
    MALFORMED_FRAME = 'malformed_frame',
    DEGRADED_FRAME = 'degraded_frame',
    COMMUNICATION_TIMEOUT = 'communication_timeout',
    COUNTER_ANOMALY = 'counter_anomaly'
}

export interface StationDiagnostic {
    kind: DiagnosticKind;
    at: number;
    detail: string;
}

// ============================================================================
// FRAME LAYOUT
// ============================================================================

export const SYNC_BYTE = 0x24;
export const BASIC_FRAME_SIZE = 17;           // bytes 0..15 + checksum at 16
export const PRESSURE_FRAME_SIZE = 21;        // bytes 17..19 + checksum at 20
export const BASIC_CHECKSUM_OFFSET = 16;
export const PRESSURE_BLOCK_OFFSET = 17;
export const PRESSURE_CHECKSUM_OFFSET = 20;

// Raw bit patterns meaning "sensor has no reading"
export const SENTINEL = {
    WIND_DIRECTION: 0x1FF,
    TEMPERATURE: 0x7FF,
    HUMIDITY: 0xFF,
    WIND_SPEED: 0x1FF,
    WIND_GUST: 0xFF,
    PRECIPITATION: 0xFFFF,
    UV_INTENSITY: 0xFFFF,
    LIGHT: 0xFFFFFF
} as const;

// Flags byte (byte 3) bit masks
export const FLAGS_BYTE = {
    WIND_DIRECTION_BIT8: 0x80,
    WIND_SPEED_BIT8: 0x10,
    BATTERY_LOW: 0x08,
    TEMPERATURE_HIGH_BITS: 0x07
} as const;

export const PRECIPITATION_MM_PER_TICK = 0.3;
export const WIND_SPEED_FACTOR = 1.12;
export const TEMPERATURE_OFFSET = 400;
export const UV_INDEX_DIVISOR = 400;

// ============================================================================
// DECODED DATA
// ============================================================================

/**
 * One transmission decoded into physical units.
 * `null` is "no reading", never zero.
 */
export interface DecodedReading {
    temperature_c: number | null;
    humidity_pct: number | null;
    pressure_hpa: number | null;
    wind_speed_kmh: number | null;
    wind_gust_kmh: number | null;
    wind_direction_deg: number | null;
    accumulated_precipitation_mm: number | null;
    precipitation_counter: number | null;    // raw 16-bit tip counter
    uv_intensity: number | null;
    uv_index: number | null;
    light_lux: number | null;
    battery_low: boolean;
}

// ============================================================================
// CHANNELS
// ============================================================================

export const NUMERIC_CHANNELS = [
    'temperature',
    'humidity',
    'pressure',
    'wind_speed',
    'wind_gust',
    'wind_direction_degrees',
    'accumulated_precipitation',
    'precipitation_intensity',
    'uv_intensity',
    'uv_index',
    'light'
] as const;

export const BINARY_CHANNELS = ['battery_low', 'night'] as const;

export const TEXT_CHANNELS = [
    'wind_description',
    'wind_direction',
    'light_description',
    'precipitation_description'
] as const;

export type NumericChannel = typeof NUMERIC_CHANNELS[number];
export type BinaryChannel = typeof BINARY_CHANNELS[number];
export type TextChannel = typeof TEXT_CHANNELS[number];
export type ChannelName = NumericChannel | BinaryChannel | TextChannel;

/** A publish handle; `null` publishes "unknown". */
export type PublishSink<T> = (value: T | null) => void;

/**
 * Which channels are active and where each one publishes.
 * A channel without a sink is not computed for output.
 */
export type ChannelSinks =
    & { [K in NumericChannel]?: PublishSink<number> }
    & { [K in BinaryChannel]?: PublishSink<boolean> }
    & { [K in TextChannel]?: PublishSink<string> };
