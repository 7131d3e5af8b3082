import {
    DecodedReading,
    FLAGS_BYTE,
    PRECIPITATION_MM_PER_TICK,
    PRESSURE_BLOCK_OFFSET,
    PRESSURE_FRAME_SIZE,
    SENTINEL,
    TEMPERATURE_OFFSET,
    UV_INDEX_DIVISOR,
    WIND_SPEED_FACTOR
} from '../types/station_structs';

function orNull(raw: number, sentinel: number, transform: (raw: number) => number): number | null {
    return raw === sentinel ? null : transform(raw);
}

function getUint24(view: DataView, offset: number): number {
    return (view.getUint8(offset) << 16) + view.getUint16(offset + 1, false);
}

/**
 * Reads the raw fields of a validated frame.
 *
 * Layout (big endian, byte 3 carries flags and the high bits of three fields):
 *   [0]     sync 0x24
 *   [2]     wind direction low 8 bits, bit 8 = byte3 bit 7
 *   [3]     flags: b7 dir bit8 | b4 speed bit8 | b3 battery low | b2..0 temperature high bits
 *   [4]     temperature low 8 bits
 *   [5]     humidity
 *   [6]     wind speed low 8 bits
 *   [7]     wind gust
 *   [8..9]  precipitation counter
 *   [10..11] UV intensity
 *   [12..14] light
 *   [16]    checksum of [0..15]
 *   [17..19] pressure (only when the extension checksum at [20] holds)
 */
export function decodeReading(data: Uint8Array, hasPressure: boolean): DecodedReading {
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const flags = view.getUint8(3);

    const windDirectionRaw = view.getUint8(2) + ((flags & FLAGS_BYTE.WIND_DIRECTION_BIT8) << 1);
    const temperatureRaw = view.getUint8(4) + ((flags & FLAGS_BYTE.TEMPERATURE_HIGH_BITS) << 8);
    const humidityRaw = view.getUint8(5);
    const windSpeedRaw = view.getUint8(6) + ((flags & FLAGS_BYTE.WIND_SPEED_BIT8) << 4);
    const windGustRaw = view.getUint8(7);
    const precipitationRaw = view.getUint16(8, false);
    const uvRaw = view.getUint16(10, false);
    const lightRaw = getUint24(view, 12);

    const precipitationCounter = precipitationRaw === SENTINEL.PRECIPITATION ? null : precipitationRaw;

    return {
        temperature_c: orNull(temperatureRaw, SENTINEL.TEMPERATURE, (raw) => (raw - TEMPERATURE_OFFSET) / 10),
        humidity_pct: orNull(humidityRaw, SENTINEL.HUMIDITY, (raw) => raw),
        pressure_hpa: hasPressure && data.length >= PRESSURE_FRAME_SIZE ? getUint24(view, PRESSURE_BLOCK_OFFSET) / 100 : null,
        wind_speed_kmh: orNull(windSpeedRaw, SENTINEL.WIND_SPEED, (raw) => raw / 8 * WIND_SPEED_FACTOR),
        wind_gust_kmh: orNull(windGustRaw, SENTINEL.WIND_GUST, (raw) => raw * WIND_SPEED_FACTOR),
        wind_direction_deg: orNull(windDirectionRaw, SENTINEL.WIND_DIRECTION, (raw) => raw),
        accumulated_precipitation_mm: precipitationCounter === null ? null : precipitationCounter * PRECIPITATION_MM_PER_TICK,
        precipitation_counter: precipitationCounter,
        uv_intensity: orNull(uvRaw, SENTINEL.UV_INTENSITY, (raw) => raw / 10),
        uv_index: orNull(uvRaw, SENTINEL.UV_INTENSITY, (raw) => Math.floor(raw / UV_INDEX_DIVISOR)),
        light_lux: orNull(lightRaw, SENTINEL.LIGHT, (raw) => raw / 10),
        battery_low: (flags & FLAGS_BYTE.BATTERY_LOW) !== 0
    };
}
