/**
 * Frame fixtures shared by the decoder, validator and service tests.
 */
import { checksum8 } from '../utils/frameValidator';

// dir 180, temp raw 650 (25.0 °C), hum 55, speed raw 40, gust 10,
// rain counter 100, UV raw 2450, light raw 123456
export const SAMPLE_FRAME = [
    0x24, 0x00, 0xB4, 0x02, 0x8A, 0x37, 0x28, 0x0A,
    0x00, 0x64, 0x09, 0x92, 0x01, 0xE2, 0x40, 0x00,
    0xEF
];

// 101325 -> 1013.25 hPa, checksum 0x59
export const SAMPLE_PRESSURE_BLOCK = [0x01, 0x8B, 0xCD, 0x59];

export interface FrameFields {
    windDirection?: number;
    batteryLow?: boolean;
    temperatureRaw?: number;
    humidity?: number;
    windSpeedRaw?: number;
    windGust?: number;
    precipitation?: number;
    uvRaw?: number;
    lightRaw?: number;
    pressureRaw?: number;
}

export function buildFrame(fields: FrameFields = {}): Uint8Array {
    const {
        windDirection = 180,
        batteryLow = false,
        temperatureRaw = 650,
        humidity = 55,
        windSpeedRaw = 40,
        windGust = 10,
        precipitation = 100,
        uvRaw = 2450,
        lightRaw = 123456,
        pressureRaw
    } = fields;

    const frame = new Uint8Array(pressureRaw === undefined ? 17 : 21);
    frame[0] = 0x24;
    frame[2] = windDirection & 0xFF;
    frame[3] =
        (((windDirection >> 8) & 0x01) << 7) |
        (((windSpeedRaw >> 8) & 0x01) << 4) |
        (batteryLow ? 0x08 : 0x00) |
        ((temperatureRaw >> 8) & 0x07);
    frame[4] = temperatureRaw & 0xFF;
    frame[5] = humidity;
    frame[6] = windSpeedRaw & 0xFF;
    frame[7] = windGust;
    frame[8] = (precipitation >> 8) & 0xFF;
    frame[9] = precipitation & 0xFF;
    frame[10] = (uvRaw >> 8) & 0xFF;
    frame[11] = uvRaw & 0xFF;
    frame[12] = (lightRaw >> 16) & 0xFF;
    frame[13] = (lightRaw >> 8) & 0xFF;
    frame[14] = lightRaw & 0xFF;
    frame[16] = checksum8(frame, 0, 16);

    if (pressureRaw !== undefined) {
        frame[17] = (pressureRaw >> 16) & 0xFF;
        frame[18] = (pressureRaw >> 8) & 0xFF;
        frame[19] = pressureRaw & 0xFF;
        frame[20] = checksum8(frame, 17, 20);
    }
    return frame;
}
