import {
    BASIC_CHECKSUM_OFFSET,
    BASIC_FRAME_SIZE,
    FrameInspection,
    PacketVariant,
    PRESSURE_BLOCK_OFFSET,
    PRESSURE_CHECKSUM_OFFSET,
    PRESSURE_FRAME_SIZE,
    SYNC_BYTE
} from '../types/station_structs';

/**
 * 8-bit truncating sum of bytes [start, end).
 */
export function checksum8(data: Uint8Array, start: number, end: number): number {
    let sum = 0;
    for (let i = start; i < end; i++) {
        sum = (sum + data[i]) & 0xFF;
    }
    return sum;
}

/**
 * Classifies a buffer and says why.
 *
 * A bad primary checksum rejects the whole buffer. A bad (or truncated)
 * pressure block only drops the extension: the first 17 bytes are a complete
 * reading on their own.
 */
export function inspectFrame(data: Uint8Array): FrameInspection {
    if (data.length < BASIC_FRAME_SIZE) {
        return { variant: PacketVariant.INVALID, verdict: 'too_short' };
    }
    if (data[0] !== SYNC_BYTE) {
        return { variant: PacketVariant.INVALID, verdict: 'bad_sync' };
    }
    if (checksum8(data, 0, BASIC_CHECKSUM_OFFSET) !== data[BASIC_CHECKSUM_OFFSET]) {
        return { variant: PacketVariant.INVALID, verdict: 'bad_checksum' };
    }

    if (data.length === BASIC_FRAME_SIZE) {
        return { variant: PacketVariant.BASIC, verdict: 'ok' };
    }
    if (data.length < PRESSURE_FRAME_SIZE) {
        return { variant: PacketVariant.BASIC, verdict: 'extension_short' };
    }
    if (checksum8(data, PRESSURE_BLOCK_OFFSET, PRESSURE_CHECKSUM_OFFSET) !== data[PRESSURE_CHECKSUM_OFFSET]) {
        return { variant: PacketVariant.BASIC, verdict: 'extension_checksum' };
    }
    return { variant: PacketVariant.BASIC_WITH_PRESSURE, verdict: 'ok' };
}

export function classifyFrame(data: Uint8Array): PacketVariant {
    return inspectFrame(data).variant;
}

/**
 * Formats bytes as "24.9F.01 (3)" for log lines.
 */
export function formatHexPretty(data: Uint8Array): string {
    if (data.length === 0) return '';
    const hex = Array.from(data, (b) => b.toString(16).toUpperCase().padStart(2, '0')).join('.');
    return `${hex} (${data.length})`;
}
