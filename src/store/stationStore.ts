import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import {
    BINARY_CHANNELS,
    BinaryChannel,
    ChannelName,
    ChannelSinks,
    NUMERIC_CHANNELS,
    NumericChannel,
    TEXT_CHANNELS,
    TextChannel
} from '../types/station_structs';

export type ChannelValues =
    & { [K in NumericChannel]: number | null }
    & { [K in BinaryChannel]: boolean | null }
    & { [K in TextChannel]: string | null };

export type ConnectionState = 'waiting' | 'receiving' | 'timed_out';

export type FrameOutcome = 'accepted' | 'degraded' | 'rejected';

export interface StationState {
    // Connection State
    connectionState: ConnectionState;
    lastPacketAt: number | null;

    // Data State
    channels: ChannelValues;
    frameCounts: Record<FrameOutcome, number>;

    // Actions
    publish: <K extends ChannelName>(channel: K, value: ChannelValues[K]) => void;
    setConnectionState: (state: ConnectionState) => void;
    recordFrame: (outcome: FrameOutcome, at: number) => void;
    resetChannels: () => void;
}

export type StationStore = StoreApi<StationState>;

export function createEmptyChannels(): ChannelValues {
    return {
        temperature: null,
        humidity: null,
        pressure: null,
        wind_speed: null,
        wind_gust: null,
        wind_direction_degrees: null,
        accumulated_precipitation: null,
        precipitation_intensity: null,
        uv_intensity: null,
        uv_index: null,
        light: null,
        battery_low: null,
        night: null,
        wind_description: null,
        wind_direction: null,
        light_description: null,
        precipitation_description: null
    };
}

export function createStationStore(): StationStore {
    return createStore<StationState>()((set) => ({
        connectionState: 'waiting',
        lastPacketAt: null,
        channels: createEmptyChannels(),
        frameCounts: { accepted: 0, degraded: 0, rejected: 0 },

        publish: (channel, value) => set((state) => ({
            channels: { ...state.channels, [channel]: value }
        })),
        setConnectionState: (connectionState) => set({ connectionState }),
        recordFrame: (outcome, at) => set((state) => ({
            lastPacketAt: at,
            connectionState: 'receiving',
            frameCounts: { ...state.frameCounts, [outcome]: state.frameCounts[outcome] + 1 }
        })),
        resetChannels: () => set({ channels: createEmptyChannels() })
    }));
}

/**
 * Binds every channel to the store, for use as the service's sink set.
 */
export function storeSinks(store: StationStore): ChannelSinks {
    const sinks: ChannelSinks = {};
    for (const name of NUMERIC_CHANNELS) {
        sinks[name] = (value) => store.getState().publish(name, value);
    }
    for (const name of BINARY_CHANNELS) {
        sinks[name] = (value) => store.getState().publish(name, value);
    }
    for (const name of TEXT_CHANNELS) {
        sinks[name] = (value) => store.getState().publish(name, value);
    }
    return sinks;
}
