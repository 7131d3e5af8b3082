// Upper bounds are exclusive. The last entry catches everything above.

export const BEAUFORT_SCALE: ReadonlyArray<{ maxKmh: number; label: string }> = [
    { maxKmh: 1, label: 'Calm' },
    { maxKmh: 6, label: 'Light air' },
    { maxKmh: 12, label: 'Light breeze' },
    { maxKmh: 20, label: 'Gentle breeze' },
    { maxKmh: 29, label: 'Moderate breeze' },
    { maxKmh: 39, label: 'Fresh breeze' },
    { maxKmh: 50, label: 'Strong breeze' },
    { maxKmh: 62, label: 'Near gale' },
    { maxKmh: 75, label: 'Gale' },
    { maxKmh: 89, label: 'Strong gale' },
    { maxKmh: 103, label: 'Storm' },
    { maxKmh: 118, label: 'Violent storm' },
    { maxKmh: Infinity, label: 'Hurricane' }
];

export const LIGHT_LEVELS: ReadonlyArray<{ maxLux: number; label: string }> = [
    { maxLux: 1, label: 'Dark' },
    { maxLux: 100, label: 'Dim' },
    { maxLux: 1_000, label: 'Overcast' },
    { maxLux: 10_000, label: 'Daylight' },
    { maxLux: 50_000, label: 'Bright' },
    { maxLux: Infinity, label: 'Direct sunlight' }
];

export const PRECIPITATION_LEVELS: ReadonlyArray<{ maxMmH: number; label: string }> = [
    { maxMmH: 2.5, label: 'Light' },
    { maxMmH: 7.6, label: 'Moderate' },
    { maxMmH: 50, label: 'Heavy' },
    { maxMmH: Infinity, label: 'Violent' }
];

export const COMPASS_POINTS_8 = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;

export const COMPASS_POINTS_16 = [
    'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
    'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW'
] as const;

export const getWindDescription = (speedKmh: number): string => {
    const level = BEAUFORT_SCALE.find((entry) => speedKmh < entry.maxKmh);
    return level ? level.label : 'Hurricane';
};

export const getBeaufortNumber = (speedKmh: number): number => {
    const index = BEAUFORT_SCALE.findIndex((entry) => speedKmh < entry.maxKmh);
    return index === -1 ? BEAUFORT_SCALE.length - 1 : index;
};

export const getLightDescription = (lux: number): string => {
    const level = LIGHT_LEVELS.find((entry) => lux < entry.maxLux);
    return level ? level.label : 'Direct sunlight';
};

export const getPrecipitationDescription = (rateMmH: number): string => {
    if (rateMmH <= 0) return 'None';
    const level = PRECIPITATION_LEVELS.find((entry) => rateMmH < entry.maxMmH);
    return level ? level.label : 'Violent';
};

/** Degrees normalised into [0, 360) after adding the mounting correction. */
export const correctDirection = (degrees: number, northCorrection: number = 0): number => {
    return (((degrees + northCorrection) % 360) + 360) % 360;
};

/**
 * 8-point compass by default; `threeLetter` switches to the 16-point rose
 * with secondary intercardinals (NNE, ENE, ...).
 */
export const getCompassDirection = (
    degrees: number,
    northCorrection: number = 0,
    threeLetter: boolean = false
): string => {
    const corrected = correctDirection(degrees, northCorrection);
    if (threeLetter) {
        return COMPASS_POINTS_16[Math.round(corrected / 22.5) % 16];
    }
    return COMPASS_POINTS_8[Math.round(corrected / 45) % 8];
};
