import { childLogger, type Logger } from '../../logger';

// canned weather for the demo agents; nothing here talks to a real weather service

export type Season = 'winter' | 'spring' | 'summer' | 'autumn';

export interface TemperatureRange {
    min: number;
    max: number;
}

export interface Forecast {
    location: string;
    season: Season;
    condition: string;
    temperatureF: number;
    summary: string;
}

export interface ForecastOptions {
    date?: Date;
    random?: () => number;
}

// indexed by Date#getMonth(), northern hemisphere
const SEASON_BY_MONTH: readonly Season[] = [
    'winter', 'winter',
    'spring', 'spring', 'spring',
    'summer', 'summer', 'summer',
    'autumn', 'autumn', 'autumn',
    'winter',
];

export const SEASONAL_RANGES_F: Readonly<Record<Season, TemperatureRange>> = {
    winter: { min: 25, max: 45 },
    spring: { min: 50, max: 70 },
    summer: { min: 75, max: 95 },
    autumn: { min: 45, max: 65 },
};

export const CONDITIONS: Readonly<Record<Season, readonly string[]>> = {
    winter: ['snowy', 'overcast and cold', 'clear but freezing', 'foggy', 'icy with light sleet'],
    spring: ['rainy', 'partly cloudy', 'sunny with a light breeze', 'showery', 'mild and overcast'],
    summer: ['sunny', 'hot and humid', 'clear', 'stormy with scattered thunderstorms', 'hazy'],
    autumn: ['windy', 'cool and cloudy', 'crisp and sunny', 'drizzly', 'misty'],
};

export function seasonForMonth(month: number): Season {
    const season = Number.isInteger(month) ? SEASON_BY_MONTH[month] : undefined;
    if (!season) throw new RangeError(`month must be an integer from 0 to 11, got ${month}`);
    return season;
}

function pick<T>(items: readonly T[], random: () => number): T {
    const index = Math.min(items.length - 1, Math.floor(random() * items.length));
    return items[Math.max(0, index)];
}

function temperatureIn(range: TemperatureRange, random: () => number): number {
    const span = range.max - range.min + 1;
    return Math.min(range.max, range.min + Math.floor(random() * span));
}

export function generateForecast(location: string, options: ForecastOptions = {}): Forecast {
    const name = location.trim();
    if (!name) throw new Error('location is required');

    const random = options.random ?? Math.random;
    const season = seasonForMonth((options.date ?? new Date()).getMonth());
    const condition = pick(CONDITIONS[season], random);
    const temperatureF = temperatureIn(SEASONAL_RANGES_F[season], random);

    return {
        location: name,
        season,
        condition,
        temperatureF,
        summary: `The weather in ${name} is ${condition} with a temperature of ${temperatureF}°F.`,
    };
}

export const UNKNOWN_LOCATION_REPLY = "I don't know which place you mean. Which city should I check the weather for?";

export function describeWeather(location: string, options: ForecastOptions = {}, logger?: Logger): string {
    const log = logger ?? childLogger('weather');

    if (!location.trim()) {
        log.warn('Weather lookup without a location');
        return UNKNOWN_LOCATION_REPLY;
    }

    const forecast = generateForecast(location, options);
    log.info('Weather lookup', {
        location: forecast.location,
        season: forecast.season,
        condition: forecast.condition,
        temperature_f: forecast.temperatureF,
    });
    return forecast.summary;
}
