// This module renders OpenWeatherMap payloads into the plain-text reports returned as tool output.

import type { CurrentWeatherPayload, ForecastEntry, ForecastPayload, Units } from './types.js';

const dayLabelFormatter = new Intl.DateTimeFormat('en-US', {
  weekday: 'long',
  month: 'long',
  day: '2-digit',
  timeZone: 'UTC'
});

export function temperatureSymbol(units: Units): string {
  if (units === 'metric') {
    return '°C';
  }

  return units === 'imperial' ? '°F' : 'K';
}

export function windSpeedUnit(units: Units): string {
  return units === 'imperial' ? 'mph' : 'm/s';
}

// "light rain" -> "Light Rain"
export function toTitleCase(value: string): string {
  return value
    .split(' ')
    .map((word) => (word ? `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}` : word))
    .join(' ');
}

function placeLabel(name: string, country: string | undefined): string {
  return country ? `${name}, ${country}` : name;
}

export function formatCurrentReport(payload: CurrentWeatherPayload, units: Units): string {
  const symbol = temperatureSymbol(units);
  const lines = [
    `🌤️ Weather Report for ${placeLabel(payload.name, payload.sys.country)}`,
    '',
    `🌡️ Temperature: ${payload.main.temp}${symbol} (feels like ${payload.main.feels_like}${symbol})`,
    `☁️ Conditions: ${toTitleCase(payload.weather[0].description)}`,
    `💧 Humidity: ${payload.main.humidity}%`,
    `🌪️ Wind Speed: ${payload.wind.speed} ${windSpeedUnit(units)}`,
    `📊 Pressure: ${payload.main.pressure} hPa`
  ];

  return lines.join('\n');
}

function entryDate(entry: ForecastEntry): string {
  return entry.dt_txt.split(' ')[0];
}

function entryHour(entry: ForecastEntry): number {
  return Number(entry.dt_txt.split(' ')[1].split(':')[0]);
}

// Entries arrive in chronological order; grouping keeps the first-seen order of dates.
export function groupEntriesByDate(entries: ForecastEntry[]): Map<string, ForecastEntry[]> {
  const groups = new Map<string, ForecastEntry[]>();
  for (const entry of entries) {
    const date = entryDate(entry);
    const bucket = groups.get(date);
    if (bucket) {
      bucket.push(entry);
    } else {
      groups.set(date, [entry]);
    }
  }
  return groups;
}

// The earliest entry wins ties, so 09:00 beats 15:00 for a day sampled every three hours.
export function pickMiddayEntry(entries: ForecastEntry[]): ForecastEntry {
  let best = entries[0];
  for (const entry of entries.slice(1)) {
    if (Math.abs(12 - entryHour(entry)) < Math.abs(12 - entryHour(best))) {
      best = entry;
    }
  }
  return best;
}

export function formatDayLabel(date: string): string {
  return dayLabelFormatter.format(new Date(`${date}T00:00:00Z`));
}

export function formatForecastReport(payload: ForecastPayload, units: Units, days: number): string {
  const symbol = temperatureSymbol(units);
  const daily = [...groupEntriesByDate(payload.list)].slice(0, days);
  const sections = [`📅 ${days}-Day Weather Forecast for ${placeLabel(payload.city.name, payload.city.country)}`];

  for (const [date, entries] of daily) {
    const midday = pickMiddayEntry(entries);
    const low = Math.min(...entries.map((entry) => entry.main.temp_min));
    const high = Math.max(...entries.map((entry) => entry.main.temp_max));

    sections.push(
      [
        `🗓️ **${formatDayLabel(date)}**`,
        `   🌡️ ${low.toFixed(1)}${symbol} - ${high.toFixed(1)}${symbol}`,
        `   ☁️ ${toTitleCase(midday.weather[0].description)}`,
        `   💧 Humidity: ${midday.main.humidity}%`
      ].join('\n')
    );
  }

  return sections.join('\n\n');
}
