/**
 * 現在の天気テキストのデコーダ
 */
import { UNAVAILABLE, type WeatherSnapshot } from '@tenki/shared';
import { tokenize } from './lines.js';

type SnapshotField = Exclude<keyof WeatherSnapshot, 'location' | 'rawText'>;

const FIELD_LABELS = new Map<string, SnapshotField>([
  ['temperature', 'temperature'],
  ['feels like', 'feelsLike'],
  ['humidity', 'humidity'],
  ['wind', 'wind'],
  ['wind speed', 'wind'],
  ['pressure', 'pressure'],
  ['cloud cover', 'cloudCover'],
  ['precipitation', 'precipitation'],
  ['time of day', 'timeOfDay']
]);

const LOCATION_HEADER = /^current weather for\s+(.+)$/i;
const FEELS_LIKE = /\(\s*feels like\s*/i;

/**
 * 該当する行が無い項目は UNAVAILABLE、場所は見出しが無ければ要求した地名になる
 */
export function decodeCurrentWeather(text: string, requestedLocation: string): WeatherSnapshot {
  const values = new Map<SnapshotField, string>();
  let location: string | undefined;

  const assign = (field: SnapshotField, value: string): void => {
    if (value && !values.has(field)) {
      values.set(field, value);
    }
  };

  for (const token of tokenize(text)) {
    if (token.kind === 'header') {
      const match = LOCATION_HEADER.exec(token.text);
      if (match && location === undefined) {
        location = match[1].trim();
      }
      continue;
    }

    if (token.kind !== 'field') {
      continue;
    }

    if (token.key === 'location') {
      location ??= token.value;
      continue;
    }

    const field = FIELD_LABELS.get(token.key);
    if (field === 'temperature') {
      // "30°C (feels like 34°C)" は1行に2項目
      const [temperature, feelsLike] = token.value.split(FEELS_LIKE);
      assign('temperature', temperature.trim());
      if (feelsLike !== undefined) {
        assign('feelsLike', feelsLike.replace(/\)\s*$/, '').trim());
      }
    } else if (field) {
      assign(field, token.value);
    }
  }

  const read = (field: SnapshotField): string => values.get(field) ?? UNAVAILABLE;

  return Object.freeze({
    location: location || requestedLocation,
    temperature: read('temperature'),
    feelsLike: read('feelsLike'),
    humidity: read('humidity'),
    wind: read('wind'),
    pressure: read('pressure'),
    cloudCover: read('cloudCover'),
    precipitation: read('precipitation'),
    timeOfDay: read('timeOfDay'),
    rawText: text
  });
}
