/**
 * 天気予報テキストのデコーダ
 *
 * 日付マーカー行で新しいエントリを開き、続く気温・降水量・風の行を
 * 開いているエントリに付け足していく。出力順は入力の行順のまま。
 */
import type { DailyEntry, ForecastSeries } from '@tenki/shared';
import { tokenize } from './lines.js';

type EntryDraft = { -readonly [K in keyof DailyEntry]: DailyEntry[K] };

const FORECAST_HEADER = /^weather forecast for\s+(.+?)(?:\s*\((\d+)\s*days?\))?$/i;
const DATE_MARKER = /^(?:\d{4}-\d{2}-\d{2}|\d{1,2}[/.]\d{1,2}[/.]\d{2,4})\b/;
const HIGH_LOW = /,\s*low\s*:\s*/i;

export function isDateMarker(text: string): boolean {
  return DATE_MARKER.test(text);
}

export function decodeForecast(
  text: string,
  requestedLocation: string,
  requestedDays?: number
): ForecastSeries {
  const entries: DailyEntry[] = [];
  let current: EntryDraft | undefined;
  let location: string | undefined;
  let days: number | undefined;

  const open = (date: string): void => {
    if (current) {
      entries.push(Object.freeze(current));
    }
    current = { date };
  };

  for (const token of tokenize(text)) {
    if (token.kind === 'header') {
      const header = FORECAST_HEADER.exec(token.text);
      if (header) {
        location ??= header[1].trim();
        if (header[2] !== undefined) {
          days ??= Number.parseInt(header[2], 10);
        }
      } else if (isDateMarker(token.text)) {
        open(token.text);
      }
      continue;
    }

    // 末尾のコロンが無い日付行も日付マーカーとして扱う
    if (token.kind === 'unrecognized') {
      if (isDateMarker(token.text)) {
        open(token.text);
      }
      continue;
    }

    if (token.key === 'date') {
      open(token.value);
      continue;
    }

    // 最初の日付より前の項目は捨てる
    if (!current) {
      continue;
    }

    switch (token.key) {
      case 'high': {
        current.temperature = `${token.label}: ${token.value}`;
        const [high, low] = token.value.split(HIGH_LOW);
        current.high = high.trim();
        if (low !== undefined) {
          current.low = low.trim();
        }
        break;
      }
      case 'low':
        current.low = token.value;
        current.temperature ??= `${token.label}: ${token.value}`;
        break;
      case 'temperature':
        current.temperature = token.value;
        break;
      case 'precipitation':
        current.precipitation = token.value;
        break;
      case 'wind':
      case 'max wind':
      case 'wind speed':
        current.wind = token.value;
        break;
    }
  }

  if (current) {
    entries.push(Object.freeze(current));
  }

  return Object.freeze({
    location: location || requestedLocation,
    days: days ?? requestedDays ?? entries.length,
    entries: Object.freeze(entries),
    rawText: text
  });
}
