/**
 * 地名検索結果テキストのデコーダ
 */
import { UNAVAILABLE, type LocationMatch } from '@tenki/shared';
import { tokenize } from './lines.js';

function toCoordinate(value: string | undefined): number {
  if (value === undefined) {
    return 0;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * "Location: 名前, 国" と "Coordinates: 緯度, 経度" を読む
 * 数値にならない座標は 0 とする
 */
export function decodeLocation(text: string): LocationMatch {
  let name: string | undefined;
  let country: string | undefined;
  let latitude: string | undefined;
  let longitude: string | undefined;

  for (const token of tokenize(text)) {
    if (token.kind !== 'field') {
      continue;
    }

    switch (token.key) {
      case 'location': {
        if (name !== undefined) {
          break;
        }
        const comma = token.value.indexOf(',');
        if (comma < 0) {
          name = token.value;
          country = UNAVAILABLE;
        } else {
          name = token.value.slice(0, comma).trim();
          country = token.value.slice(comma + 1).trim() || UNAVAILABLE;
        }
        break;
      }
      case 'coordinates': {
        if (latitude !== undefined) {
          break;
        }
        const [lat, lon] = token.value.split(',');
        latitude = lat.trim();
        longitude = lon?.trim();
        break;
      }
      case 'latitude':
        latitude ??= token.value;
        break;
      case 'longitude':
        longitude ??= token.value;
        break;
    }
  }

  return Object.freeze({
    name: name || UNAVAILABLE,
    country: country ?? UNAVAILABLE,
    latitude: toCoordinate(latitude),
    longitude: toCoordinate(longitude),
    rawText: text
  });
}
