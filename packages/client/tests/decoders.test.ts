/**
 * 応答テキストデコーダ テストスイート
 */
import { describe, it, expect } from 'vitest';
import {
  classifyLine,
  decodeCurrentWeather,
  decodeForecast,
  decodeLocation,
  tokenize
} from '../src/decoders/index.js';

describe('行トークナイザ', () => {
  it('ラベル付きの行を項目として分類する', () => {
    expect(classifyLine('Cloud   Cover: 40%')).toEqual({
      kind: 'field',
      label: 'Cloud   Cover',
      key: 'cloud cover',
      value: '40%'
    });
  });

  it('コロンで終わる行は見出しになる', () => {
    expect(classifyLine('📅 2024-05-01:')).toEqual({ kind: 'header', text: '2024-05-01' });
  });

  it('先頭の装飾や文字化けを読み飛ばす', () => {
    expect(classifyLine('  üå°Ô∏è  High: 20°C, Low: 12°C')).toEqual({
      kind: 'field',
      label: 'High',
      key: 'high',
      value: '20°C, Low: 12°C'
    });
  });

  it('それ以外の行は unrecognized', () => {
    expect(classifyLine('Data from Open-Meteo API')).toEqual({
      kind: 'unrecognized',
      text: 'Data from Open-Meteo API'
    });
  });

  it('空行を除いて分類する', () => {
    expect(tokenize('A: 1\r\n\r\nB: 2\n')).toHaveLength(2);
  });
});

describe('decodeCurrentWeather', () => {
  it('見出しと一部の項目だけでも読める', () => {
    const snapshot = decodeCurrentWeather(
      'Current weather for Bangkok:\nTemperature: 30°C (feels like 34°C)\nHumidity: 70%\n',
      'bangkok'
    );

    expect(snapshot).toEqual({
      location: 'Bangkok',
      temperature: '30°C',
      feelsLike: '34°C',
      humidity: '70%',
      wind: 'N/A',
      pressure: 'N/A',
      cloudCover: 'N/A',
      precipitation: 'N/A',
      timeOfDay: 'N/A',
      rawText: 'Current weather for Bangkok:\nTemperature: 30°C (feels like 34°C)\nHumidity: 70%\n'
    });
  });

  it('ワーカーの完全な出力を読む', () => {
    const text = [
      'Current weather for Oslo, Norway:',
      'Temperature: -3.2°C (feels like -8.1°C)',
      'Humidity: 81%',
      'Wind: 14.5km/h at 310°',
      'Pressure: 1012.4hPa',
      'Cloud Cover: 90%',
      'Precipitation: 0.2mm',
      'Time of Day: Night',
      '',
      'Data from Open-Meteo API'
    ].join('\n');

    const snapshot = decodeCurrentWeather(text, 'Oslo');

    expect(snapshot.location).toBe('Oslo, Norway');
    expect(snapshot.temperature).toBe('-3.2°C');
    expect(snapshot.feelsLike).toBe('-8.1°C');
    expect(snapshot.wind).toBe('14.5km/h at 310°');
    expect(snapshot.pressure).toBe('1012.4hPa');
    expect(snapshot.cloudCover).toBe('90%');
    expect(snapshot.precipitation).toBe('0.2mm');
    expect(snapshot.timeOfDay).toBe('Night');
  });

  it('同じ項目が複数あれば最初の値を使う', () => {
    const snapshot = decodeCurrentWeather('Humidity: 70%\nHumidity: 99%', 'Lima');
    expect(snapshot.humidity).toBe('70%');
  });

  it('見出しが無ければ要求した地名を使う', () => {
    const snapshot = decodeCurrentWeather('Error getting weather: upstream unavailable', 'Nowhere');

    expect(snapshot.location).toBe('Nowhere');
    expect(snapshot.temperature).toBe('N/A');
    expect(snapshot.rawText).toBe('Error getting weather: upstream unavailable');
  });

  it('Location 項目からも地名を読む', () => {
    expect(decodeCurrentWeather('Location: Quito, Ecuador\nTemperature: 14°C', 'quito').location).toBe(
      'Quito, Ecuador'
    );
  });

  it('結果は変更できない', () => {
    expect(Object.isFrozen(decodeCurrentWeather('', 'Tokyo'))).toBe(true);
  });
});

describe('decodeForecast', () => {
  const twoDays = [
    'Weather forecast for Paris, France (2 days):',
    '',
    '📅 2024-05-01:',
    '  🌡️  High: 20°C, Low: 12°C',
    '  🌧️  Precipitation: 1.2mm',
    '  💨 Max Wind: 18km/h',
    '',
    '📅 2024-05-02:',
    '  🌡️  High: 18°C, Low: 11°C',
    '',
    'Data from Open-Meteo API'
  ].join('\n');

  it('日付ごとのエントリを入力順に返す', () => {
    const series = decodeForecast(twoDays, 'Paris', 2);

    expect(series.location).toBe('Paris, France');
    expect(series.days).toBe(2);
    expect(series.entries).toEqual([
      {
        date: '2024-05-01',
        temperature: 'High: 20°C, Low: 12°C',
        high: '20°C',
        low: '12°C',
        precipitation: '1.2mm',
        wind: '18km/h'
      },
      {
        date: '2024-05-02',
        temperature: 'High: 18°C, Low: 11°C',
        high: '18°C',
        low: '11°C'
      }
    ]);
  });

  it('欠けている項目はキーごと無い', () => {
    const [, second] = decodeForecast(twoDays, 'Paris').entries;
    expect('precipitation' in second).toBe(false);
    expect('wind' in second).toBe(false);
  });

  it('最初の日付より前の項目は無視する', () => {
    const series = decodeForecast('Precipitation: 9mm\n2024-06-01:\nMax Wind: 5km/h', 'Rome');

    expect(series.entries).toEqual([{ date: '2024-06-01', wind: '5km/h' }]);
  });

  it('Date 項目でもエントリを開く', () => {
    const series = decodeForecast('Date: 01/06/2024\nTemperature: 22°C\nDate: 02/06/2024', 'Rome');

    expect(series.entries).toEqual([{ date: '01/06/2024', temperature: '22°C' }, { date: '02/06/2024' }]);
  });

  it('末尾にコロンの無い日付行でもエントリを開く', () => {
    const series = decodeForecast(
      '📅 2024-01-01\n  High: 30°C, Low: 20°C\n📅 2024-01-02\n  High: 31°C, Low: 21°C\n',
      'Bangkok'
    );

    expect(series.entries).toEqual([
      { date: '2024-01-01', temperature: 'High: 30°C, Low: 20°C', high: '30°C', low: '20°C' },
      { date: '2024-01-02', temperature: 'High: 31°C, Low: 21°C', high: '31°C', low: '21°C' }
    ]);
    expect(series.days).toBe(2);
  });

  it('日数は見出し、要求値、エントリ数の順に決める', () => {
    expect(decodeForecast(twoDays, 'Paris', 5).days).toBe(2);
    expect(decodeForecast('2024-05-01:', 'Paris', 5).days).toBe(5);
    expect(decodeForecast('2024-05-01:\n2024-05-02:\n2024-05-03:', 'Paris').days).toBe(3);
  });

  it('日付が無ければ空のシリーズ', () => {
    const series = decodeForecast('Error getting forecast: timeout', 'Berlin', 3);

    expect(series.location).toBe('Berlin');
    expect(series.entries).toEqual([]);
    expect(series.days).toBe(3);
  });
});

describe('decodeLocation', () => {
  it('地名・国・座標を読む', () => {
    expect(decodeLocation('Location: Nairobi, Kenya\nCoordinates: -1.28333, 36.81667')).toEqual({
      name: 'Nairobi',
      country: 'Kenya',
      latitude: -1.28333,
      longitude: 36.81667,
      rawText: 'Location: Nairobi, Kenya\nCoordinates: -1.28333, 36.81667'
    });
  });

  it('最初のカンマで地名と国を分ける', () => {
    const match = decodeLocation('Location: Washington, D.C., United States');

    expect(match.name).toBe('Washington');
    expect(match.country).toBe('D.C., United States');
  });

  it('カンマが無ければ国は N/A', () => {
    const match = decodeLocation('Location: Singapore');

    expect(match.name).toBe('Singapore');
    expect(match.country).toBe('N/A');
  });

  it('数値にならない座標は 0', () => {
    const match = decodeLocation('Location: Atlantis, Ocean\nCoordinates: unknown, n/a');

    expect(match.latitude).toBe(0);
    expect(match.longitude).toBe(0);
  });

  it('緯度と経度が別の行でも読む', () => {
    const match = decodeLocation('Location: Reykjavik, Iceland\nLatitude: 64.1355\nLongitude: -21.8954');

    expect(match.latitude).toBe(64.1355);
    expect(match.longitude).toBe(-21.8954);
  });

  it('何も読めなければ N/A と 0', () => {
    const match = decodeLocation('Error searching location: not found');

    expect(match).toMatchObject({ name: 'N/A', country: 'N/A', latitude: 0, longitude: 0 });
  });
});
