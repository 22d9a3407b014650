/**
 * CLI ユーティリティ関数
 * 色付けはログ用ヘルパーのみ。結果の整形は純粋関数で行う
 */
import chalk from 'chalk';
import type { DailyEntry, ForecastSeries, LocationMatch, WeatherSnapshot } from '@tenki/shared';

export function logSuccess(message: string): void {
  console.error(chalk.green(`✅ ${message}`));
}

export function logError(message: string): void {
  console.error(chalk.red(`❌ ${message}`));
}

export function logWarning(message: string): void {
  console.error(chalk.yellow(`⚠️  ${message}`));
}

export function formatSnapshot(snapshot: WeatherSnapshot): string {
  return [
    `Current weather for ${snapshot.location}`,
    `  Temperature: ${snapshot.temperature} (feels like ${snapshot.feelsLike})`,
    `  Humidity: ${snapshot.humidity}`,
    `  Wind: ${snapshot.wind}`,
    `  Pressure: ${snapshot.pressure}`,
    `  Cloud cover: ${snapshot.cloudCover}`,
    `  Precipitation: ${snapshot.precipitation}`,
    `  Time of day: ${snapshot.timeOfDay}`
  ].join('\n');
}

function formatEntry(entry: DailyEntry): string[] {
  const lines = [`  ${entry.date}`];

  if (entry.high !== undefined || entry.low !== undefined) {
    lines.push(`    High: ${entry.high ?? '-'}  Low: ${entry.low ?? '-'}`);
  } else if (entry.temperature !== undefined) {
    lines.push(`    Temperature: ${entry.temperature}`);
  }
  if (entry.precipitation !== undefined) {
    lines.push(`    Precipitation: ${entry.precipitation}`);
  }
  if (entry.wind !== undefined) {
    lines.push(`    Wind: ${entry.wind}`);
  }

  return lines;
}

export function formatForecast(series: ForecastSeries): string {
  const header = `Weather forecast for ${series.location} (${series.days} ${series.days === 1 ? 'day' : 'days'})`;

  if (series.entries.length === 0) {
    return `${header}\n  No daily entries`;
  }

  return [header, ...series.entries.flatMap(formatEntry)].join('\n');
}

export function formatLocation(match: LocationMatch): string {
  return [
    `${match.name}, ${match.country}`,
    `  Coordinates: ${match.latitude}, ${match.longitude}`
  ].join('\n');
}

export function formatToolList(names: string[]): string {
  if (names.length === 0) {
    return 'No tools available';
  }
  return [`Available tools (${names.length}):`, ...names.map(name => `  - ${name}`)].join('\n');
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}
