export { classifyLine, normalizeLabel, tokenize, type LineToken } from './lines.js';
export { decodeCurrentWeather } from './current.js';
export { decodeForecast, isDateMarker } from './forecast.js';
export { decodeLocation } from './location.js';
