/**
 * 天気クライアント
 * 設定からトランスポートとセッションを組み立て、天気ワーカーの各ツールを
 * 型付きのレコードとして返す
 */
import {
  FORECAST_DAYS,
  TenkiConfigSchema,
  WEATHER_TOOLS,
  clamp,
  type ForecastSeries,
  type JsonObject,
  type LocationMatch,
  type TenkiConfig,
  type WeatherSnapshot
} from '@tenki/shared';
import { DEFAULT_CONFIG } from '../config/index.js';
import { decodeCurrentWeather, decodeForecast, decodeLocation } from '../decoders/index.js';
import { ConfigError, ErrorReporter, InvalidArgumentError, NotConnectedError } from '../error/index.js';
import { silentLogger, type Logger } from '../logger/index.js';
import { Session } from '../session/index.js';
import { ProcessTransport, type Spawner } from '../transport/index.js';

export interface WeatherClientOptions {
  config?: TenkiConfig;
  spawner?: Spawner;
  logger?: Logger;
  reporter?: ErrorReporter;
}

export class WeatherClient {
  private session?: Session;
  private readonly config: TenkiConfig;
  private readonly spawner?: Spawner;
  private readonly logger: Logger;
  private readonly reporter: ErrorReporter;

  constructor(options: WeatherClientOptions = {}) {
    const parsed = TenkiConfigSchema.safeParse(options.config ?? DEFAULT_CONFIG);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues: parsed.error.issues });
    }

    this.config = parsed.data;
    this.spawner = options.spawner;
    this.logger = options.logger ?? silentLogger;
    this.reporter = options.reporter ?? new ErrorReporter(this.logger);
  }

  /**
   * 新しいワーカーを起動して接続する
   * 既存の接続があれば先に閉じる
   */
  async connect(): Promise<boolean> {
    if (this.session) {
      await this.close();
    }

    const { worker, session } = this.config;
    const transport = new ProcessTransport({
      command: worker.command,
      args: worker.args,
      cwd: worker.cwd,
      env: worker.env,
      requestTimeout: session.requestTimeout,
      shutdownTimeout: session.shutdownTimeout,
      spawner: this.spawner,
      logger: this.logger
    });

    transport.onError = error => {
      this.reporter.report(error, { operation: 'transport' });
    };

    const next = new Session(transport, {
      protocolVersion: session.protocolVersion,
      clientInfo: { name: session.clientName, version: session.clientVersion },
      handshakeTimeout: session.handshakeTimeout,
      requestTimeout: session.requestTimeout,
      logger: this.logger
    });

    try {
      const started = await next.start();
      if (started) {
        this.session = next;
      }
      return started;
    } catch (error) {
      throw this.reporter.report(error, { operation: 'connect' });
    }
  }

  async getCurrentWeather(location: string): Promise<WeatherSnapshot> {
    const place = requireLocation(location);
    const text = await this.invoke(WEATHER_TOOLS.CURRENT, { location: place }, place);
    return decodeCurrentWeather(text, place);
  }

  async getForecast(location: string, days = this.config.forecast.defaultDays): Promise<ForecastSeries> {
    const place = requireLocation(location);
    if (!Number.isFinite(days)) {
      throw new InvalidArgumentError(`Forecast days must be a number, got ${days}`);
    }
    const maxDays = Math.min(this.config.forecast.maxDays, FORECAST_DAYS.MAX);
    const requestedDays = clamp(Math.trunc(days), FORECAST_DAYS.MIN, maxDays);

    if (requestedDays !== days) {
      this.logger.debug(`Forecast days ${days} clamped to ${requestedDays}`);
    }

    const text = await this.invoke(
      WEATHER_TOOLS.FORECAST,
      { location: place, days: requestedDays },
      place
    );
    return decodeForecast(text, place, requestedDays);
  }

  async searchLocation(location: string): Promise<LocationMatch> {
    const place = requireLocation(location);
    const text = await this.invoke(WEATHER_TOOLS.SEARCH_LOCATION, { location: place }, place);
    return decodeLocation(text);
  }

  async listAvailableTools(): Promise<string[]> {
    try {
      const tools = await this.requireSession().listTools();
      return tools.map(tool => tool.name);
    } catch (error) {
      throw this.reporter.report(error, { operation: 'listTools' });
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = undefined;
    await session?.close();
  }

  isConnected(): boolean {
    return this.session?.isReady() ?? false;
  }

  getErrorReporter(): ErrorReporter {
    return this.reporter;
  }

  private async invoke(tool: string, args: JsonObject, location: string): Promise<string> {
    try {
      return await this.requireSession().invoke(tool, args);
    } catch (error) {
      throw this.reporter.report(error, { operation: 'invoke', tool, location });
    }
  }

  private requireSession(): Session {
    if (!this.session || !this.session.isReady()) {
      throw new NotConnectedError('Weather client is not connected');
    }
    return this.session;
  }
}

function requireLocation(location: string): string {
  const place = location.trim();
  if (place === '') {
    throw new InvalidArgumentError('Location must not be blank');
  }
  return place;
}
