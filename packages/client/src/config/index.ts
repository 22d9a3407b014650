/**
 * 設定管理
 * デフォルト値、設定ファイル、環境変数の統合管理
 */
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import {
  FORECAST_DAYS,
  LogLevelSchema,
  PartialTenkiConfigSchema,
  TenkiConfigSchema,
  type PartialTenkiConfig,
  type TenkiConfig
} from '@tenki/shared';
import { silentLogger, type Logger } from '../logger/index.js';

export const DEFAULT_CONFIG_PATH = './tenki.config.json';

export const DEFAULT_CONFIG: TenkiConfig = {
  worker: {
    command: 'python3',
    args: ['weather/weather.py'],
    env: {}
  },
  session: {
    protocolVersion: '2024-11-05',
    clientName: 'tenki-client',
    clientVersion: '0.1.0',
    handshakeTimeout: 10000,
    requestTimeout: 30000,
    shutdownTimeout: 5000
  },
  forecast: {
    defaultDays: FORECAST_DAYS.DEFAULT,
    maxDays: FORECAST_DAYS.MAX
  },
  logging: {
    level: 'info'
  }
};

export interface ConfigManagerOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * セクション単位で上書きする（args や env は配列・マップごと置き換え）
 */
export function mergeConfig(base: TenkiConfig, override: PartialTenkiConfig): TenkiConfig {
  return {
    worker: { ...base.worker, ...override.worker },
    session: { ...base.session, ...override.session },
    forecast: { ...base.forecast, ...override.forecast },
    logging: { ...base.logging, ...override.logging }
  };
}

export class ConfigManager {
  private config: TenkiConfig;
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(options: ConfigManagerOptions = {}) {
    this.configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? silentLogger;
    this.config = this.loadConfig();
  }

  private loadConfig(): TenkiConfig {
    const fileConfig = this.loadFromFile();
    const envConfig = this.loadFromEnvironment();

    // 環境変数 > ファイル > デフォルト
    return mergeConfig(mergeConfig(DEFAULT_CONFIG, fileConfig), envConfig);
  }

  private loadFromFile(): PartialTenkiConfig {
    if (!existsSync(this.configPath)) {
      this.logger.debug(`Using default config (${this.configPath} not found)`);
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      this.logger.warn(`Failed to load config from ${this.configPath}:`, error);
      return {};
    }

    const parsed = PartialTenkiConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      this.logger.warn(`Ignoring invalid config ${this.configPath}: ${issues.join('; ')}`);
      return {};
    }

    this.logger.debug(`Loaded config from: ${this.configPath}`);
    return parsed.data;
  }

  private loadFromEnvironment(): PartialTenkiConfig {
    const env = this.env;
    const envConfig: PartialTenkiConfig = {};

    // ワーカー設定
    if (env.TENKI_WORKER_COMMAND) {
      envConfig.worker = { ...envConfig.worker, command: env.TENKI_WORKER_COMMAND };
    }

    if (env.TENKI_WORKER_ARGS !== undefined) {
      envConfig.worker = {
        ...envConfig.worker,
        args: env.TENKI_WORKER_ARGS.split(',')
          .map(arg => arg.trim())
          .filter(arg => arg !== '')
      };
    }

    if (env.TENKI_WORKER_CWD) {
      envConfig.worker = { ...envConfig.worker, cwd: env.TENKI_WORKER_CWD };
    }

    // セッション設定
    const requestTimeout = this.readInteger('TENKI_REQUEST_TIMEOUT');
    if (requestTimeout !== undefined) {
      envConfig.session = { ...envConfig.session, requestTimeout };
    }

    const handshakeTimeout = this.readInteger('TENKI_HANDSHAKE_TIMEOUT');
    if (handshakeTimeout !== undefined) {
      envConfig.session = { ...envConfig.session, handshakeTimeout };
    }

    // ログ設定
    if (env.TENKI_LOG_LEVEL) {
      const level = LogLevelSchema.safeParse(env.TENKI_LOG_LEVEL.toLowerCase());
      if (level.success) {
        envConfig.logging = { level: level.data };
      } else {
        this.logger.warn(`Ignoring TENKI_LOG_LEVEL="${env.TENKI_LOG_LEVEL}"`);
      }
    }

    return envConfig;
  }

  private readInteger(name: string): number | undefined {
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === '') {
      return undefined;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      this.logger.warn(`Ignoring ${name}="${raw}": expected a non-negative integer`);
      return undefined;
    }
    return value;
  }

  getConfig(): TenkiConfig {
    return mergeConfig(this.config, {});
  }

  getConfigPath(): string {
    return this.configPath;
  }

  update(updates: PartialTenkiConfig): void {
    this.config = mergeConfig(this.config, updates);
  }

  async saveConfig(path?: string): Promise<void> {
    const targetPath = path ?? this.configPath;

    try {
      const dir = dirname(targetPath);
      if (!existsSync(dir)) {
        await mkdir(dir, { recursive: true });
      }

      writeFileSync(targetPath, JSON.stringify(this.config, null, 2), 'utf-8');
      this.logger.info(`💾 Config saved to: ${targetPath}`);
    } catch (error) {
      this.logger.error(`Failed to save config to ${targetPath}:`, error);
      throw error;
    }
  }

  reload(): void {
    this.logger.debug('🔄 Reloading configuration...');
    this.config = this.loadConfig();
  }

  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const parsed = TenkiConfigSchema.safeParse(this.config);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        errors.push(`${issue.path.join('.')}: ${issue.message}`);
      }
    }

    if (this.config.forecast.defaultDays > this.config.forecast.maxDays) {
      errors.push('forecast.defaultDays must not exceed forecast.maxDays');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  getSummary(): {
    worker: string;
    session: string;
    forecast: string;
    logging: string;
  } {
    const { worker, session, forecast, logging } = this.config;
    return {
      worker: [worker.command, ...worker.args].join(' ') + (worker.cwd ? ` (cwd: ${worker.cwd})` : ''),
      session: `protocol ${session.protocolVersion}, handshake ${session.handshakeTimeout}ms, request ${session.requestTimeout}ms`,
      forecast: `default ${forecast.defaultDays} days, max ${forecast.maxDays} days`,
      logging: logging.level
    };
  }
}
