/**
 * tenki CLI メインクラス
 */
import { Command } from 'commander';
import { LogLevelSchema, toError, type LogLevel } from '@tenki/shared';
import {
  ConfigManager,
  DEFAULT_CONFIG_PATH,
  WeatherClient,
  createLogger,
  type ConsoleLogger,
  type Spawner
} from '@tenki/client';
import {
  formatDuration,
  formatForecast,
  formatLocation,
  formatSnapshot,
  formatToolList,
  logError,
  logSuccess,
  logWarning
} from './utils/index.js';

type GlobalOptions = {
  config?: string;
  worker?: string;
  logLevel?: string;
};

interface ConfigCommandOptions {
  show?: boolean;
  validate?: boolean;
  createDefault?: boolean;
}

export interface TenkiCliOptions {
  spawner?: Spawner;
  env?: NodeJS.ProcessEnv;
  /** 結果の出力先（既定は console.log） */
  write?: (text: string) => void;
}

export class TenkiCli {
  private readonly program: Command;
  private readonly spawner?: Spawner;
  private readonly env?: NodeJS.ProcessEnv;
  private readonly write: (text: string) => void;
  private exitCode = 0;

  constructor(options: TenkiCliOptions = {}) {
    this.spawner = options.spawner;
    this.env = options.env;
    this.write = options.write ?? (text => console.log(text));
    this.program = new Command();
    this.setupCommands();
  }

  private setupCommands(): void {
    this.program
      .name('tenki')
      .description('Weather lookups through an MCP weather worker')
      .version('0.1.0')
      .option('--config <path>', 'Configuration file path', DEFAULT_CONFIG_PATH)
      .option('--worker <command>', 'Worker command line (overrides worker.command and worker.args)')
      .option('--log-level <level>', 'Log level (debug|info|warn|error|silent)');

    this.program
      .command('current')
      .description('Show current weather for a location')
      .argument('<location>', 'City or place name')
      .action(async (location: string) => {
        await this.withClient('current', async client => {
          this.write(formatSnapshot(await client.getCurrentWeather(location)));
        });
      });

    this.program
      .command('forecast')
      .description('Show the daily forecast for a location')
      .argument('<location>', 'City or place name')
      .option('-d, --days <n>', 'Number of days (1-16)')
      .action(async (location: string, options: { days?: string }) => {
        const days = options.days === undefined ? undefined : Number.parseInt(options.days, 10);
        if (days !== undefined && Number.isNaN(days)) {
          this.fail(`--days must be a number, got "${options.days}"`);
          return;
        }

        await this.withClient('forecast', async client => {
          this.write(formatForecast(await client.getForecast(location, days)));
        });
      });

    this.program
      .command('search')
      .description('Look up a location and its coordinates')
      .argument('<location>', 'City or place name')
      .action(async (location: string) => {
        await this.withClient('search', async client => {
          this.write(formatLocation(await client.searchLocation(location)));
        });
      });

    this.program
      .command('tools')
      .description('List the tools the worker exposes')
      .action(async () => {
        await this.withClient('tools', async client => {
          this.write(formatToolList(await client.listAvailableTools()));
        });
      });

    this.program
      .command('config')
      .description('Configuration management')
      .option('--show', 'Show current configuration')
      .option('--validate', 'Validate configuration')
      .option('--create-default', 'Create default configuration file')
      .action(async (options: ConfigCommandOptions) => {
        await this.manageConfig(options);
      });
  }

  private loadConfig(): { manager: ConfigManager; logger: ConsoleLogger } {
    const globals = this.program.opts<GlobalOptions>();
    const requested = this.resolveLogLevel(globals.logLevel);
    const bootstrap = createLogger(requested ?? 'warn', 'cli');
    const manager = new ConfigManager({
      configPath: globals.config,
      env: this.env,
      logger: bootstrap
    });

    const level = requested ?? manager.getConfig().logging.level;
    manager.update({ logging: { level } });

    if (globals.worker) {
      const [command, ...args] = globals.worker.trim().split(/\s+/);
      manager.update({ worker: { command, args } });
    }

    return { manager, logger: createLogger(level) };
  }

  private resolveLogLevel(raw: string | undefined): LogLevel | undefined {
    if (raw === undefined) {
      return undefined;
    }
    const parsed = LogLevelSchema.safeParse(raw.toLowerCase());
    if (!parsed.success) {
      logWarning(`Unknown log level "${raw}", ignoring`);
      return undefined;
    }
    return parsed.data;
  }

  private async withClient(command: string, body: (client: WeatherClient) => Promise<void>): Promise<void> {
    const { manager, logger } = this.loadConfig();
    const startedAt = Date.now();
    let client: WeatherClient | undefined;

    try {
      client = new WeatherClient({
        config: manager.getConfig(),
        spawner: this.spawner,
        logger
      });

      const connected = await client.connect();
      if (!connected) {
        this.fail(`Could not connect to weather worker (${manager.getSummary().worker})`);
        return;
      }

      await body(client);
      logger.debug(`${command} finished in ${formatDuration(Date.now() - startedAt)}`);
    } catch (error) {
      this.fail(toError(error).message);
    } finally {
      await client?.close();
    }
  }

  private async manageConfig(options: ConfigCommandOptions): Promise<void> {
    const { manager } = this.loadConfig();

    try {
      if (options.show) {
        this.write(JSON.stringify(manager.getConfig(), null, 2));
        return;
      }

      if (options.validate) {
        const validation = manager.validate();
        if (validation.valid) {
          logSuccess('Configuration is valid');
        } else {
          this.fail('Configuration has errors:');
          validation.errors.forEach(error => this.write(`   - ${error}`));
        }
        return;
      }

      if (options.createDefault) {
        await manager.saveConfig();
        logSuccess(`Default configuration created: ${manager.getConfigPath()}`);
        return;
      }

      const summary = manager.getSummary();
      this.write(
        [
          'Configuration Summary:',
          `   Worker: ${summary.worker}`,
          `   Session: ${summary.session}`,
          `   Forecast: ${summary.forecast}`,
          `   Logging: ${summary.logging}`
        ].join('\n')
      );
    } catch (error) {
      this.fail(`Configuration error: ${toError(error).message}`);
    }
  }

  private fail(message: string): void {
    logError(message);
    this.exitCode = 1;
  }

  /**
   * コマンドを実行し、終了コードを返す
   */
  async run(argv: string[]): Promise<number> {
    this.exitCode = 0;
    await this.program.parseAsync(argv);
    return this.exitCode;
  }
}
