import * as dotenv from 'dotenv';
import { AppConfig, AppConfigSchema, LoggingConfig } from './ConfigSchema';
import { ConfigurationError } from '../../domain/errors/AppErrors';
import { loggers, setGlobalLoggerConfig } from '../logging';

type Env = Record<string, string | undefined>;

/**
 * Partial configuration taking precedence over the environment.
 */
export interface ConfigOverrides {
  browser?: Partial<AppConfig['browser']>;
  replay?: Partial<AppConfig['replay']>;
  logging?: Partial<AppConfig['logging']>;
}

function int(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function flag(value: string | undefined): boolean | undefined {
  return value === undefined || value === '' ? undefined : value !== 'false';
}

export class ConfigFactory {
  /**
   * Builds the configuration from `env` (the process environment, after
   * loading `.env`, by default) and `overrides`.
   *
   * @throws ConfigurationError when a value does not pass validation
   */
  static load(overrides: ConfigOverrides = {}, env: Env = ConfigFactory.processEnv()): AppConfig {
    const rawConfig = {
      browser: {
        headless: flag(env.HEADLESS),
        timeout: int(env.BROWSER_TIMEOUT),
        width: int(env.VIEWPORT_WIDTH),
        height: int(env.VIEWPORT_HEIGHT),
        maxRetries: int(env.MAX_RETRIES),
        retryBaseDelay: int(env.RETRY_BASE_DELAY),
        ...overrides.browser,
      },
      replay: {
        maxDepth: int(env.REPLAY_MAX_DEPTH),
        stopOnFailure: flag(env.REPLAY_STOP_ON_FAILURE),
        ...overrides.replay,
      },
      logging: {
        level: env.LOG_LEVEL,
        json: flag(env.LOG_JSON),
        ...overrides.logging,
      },
    };

    const result = AppConfigSchema.safeParse(rawConfig);

    if (!result.success) {
      const errorMsg = JSON.stringify(result.error.format(), null, 2);
      throw new ConfigurationError(`Invalid Configuration:\n${errorMsg}`);
    }

    loggers.config.debug('Configuration loaded', {
      headless: result.data.browser.headless,
      maxDepth: result.data.replay.maxDepth,
    });
    return result.data;
  }

  /**
   * Applies the logging section to every logger.
   */
  static applyLogging(logging: LoggingConfig): void {
    setGlobalLoggerConfig({ minLevel: logging.level, jsonOutput: logging.json });
  }

  private static processEnv(): Env {
    dotenv.config();
    return process.env;
  }
}
