import * as dotenv from 'dotenv';
import { AppConfig, AppConfigOverrides, AppConfigSchema } from './ConfigSchema';
import { ConfigurationError } from '../../domain/errors/AppErrors';

type Env = Record<string, string | undefined>;

function int(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function float(value: string | undefined): number | undefined {
  return value ? parseFloat(value) : undefined;
}

function flag(value: string | undefined): boolean | undefined {
  return value === undefined || value === '' ? undefined : value !== 'false' && value !== '0';
}

export class ConfigFactory {
  /**
   * Builds the configuration from `.env`, the process environment and explicit
   * overrides (highest precedence). Unset variables fall back to schema defaults.
   * @throws ConfigurationError listing every invalid field
   */
  static load(overrides: AppConfigOverrides = {}, env: Env = ConfigFactory.readEnv()): AppConfig {
    const rawConfig = {
      browser: {
        headless: flag(env.HEADLESS),
        width: int(env.VIEWPORT_WIDTH),
        height: int(env.VIEWPORT_HEIGHT),
        timeout: int(env.BROWSER_TIMEOUT),
        ...overrides.browser,
      },
      output: {
        dir: env.OUTPUT_DIR || undefined,
        ...overrides.output,
      },
      executor: {
        maxConsecutiveErrors: int(env.MAX_CONSECUTIVE_ERRORS),
        settleTimeout: int(env.SETTLE_TIMEOUT),
        pollInterval: int(env.POLL_INTERVAL),
        stabilityTimeout: int(env.STABILITY_TIMEOUT),
        defaultWaitSeconds: float(env.DEFAULT_WAIT_SECONDS),
        ...overrides.executor,
      },
      resolver: {
        menuRenderDelay: int(env.MENU_RENDER_DELAY),
        ...overrides.resolver,
      },
      logging: {
        level: env.LOG_LEVEL || undefined,
        json: flag(env.LOG_JSON),
        ...overrides.logging,
      },
    };

    const result = AppConfigSchema.safeParse(rawConfig);

    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(issues.join('; '));
    }

    return result.data;
  }

  /**
   * Loads `.env` into the process environment (existing variables win) and returns it.
   */
  static readEnv(): Env {
    dotenv.config();
    return process.env;
  }
}
