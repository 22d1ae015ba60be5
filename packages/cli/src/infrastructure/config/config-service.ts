/**
 * @file packages/cli/src/infrastructure/config/config-service.ts
 * @description Injectable access to the loaded configuration, with CLI overrides.
 */

import { inject, singleton } from 'tsyringe';
import { LSensorsConfigSchema } from '@lsensors/shared';
import { loadConfig, type LSensorsConfig } from '../../config.js';
import { ConfigurationError } from '../../domain/errors/app-error.js';
import { Logger, type LoggerLike } from '../../logger.js';

/**
 * Encapsulates config service behavior.
 */
@singleton()
export class ConfigService {
  private config: LSensorsConfig | null = null;

  constructor(@inject(Logger) private logger: LoggerLike) {}

  /**
   * Executes load.
   * @param projectRoot - Directory to read configuration from.
   * @returns The load result.
   */
  public load(projectRoot?: string): LSensorsConfig {
    try {
      this.config = loadConfig(projectRoot);
      return this.config;
    } catch (err) {
      this.logger.error({ err }, 'Failed to load config');
      throw err;
    }
  }

  /**
   * Executes get.
   * @param key - Key.
   * @returns The get result.
   */
  public get<K extends keyof LSensorsConfig>(key: K): LSensorsConfig[K] {
    return this.getFullConfig()[key];
  }

  /**
   * Applies command-line overrides on top of the loaded configuration.
   * The result is validated again, so a bad flag fails like a bad file.
   */
  public override(updates: Partial<LSensorsConfig>): LSensorsConfig {
    const defined = Object.fromEntries(
      Object.entries(updates).filter(([, value]) => value !== undefined),
    );
    const result = LSensorsConfigSchema.safeParse({ ...this.getFullConfig(), ...defined });
    if (!result.success) {
      throw new ConfigurationError(result.error.issues.map((issue) => issue.message).join('; '));
    }
    this.config = result.data;
    this.logger.debug({ keys: Object.keys(defined) }, 'Config overridden');
    return this.config;
  }

  /**
   * Retrieves full config.
   * @returns The get full config result.
   */
  public getFullConfig(): LSensorsConfig {
    return this.config ?? this.load();
  }
}
