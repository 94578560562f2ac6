/**
 * Runtime configuration holder for the server.
 *
 * Loaded once at startup; updates from the config API are validated,
 * written back to disk and only then take effect.
 */

import {
  DEFAULT_CONFIG_PATH,
  defaultDubbingConfig,
  loadDubbingConfig,
  mergeDubbingConfig,
  saveDubbingConfig,
  type DubbingConfig,
} from '../../services/config/dubbingConfig';
import { createLogger } from '../../services/logger';

const log = createLogger('ConfigStore');

export class ConfigStore {
  private current: DubbingConfig = defaultDubbingConfig();

  constructor(private readonly filePath: string = DEFAULT_CONFIG_PATH) {}

  async initialize(env: NodeJS.ProcessEnv = process.env): Promise<DubbingConfig> {
    this.current = await loadDubbingConfig(this.filePath, env);
    log.info(`Loaded config (engine=${this.current.basic.ttsEngine}, strategy=${this.current.basic.strategy})`);
    return this.current;
  }

  get(): DubbingConfig {
    return this.current;
  }

  /**
   * Merge a nested patch, persist it, then apply it.
   * @throws ConfigError when the result is invalid
   */
  async update(patch: unknown): Promise<DubbingConfig> {
    const next = mergeDubbingConfig(this.current, patch);
    await saveDubbingConfig(next, this.filePath);
    this.current = next;
    return next;
  }
}

export const configStore = new ConfigStore();
