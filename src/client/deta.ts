import { ConfigurationError } from '../errors.js';
import { DetaBase } from './base.js';
import { configFromEnv, resolveConfig } from './config.js';
import type { DetaConfig, ResolvedConfig } from './config.js';

const BASE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Project-level client. Construct once and share: configuration is
 * resolved at construction and never changes afterwards.
 *
 * @example
 * const deta = Deta.fromEnv();
 * const users = deta.base('users');
 * await users.insert({ key: 'user123', name: 'Ann' });
 */
export class Deta {
  private readonly config: ResolvedConfig;

  constructor(config: DetaConfig) {
    this.config = resolveConfig(config);
  }

  /** Reads DETA_PROJECT_KEY (and DETA_ENDPOINT, if set) once. */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: Partial<Omit<DetaConfig, 'projectKey'>> = {},
  ): Deta {
    return new Deta(configFromEnv(env, overrides));
  }

  get projectId(): string {
    return this.config.projectId;
  }

  get endpoint(): string {
    return this.config.endpoint;
  }

  base(name: string): DetaBase {
    if (!BASE_NAME_PATTERN.test(name)) {
      throw new ConfigurationError(`Base name "${name}" must match /^[A-Za-z0-9_-]+$/`);
    }
    return new DetaBase(this.config, name);
  }
}
