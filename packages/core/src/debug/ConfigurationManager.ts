import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { QUIRE_DIR } from '../utils/paths.js';
import type { ConfigSources, DebugSettings } from './types.js';

const DebugOutputSchema = z.union([
  z.string(),
  z.object({ target: z.string(), directory: z.string().optional() }),
]);

// `debug` key of settings.json / config.json; unknown keys are ignored.
const PartialDebugSettingsSchema = z
  .object({
    enabled: z.boolean(),
    namespaces: z.union([
      z.array(z.string()),
      z.record(z.string(), z.unknown()),
    ]),
    level: z.string(),
    output: DebugOutputSchema,
    lazyEvaluation: z.boolean(),
    redactPatterns: z.array(z.string()),
  })
  .partial();

const SettingsFileSchema = z
  .object({ debug: PartialDebugSettingsSchema.optional() })
  .passthrough();

function defaultSources(): ConfigSources {
  return { env: process.env, homeDir: os.homedir(), cwd: process.cwd() };
}

export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly sources: ConfigSources;
  private readonly defaultConfig: DebugSettings;
  private projectConfig: Partial<DebugSettings> | null = null;
  private userConfig: Partial<DebugSettings> | null = null;
  private envConfig: Partial<DebugSettings> | null = null;
  private cliConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private readonly listeners = new Set<() => void>();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager(
        defaultSources(),
      );
    }
    return ConfigurationManager.instance;
  }

  /**
   * Replaces the shared instance with one reading from `sources`.
   * Loggers created afterwards observe the new instance.
   */
  static resetForTesting(
    sources?: Partial<ConfigSources>,
  ): ConfigurationManager {
    ConfigurationManager.instance = new ConfigurationManager({
      ...defaultSources(),
      ...sources,
    });
    return ConfigurationManager.instance;
  }

  private constructor(sources: ConfigSources) {
    this.sources = sources;
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'info',
      output: { target: 'stderr', directory: `~/${QUIRE_DIR}/debug` },
      lazyEvaluation: true,
      redactPatterns: ['apiKey', 'token', 'password'],
    };
    this.mergedConfig = this.defaultConfig;
    this.loadConfigurations();
  }

  loadConfigurations(): void {
    this.envConfig = this.loadEnvironmentConfig();
    this.userConfig = this.loadDebugSection(
      path.join(this.sources.homeDir, QUIRE_DIR, 'settings.json'),
    );
    this.projectConfig = this.loadDebugSection(
      path.join(this.sources.cwd, QUIRE_DIR, 'config.json'),
    );
    this.mergeConfigurations();
  }

  // DEBUG is shared with other tools, so only quire namespaces count there.
  private loadEnvironmentConfig(): Partial<DebugSettings> | null {
    const env = this.sources.env;
    let config: Partial<DebugSettings> | null = null;

    if (env.DEBUG) {
      const namespaces = this.parseDebugEnv(env.DEBUG).filter(
        (ns) => ns.startsWith('quire') || ns === '*',
      );
      if (namespaces.length > 0) {
        config = { enabled: true, namespaces };
      }
    }

    if (env.QUIRE_DEBUG) {
      config = {
        enabled: true,
        namespaces: this.parseDebugEnv(env.QUIRE_DEBUG),
      };
    }

    if (env.DEBUG_ENABLED) {
      config = { ...config, enabled: env.DEBUG_ENABLED === 'true' };
    }

    if (env.DEBUG_LEVEL) {
      config = { ...config, level: env.DEBUG_LEVEL };
    }

    if (env.DEBUG_OUTPUT) {
      config = { ...config, output: { target: env.DEBUG_OUTPUT } };
    }

    return config;
  }

  private loadDebugSection(configPath: string): Partial<DebugSettings> | null {
    if (!fs.existsSync(configPath)) {
      return null;
    }
    try {
      const parsed = SettingsFileSchema.safeParse(
        JSON.parse(fs.readFileSync(configPath, 'utf8')),
      );
      if (!parsed.success) {
        console.warn(
          `Ignoring debug settings in ${configPath}: ${parsed.error.message}`,
        );
        return null;
      }
      return parsed.data.debug ?? null;
    } catch (error) {
      console.warn(`Failed to load debug settings from ${configPath}:`, error);
      return null;
    }
  }

  // Later sources win: defaults < project < user < env < cli < ephemeral.
  private mergeConfigurations(): void {
    this.mergedConfig = {
      ...this.defaultConfig,
      ...this.projectConfig,
      ...this.userConfig,
      ...this.envConfig,
      ...this.cliConfig,
      ...this.ephemeralConfig,
    };

    this.listeners.forEach((listener) => listener());
  }

  setCliConfig(config: Partial<DebugSettings>): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    const output = this.mergedConfig.output;
    if (typeof output === 'string') {
      return output;
    }
    return output.target;
  }

  getOutputDirectory(): string | undefined {
    const output = this.mergedConfig.output;
    return typeof output === 'string' ? undefined : output.directory;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  get homeDir(): string {
    return this.sources.homeDir;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
