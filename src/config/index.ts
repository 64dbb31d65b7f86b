import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { WardenConfig } from '../types';
import { Logger, defaultLogger } from '../core/logger';
import { isMapping } from '../core/schema-node';

/**
 * Default configuration for Warden
 */
const DEFAULT_CONFIG: WardenConfig = {
  resourceTypes: [],
  summary: {
    // Capabilities every resource type carries; left out of the "unique" counts
    commonActions: ['notify', 'invoke-lambda'],
    commonFilters: ['value', 'and', 'or', 'event'],
  },
  server: {
    port: 3000,
  },
};

/**
 * Configuration file paths to search (in order)
 */
export const CONFIG_PATHS = [
  '.warden/config.yml',
  '.warden/config.yaml',
  'warden.yml',
  'warden.yaml',
];

/**
 * Load Warden configuration from file or use defaults
 */
export function loadConfig(basePath?: string, logger: Logger = defaultLogger): WardenConfig {
  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(basePath || process.cwd(), p));

  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        const parsed: unknown = yaml.parse(content);
        return mergeConfig(getDefaultConfig(), parsed);
      } catch (error) {
        logger.warn(`Warning: Failed to parse config at ${configPath}: ${error}`);
      }
    }
  }

  return getDefaultConfig();
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

function asRecord(value: unknown): Record<string, unknown> {
  return isMapping(value) ? value : {};
}

/**
 * Merge a parsed config file over the defaults; unknown or mistyped keys are ignored
 */
function mergeConfig(defaults: WardenConfig, override: unknown): WardenConfig {
  const top = asRecord(override);
  const summary = asRecord(top.summary);
  const server = asRecord(top.server);
  const port = server.port;

  return {
    resourceTypes: stringList(top.resourceTypes) ?? defaults.resourceTypes,
    summary: {
      commonActions: stringList(summary.commonActions) ?? defaults.summary.commonActions,
      commonFilters: stringList(summary.commonFilters) ?? defaults.summary.commonFilters,
    },
    server: {
      port: typeof port === 'number' ? port : defaults.server.port,
    },
  };
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): WardenConfig {
  return {
    resourceTypes: [...DEFAULT_CONFIG.resourceTypes],
    summary: {
      commonActions: [...DEFAULT_CONFIG.summary.commonActions],
      commonFilters: [...DEFAULT_CONFIG.summary.commonFilters],
    },
    server: { ...DEFAULT_CONFIG.server },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(
  config: WardenConfig,
  knownResources: readonly string[] = []
): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push(`Invalid server port: ${config.server.port}. Must be between 1 and 65535.`);
  }

  if (knownResources.length > 0) {
    for (const name of config.resourceTypes) {
      if (!knownResources.includes(name)) {
        errors.push(`Unknown resource type in resourceTypes: ${name}`);
      }
    }
  }

  return errors;
}
