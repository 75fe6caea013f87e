import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'js-yaml';
import { ConfigurationError } from '@core/errors/ConfigurationError';
import { configLogger } from '@core/utils/logger';
import type { DataConfig, ToolConfig, ToolboxConfig, ToolScope, ToolsConfig } from './types';

export const CONFIG_FILE_NAMES = ['tools.config.json', 'tools.config.yaml', 'tools.config.yml'] as const;

const SCOPES: readonly ToolScope[] = ['request', 'application'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScope(value: unknown): value is ToolScope {
  return SCOPES.some(scope => scope === value);
}

function parseData(entry: unknown, filePath?: string): DataConfig {
  if (!isRecord(entry) || typeof entry.key !== 'string') {
    throw new ConfigurationError('Data entries need a string key', { filePath });
  }
  if (entry.type !== undefined && typeof entry.type !== 'string') {
    throw new ConfigurationError(`Data type for '${entry.key}' must be a string`, { key: entry.key, filePath });
  }
  return { key: entry.key, type: entry.type, value: entry.value };
}

function parseTool(entry: unknown, filePath?: string): ToolConfig {
  if (!isRecord(entry) || typeof entry.tool !== 'string') {
    throw new ConfigurationError('Tool entries need a tool name', { filePath });
  }
  if (entry.key !== undefined && typeof entry.key !== 'string') {
    throw new ConfigurationError(`Key for tool '${entry.tool}' must be a string`, { filePath });
  }
  return { tool: entry.tool, key: entry.key };
}

function parseToolbox(entry: unknown, filePath?: string): ToolboxConfig {
  if (!isRecord(entry) || !isScope(entry.scope)) {
    throw new ConfigurationError(`Toolbox scope must be one of: ${SCOPES.join(', ')}`, { filePath });
  }
  const tools = entry.tools ?? [];
  if (!Array.isArray(tools)) {
    throw new ConfigurationError(`Tools of the ${entry.scope} toolbox must be a list`, { filePath });
  }
  return { scope: entry.scope, tools: tools.map(tool => parseTool(tool, filePath)) };
}

/**
 * Checks the shape of parsed configuration content
 */
export function parseToolsConfig(raw: unknown, filePath?: string): ToolsConfig {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError('Tools configuration must be an object', { filePath });
  }

  const config: ToolsConfig = {};

  if (raw.data !== undefined) {
    if (!Array.isArray(raw.data)) {
      throw new ConfigurationError('`data` must be a list', { filePath });
    }
    config.data = raw.data.map(entry => parseData(entry, filePath));
  }

  if (raw.toolboxes !== undefined) {
    if (!Array.isArray(raw.toolboxes)) {
      throw new ConfigurationError('`toolboxes` must be a list', { filePath });
    }
    config.toolboxes = raw.toolboxes.map(entry => parseToolbox(entry, filePath));
  }

  return config;
}

/**
 * Load tools configuration from both global and project locations
 */
export class ToolsConfigLoader {
  private globalConfigPath: string;
  private projectPath: string;
  private cachedConfig?: ToolsConfig;

  constructor(projectPath?: string) {
    // Global config location: ~/.config/template-tools.json
    this.globalConfigPath = path.join(os.homedir(), '.config', 'template-tools.json');
    this.projectPath = projectPath ?? process.cwd();
  }

  /**
   * Load and merge configurations
   */
  load(): ToolsConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectFile = this.findProjectConfig();
    const projectConfig = projectFile ? this.loadConfigFile(projectFile) : {};

    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * Path of the first project config file present, if any
   */
  findProjectConfig(): string | undefined {
    return CONFIG_FILE_NAMES
      .map(name => path.join(this.projectPath, name))
      .find(candidate => fs.existsSync(candidate));
  }

  /**
   * Load a single config file. Unreadable files count as empty; content
   * with the wrong shape throws.
   */
  loadConfigFile(filePath: string): ToolsConfig {
    let raw: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      raw = /\.ya?ml$/i.test(filePath) ? yaml.load(content) : JSON.parse(content);
    } catch (error) {
      configLogger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }

    return parseToolsConfig(raw, filePath);
  }

  /**
   * Project data overrides global data with the same key; toolboxes from
   * both are kept
   */
  private mergeConfigs(global: ToolsConfig, project: ToolsConfig): ToolsConfig {
    const merged: ToolsConfig = {};

    if (global.data || project.data) {
      const projectKeys = new Set((project.data ?? []).map(entry => entry.key));
      merged.data = [
        ...(global.data ?? []).filter(entry => !projectKeys.has(entry.key)),
        ...(project.data ?? [])
      ];
    }

    if (global.toolboxes || project.toolboxes) {
      merged.toolboxes = [...(global.toolboxes ?? []), ...(project.toolboxes ?? [])];
    }

    return merged;
  }
}
