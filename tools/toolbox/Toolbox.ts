import { ConfigurationError } from '@core/errors/ConfigurationError';
import type { ToolScope, ToolsConfig } from '@core/config/types';
import { toolboxLogger } from '@core/utils/logger';
import { Data } from '@tools/data/Data';
import { builtinTools, type ToolCatalog, type ToolDefinition } from './catalog';

/**
 * The tools and data values available to one template context.
 */
export class Toolbox {
  constructor(
    readonly scope: ToolScope,
    private readonly entries: ReadonlyMap<string, unknown>
  ) {}

  get(key: string): unknown {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.entries);
  }
}

interface RegisteredTool {
  key: string;
  definition: ToolDefinition;
}

/**
 * Collects tool registrations and data, and builds fresh toolboxes per
 * scope. Request toolboxes are meant to be built once per render.
 */
export class ToolboxFactory {
  private readonly tools = new Map<ToolScope, RegisteredTool[]>();
  private readonly data = new Map<string, Data>();

  /**
   * @throws ConfigurationError if the tool may not live in `scope`
   */
  addTool(scope: ToolScope, definition: ToolDefinition, key: string = definition.defaultKey): this {
    if (!definition.validScopes.includes(scope)) {
      throw new ConfigurationError(
        `Tool '${key}' is not valid in ${scope} scope (valid: ${definition.validScopes.join(', ')})`,
        { key }
      );
    }
    const registered = this.tools.get(scope) ?? [];
    registered.push({ key, definition });
    this.tools.set(scope, registered);
    toolboxLogger.debug('Registered tool', { key, scope });
    return this;
  }

  /**
   * Data values are shared by every scope. Later entries replace earlier
   * ones with the same key.
   */
  addData(data: Data): this {
    data.validate();
    if (data.key === undefined) {
      return this;
    }
    this.data.set(data.key, data);
    return this;
  }

  createToolbox(scope: ToolScope): Toolbox {
    const entries = new Map<string, unknown>();

    for (const [key, data] of this.data) {
      entries.set(key, data.getConvertedValue());
    }
    for (const { key, definition } of this.tools.get(scope) ?? []) {
      if (entries.has(key)) {
        toolboxLogger.warn(`Tool '${key}' replaces a data value with the same key`, { scope });
      }
      entries.set(key, definition.create());
    }

    return new Toolbox(scope, entries);
  }

  static fromConfig(config: ToolsConfig, catalog: ToolCatalog = builtinTools): ToolboxFactory {
    const factory = new ToolboxFactory();

    for (const entry of config.data ?? []) {
      factory.addData(new Data({ key: entry.key, type: entry.type, value: entry.value }));
    }

    for (const toolbox of config.toolboxes ?? []) {
      for (const tool of toolbox.tools) {
        if (!Object.prototype.hasOwnProperty.call(catalog, tool.tool)) {
          throw new ConfigurationError(`Unknown tool '${tool.tool}'`, { key: tool.key });
        }
        factory.addTool(toolbox.scope, catalog[tool.tool], tool.key);
      }
    }

    return factory;
  }
}
