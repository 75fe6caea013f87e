/**
 * Template Tools API Entry Point
 *
 * Helper tools for page templates: managed loops, typed configuration
 * data and scoped toolboxes.
 */
import { ToolsConfigLoader } from '@core/config/loader';
import { ToolboxFactory } from '@tools/toolbox/Toolbox';

export { LoopController, ManagedIterator, Action, ActionCondition, Comparison, Equals } from '@tools/loop/index';
export type { Condition, ManagedIteratorOptions } from '@tools/loop/index';

export {
  Data,
  DEFAULT_TYPE,
  AutoConverter,
  BooleanConverter,
  FieldConverter,
  ListConverter,
  NumberConverter,
  StringConverter,
  createConverter
} from '@tools/data/index';
export type { Converter, DataOptions } from '@tools/data/index';

export { Toolbox, ToolboxFactory, builtinTools, loopTool } from '@tools/toolbox/index';
export type { ToolCatalog, ToolDefinition } from '@tools/toolbox/index';

export { toIterator } from '@core/utils/iteration';
export { createServiceLogger } from '@core/utils/logger';
export type { ILogger } from '@core/utils/logger';

export { ToolsConfigLoader, parseToolsConfig, CONFIG_FILE_NAMES } from '@core/config/loader';
export type { ToolsConfig, DataConfig, ToolConfig, ToolboxConfig, ToolScope } from '@core/config/types';

export * from '@core/errors/index';

/**
 * Builds a toolbox factory from the tools config found in `projectPath`
 * (and the user's global config).
 */
export function loadToolboxFactory(projectPath?: string): ToolboxFactory {
  return ToolboxFactory.fromConfig(new ToolsConfigLoader(projectPath).load());
}
