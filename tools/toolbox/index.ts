export { Toolbox, ToolboxFactory } from './Toolbox';
export { builtinTools, loopTool, type ToolCatalog, type ToolDefinition } from './catalog';
