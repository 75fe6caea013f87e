/**
 * Configuration types for template tools
 */

export type ToolScope = 'request' | 'application';

export interface DataConfig {
  key: string;
  /** Defaults to `auto` */
  type?: string;
  value: unknown;
}

export interface ToolConfig {
  /** Catalog name of the tool, e.g. `loop` */
  tool: string;
  /** Key the tool is published under; defaults to the tool's own key */
  key?: string;
}

export interface ToolboxConfig {
  scope: ToolScope;
  tools: ToolConfig[];
}

export interface ToolsConfig {
  data?: DataConfig[];
  toolboxes?: ToolboxConfig[];
}
