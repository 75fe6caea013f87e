import type { ToolScope } from '@core/config/types';
import { LoopController } from '@tools/loop/LoopController';

/**
 * How a tool is published into toolboxes.
 */
export interface ToolDefinition<T = unknown> {
  /** Key the tool is published under unless configured otherwise */
  defaultKey: string;
  /** Scopes the tool may live in; a tool with state per render is request-only */
  validScopes: readonly ToolScope[];
  create(): T;
}

export type ToolCatalog = Record<string, ToolDefinition>;

export const loopTool: ToolDefinition<LoopController> = {
  defaultKey: 'loop',
  validScopes: ['request'],
  create: () => new LoopController()
};

export const builtinTools: ToolCatalog = {
  loop: loopTool
};
