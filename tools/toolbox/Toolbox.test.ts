import { describe, it, expect } from 'vitest';
import { ToolboxFactory } from './Toolbox';
import { loopTool, type ToolDefinition } from './catalog';
import { LoopController } from '@tools/loop/LoopController';
import { Data } from '@tools/data/Data';
import { ConfigurationError } from '@core/errors/ConfigurationError';

const clockTool: ToolDefinition<{ now: number }> = {
  defaultKey: 'clock',
  validScopes: ['request', 'application'],
  create: () => ({ now: 0 })
};

describe('ToolboxFactory', () => {
  it('builds request toolboxes from configuration', () => {
    const factory = ToolboxFactory.fromConfig({
      data: [{ key: 'pageSize', type: 'number', value: '20' }],
      toolboxes: [{ scope: 'request', tools: [{ tool: 'loop' }] }]
    });

    const toolbox = factory.createToolbox('request');

    expect(toolbox.scope).toBe('request');
    expect(toolbox.keys()).toEqual(['pageSize', 'loop']);
    expect(toolbox.get('pageSize')).toBe(20);
    expect(toolbox.get('loop')).toBeInstanceOf(LoopController);
  });

  it('creates a fresh loop controller for every request', () => {
    const factory = new ToolboxFactory().addTool('request', loopTool);

    const first = factory.createToolbox('request').get('loop');
    const second = factory.createToolbox('request').get('loop');

    expect(first).toBeInstanceOf(LoopController);
    expect(second).toBeInstanceOf(LoopController);
    expect(first).not.toBe(second);
  });

  it('keeps request tools out of application toolboxes', () => {
    const factory = new ToolboxFactory()
      .addTool('request', loopTool)
      .addData(new Data({ key: 'site', type: 'string', value: 'docs' }));

    const toolbox = factory.createToolbox('application');

    expect(toolbox.has('loop')).toBe(false);
    expect(toolbox.toObject()).toEqual({ site: 'docs' });
  });

  it('rejects tools registered outside their valid scopes', () => {
    const factory = new ToolboxFactory();
    expect(() => factory.addTool('application', loopTool)).toThrow(ConfigurationError);
    expect(() => factory.addTool('application', loopTool)).toThrow(
      "Tool 'loop' is not valid in application scope (valid: request)"
    );
  });

  it('publishes tools under a configured key', () => {
    const factory = ToolboxFactory.fromConfig({
      toolboxes: [{ scope: 'request', tools: [{ tool: 'loop', key: 'iter' }] }]
    });
    const toolbox = factory.createToolbox('request');

    expect(toolbox.has('iter')).toBe(true);
    expect(toolbox.has('loop')).toBe(false);
  });

  it('resolves tools from a custom catalog', () => {
    const factory = ToolboxFactory.fromConfig(
      { toolboxes: [{ scope: 'application', tools: [{ tool: 'clock' }] }] },
      { clock: clockTool }
    );

    expect(factory.createToolbox('application').get('clock')).toEqual({ now: 0 });
  });

  it('rejects unknown tools', () => {
    expect(() =>
      ToolboxFactory.fromConfig({ toolboxes: [{ scope: 'request', tools: [{ tool: 'calendar' }] }] })
    ).toThrow("Unknown tool 'calendar'");
  });

  it('validates data as it is added', () => {
    const factory = new ToolboxFactory();
    expect(() => factory.addData(new Data({ key: 'limit', type: 'number' }))).toThrow(
      "No value has been set for 'limit'"
    );
  });

  it('lets later data replace earlier data with the same key', () => {
    const factory = ToolboxFactory.fromConfig({
      data: [
        { key: 'debug', value: 'false' },
        { key: 'debug', value: 'true' }
      ]
    });

    expect(factory.createToolbox('request').get('debug')).toBe(true);
  });

  it('drives loops from a request toolbox', () => {
    const toolbox = ToolboxFactory.fromConfig({
      toolboxes: [{ scope: 'request', tools: [{ tool: 'loop' }] }]
    }).createToolbox('request');

    const loop = toolbox.get('loop');
    if (!(loop instanceof LoopController)) {
      throw new Error('Expected a loop controller');
    }

    const rows: string[] = [];
    for (const name of loop.watch(['ann', 'bob', 'cy']) ?? []) {
      rows.push(loop.isLast() ? `${name}.` : `${name},`);
    }

    expect(rows).toEqual(['ann,', 'bob,', 'cy.']);
    expect(loop.getDepth()).toBe(0);
  });
});
