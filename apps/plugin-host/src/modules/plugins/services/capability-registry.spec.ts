import { z } from 'zod';
import { createWeatherPlugin } from '../../../../test/mocks/weather-plugin';
import { CapabilityNotFoundError, PluginValidationError } from '../errors/plugin-errors';
import { defineIntegration, defineNode, definePlugin, syncHandler } from '../sdk/define';
import { CapabilityRegistry } from './capability-registry';

const echo = defineNode({
  name: 'echo',
  inputs: [],
  outputs: [],
  configSchema: z.object({}),
  handler: syncHandler(() => ({})),
});

describe('CapabilityRegistry', () => {
  it('indexes nodes and integrations by name', () => {
    const { plugin } = createWeatherPlugin();
    const registry = CapabilityRegistry.fromPlugin(plugin);

    expect(registry.nodeNames()).toEqual(['forecast', 'temperature', 'summarize-file', 'strict', 'broken']);
    expect(registry.integrationTypes()).toEqual(['weather-api']);
    expect(registry.getNode('forecast').displayName).toBe('Forecast');
    expect(registry.getIntegration('weather-api').displayName).toBe('Weather API');
    expect(registry.listNodes()).toHaveLength(5);
    expect(registry.listIntegrations()).toHaveLength(1);
  });

  it('names the available nodes when a node is missing', () => {
    const registry = CapabilityRegistry.fromPlugin(createWeatherPlugin().plugin);

    expect(() => registry.getNode('missing')).toThrow(CapabilityNotFoundError);
    expect(() => registry.getNode('missing')).toThrow(
      "Node 'missing' not found. Available nodes: forecast, temperature, summarize-file, strict, broken",
    );
  });

  it('names the available integrations when one is missing', () => {
    const registry = CapabilityRegistry.fromPlugin(createWeatherPlugin().plugin);

    expect(() => registry.getIntegration('slack')).toThrow(
      "Integration 'slack' not found. Available integrations: weather-api",
    );
  });

  it('reports an empty plugin', () => {
    const registry = CapabilityRegistry.fromPlugin(
      definePlugin({ name: 'empty', version: '0.1.0', nodes: [], integrations: [] }),
    );

    expect(() => registry.getNode('echo')).toThrow("Node 'echo' not found. Available nodes: (none)");
  });

  it('rejects duplicate node names', () => {
    const plugin = definePlugin({ name: 'dup', version: '1.0.0', nodes: [echo, echo], integrations: [] });

    expect(() => CapabilityRegistry.fromPlugin(plugin)).toThrow(PluginValidationError);
    expect(() => CapabilityRegistry.fromPlugin(plugin)).toThrow("Duplicate node 'echo' in plugin");
  });

  it('rejects duplicate integration types', () => {
    const integration = defineIntegration({
      type: 'api',
      displayName: 'API',
      image: '',
      credentialsSchema: z.object({ token: z.string() }),
    });
    const plugin = definePlugin({
      name: 'dup',
      version: '1.0.0',
      nodes: [],
      integrations: [integration, integration],
    });

    expect(() => CapabilityRegistry.fromPlugin(plugin)).toThrow("Duplicate integration 'api' in plugin");
  });

  it('is frozen once built', () => {
    const registry = CapabilityRegistry.fromPlugin(createWeatherPlugin().plugin);

    expect(Object.isFrozen(registry)).toBe(true);
  });
});
