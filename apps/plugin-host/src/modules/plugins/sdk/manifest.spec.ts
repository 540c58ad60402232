import { z } from 'zod';
import { createWeatherPlugin } from '../../../../test/mocks/weather-plugin';
import { buildManifest, describeShape } from './manifest';

describe('describeShape', () => {
  it('lists object fields with their requiredness and descriptions', () => {
    const schema = z.object({
      token: z.string().describe('API token'),
      retries: z.number().optional(),
      mode: z.string().default('fast'),
    });

    expect(describeShape(schema)).toEqual({
      fields: [
        { name: 'token', required: true, description: 'API token' },
        { name: 'retries', required: false },
        { name: 'mode', required: false },
      ],
    });
  });

  it('looks through refinements and defaults', () => {
    const schema = z
      .object({ url: z.string() })
      .refine((value) => value.url.length > 0)
      .default({ url: 'x' });

    expect(describeShape(schema)).toEqual({ fields: [{ name: 'url', required: true }] });
  });

  it('has no fields for a non-object schema', () => {
    expect(describeShape(z.string())).toEqual({ fields: [] });
  });
});

describe('buildManifest', () => {
  it('describes the plugin, its nodes and integrations', () => {
    const { plugin } = createWeatherPlugin();

    const manifest = buildManifest(plugin);

    expect(manifest.name).toBe('weather');
    expect(manifest.version).toBe('1.2.0');
    expect(manifest.displayName).toBe('Weather');
    expect(manifest.nodes.map((node) => node.name)).toEqual([
      'forecast',
      'temperature',
      'summarize-file',
      'strict',
      'broken',
    ]);
    expect(manifest.nodes[0]).toEqual({
      name: 'forecast',
      displayName: 'Forecast',
      description: 'Forecast for a city',
      inputs: [{ name: 'city', dataType: 'text' }],
      outputs: [{ name: 'summary', dataType: 'text' }],
      config: {
        fields: [
          { name: 'units', required: true, description: 'Measurement system' },
          { name: 'days', required: false },
        ],
      },
    });
    expect(manifest.integrations).toEqual([
      {
        type: 'weather-api',
        displayName: 'Weather API',
        image: 'https://example.com/weather.png',
        visible: true,
        scopes: ['read'],
        properties: {},
        config: {
          fields: [
            { name: 'apiKey', required: true, description: 'Weather API key' },
            { name: 'endpoint', required: false },
          ],
        },
      },
    ]);
  });

  it('defaults an untyped connector to text', () => {
    const { plugin } = createWeatherPlugin();

    const temperature = buildManifest(plugin).nodes.find((node) => node.name === 'temperature');

    expect(temperature?.inputs).toEqual([{ name: 'city', dataType: 'text' }]);
  });
});
