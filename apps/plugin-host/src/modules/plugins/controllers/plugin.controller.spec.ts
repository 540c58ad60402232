import { Test, TestingModule } from '@nestjs/testing';
import { ZodError } from 'zod';
import { PluginExecutionService } from '../services/plugin-execution.service';
import { PluginController } from './plugin.controller';

describe('PluginController', () => {
  let controller: PluginController;
  let executionService: {
    getManifest: jest.Mock;
    validateConfig: jest.Mock;
    listNodes: jest.Mock;
    executeNode: jest.Mock;
    getNodeConfig: jest.Mock;
    getIntegrationConfig: jest.Mock;
    checkIntegrationReady: jest.Mock;
  };

  beforeEach(async () => {
    executionService = {
      getManifest: jest.fn(),
      validateConfig: jest.fn(),
      listNodes: jest.fn(),
      executeNode: jest.fn(),
      getNodeConfig: jest.fn(),
      getIntegrationConfig: jest.fn(),
      checkIntegrationReady: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [PluginController],
      providers: [{ provide: PluginExecutionService, useValue: executionService }],
    }).compile();

    controller = module.get(PluginController);
  });

  it('returns the manifest', () => {
    const manifest = { name: 'weather', version: '1.2.0', nodes: [], integrations: [] };
    executionService.getManifest.mockReturnValue(manifest);

    expect(controller.getManifest()).toBe(manifest);
  });

  it('validates an empty body as an empty config', async () => {
    executionService.validateConfig.mockResolvedValue({ valid: true, errors: [] });

    await controller.validateConfig(undefined);

    expect(executionService.validateConfig).toHaveBeenCalledWith({});
  });

  it('forwards node execution with the raw body', async () => {
    const body = { inputs: { city: 'Porto' } };
    executionService.executeNode.mockResolvedValue({ success: true, outputs: {} });

    await controller.executeNode('forecast', body);

    expect(executionService.executeNode).toHaveBeenCalledWith('forecast', body);
  });

  it.each<[string | undefined, boolean]>([
    [undefined, false],
    ['true', true],
    ['1', true],
    ['false', false],
    ['0', false],
  ])('reads skipCache=%s as %s', async (skipCache, expected) => {
    executionService.getNodeConfig.mockResolvedValue({});

    await controller.getNodeConfig('forecast', { config: {} }, skipCache);

    expect(executionService.getNodeConfig).toHaveBeenCalledWith('forecast', { config: {} }, expected);
  });

  it('rejects an unrecognised skipCache value', async () => {
    await expect(controller.getNodeConfig('forecast', {}, 'maybe')).rejects.toBeInstanceOf(ZodError);
    expect(executionService.getNodeConfig).not.toHaveBeenCalled();
  });

  it('describes integration credentials', () => {
    executionService.getIntegrationConfig.mockReturnValue({ fields: [] });

    expect(controller.getIntegrationConfig('weather-api')).toEqual({ fields: [] });
    expect(executionService.getIntegrationConfig).toHaveBeenCalledWith('weather-api');
  });

  it('checks integration readiness', async () => {
    executionService.checkIntegrationReady.mockResolvedValue(true);

    await expect(
      controller.checkIntegrationReady('weather-api', { credentials: { apiKey: 'test-token' } }),
    ).resolves.toBe(true);
  });

  it('lists nodes', () => {
    executionService.listNodes.mockReturnValue({ plugin: 'weather', nodes: [] });

    expect(controller.listNodes()).toEqual({ plugin: 'weather', nodes: [] });
  });
});
