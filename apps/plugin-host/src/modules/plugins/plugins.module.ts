import { DynamicModule, Module } from '@nestjs/common';
import { HEALTH_READINESS_CHECKER } from '../core/services/health.service';
import { PluginController } from './controllers/plugin.controller';
import type { PluginDefinition } from './interfaces/plugin-definition.interface';
import { CapabilityRegistry } from './services/capability-registry';
import { FileContentServiceFactory } from './services/file-content.service';
import { PluginExecutionService } from './services/plugin-execution.service';
import { PluginReadinessChecker } from './services/plugin-readiness.checker';

export const PLUGIN_DEFINITION = 'PLUGIN_DEFINITION';

@Module({})
export class PluginsModule {
  /** Serves one plugin; the registry is built from it once, at module creation. */
  static forPlugin(plugin: PluginDefinition): DynamicModule {
    return {
      module: PluginsModule,
      controllers: [PluginController],
      providers: [
        { provide: PLUGIN_DEFINITION, useValue: plugin },
        {
          provide: CapabilityRegistry,
          useFactory: (definition: PluginDefinition) => CapabilityRegistry.fromPlugin(definition),
          inject: [PLUGIN_DEFINITION],
        },
        FileContentServiceFactory,
        PluginExecutionService,
        { provide: HEALTH_READINESS_CHECKER, useClass: PluginReadinessChecker },
      ],
      exports: [CapabilityRegistry, PluginExecutionService, HEALTH_READINESS_CHECKER],
    };
  }
}
