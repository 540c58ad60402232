import { DynamicModule, Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AllExceptionsFilter } from './common/filters/http-exception.filter';
import { CoreModule } from './modules/core/core.module';
import { PluginsModule } from './modules/plugins/plugins.module';
import type { PluginDefinition } from './modules/plugins/interfaces/plugin-definition.interface';
import { SourcesModule } from './modules/sources/sources.module';

const exceptionFilter = { provide: APP_FILTER, useClass: AllExceptionsFilter };

@Module({})
export class AppModule {
  /** Plugin execution server for one loaded plugin. */
  static forPlugin(plugin: PluginDefinition): DynamicModule {
    const pluginsModule = PluginsModule.forPlugin(plugin);
    return {
      module: AppModule,
      imports: [
        CoreModule.forRoot({ identity: { plugin: plugin.name }, readinessModule: pluginsModule }),
        pluginsModule,
      ],
      providers: [exceptionFilter],
    };
  }

  /** Source resolution API. */
  static forSources(): DynamicModule {
    return {
      module: AppModule,
      imports: [CoreModule.forRoot({ identity: {}, readinessModule: SourcesModule }), SourcesModule],
      providers: [exceptionFilter],
    };
  }
}
