import { DynamicModule, Module, type ModuleMetadata } from '@nestjs/common';
import { HealthController } from './controllers/health.controller';
import { HEALTH_IDENTITY, HealthService, type HealthIdentity } from './services/health.service';

export interface CoreModuleOptions {
  identity: HealthIdentity;
  /** Module exporting the HEALTH_READINESS_CHECKER provider. */
  readinessModule?: NonNullable<ModuleMetadata['imports']>[number];
}

@Module({})
export class CoreModule {
  static forRoot(options: CoreModuleOptions): DynamicModule {
    return {
      module: CoreModule,
      imports: options.readinessModule ? [options.readinessModule] : [],
      controllers: [HealthController],
      providers: [{ provide: HEALTH_IDENTITY, useValue: options.identity }, HealthService],
      exports: [HealthService],
    };
  }
}
