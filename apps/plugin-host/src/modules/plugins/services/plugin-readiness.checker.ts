import { Injectable } from '@nestjs/common';
import type {
  CheckStatus,
  HealthReadinessChecker,
} from '../../core/services/health.service';
import { CapabilityRegistry } from './capability-registry';

/** A loaded plugin is ready when it offers at least one capability. */
@Injectable()
export class PluginReadinessChecker implements HealthReadinessChecker {
  constructor(private readonly registry: CapabilityRegistry) {}

  async getChecks(): Promise<Record<string, CheckStatus>> {
    const capabilities =
      this.registry.nodeNames().length + this.registry.integrationTypes().length;
    return { plugin: capabilities > 0 ? 'ok' : 'fail' };
  }
}
