import { Inject, Injectable, Optional } from '@nestjs/common';

export const SERVICE_NAME = 'plugin-host';

export const HEALTH_IDENTITY = 'HEALTH_IDENTITY';
export const HEALTH_READINESS_CHECKER = 'HEALTH_READINESS_CHECKER';

export type CheckStatus = 'ok' | 'fail';

/** What this process serves; `plugin` is set in serve mode. */
export interface HealthIdentity {
  plugin?: string;
}

export interface HealthStatus {
  status: 'healthy';
  plugin?: string;
  service: string;
}

export interface HealthReadiness {
  ready: boolean;
  checks: Record<string, CheckStatus>;
}

export interface HealthReadinessChecker {
  getChecks(): Promise<Record<string, CheckStatus>>;
}

@Injectable()
export class HealthService {
  constructor(
    @Inject(HEALTH_IDENTITY) private readonly identity: HealthIdentity,
    @Optional()
    @Inject(HEALTH_READINESS_CHECKER)
    private readonly readinessChecker?: HealthReadinessChecker,
  ) {}

  getStatus(): HealthStatus {
    return {
      status: 'healthy',
      ...(this.identity.plugin ? { plugin: this.identity.plugin } : {}),
      service: SERVICE_NAME,
    };
  }

  async getReadiness(): Promise<HealthReadiness> {
    const checks = (await this.readinessChecker?.getChecks()) ?? {};
    const statuses = Object.values(checks);
    const ready = statuses.length > 0 && statuses.every((status) => status === 'ok');

    return { ready, checks };
  }
}
