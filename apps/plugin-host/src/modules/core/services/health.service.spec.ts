import { HealthService } from './health.service';

describe('HealthService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('getStatus', () => {
    it('names the served plugin', () => {
      const service = new HealthService({ plugin: 'weather' });

      expect(service.getStatus()).toEqual({
        status: 'healthy',
        plugin: 'weather',
        service: 'plugin-host',
      });
    });

    it('omits the plugin when none is served', () => {
      const service = new HealthService({});

      expect(service.getStatus()).toEqual({ status: 'healthy', service: 'plugin-host' });
    });
  });

  describe('getReadiness', () => {
    it('returns ready=true when all injected checks pass', async () => {
      const checker = { getChecks: jest.fn().mockResolvedValue({ plugin: 'ok' }) };
      const service = new HealthService({ plugin: 'weather' }, checker);

      await expect(service.getReadiness()).resolves.toEqual({
        ready: true,
        checks: { plugin: 'ok' },
      });
    });

    it('returns ready=false when any injected check fails', async () => {
      const checker = { getChecks: jest.fn().mockResolvedValue({ git: 'fail', tmp: 'ok' }) };
      const service = new HealthService({}, checker);

      await expect(service.getReadiness()).resolves.toEqual({
        ready: false,
        checks: { git: 'fail', tmp: 'ok' },
      });
    });

    it('returns ready=false when no checker is registered', async () => {
      const service = new HealthService({}, undefined);

      await expect(service.getReadiness()).resolves.toEqual({ ready: false, checks: {} });
    });
  });
});
