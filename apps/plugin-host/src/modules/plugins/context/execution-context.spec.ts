import { FakeFileContentService } from '../../../../test/mocks/fake-file-content.service';
import { FileHelperNotBoundError } from '../errors/plugin-errors';
import { DEFAULT_GROUP_ID, ExecutionContext } from './execution-context';

describe('ExecutionContext', () => {
  it('defaults to the placeholder group', () => {
    const ctx = new ExecutionContext();

    expect(ctx.getGroup()).toEqual({ id: DEFAULT_GROUP_ID, name: 'Plugin Group' });
    expect(DEFAULT_GROUP_ID).toBe('00000000-0000-0000-0000-000000000000');
  });

  it('uses the request group when given', () => {
    const ctx = new ExecutionContext({ groupId: 'group-7' });

    expect(ctx.getGroup()).toEqual({ id: 'group-7', name: 'Plugin Group' });
  });

  it('returns credentials per integration', () => {
    const ctx = new ExecutionContext({
      integrationCredentials: { 'weather-api': { apiKey: 'test-token' } },
    });

    expect(ctx.getIntegrationCredentials('weather-api')).toEqual({ apiKey: 'test-token' });
    expect(ctx.getIntegrationCredentials('slack')).toEqual({});
  });

  it('keeps the plugin config', () => {
    const ctx = new ExecutionContext({ pluginConfig: { region: 'eu' } });

    expect(ctx.pluginConfig).toEqual({ region: 'eu' });
  });

  it('refuses file access before a helper is bound', () => {
    const ctx = new ExecutionContext();

    expect(() => ctx.getFileHelper()).toThrow(FileHelperNotBoundError);
  });

  it('returns the bound helper', () => {
    const ctx = new ExecutionContext();
    const helper = new FakeFileContentService();

    ctx.bindFileHelper(helper);

    expect(ctx.getFileHelper()).toBe(helper);
  });
});
