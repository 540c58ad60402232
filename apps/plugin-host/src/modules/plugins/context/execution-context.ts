import { FileHelperNotBoundError } from '../errors/plugin-errors';
import type { FileContentService } from '../services/file-content.service';

export const DEFAULT_GROUP_ID = '00000000-0000-0000-0000-000000000000';
const DEFAULT_GROUP_NAME = 'Plugin Group';

export interface ExecutionContextInit {
  pluginConfig?: Record<string, unknown>;
  integrationCredentials?: Record<string, Record<string, unknown>>;
  groupId?: string | null;
}

export interface PluginGroup {
  id: string;
  name: string;
}

/**
 * Per-request state handed to a capability. The file helper is bound after
 * construction, once the request has been routed.
 */
export class ExecutionContext {
  readonly pluginConfig: Readonly<Record<string, unknown>>;
  readonly integrationCredentials: Readonly<Record<string, Record<string, unknown>>>;
  readonly groupId: string | null;
  private fileHelper: FileContentService | null = null;

  constructor(init: ExecutionContextInit = {}) {
    this.pluginConfig = init.pluginConfig ?? {};
    this.integrationCredentials = init.integrationCredentials ?? {};
    this.groupId = init.groupId ?? null;
  }

  getIntegrationCredentials(integration: string): Record<string, unknown> {
    return this.integrationCredentials[integration] ?? {};
  }

  getGroup(): PluginGroup {
    return { id: this.groupId ?? DEFAULT_GROUP_ID, name: DEFAULT_GROUP_NAME };
  }

  bindFileHelper(helper: FileContentService): void {
    this.fileHelper = helper;
  }

  getFileHelper(): FileContentService {
    if (!this.fileHelper) {
      throw new FileHelperNotBoundError();
    }
    return this.fileHelper;
  }
}
