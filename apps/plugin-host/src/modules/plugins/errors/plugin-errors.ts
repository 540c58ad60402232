import { AppError, InternalError } from '../../../common/errors/error-types';

export type CapabilityKind = 'node' | 'integration';

const KIND_LABELS: Record<CapabilityKind, { singular: string; plural: string }> = {
  node: { singular: 'Node', plural: 'nodes' },
  integration: { singular: 'Integration', plural: 'integrations' },
};

export class CapabilityNotFoundError extends AppError {
  constructor(
    public readonly kind: CapabilityKind,
    public readonly capabilityName: string,
    public readonly available: readonly string[],
  ) {
    const label = KIND_LABELS[kind];
    super(
      `${label.singular} '${capabilityName}' not found. Available ${label.plural}: ${available.length > 0 ? available.join(', ') : '(none)'}`,
      'capability_not_found',
      404,
      { kind, name: capabilityName, available: [...available] },
    );
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
  code: string;
}

/** Config rejected by the capability's declared shape; the handler never ran. */
export class ConfigValidationError extends AppError {
  constructor(public readonly issues: ConfigIssue[]) {
    super('Invalid capability configuration', 'config_validation_error', 422, { issues });
  }

  toEnvelopeDetail(): ConfigIssue[] {
    return this.issues;
  }
}

/** Raised by plugin code, or by the loader, when a plugin is malformed. */
export class PluginValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'plugin_validation_error', 400, details);
  }
}

/** Unexpected fault inside a capability; the cause is logged, never returned. */
export class CapabilityExecutionError extends InternalError {
  constructor(cause: unknown, details?: Record<string, unknown>) {
    super(cause, details, 'capability_execution_error');
  }
}

export class FileHelperNotBoundError extends AppError {
  constructor() {
    super('File helper is not bound to this execution context', 'file_helper_not_bound', 500);
  }
}

export class FileTransferError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'file_transfer_error', 502, details);
  }
}
