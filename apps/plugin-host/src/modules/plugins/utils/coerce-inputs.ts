import type { ConnectorInput, NodeInputs } from '../interfaces/plugin-definition.interface';
import { PluginFile } from '../sdk/plugin-file';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function coerceFile(value: unknown): unknown {
  if (value instanceof PluginFile || !isRecord(value)) {
    return value;
  }
  return PluginFile.tryFrom(value) ?? value;
}

/**
 * Turns the file-typed slots of a raw payload into PluginFiles. Everything
 * else, including keys no slot declares and values that do not parse as a
 * file reference, is passed through untouched.
 */
export function coerceInputs(
  slots: readonly ConnectorInput[],
  payload: Record<string, unknown>,
): NodeInputs {
  const fileSlots = new Set(slots.filter((slot) => slot.dataType === 'file').map((slot) => slot.name));

  const inputs: NodeInputs = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!fileSlots.has(key)) {
      inputs[key] = value;
    } else if (Array.isArray(value)) {
      inputs[key] = value.map(coerceFile);
    } else {
      inputs[key] = coerceFile(value);
    }
  }
  return inputs;
}
