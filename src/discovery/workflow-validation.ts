import { WorkflowValidation } from './interfaces/workflow-file.interface';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nodeError(node: unknown, index: number): string | undefined {
  const label = `nodes[${index}]`;
  if (!isRecord(node)) {
    return `${label} must be an object`;
  }
  const { name, type, position, typeVersion, parameters } = node;
  if (typeof name !== 'string' || name.length === 0) {
    return `${label}.name must be a non-empty string`;
  }
  if (typeof type !== 'string' || type.length === 0) {
    return `${label}.type must be a non-empty string`;
  }
  if (
    !Array.isArray(position) ||
    position.length !== 2 ||
    !position.every((coordinate) => typeof coordinate === 'number')
  ) {
    return `${label}.position must be a pair of numbers`;
  }
  if (typeof typeVersion !== 'number' || typeVersion < 1) {
    return `${label}.typeVersion must be a number >= 1`;
  }
  if (parameters !== undefined && !isRecord(parameters)) {
    return `${label}.parameters must be an object`;
  }
  return undefined;
}

/**
 * Structural check of a parsed workflow export. Only the first problem found
 * is reported.
 */
export function validateWorkflow(data: unknown): WorkflowValidation {
  if (!isRecord(data)) {
    return { valid: false, error: 'Workflow must be a JSON object' };
  }
  const { name, nodes, connections, active } = data;
  if (typeof name !== 'string') {
    return { valid: false, error: 'name must be a string' };
  }
  if (!Array.isArray(nodes) || nodes.length === 0) {
    return { valid: false, error: 'nodes must be a non-empty array' };
  }

  for (const [index, node] of nodes.entries()) {
    const error = nodeError(node, index);
    if (error) {
      return { valid: false, error };
    }
  }

  if (connections !== undefined && !isRecord(connections)) {
    return { valid: false, error: 'connections must be an object' };
  }
  if (active !== undefined && typeof active !== 'boolean') {
    return { valid: false, error: 'active must be a boolean' };
  }

  return {
    valid: true,
    workflow: { name, nodes, connections, active },
  };
}
