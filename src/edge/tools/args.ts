/**
 * Tool argument validation - the tool's inputSchema doubles as the ajv schema
 */

import { Ajv, type ErrorObject } from 'ajv';

const ajv = new Ajv({ allErrors: true });

export class ToolArgumentError extends Error {
  constructor(
    readonly toolName: string,
    readonly problems: string[]
  ) {
    super(`Invalid arguments for ${toolName}: ${problems.join('; ')}`);
    this.name = 'ToolArgumentError';
  }
}

/**
 * JSON Schema shape accepted by both the MCP Tool definition and ajv
 */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
  additionalProperties?: boolean;
};

function describeProblem(error: ErrorObject): string {
  const path = error.instancePath ? error.instancePath.slice(1) : 'arguments';
  return `${path} ${error.message ?? 'is invalid'}`;
}

/**
 * Compile a parser that narrows raw tool arguments to T
 *
 * @throws {ToolArgumentError} From the returned function when arguments do not match
 */
export function createArgsParser<T>(toolName: string, schema: ToolInputSchema): (args: unknown) => T {
  const validate = ajv.compile<T>(schema);

  return (args: unknown): T => {
    const value = args ?? {};
    if (validate(value)) {
      return value;
    }
    throw new ToolArgumentError(toolName, (validate.errors ?? []).map(describeProblem));
  };
}
