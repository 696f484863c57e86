/**
 * Narrowing of raw MCP tool arguments
 */

export type ToolArgs = Record<string, unknown> | undefined;

export function readString(args: ToolArgs, key: string): string {
  const value = args?.[key];
  if (typeof value !== 'string') {
    throw new Error(`Missing required string argument: ${key}`);
  }
  return value;
}

export function readOptionalString(args: ToolArgs, key: string): string | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Argument ${key} must be a string`);
  }
  return value;
}

export function readOptionalBoolean(args: ToolArgs, key: string): boolean | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`Argument ${key} must be a boolean`);
  }
  return value;
}
