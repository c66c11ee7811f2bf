import { InvalidParameterError } from '../errors';

export function stringArg(args: Record<string, unknown>, name: string): string {
  const value = args[name];
  if (typeof value !== 'string') {
    throw new InvalidParameterError(name, 'a string');
  }
  return value;
}

export function optionalPositiveIntArg(
  args: Record<string, unknown>,
  name: string
): number | undefined {
  const value = args[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new InvalidParameterError(name, 'a positive integer');
  }
  return value;
}
