import { InvalidArgumentError } from 'commander';

const INTEGER = /^[+-]?\d+$/;

export function toInt(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!INTEGER.test(trimmed) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

export function toIntList(value: string): number[] {
  return value.split(',').map(part => toInt(part.trim()));
}
