import { InvalidArgumentError } from './error';

export function notNull<T>(value: T | null | undefined, name: string): asserts value is T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(`${name} is null`);
  }
}

export function greaterThanOrEqualToZero(value: number, name: string): void {
  if (Number.isNaN(value) || value < 0) {
    throw new InvalidArgumentError(`${name} < 0`);
  }
}
