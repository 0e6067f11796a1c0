import { StoreValue } from '../interfaces/counter-store.interface';
import { DecodeError } from '../errors/store.errors';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

export function decodeString(value: StoreValue): string {
  return Buffer.isBuffer(value) ? value.toString('utf8') : String(value);
}

/**
 * Decode a stored counter or integer value.
 * @throws DecodeError when the value is not an integer
 */
export function decodeInteger(key: string, value: StoreValue): number {
  if (typeof value === 'number') {
    if (Number.isInteger(value)) {
      return value;
    }
    throw new DecodeError(key, value, 'integer');
  }

  const text = decodeString(value);
  if (!INTEGER_PATTERN.test(text)) {
    throw new DecodeError(key, text, 'integer');
  }
  return parseInt(text, 10);
}

/**
 * @throws DecodeError when the value is not a finite number
 */
export function decodeFloat(key: string, value: StoreValue): number {
  if (typeof value === 'number') {
    return value;
  }

  const text = decodeString(value).trim();
  const parsed = Number(text);
  if (text === '' || !Number.isFinite(parsed)) {
    throw new DecodeError(key, text, 'float');
  }
  return parsed;
}
