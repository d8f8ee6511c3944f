import { isRecord } from '../../../../../common/utils/object.utils';

/**
 * Serializes a value for a `$n::jsonb` parameter. `null`/`undefined` become JSON `null`.
 */
export function toJsonb(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  return JSON.stringify(value);
}

/** pg parses jsonb columns; anything that is not an object reads back as `{}`. */
export function fromJsonbObject(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
