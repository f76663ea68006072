/**
 * Values a template can be rendered against.
 */
export type StructuredValue =
  | null
  | boolean
  | number
  | string
  | StructuredValue[]
  | StructuredMapping;

export interface StructuredMapping {
  [key: string]: StructuredValue;
}

export function isSequence(value: StructuredValue | undefined): value is StructuredValue[] {
  return Array.isArray(value);
}

export function isMapping(value: StructuredValue | undefined): value is StructuredMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Section truthiness. Zero counts as truthy; empty strings and empty
 * collections do not.
 */
export function isTruthy(value: StructuredValue | undefined): boolean {
  if (value === undefined || value === null || value === false || value === '') {
    return false;
  }
  if (isSequence(value)) {
    return value.length > 0;
  }
  if (isMapping(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}

/**
 * Narrow untyped input (parsed JSON, for instance) to a StructuredValue.
 * Returns undefined when some part of it has no StructuredValue shape.
 */
export function toStructuredValue(input: unknown): StructuredValue | undefined {
  if (input === null || typeof input === 'boolean' || typeof input === 'string') {
    return input;
  }
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : undefined;
  }
  if (Array.isArray(input)) {
    const items: StructuredValue[] = [];
    for (const item of input) {
      const converted = toStructuredValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof input === 'object') {
    const entries: Array<[string, StructuredValue]> = [];
    for (const [key, item] of Object.entries(input)) {
      const converted = toStructuredValue(item);
      if (converted === undefined) return undefined;
      entries.push([key, converted]);
    }
    // fromEntries defines own properties, so a "__proto__" key stays data
    return Object.fromEntries(entries);
  }
  return undefined;
}
