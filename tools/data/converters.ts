import { DataConversionError } from '@core/errors/DataConversionError';

/**
 * Turns a raw configuration value into a typed one.
 */
export interface Converter {
  convert(value: unknown): unknown;
}

const BOOLEAN_WORDS: Record<string, boolean> = {
  true: true,
  yes: true,
  y: true,
  on: true,
  '1': true,
  false: false,
  no: false,
  n: false,
  off: false,
  '0': false
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Recognizes `true` and `false` in any case; leaves everything else alone.
 */
export class AutoConverter implements Converter {
  convert(value: unknown): unknown {
    if (typeof value !== 'string') {
      return value;
    }
    const lower = value.toLowerCase();
    if (lower === 'true') {
      return true;
    }
    if (lower === 'false') {
      return false;
    }
    return value;
  }
}

export class BooleanConverter implements Converter {
  convert(value: unknown): boolean {
    if (typeof value === 'boolean') {
      return value;
    }
    const word = String(value).trim().toLowerCase();
    if (Object.prototype.hasOwnProperty.call(BOOLEAN_WORDS, word)) {
      return BOOLEAN_WORDS[word];
    }
    throw new DataConversionError('boolean', value);
  }
}

/**
 * Integers unless the text has a decimal point.
 */
export class NumberConverter implements Converter {
  convert(value: unknown): number {
    if (typeof value === 'number') {
      return value;
    }
    const text = String(value).trim();
    if (!text.includes('.')) {
      if (!INTEGER_PATTERN.test(text)) {
        throw new DataConversionError('integer', value);
      }
      return Number.parseInt(text, 10);
    }
    const parsed = Number(text);
    if (Number.isNaN(parsed)) {
      throw new DataConversionError('number', value);
    }
    return parsed;
  }
}

export class StringConverter implements Converter {
  convert(value: unknown): string {
    return String(value);
  }
}

/**
 * Resolves a dotted path such as `Number.MAX_SAFE_INTEGER` against a root
 * object.
 */
export class FieldConverter implements Converter {
  constructor(private readonly root: object = globalThis) {}

  convert(value: unknown): unknown {
    const path = String(value);
    let current: unknown = this.root;
    for (const segment of path.split('.')) {
      if (current === null || current === undefined) {
        throw new DataConversionError('field', value, `Could not retrieve value for field at ${path}`);
      }
      const holder: object = Object(current);
      if (!(segment in holder)) {
        throw new DataConversionError('field', value, `Could not retrieve value for field at ${path}`);
      }
      current = Reflect.get(holder, segment);
    }
    return current;
  }
}

/**
 * Splits comma separated text, converting each item when given a converter.
 * Blank text converts to null.
 */
export class ListConverter implements Converter {
  constructor(readonly itemConverter?: Converter) {}

  convert(value: unknown): unknown[] | null {
    let items: unknown[];
    if (Array.isArray(value)) {
      items = value;
    } else if (typeof value === 'string') {
      if (value.trim().length === 0) {
        return null;
      }
      items = value.split(',');
    } else {
      throw new DataConversionError('list', value);
    }

    const { itemConverter } = this;
    return itemConverter ? items.map(item => itemConverter.convert(item)) : items;
  }
}

const SCALAR_CONVERTERS: Record<string, () => Converter> = {
  auto: () => new AutoConverter(),
  boolean: () => new BooleanConverter(),
  number: () => new NumberConverter(),
  string: () => new StringConverter(),
  field: () => new FieldConverter()
};

/**
 * Builds the converter for a data type name: one of `auto`, `boolean`,
 * `number`, `string`, `field`, `list`, or `list.<type>`.
 *
 * @returns null for unknown type names
 */
export function createConverter(type: string): Converter | null {
  if (type === 'list') {
    return new ListConverter();
  }
  if (type.startsWith('list.')) {
    const item = createScalarConverter(type.substring('list.'.length));
    return item ? new ListConverter(item) : null;
  }
  return createScalarConverter(type);
}

function createScalarConverter(type: string): Converter | null {
  if (!Object.prototype.hasOwnProperty.call(SCALAR_CONVERTERS, type)) {
    return null;
  }
  return SCALAR_CONVERTERS[type]();
}
