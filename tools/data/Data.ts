import { ConfigurationError, NullKeyError } from '@core/errors/ConfigurationError';
import { ToolArgumentError } from '@core/errors/ToolArgumentError';
import { dataLogger } from '@core/utils/logger';
import { createConverter, ListConverter, type Converter } from './converters';

export const DEFAULT_TYPE = 'auto';

export interface DataOptions {
  key?: string;
  type?: string;
  value?: unknown;
  converter?: Converter;
}

/**
 * A keyed configuration value with a declared type.
 */
export class Data {
  key?: string;
  value?: unknown;
  private typeName: string = DEFAULT_TYPE;
  private converter: Converter;

  constructor(options: DataOptions = {}) {
    this.key = options.key;
    this.value = options.value;
    this.converter = this.resolveConverter(options.type ?? DEFAULT_TYPE);
    this.typeName = options.type ?? DEFAULT_TYPE;
    if (options.converter) {
      this.convertWith(options.converter);
    }
  }

  get type(): string {
    return this.typeName;
  }

  /**
   * @throws ToolArgumentError for unknown type names
   */
  setType(type: string): void {
    this.converter = this.resolveConverter(type);
    this.typeName = type;
  }

  /**
   * Replaces the converter. For list types the converter applies to each
   * item.
   */
  convertWith(converter: Converter): void {
    this.converter = this.converter instanceof ListConverter
      ? new ListConverter(converter)
      : converter;
  }

  getConverter(): Converter {
    return this.converter;
  }

  getConvertedValue(): unknown {
    return this.converter.convert(this.value);
  }

  /**
   * Checks for a key and for a value that converts.
   */
  validate(): void {
    if (this.key === undefined || this.key === null) {
      throw new NullKeyError(this.toString());
    }
    if (this.value === undefined || this.value === null) {
      throw new ConfigurationError(`No value has been set for '${this.key}'`, { key: this.key });
    }
    try {
      this.getConvertedValue();
    } catch (error) {
      dataLogger.debug('Data value failed to convert', { key: this.key, type: this.typeName });
      throw new ConfigurationError(`Invalid ${this.typeName} value for '${this.key}'`, {
        key: this.key,
        cause: error
      });
    }
  }

  /**
   * Orders by key; entries without a key sort first.
   */
  compareTo(other: Data): number {
    if (this.key === undefined && other.key === undefined) {
      return 0;
    }
    if (this.key === undefined) {
      return -1;
    }
    if (other.key === undefined) {
      return 1;
    }
    if (this.key === other.key) {
      return 0;
    }
    return this.key < other.key ? -1 : 1;
  }

  equals(other: unknown): boolean {
    if (this.key === undefined || !(other instanceof Data)) {
      return this === other;
    }
    return this.key === other.key;
  }

  toString(): string {
    return `Data '${String(this.key)}' -${this.typeName}-> ${String(this.value)}`;
  }

  private resolveConverter(type: string): Converter {
    const converter = createConverter(type);
    if (!converter) {
      throw new ToolArgumentError(`Unknown data type '${type}'`, { tool: 'data', type });
    }
    return converter;
  }
}
