export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  constructor(readonly options: { nonEmpty?: boolean } = {}) {}

  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }
    if (this.options.nonEmpty && value.trim().length === 0) {
      throw new TypeError(`${path} must not be empty`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  constructor(readonly options: { integer?: boolean } = {}) {}

  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a number`);
    }
    if (this.options.integer && !Number.isInteger(value)) {
      throw new TypeError(`${path} must be an integer`);
    }

    return value;
  }
}

class BooleanNode implements JotSchema<boolean> {
  parse(value: unknown, path: string = 'value'): boolean {
    if (typeof value !== 'boolean') {
      throw new TypeError(`${path} must be a boolean`);
    }

    return value;
  }
}

class EnumNode<TValue extends readonly (string | number)[]> implements JotSchema<TValue[number]> {
  constructor(readonly values: TValue) {}

  parse(value: unknown, path: string = 'value'): TValue[number] {
    const match = this.values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new TypeError(`${path} must be one of ${this.values.join(', ')}`);
    }

    return match;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    return this.inner.parse(value, path);
  }
}

class NullableNode<T> implements JotSchema<T | null> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | null {
    if (value === undefined || value === null) {
      return null;
    }

    return this.inner.parse(value, path);
  }
}

export interface ObjectNodeOptions {
  /** Reject keys that are not part of the shape. Extra keys are dropped otherwise. */
  strict?: boolean;
}

type Shape = Record<string, JotSchema<unknown>>;

export type InferShape<S extends Shape> = { [K in keyof S]: InferJot<S[K]> };

class ObjectNode<S extends Shape> implements JotSchema<InferShape<S>> {
  constructor(readonly shape: S, readonly options: ObjectNodeOptions = {}) {}

  parse(value: unknown, path: string = 'value'): InferShape<S> {
    if (!isRecord(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    if (this.options.strict) {
      for (const key of Object.keys(value)) {
        if (!(key in this.shape)) {
          throw new TypeError(`${path}.${key} is not a recognised field`);
        }
      }
    }

    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      const parsed = node.parse(value[key], `${path}.${key}`);
      if (parsed !== undefined) {
        result[key] = parsed;
      }
    }

    return result as InferShape<S>;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (options?: { nonEmpty?: boolean }): JotSchema<string> => new StringNode(options),
  number: (): JotSchema<number> => new NumberNode(),
  integer: (): JotSchema<number> => new NumberNode({ integer: true }),
  boolean: (): JotSchema<boolean> => new BooleanNode(),
  enum: <TValue extends readonly (string | number)[]>(values: TValue): JotSchema<TValue[number]> =>
    new EnumNode(values),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  nullable: <T>(schema: JotSchema<T>): JotSchema<T | null> => new NullableNode(schema),
  object: <S extends Shape>(shape: S, options?: ObjectNodeOptions): JotSchema<InferShape<S>> =>
    new ObjectNode(shape, options),
};
