import type { AttributeList } from '../xml/xmlDocument';

export const VALUE_TYPES = ['Real', 'Integer', 'Boolean', 'String', 'Enumeration'] as const;
export type ValueType = (typeof VALUE_TYPES)[number];

export type StartValueOf = {
  Real: number;
  Integer: number;
  Boolean: boolean;
  String: string;
  Enumeration: number;
};

export type StartValue = StartValueOf[ValueType];

/** What callers may hand to a setter; it is coerced to the declared type or rejected. */
export type StartInput = number | boolean | string;

export type TypedValueOf<K extends ValueType> = {
  type: K;
  start?: StartValueOf[K];
  /** Every attribute of the value element except `start`, in source order. */
  facets: AttributeList;
};

export type TypedValue = { [K in ValueType]: TypedValueOf<K> }[ValueType];

export function isValueType(v: string): v is ValueType {
  return VALUE_TYPES.some((t) => t === v);
}

type Codec<T> = {
  /** XML Schema type the lexical form follows. */
  xsdType: string;
  parse(text: string): T | undefined;
  coerce(input: unknown): T | undefined;
  format(value: T): string;
};

const DOUBLE_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INT_RE = /^[+-]?\d+$/;
const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

const realCodec: Codec<number> = {
  xsdType: 'xs:double',
  parse(text) {
    const t = text.trim();
    if (t === 'INF') return Infinity;
    if (t === '-INF') return -Infinity;
    if (t === 'NaN') return NaN;
    return DOUBLE_RE.test(t) ? Number(t) : undefined;
  },
  coerce(input) {
    if (typeof input === 'number') return input;
    return typeof input === 'string' ? this.parse(input) : undefined;
  },
  format(value) {
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return 'INF';
    if (value === -Infinity) return '-INF';
    return String(value);
  },
};

const integerCodec: Codec<number> = {
  xsdType: 'xs:int',
  parse(text) {
    const t = text.trim();
    if (!INT_RE.test(t)) return undefined;
    const n = Number(t);
    return n >= INT_MIN && n <= INT_MAX ? n : undefined;
  },
  coerce(input) {
    if (typeof input === 'number') return Number.isInteger(input) && input >= INT_MIN && input <= INT_MAX ? input : undefined;
    return typeof input === 'string' ? this.parse(input) : undefined;
  },
  format(value) {
    return String(value);
  },
};

const booleanCodec: Codec<boolean> = {
  xsdType: 'xs:boolean',
  parse(text) {
    const t = text.trim();
    if (t === 'true' || t === '1') return true;
    if (t === 'false' || t === '0') return false;
    return undefined;
  },
  coerce(input) {
    if (typeof input === 'boolean') return input;
    return typeof input === 'string' ? this.parse(input) : undefined;
  },
  format(value) {
    return value ? 'true' : 'false';
  },
};

const stringCodec: Codec<string> = {
  xsdType: 'xs:string',
  parse: (text) => text,
  coerce: (input) => (typeof input === 'string' ? input : undefined),
  format: (value) => value,
};

export const XSD_TYPE_BY_VALUE_TYPE: Record<ValueType, string> = {
  Real: realCodec.xsdType,
  Integer: integerCodec.xsdType,
  Boolean: booleanCodec.xsdType,
  String: stringCodec.xsdType,
  Enumeration: integerCodec.xsdType,
};

function fromText<K extends ValueType>(
  type: K,
  codec: Codec<StartValueOf[K]>,
  facets: AttributeList,
  startText: string | undefined,
): TypedValueOf<K> | null {
  if (startText === undefined) return { type, facets };
  const start = codec.parse(startText);
  return start === undefined ? null : { type, start, facets };
}

/**
 * Build the typed value of a value element.
 * Returns null when `startText` is not a valid lexical form of `type`.
 */
export function typedValueFromText(type: ValueType, facets: AttributeList, startText?: string): TypedValue | null {
  switch (type) {
    case 'Real':
      return fromText('Real', realCodec, facets, startText);
    case 'Integer':
      return fromText('Integer', integerCodec, facets, startText);
    case 'Boolean':
      return fromText('Boolean', booleanCodec, facets, startText);
    case 'String':
      return fromText('String', stringCodec, facets, startText);
    case 'Enumeration':
      return fromText('Enumeration', integerCodec, facets, startText);
  }
}

function coerceInto<K extends ValueType>(
  value: TypedValueOf<K>,
  codec: Codec<StartValueOf[K]>,
  input: unknown,
): TypedValueOf<K> | null {
  const start = codec.coerce(input);
  return start === undefined ? null : { ...value, start };
}

/** Replace the start value, or return null when `input` does not fit the declared type. */
export function withStartValue(value: TypedValue, input: unknown): TypedValue | null {
  switch (value.type) {
    case 'Real':
      return coerceInto(value, realCodec, input);
    case 'Integer':
      return coerceInto(value, integerCodec, input);
    case 'Boolean':
      return coerceInto(value, booleanCodec, input);
    case 'String':
      return coerceInto(value, stringCodec, input);
    case 'Enumeration':
      return coerceInto(value, integerCodec, input);
  }
}

export function formatStartValue(value: TypedValue): string | undefined {
  switch (value.type) {
    case 'Real':
      return value.start === undefined ? undefined : realCodec.format(value.start);
    case 'Integer':
    case 'Enumeration':
      return value.start === undefined ? undefined : integerCodec.format(value.start);
    case 'Boolean':
      return value.start === undefined ? undefined : booleanCodec.format(value.start);
    case 'String':
      return value.start;
  }
}

/** Equality of start values; NaN equals NaN so a Real start of NaN can still be queried. */
export function sameStart(a: StartValue | undefined, b: StartValue | undefined): boolean {
  if (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b)) return true;
  return a === b;
}
