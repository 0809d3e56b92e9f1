import { InvalidValueError, ParseError } from '../errors';
import {
  type AttributeList,
  attributeValue,
  childElements,
  getAttribute,
  readAttributes,
  syncAttributes,
  withAttribute,
} from '../xml/xmlDocument';
import {
  type StartInput,
  type StartValue,
  type TypedValue,
  type ValueType,
  XSD_TYPE_BY_VALUE_TYPE,
  formatStartValue,
  isValueType,
  typedValueFromText,
  withStartValue,
} from './valueTypes';

export const CAUSALITIES = ['parameter', 'calculatedParameter', 'input', 'output', 'local', 'independent'] as const;
export const VARIABILITIES = ['constant', 'fixed', 'tunable', 'discrete', 'continuous'] as const;
export const INITIALS = ['exact', 'approx', 'calculated'] as const;

export type Causality = (typeof CAUSALITIES)[number];
export type Variability = (typeof VARIABILITIES)[number];
export type Initial = (typeof INITIALS)[number];

/** Child of <ScalarVariable> that is not the value element. */
const ANNOTATIONS_TAG = 'Annotations';

/** valueReference is an xs:unsignedInt. */
export const MAX_VALUE_REFERENCE = 4294967295;

const MODELLED_ATTRIBUTES = new Set(['name', 'valueReference', 'description', 'causality', 'variability', 'initial']);

export function isOneOf<T extends string>(values: readonly T[], v: string): v is T {
  return values.some((x) => x === v);
}

export type ScalarVariableInit = {
  name: string;
  valueReference: number;
  valueType: ValueType;
  description?: string;
  causality?: Causality;
  variability?: Variability;
  initial?: Initial;
  start?: StartInput;
  /** Attributes of the value element other than `start` (unit, min, max, declaredType…). */
  facets?: Record<string, string>;
  extraAttributes?: Record<string, string>;
};

/**
 * Changes to apply to a variable. `undefined` keeps a field, `null` removes the attribute.
 * Strings are accepted for the enumerated fields so command line input can be passed through;
 * they are checked against the allowed values.
 */
export type ScalarVariablePatch = {
  description?: string | null;
  causality?: Causality | string | null;
  variability?: Variability | string | null;
  initial?: Initial | string | null;
  start?: StartInput;
  facets?: Record<string, string | null>;
};

type ScalarVariableProps = {
  name: string;
  valueReference: number;
  description?: string;
  causality?: Causality;
  variability?: Variability;
  initial?: Initial;
  value: TypedValue;
  extraAttributes: AttributeList;
};

/** Flat, JSON-friendly view used for listings. */
export type ScalarVariableSummary = {
  name: string;
  valueReference: number;
  valueType: ValueType;
  causality?: Causality;
  variability?: Variability;
  initial?: Initial;
  start?: string;
  unit?: string;
  description?: string;
};

/**
 * Immutable snapshot of one <ScalarVariable> element.
 * Changes go through {@link withStart} / {@link withChanges}, which return a new snapshot; the
 * model description document stores it and writes it back to the XML tree.
 */
export class ScalarVariable {
  readonly name: string;
  readonly valueReference: number;
  readonly description?: string;
  readonly causality?: Causality;
  readonly variability?: Variability;
  readonly initial?: Initial;
  readonly value: TypedValue;
  /** ScalarVariable attributes not modelled above, in source order. */
  readonly extraAttributes: AttributeList;

  private constructor(props: ScalarVariableProps) {
    this.name = props.name;
    this.valueReference = props.valueReference;
    this.description = props.description;
    this.causality = props.causality;
    this.variability = props.variability;
    this.initial = props.initial;
    this.value = props.value;
    this.extraAttributes = props.extraAttributes;
  }

  static fromElement(el: Element): ScalarVariable {
    const name = attributeValue(el, 'name');
    if (name === undefined || name === '') throw new ParseError('ScalarVariable without a name attribute');

    const vrText = attributeValue(el, 'valueReference');
    if (vrText === undefined) throw new ParseError(`ScalarVariable ${name} has no valueReference attribute`);
    if (!/^\s*\d+\s*$/.test(vrText) || Number(vrText.trim()) > MAX_VALUE_REFERENCE) {
      throw new ParseError(`ScalarVariable ${name} has an invalid valueReference "${vrText}"`);
    }

    const valueEls = childElements(el).filter((c) => c.tagName !== ANNOTATIONS_TAG);
    if (valueEls.length !== 1) {
      throw new ParseError(`ScalarVariable ${name} must have exactly one value element, found ${valueEls.length}`);
    }
    const valueEl = valueEls[0];
    const type = valueEl.tagName;
    if (!isValueType(type)) throw new ParseError(`ScalarVariable ${name} has unrecognized value element <${type}>`);

    const facets = readAttributes(valueEl).filter(([n]) => n !== 'start');
    const startText = attributeValue(valueEl, 'start');
    const value = typedValueFromText(type, facets, startText);
    if (!value) throw new InvalidValueError(name, XSD_TYPE_BY_VALUE_TYPE[type], startText);

    return new ScalarVariable({
      name,
      valueReference: Number(vrText.trim()),
      description: attributeValue(el, 'description'),
      causality: enumAttribute(el, name, 'causality', CAUSALITIES),
      variability: enumAttribute(el, name, 'variability', VARIABILITIES),
      initial: enumAttribute(el, name, 'initial', INITIALS),
      value,
      extraAttributes: readAttributes(el).filter(([n]) => !MODELLED_ATTRIBUTES.has(n)),
    });
  }

  /** Build a new variable for insertion into a document. */
  static create(init: ScalarVariableInit): ScalarVariable {
    if (init.name === '') throw new InvalidValueError('(unnamed)', 'non-empty name', init.name);
    if (!Number.isInteger(init.valueReference) || init.valueReference < 0 || init.valueReference > MAX_VALUE_REFERENCE) {
      throw new InvalidValueError(init.name, 'non-negative integer valueReference', init.valueReference);
    }
    const facets: AttributeList = Object.entries(init.facets ?? {}).filter(([n]) => n !== 'start');
    const base = typedValueFromText(init.valueType, facets);
    if (!base) throw new InvalidValueError(init.name, XSD_TYPE_BY_VALUE_TYPE[init.valueType], undefined);

    const variable = new ScalarVariable({
      name: init.name,
      valueReference: init.valueReference,
      description: init.description,
      causality: init.causality,
      variability: init.variability,
      initial: init.initial,
      value: base,
      extraAttributes: Object.entries(init.extraAttributes ?? {}).filter(([n]) => !MODELLED_ATTRIBUTES.has(n)),
    });
    return init.start === undefined ? variable : variable.withStart(init.start);
  }

  get valueType(): ValueType {
    return this.value.type;
  }

  get start(): StartValue | undefined {
    return this.value.start;
  }

  get unit(): string | undefined {
    return this.facet('unit');
  }

  get min(): string | undefined {
    return this.facet('min');
  }

  get max(): string | undefined {
    return this.facet('max');
  }

  get canHandleMultipleSetPerTimeInstant(): boolean | undefined {
    const raw = getAttribute(this.extraAttributes, 'canHandleMultipleSetPerTimeInstant');
    if (raw === undefined) return undefined;
    return raw.trim() === 'true' || raw.trim() === '1';
  }

  facet(name: string): string | undefined {
    return getAttribute(this.value.facets, name);
  }

  equals(other: ScalarVariable): boolean {
    return this.name === other.name;
  }

  withStart(input: StartInput): ScalarVariable {
    const value = withStartValue(this.value, input);
    if (!value) throw new InvalidValueError(this.name, XSD_TYPE_BY_VALUE_TYPE[this.valueType], input);
    return this.copy({ value });
  }

  withChanges(patch: ScalarVariablePatch): ScalarVariable {
    let facets = this.value.facets;
    for (const [facetName, facetValue] of Object.entries(patch.facets ?? {})) {
      if (facetName === 'start') throw new InvalidValueError(this.name, 'facet other than start', facetName);
      facets = withAttribute(facets, facetName, facetValue);
    }

    const next = this.copy({
      description: patch.description === undefined ? this.description : patch.description ?? undefined,
      causality: this.patchEnum('causality', CAUSALITIES, this.causality, patch.causality),
      variability: this.patchEnum('variability', VARIABILITIES, this.variability, patch.variability),
      initial: this.patchEnum('initial', INITIALS, this.initial, patch.initial),
      value: { ...this.value, facets },
    });
    return patch.start === undefined ? next : next.withStart(patch.start);
  }

  /** ScalarVariable attributes in write order: modelled ones first, then pass-through ones. */
  attributeList(): AttributeList {
    const out: Array<readonly [string, string]> = [
      ['name', this.name],
      ['valueReference', String(this.valueReference)],
    ];
    if (this.description !== undefined) out.push(['description', this.description]);
    if (this.causality !== undefined) out.push(['causality', this.causality]);
    if (this.variability !== undefined) out.push(['variability', this.variability]);
    if (this.initial !== undefined) out.push(['initial', this.initial]);
    return [...out, ...this.extraAttributes];
  }

  /** Value element attributes: facets in source order, `start` last unless it already exists. */
  valueAttributeList(): AttributeList {
    const start = formatStartValue(this.value);
    return start === undefined ? this.value.facets : [...this.value.facets, ['start', start]];
  }

  /** Fresh <ScalarVariable> element, used when inserting a new variable. */
  toElement(doc: Document): Element {
    const el = doc.createElement('ScalarVariable');
    for (const [n, v] of this.attributeList()) el.setAttribute(n, v);
    const valueEl = doc.createElement(this.valueType);
    for (const [n, v] of this.valueAttributeList()) valueEl.setAttribute(n, v);
    el.appendChild(valueEl);
    return el;
  }

  /**
   * Write this snapshot onto an existing element. Existing attributes keep their position, and
   * child nodes other than the value element (annotations, comments, whitespace) are left alone.
   */
  writeTo(el: Element): void {
    const valueEl = childElements(el).find((c) => c.tagName !== ANNOTATIONS_TAG);
    if (!valueEl || valueEl.tagName !== this.valueType) {
      throw new ParseError(`ScalarVariable ${this.name} no longer has a <${this.valueType}> value element`);
    }
    syncAttributes(el, this.attributeList());
    syncAttributes(valueEl, this.valueAttributeList());
  }

  toSummary(): ScalarVariableSummary {
    return {
      name: this.name,
      valueReference: this.valueReference,
      valueType: this.valueType,
      causality: this.causality,
      variability: this.variability,
      initial: this.initial,
      start: formatStartValue(this.value),
      unit: this.unit,
      description: this.description,
    };
  }

  private copy(changes: Partial<ScalarVariableProps>): ScalarVariable {
    return new ScalarVariable({
      name: this.name,
      valueReference: this.valueReference,
      description: this.description,
      causality: this.causality,
      variability: this.variability,
      initial: this.initial,
      value: this.value,
      extraAttributes: this.extraAttributes,
      ...changes,
    });
  }

  private patchEnum<T extends string>(
    attribute: string,
    allowed: readonly T[],
    current: T | undefined,
    next: string | null | undefined,
  ): T | undefined {
    if (next === undefined) return current;
    if (next === null) return undefined;
    if (!isOneOf(allowed, next)) throw new InvalidValueError(this.name, `${attribute} (${allowed.join('|')})`, next);
    return next;
  }
}

function enumAttribute<T extends string>(el: Element, variableName: string, attribute: string, allowed: readonly T[]): T | undefined {
  const raw = attributeValue(el, attribute);
  if (raw === undefined) return undefined;
  if (!isOneOf(allowed, raw)) {
    throw new ParseError(`ScalarVariable ${variableName} has invalid ${attribute} "${raw}"`);
  }
  return raw;
}
