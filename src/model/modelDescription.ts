import { DuplicateVariableError, NotFoundError, ParseError } from '../errors';
import { SchemaValidator } from '../schema/schemaValidator';
import type { ValidationResult } from '../schema/validationResult';
import {
  childElements,
  isWhitespaceText,
  parseXml,
  readAttributes,
  serializeXml,
} from '../xml/xmlDocument';
import {
  type Causality,
  type Initial,
  ScalarVariable,
  type ScalarVariablePatch,
  type Variability,
} from './scalarVariable';
import { type StartInput, type ValueType, sameStart } from './valueTypes';

export const MODEL_DESCRIPTION_ROOT = 'fmiModelDescription';
const MODEL_VARIABLES_TAG = 'ModelVariables';
const SCALAR_VARIABLE_TAG = 'ScalarVariable';

/** Every supplied criterion must match; omitted ones match anything. */
export type ScalarVariableQuery = {
  name?: string;
  valueReference?: number;
  causality?: Causality;
  variability?: Variability;
  initial?: Initial;
  valueType?: ValueType;
  unit?: string;
  description?: string;
  start?: StartInput;
};

type Entry = {
  variable: ScalarVariable;
  element: Element;
};

/**
 * Parsed modelDescription.xml.
 *
 * The DOM is kept whole, so everything this class does not model (root attributes, ModelStructure,
 * unit and type definitions, comments, whitespace) is written back unchanged. ScalarVariables are
 * tracked as snapshots bound to their elements; each mutation replaces the snapshot and writes it
 * through to the element. Until the first mutation the document serializes to its source exactly.
 */
export class ModelDescriptionDocument {
  private readonly entries: Entry[];
  private readonly byName = new Map<string, Entry>();
  private dirty = false;

  private constructor(
    private readonly source: { text: string; bytes: Uint8Array },
    private readonly dom: Document,
    private readonly modelVariables: Element,
    entries: Entry[],
  ) {
    this.entries = entries;
    for (const entry of entries) this.byName.set(entry.variable.name, entry);
  }

  static parse(xml: string | Uint8Array): ModelDescriptionDocument {
    const bytes = typeof xml === 'string' ? Buffer.from(xml, 'utf8') : xml;
    const text = (typeof xml === 'string' ? xml : Buffer.from(xml).toString('utf8')).replace(/^\uFEFF/, '');
    const dom = parseXml(text);

    const root = dom.documentElement;
    if (root.tagName !== MODEL_DESCRIPTION_ROOT) {
      throw new ParseError(`Root element is <${root.tagName}>, expected <${MODEL_DESCRIPTION_ROOT}>`);
    }
    const modelVariables = childElements(root, MODEL_VARIABLES_TAG)[0];
    if (!modelVariables) throw new ParseError(`No <${MODEL_VARIABLES_TAG}> element`);

    const elements = childElements(modelVariables, SCALAR_VARIABLE_TAG);
    if (elements.length === 0) throw new ParseError(`No <${SCALAR_VARIABLE_TAG}> elements`);

    const seen = new Set<string>();
    const entries = elements.map((element): Entry => {
      const variable = ScalarVariable.fromElement(element);
      if (seen.has(variable.name)) throw new DuplicateVariableError(variable.name);
      seen.add(variable.name);
      return { variable, element };
    });
    return new ModelDescriptionDocument({ text, bytes }, dom, modelVariables, entries);
  }

  /** Variables in declaration order. */
  get variables(): ScalarVariable[] {
    return this.entries.map((e) => e.variable);
  }

  get variableNames(): string[] {
    return this.entries.map((e) => e.variable.name);
  }

  /** Root attributes (fmiVersion, modelName, guid, …) in source order. */
  get modelAttributes(): Record<string, string> {
    return Object.fromEntries(readAttributes(this.dom.documentElement));
  }

  hasVariable(name: string): boolean {
    return this.byName.has(name);
  }

  getVariableByName(name: string): ScalarVariable {
    return this.entry(name).variable;
  }

  queryVariables(query: ScalarVariableQuery = {}): ScalarVariable[] {
    return this.variables.filter((v) => matchesQuery(v, query));
  }

  setStartValue(name: string, value: StartInput): ScalarVariable {
    return this.replace(name, (v) => v.withStart(value));
  }

  updateVariable(name: string, patch: ScalarVariablePatch): ScalarVariable {
    return this.replace(name, (v) => v.withChanges(patch));
  }

  /** Append a variable at the end of ModelVariables, indented like its predecessor. */
  addVariable(variable: ScalarVariable): void {
    if (this.byName.has(variable.name)) throw new DuplicateVariableError(variable.name);

    const element = variable.toElement(this.dom);
    const last = this.entries[this.entries.length - 1]?.element;
    if (last) {
      const anchor = last.nextSibling;
      const indent = last.previousSibling;
      if (indent && isWhitespaceText(indent)) {
        this.modelVariables.insertBefore(this.dom.createTextNode(indent.nodeValue ?? ''), anchor);
      }
      this.modelVariables.insertBefore(element, anchor);
    } else {
      this.modelVariables.appendChild(element);
    }

    const entry: Entry = { variable, element };
    this.entries.push(entry);
    this.byName.set(variable.name, entry);
    this.dirty = true;
  }

  /**
   * Remove a variable and its element (plus the indentation in front of it).
   * References to it elsewhere, such as ModelStructure indices, are left as they are.
   */
  deleteVariable(name: string): void {
    const entry = this.entry(name);
    const { element } = entry;
    const before = element.previousSibling;
    if (before && isWhitespaceText(before)) this.modelVariables.removeChild(before);
    this.modelVariables.removeChild(element);

    this.entries.splice(this.entries.indexOf(entry), 1);
    this.byName.delete(name);
    this.dirty = true;
  }

  /** Source text (without byte order mark) while unmodified, the canonical serialization after. */
  toXml(): string {
    return this.dirty ? serializeXml(this.dom) : this.source.text;
  }

  /** Source bytes while unmodified, UTF-8 of {@link toXml} after. */
  toXmlBytes(): Uint8Array {
    return this.dirty ? Buffer.from(this.toXml(), 'utf8') : this.source.bytes;
  }

  get modified(): boolean {
    return this.dirty;
  }

  /**
   * Schema-validate the serialized document. A schema-invalid document is reported in the result;
   * only a serialization that is not well-formed throws.
   */
  async validate(validator: SchemaValidator = SchemaValidator.fmi2()): Promise<ValidationResult> {
    const xml = this.toXml();
    parseXml(xml);
    return validator.validate(xml);
  }

  private entry(name: string): Entry {
    const entry = this.byName.get(name);
    if (!entry) throw new NotFoundError(name);
    return entry;
  }

  private replace(name: string, change: (v: ScalarVariable) => ScalarVariable): ScalarVariable {
    const entry = this.entry(name);
    const next = change(entry.variable);
    next.writeTo(entry.element);
    entry.variable = next;
    this.dirty = true;
    return next;
  }
}

function matchesQuery(v: ScalarVariable, q: ScalarVariableQuery): boolean {
  if (q.name !== undefined && v.name !== q.name) return false;
  if (q.valueReference !== undefined && v.valueReference !== q.valueReference) return false;
  if (q.causality !== undefined && v.causality !== q.causality) return false;
  if (q.variability !== undefined && v.variability !== q.variability) return false;
  if (q.initial !== undefined && v.initial !== q.initial) return false;
  if (q.valueType !== undefined && v.valueType !== q.valueType) return false;
  if (q.unit !== undefined && v.unit !== q.unit) return false;
  if (q.description !== undefined && v.description !== q.description) return false;
  if (q.start !== undefined && !sameStart(v.start, q.start)) return false;
  return true;
}
