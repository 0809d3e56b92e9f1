import fs from 'node:fs/promises';
import path from 'node:path';
import { validateXML } from 'xmllint-wasm';

import { ValidatorError } from '../errors';
import type { ValidationResult } from './validationResult';

/** Bundled FMI 2.0 model description schema; resolves from both src/ and dist/. */
export const FMI2_SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'schema', 'fmi2ModelDescription.xsd');

/**
 * XSD validation through libxml2 (compiled to wasm).
 * The schema text is read once per validator and reused for every call.
 */
export class SchemaValidator {
  private static fmi2Validator: SchemaValidator | undefined;

  private schemaText: string | undefined;

  constructor(readonly schemaPath: string) {}

  /** Process-wide validator for the bundled FMI 2.0 schema. */
  static fmi2(): SchemaValidator {
    if (!SchemaValidator.fmi2Validator) SchemaValidator.fmi2Validator = new SchemaValidator(FMI2_SCHEMA_PATH);
    return SchemaValidator.fmi2Validator;
  }

  /** Failures of the validator itself (not of the document) are raised as {@link ValidatorError}. */
  async validate(xml: string): Promise<ValidationResult> {
    let result: Awaited<ReturnType<typeof validateXML>>;
    try {
      const schema = await this.loadSchema();
      result = await validateXML({
        xml: [{ fileName: 'modelDescription.xml', contents: xml }],
        schema: [{ fileName: path.basename(this.schemaPath), contents: schema }],
      });
    } catch (e) {
      throw new ValidatorError(this.schemaPath, { cause: e });
    }
    return {
      valid: result.valid,
      diagnostics: result.errors.map((e) => ({ line: e.loc?.lineNumber ?? null, message: e.message })),
    };
  }

  private async loadSchema(): Promise<string> {
    if (this.schemaText === undefined) this.schemaText = await fs.readFile(this.schemaPath, 'utf8');
    return this.schemaText;
  }
}
