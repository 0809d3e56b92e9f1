import fs from 'node:fs/promises';
import path from 'node:path';
import JSZip from 'jszip';

import { ArchiveFormatError, ArchiveWriteError, FileNotFoundError, SchemaValidationError } from '../errors';
import { ModelDescriptionDocument, type ScalarVariableQuery } from '../model/modelDescription';
import type { ScalarVariable, ScalarVariablePatch } from '../model/scalarVariable';
import type { StartInput } from '../model/valueTypes';
import { SchemaValidator } from '../schema/schemaValidator';
import type { ValidationResult } from '../schema/validationResult';
import { writeFileAtomic } from '../util/atomicWrite';
import { readEntryMethods, ZIP_METHOD_STORE } from './zipEntries';

export const MODEL_DESCRIPTION_MEMBER = 'modelDescription.xml';
export const FMU_EXTENSION = '.fmu';

export type FmuArchiveOptions = {
  /** Validator used by `validate` and before every save (default: bundled FMI 2.0 schema). */
  validator?: SchemaValidator;
};

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * An opened .fmu file.
 *
 * The archive is read into memory once; no file handle stays open. The model description is parsed
 * on first access and cached. Saving regenerates only modelDescription.xml; every other member
 * keeps its name, bytes, date, permissions and compression method.
 */
export class FmuArchive {
  private document: ModelDescriptionDocument | undefined;

  private constructor(
    readonly sourcePath: string,
    private readonly zip: JSZip,
    private readonly modelDescriptionBytes: Uint8Array,
    private readonly validator: SchemaValidator,
    private readonly entryMethods: Map<string, number>,
  ) {}

  static async open(fmuPath: string, options: FmuArchiveOptions = {}): Promise<FmuArchive> {
    const sourcePath = path.resolve(fmuPath);

    let data: Buffer;
    try {
      data = await fs.readFile(sourcePath);
    } catch (e) {
      if (isErrnoException(e) && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) {
        throw new FileNotFoundError(sourcePath, { cause: e });
      }
      if (isErrnoException(e) && e.code === 'EISDIR') {
        throw new ArchiveFormatError(sourcePath, 'path is a directory', { cause: e });
      }
      const reason = e instanceof Error ? e.message : String(e);
      throw new ArchiveFormatError(sourcePath, `cannot be read (${reason})`, { cause: e });
    }

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (e) {
      throw new ArchiveFormatError(sourcePath, 'not a zip archive', { cause: e });
    }

    const member = zip.file(MODEL_DESCRIPTION_MEMBER);
    if (!member) throw new ArchiveFormatError(sourcePath, `no ${MODEL_DESCRIPTION_MEMBER} member`);

    let bytes: Uint8Array;
    try {
      bytes = await member.async('uint8array');
    } catch (e) {
      throw new ArchiveFormatError(sourcePath, `${MODEL_DESCRIPTION_MEMBER} cannot be extracted`, { cause: e });
    }
    return new FmuArchive(sourcePath, zip, bytes, options.validator ?? SchemaValidator.fmi2(), readEntryMethods(data));
  }

  /** All member names (directories included) in archive order. */
  get memberNames(): string[] {
    return Object.keys(this.zip.files);
  }

  get modelDescription(): ModelDescriptionDocument {
    if (!this.document) this.document = ModelDescriptionDocument.parse(this.modelDescriptionBytes);
    return this.document;
  }

  get scalarVariables(): ScalarVariable[] {
    return this.modelDescription.variables;
  }

  getScalarVariableByName(name: string): ScalarVariable {
    return this.modelDescription.getVariableByName(name);
  }

  queryScalarVariables(query: ScalarVariableQuery = {}): ScalarVariable[] {
    return this.modelDescription.queryVariables(query);
  }

  setStartValue(name: string, value: StartInput): ScalarVariable {
    return this.modelDescription.setStartValue(name, value);
  }

  updateVariable(name: string, patch: ScalarVariablePatch): ScalarVariable {
    return this.modelDescription.updateVariable(name, patch);
  }

  addVariable(variable: ScalarVariable): void {
    this.modelDescription.addVariable(variable);
  }

  deleteVariable(name: string): void {
    this.modelDescription.deleteVariable(name);
  }

  validate(): Promise<ValidationResult> {
    return this.modelDescription.validate(this.validator);
  }

  /**
   * Write the archive with the current model description to `targetPath` (default: the source).
   * Refuses with {@link SchemaValidationError} before touching the file system when the document
   * does not validate; packing and file system failures are raised as {@link ArchiveWriteError}.
   * Returns the absolute path written.
   */
  async saveFmu(targetPath?: string): Promise<string> {
    const target = path.resolve(targetPath ?? this.sourcePath);
    const document = this.modelDescription;

    const result = await this.validator.validate(document.toXml());
    if (!result.valid) throw new SchemaValidationError(result.diagnostics);

    try {
      await writeFileAtomic(target, await this.pack(document.toXmlBytes()));
    } catch (e) {
      throw new ArchiveWriteError(target, { cause: e });
    }
    return target;
  }

  /**
   * Save into `targetDir`, named `fileName` (default: the source file name); `.fmu` is appended
   * when missing.
   */
  async saveFmuCopy(targetDir: string, fileName?: string): Promise<string> {
    let name = fileName ?? path.basename(this.sourcePath);
    if (!name.endsWith(FMU_EXTENSION)) name = `${name}${FMU_EXTENSION}`;
    return this.saveFmu(path.join(targetDir, name));
  }

  private compressionOf(name: string): 'STORE' | 'DEFLATE' {
    return this.entryMethods.get(name) === ZIP_METHOD_STORE ? 'STORE' : 'DEFLATE';
  }

  private async pack(xml: Uint8Array): Promise<Buffer> {
    const previous = this.zip.file(MODEL_DESCRIPTION_MEMBER);
    this.zip.file(MODEL_DESCRIPTION_MEMBER, xml, {
      date: previous?.date,
      comment: previous?.comment,
      unixPermissions: previous?.unixPermissions,
      dosPermissions: previous?.dosPermissions,
      compression: this.compressionOf(MODEL_DESCRIPTION_MEMBER),
    });
    // Entries whose method matches are copied without recompression.
    this.zip.forEach((name, entry) => {
      if (!entry.dir) entry.options.compression = this.compressionOf(name);
    });
    return this.zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }
}
