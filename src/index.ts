// Public library surface.

export { TOOL_NAME, VERSION } from './version';

export * from './errors';
export * from './model/valueTypes';
export * from './model/scalarVariable';
export * from './model/modelDescription';
export * from './schema/validationResult';
export * from './schema/schemaValidator';
export * from './archive/fmuArchive';
export * from './batch/reductionConfig';
export * from './batch/reduceDirectory';
export * from './report/reductionReport';
export * from './report/markdownReport';
export * from './report/writeReport';
export * from './util/deterministicJson';
export * from './util/atomicWrite';
export * from './archive/zipEntries';
