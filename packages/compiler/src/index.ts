/**
 * @polyschema/compiler
 * Compiles YAML schema descriptions into record, storage, interface and extraction targets
 */

export * from './ir/types.js';

export {
  parseLogicalType,
  formatLogicalType,
  supportedLogicalTypes,
} from './catalog/logical-type.js';
export {
  mapType,
  storageTypeSystemId,
  STORAGE_DIALECTS,
  type StorageDialect,
  type TypeSystem,
  type TypeSystemId,
  type TypedField,
  type MapTypeOptions,
} from './catalog/type-catalog.js';

export { parseSchema, INLINE_SOURCE, type ParseOptions } from './parser/schema-parser.js';
export { resolveFields, createSchemaLoader, mergeByName } from './inheritance/resolver.js';

export * from './generation/types.js';
export { renderHeader, stripTimestamp, TIMESTAMP_LINE_PATTERN } from './generation/header.js';
export {
  generateRecordModule,
  recordFileName,
  recordFieldsConstant,
  RUNTIME_MODULE,
} from './generation/record-generator.js';
export {
  generateStorageModel,
  generateStorageSchema,
  STORAGE_FILE_NAME,
} from './generation/storage-schema-generator.js';
export {
  generateInterfaceModule,
  interfaceFileName,
  validationSchemaName,
} from './generation/interface-generator.js';
export {
  generateExtractionModel,
  collectExtractionFields,
  describeExtractionField,
  extractionFileName,
  extractionModelName,
  type ExtractionEntry,
  type ExtractionFieldSource,
} from './generation/extraction-model-generator.js';
export { VALIDATOR_NAMES, isValidatorName, type ValidatorName } from './generation/validators.js';

export {
  checkConsistency,
  artifactsMatch,
  type ConsistencyEntry,
  type ConsistencyReport,
  type ConsistencyResult,
  type ConsistencyStatus,
} from './consistency/consistency-checker.js';

export {
  SchemaCompiler,
  type SchemaCompilerOptions,
  type SchemaSource,
  type CompileOptions,
  type CompileResult,
  type ParseResult,
} from './compiler.js';
