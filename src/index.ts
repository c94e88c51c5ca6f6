// src/index.ts
// graph-archive - Public API
//
// Loads saved module containers (ZIP of pickled archives plus raw tensor
// storages) into typed object graphs.

// ═══════════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════════

export { load, loadFromStream, loadArchive, type LoadInput, type LoadOptions } from "./core/deserializer/load";
export {
  ModuleDeserializer,
  LoadedModule,
  LEGACY_MARKER,
  VERSION_RECORD,
  EXTRA_PREFIX,
  type LegacyImporter,
  type DeserializerOptions,
} from "./core/deserializer/deserializer";

// ═══════════════════════════════════════════════════════════════════════════════
// ARCHIVES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  MemoryArchiveReader,
  ZipArchiveReader,
  type ArchiveReader,
  type RecordData,
} from "./core/archive/reader";
export {
  BufferReadAdapter,
  FileReadAdapter,
  readAll,
  collectStream,
  type ReadAdapter,
} from "./core/archive/adapters";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  TypeDescriptor,
  defineType,
  type AttributeDef,
  type ConstructionStrategy,
  type RestoreContext,
  type RestoreMethod,
  type TypeDefinition,
} from "./core/types/descriptor";
export { TypeRegistry, type TypeLoader } from "./core/types/registry";
export { ClassResolver, type TypeResolver } from "./core/types/resolver";
export {
  AnyType,
  NoneType,
  BoolType,
  IntType,
  FloatType,
  StrType,
  TensorType,
  listOf,
  tupleOf,
  dictOf,
  optionalOf,
  classOf,
  isOptional,
  typeEquals,
  renderType,
  parseType,
  type TypeExpr,
} from "./core/types/typeExpr";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  VNone,
  VTrue,
  VFalse,
  vbool,
  vint,
  vfloat,
  vstr,
  vlist,
  vtuple,
  vdict,
  vtensor,
  vobject,
  dictGet,
  dictGetStr,
  dictSet,
  describeValue,
  toPlain,
  type TaggedValue,
  type DictValue,
  type ListValue,
  type PlainValue,
  type PlainObject,
} from "./core/values/values";
export { ObjectInstance } from "./core/values/object";
export {
  Tensor,
  defaultMaterializer,
  DTYPE_BYTES,
  type DType,
  type Storage,
  type TensorSpec,
  type TensorElement,
  type TensorMaterializer,
} from "./core/values/tensor";

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  isSpecializationEnabled,
  setSpecializationEnabled,
  withSpecializationDisabled,
} from "./core/construct/specialization";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ArchiveLoadError,
  RecordNotFoundError,
  MalformedArchiveError,
  UnresolvedTypeError,
  TypeReconciliationError,
  MissingAttributeError,
  UninitializedAttributeError,
  UnsupportedFormatError,
  ConfigError,
  type ErrorContext,
  type LoadErrorCode,
} from "./core/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG & TRACING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export * from "./ports";
export { loggingArchiveReader, loggingTypeLoader, loggingMaterializer } from "./adapters/logging";
