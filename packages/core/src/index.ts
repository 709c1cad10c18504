export type { NodeId } from "./ids.js";
export { NodeIdAllocator } from "./ids.js";
export type { Language } from "./language.js";
export { languageDisplayName } from "./language.js";
export { freezeReadonlyArray } from "./freeze.js";
export type { Err, Ok, Result } from "./result.js";
export { err, isErr, isOk, mapResult, ok, unwrap, unwrapOr } from "./result.js";
export type { LiteralValue } from "./literal.js";
export { formatLiteral, literalFromJson } from "./literal.js";
export type { Metadata, SourceLocation } from "./metadata.js";
export {
  EMPTY_METADATA,
  formatSourceLocation,
  metadata,
  sourceLocation,
  withDebugNote,
} from "./metadata.js";
export type { CPythonHandle, DynamicType, IntBits, SystemsType, TargetType, Type } from "./types.js";
export {
  CPYTHON_HANDLES,
  UNKNOWN_TYPE,
  cpythonType,
  dynamicType,
  formatType,
  functionType,
  genericType,
  isCompatible,
  systemsType,
  targetType,
  typeEquals,
} from "./types.js";
export type {
  DynamicCall,
  DynamicFunction,
  DynamicLiteral,
  DynamicModule,
  DynamicNode,
  DynamicReturn,
  DynamicVariable,
} from "./dynamic.js";
export type {
  SystemsCPythonMacro,
  SystemsCall,
  SystemsFunction,
  SystemsLiteral,
  SystemsNode,
  SystemsParam,
  SystemsReturn,
  SystemsTranslationUnit,
  SystemsVariable,
} from "./systems.js";
export type {
  CrossMapping,
  UnifiedCall,
  UnifiedFunction,
  UnifiedLiteral,
  UnifiedModule,
  UnifiedNode,
  UnifiedParam,
  UnifiedVariable,
} from "./unified.js";
export { eliminateBoundary, positionalArgs, unifiedChildren, unifiedNodeId, walkUnified } from "./unified.js";
