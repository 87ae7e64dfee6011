export { EMPTY_KIND_LIST, EMPTY_STRING_LIST } from './EmptyList';
export { NotSerializableError } from './NotSerializableError';
export { PSVIDocument } from './PSVIDocument';
export { PSVIElement } from './PSVIElement';
export { SchemaLoadError, SchemaLoader } from './SchemaLoader';
export {
  ANY_SIMPLE_TYPE,
  ANY_TYPE,
  SchemaModel,
  XSD_NAMESPACE,
  XSI_NAMESPACE,
  constraintValueOf,
  getBuiltinType,
  hasSimpleValue
} from './SchemaModel';
export type {
  ComplexTypeDefinition,
  ContentKind,
  ElementDeclaration,
  NotationDeclaration,
  SchemaComponents,
  SimpleTypeDefinition,
  SimpleVariety,
  TypeDefinition,
  ValueConstraint
} from './SchemaModel';
export { SchemaRegistry } from './SchemaRegistry';
export type { SchemaLocation } from './SchemaRegistry';
export { ValidatedValue } from './ValidatedValue';
export type { SchemaValue, ValidatedValueInit } from './ValidatedValue';
export { NOT_ASSESSED, ValidationAttempted, ValidationOutcome, Validity, assess } from './ValidationOutcome';
export type { Assessment, ElementPSVI, SchemaError, ValidationOutcomeInit } from './ValidationOutcome';
export { VALUE_KINDS, builtinValueKind, isValueKind } from './ValueKind';
export type { ValueKind } from './ValueKind';
