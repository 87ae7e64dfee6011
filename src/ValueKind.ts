/**
 * Kinds of actual values a simple-type validation can produce.
 * Built-in datatype kinds use the XSD local name of the datatype.
 */
export const VALUE_KINDS = [
  'anySimpleType', 'string', 'boolean', 'decimal', 'float', 'double', 'duration',
  'dateTime', 'time', 'date', 'gYearMonth', 'gYear', 'gMonthDay', 'gDay', 'gMonth',
  'hexBinary', 'base64Binary', 'anyURI', 'QName', 'NOTATION',
  'normalizedString', 'token', 'language', 'NMTOKEN', 'Name', 'NCName',
  'ID', 'IDREF', 'ENTITY',
  'integer', 'nonPositiveInteger', 'negativeInteger', 'long', 'int', 'short', 'byte',
  'nonNegativeInteger', 'unsignedLong', 'unsignedInt', 'unsignedShort', 'unsignedByte',
  'positiveInteger',
  'listOfUnion', 'list', 'unavailable'
] as const;

export type ValueKind = typeof VALUE_KINDS[number];

/** Built-in list datatypes and the kind of their items */
export const BUILTIN_LIST_TYPES: Readonly<Record<string, ValueKind>> = {
  NMTOKENS: 'NMTOKEN',
  IDREFS: 'IDREF',
  ENTITIES: 'ENTITY'
};

const kindSet = new Set<string>(VALUE_KINDS);

export function isValueKind(name: string): name is ValueKind {
  return kindSet.has(name);
}

/**
 * Kind for a built-in atomic datatype local name, or undefined when the name is
 * not a built-in atomic datatype. The pseudo kinds never map to a datatype.
 */
export function builtinValueKind(localName: string): ValueKind | undefined {
  if (localName === 'list' || localName === 'listOfUnion' || localName === 'unavailable') {
    return undefined;
  }
  return isValueKind(localName) ? localName : undefined;
}
