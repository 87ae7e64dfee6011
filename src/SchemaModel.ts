import { BUILTIN_LIST_TYPES, builtinValueKind } from './ValueKind';
import type { ValueKind } from './ValueKind';

export const XSD_NAMESPACE = 'http://www.w3.org/2001/XMLSchema';
export const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

export type SimpleVariety = 'atomic' | 'list' | 'union';
export type ContentKind = 'empty' | 'simple' | 'element-only' | 'mixed';

export interface SimpleTypeDefinition {
  readonly kind: 'simple';
  readonly name: string | null; // null for anonymous types
  readonly namespace: string | null;
  readonly variety: SimpleVariety;
  readonly primitiveKind: ValueKind;
  readonly baseTypeName: string | null;
  readonly itemType: SimpleTypeDefinition | null;
  readonly memberTypes: readonly SimpleTypeDefinition[];
}

export interface ComplexTypeDefinition {
  readonly kind: 'complex';
  readonly name: string | null;
  readonly namespace: string | null;
  readonly contentKind: ContentKind;
  readonly simpleContentType: SimpleTypeDefinition | null;
  readonly abstract: boolean;
}

export type TypeDefinition = SimpleTypeDefinition | ComplexTypeDefinition;

export interface ValueConstraint {
  readonly kind: 'default' | 'fixed';
  readonly value: string;
}

export interface ElementDeclaration {
  readonly name: string;
  readonly namespace: string | null;
  readonly typeDefinition: TypeDefinition;
  readonly nillable: boolean;
  readonly abstract: boolean;
  readonly scope: 'global' | 'local';
  readonly valueConstraint: ValueConstraint | null;
}

export interface NotationDeclaration {
  readonly name: string;
  readonly namespace: string | null;
  readonly publicId: string | null;
  readonly systemId: string | null;
}

/**
 * True when an element validated by `type` carries a schema value: the type is
 * simple, or complex with simple content.
 */
export function hasSimpleValue(type: TypeDefinition | null): boolean {
  if (!type) {
    return false;
  }
  switch (type.kind) {
    case 'simple':
      return true;
    case 'complex':
      return type.contentKind === 'simple';
  }
}

/**
 * The canonical value of the declaration's value constraint, if any
 */
export function constraintValueOf(declaration: ElementDeclaration | null): string | null {
  return declaration?.valueConstraint?.value ?? null;
}

// Built-in types

const builtinCache = new Map<string, TypeDefinition>();

export const ANY_TYPE: ComplexTypeDefinition = {
  kind: 'complex',
  name: 'anyType',
  namespace: XSD_NAMESPACE,
  contentKind: 'mixed',
  simpleContentType: null,
  abstract: false
};

export const ANY_SIMPLE_TYPE: SimpleTypeDefinition = {
  kind: 'simple',
  name: 'anySimpleType',
  namespace: XSD_NAMESPACE,
  variety: 'atomic',
  primitiveKind: 'anySimpleType',
  baseTypeName: 'anyType',
  itemType: null,
  memberTypes: []
};

/**
 * Look up a built-in XSD type by local name
 */
export function getBuiltinType(localName: string): TypeDefinition | undefined {
  if (localName === 'anyType') return ANY_TYPE;
  if (localName === 'anySimpleType') return ANY_SIMPLE_TYPE;

  const cached = builtinCache.get(localName);
  if (cached) {
    return cached;
  }

  let type: SimpleTypeDefinition | undefined;
  const itemKind = BUILTIN_LIST_TYPES[localName];
  if (itemKind) {
    const itemType = getBuiltinType(itemKind);
    type = {
      kind: 'simple',
      name: localName,
      namespace: XSD_NAMESPACE,
      variety: 'list',
      primitiveKind: 'list',
      baseTypeName: 'anySimpleType',
      itemType: itemType && itemType.kind === 'simple' ? itemType : ANY_SIMPLE_TYPE,
      memberTypes: []
    };
  } else {
    const kind = builtinValueKind(localName);
    if (kind) {
      type = {
        kind: 'simple',
        name: localName,
        namespace: XSD_NAMESPACE,
        variety: 'atomic',
        primitiveKind: kind,
        baseTypeName: 'anySimpleType',
        itemType: null,
        memberTypes: []
      };
    }
  }

  if (type) {
    builtinCache.set(localName, type);
  }
  return type;
}

function componentKey(name: string, namespace: string | null): string {
  return namespace ? `{${namespace}}${name}` : name;
}

export interface SchemaComponents {
  elements: ElementDeclaration[];
  types: TypeDefinition[];
  notations: NotationDeclaration[];
  localElements: ElementDeclaration[];
}

/**
 * Read-only model of one loaded schema. A validation root's PSVI record refers to it
 * as its [schema information].
 */
export class SchemaModel {
  private readonly elements = new Map<string, ElementDeclaration>();
  private readonly types = new Map<string, TypeDefinition>();
  private readonly notations = new Map<string, NotationDeclaration>();
  private readonly localElements = new Map<string, ElementDeclaration[]>();

  constructor(
    public readonly name: string,
    public readonly targetNamespace: string | null,
    components: SchemaComponents
  ) {
    for (const element of components.elements) {
      this.elements.set(componentKey(element.name, element.namespace), element);
    }
    for (const type of components.types) {
      if (type.name) {
        this.types.set(componentKey(type.name, type.namespace), type);
      }
    }
    for (const notation of components.notations) {
      this.notations.set(componentKey(notation.name, notation.namespace), notation);
    }
    for (const element of components.localElements) {
      const list = this.localElements.get(element.name) ?? [];
      list.push(element);
      this.localElements.set(element.name, list);
    }
  }

  /**
   * Namespaces with components in this model, the XSD namespace included
   */
  public get namespaces(): readonly (string | null)[] {
    return [this.targetNamespace, XSD_NAMESPACE];
  }

  public getElementDeclaration(name: string, namespace: string | null = this.targetNamespace): ElementDeclaration | null {
    return this.elements.get(componentKey(name, namespace)) ?? null;
  }

  public getTypeDefinition(name: string, namespace: string | null = this.targetNamespace): TypeDefinition | null {
    if (namespace === XSD_NAMESPACE) {
      return getBuiltinType(name) ?? null;
    }
    return this.types.get(componentKey(name, namespace)) ?? null;
  }

  public getNotationDeclaration(name: string, namespace: string | null = this.targetNamespace): NotationDeclaration | null {
    return this.notations.get(componentKey(name, namespace)) ?? null;
  }

  /**
   * Element declarations nested inside type definitions, by local name
   */
  public getLocalElementDeclarations(name: string): readonly ElementDeclaration[] {
    return this.localElements.get(name) ?? [];
  }

  public getElementDeclarations(): ElementDeclaration[] {
    return Array.from(this.elements.values());
  }

  public getTypeDefinitions(): TypeDefinition[] {
    return Array.from(this.types.values());
  }

  public getNotationDeclarations(): NotationDeclaration[] {
    return Array.from(this.notations.values());
  }
}
