import * as fs from 'fs';
import * as path from 'path';
import { DOMParser } from '@xmldom/xmldom';
import { childElements, firstChild, isElement, lookupNamespace, optionalAttribute } from './DomUtils';
import { ANY_SIMPLE_TYPE, ANY_TYPE, SchemaModel, XSD_NAMESPACE, getBuiltinType } from './SchemaModel';
import type {
  ComplexTypeDefinition,
  ContentKind,
  ElementDeclaration,
  NotationDeclaration,
  SimpleTypeDefinition,
  TypeDefinition,
  ValueConstraint
} from './SchemaModel';

export class SchemaLoadError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'SchemaLoadError';
  }
}

const PARTICLES = new Set(['sequence', 'choice', 'all', 'group']);

function splitQName(qname: string): { prefix: string; localName: string } {
  const idx = qname.indexOf(':');
  if (idx < 0) {
    return { prefix: '', localName: qname };
  }
  return { prefix: qname.substring(0, idx), localName: qname.substring(idx + 1) };
}

/**
 * Builds a {@link SchemaModel} from XSD documents.
 */
export class SchemaLoader {
  private readonly targetNamespace: string | null;
  private readonly qualifiedLocals: boolean;
  private readonly namedTypes = new Map<string, Element>();
  private readonly builtTypes = new Map<Element, TypeDefinition>();
  private readonly inProgress = new Set<Element>();

  private constructor(private readonly name: string, private readonly root: Element) {
    this.targetNamespace = root.getAttribute('targetNamespace') || null;
    this.qualifiedLocals = root.getAttribute('elementFormDefault') === 'qualified';
  }

  /**
   * Load a schema file, merging the given include files into it
   * @param xsdFilePath The main XSD file
   * @param includeFiles XSD files whose top-level components join the main schema
   */
  public static fromFile(xsdFilePath: string, includeFiles: string[] = []): SchemaModel {
    const doc = SchemaLoader.loadXml(xsdFilePath);
    for (const includeFile of includeFiles) {
      SchemaLoader.mergeXsds(doc, SchemaLoader.loadXml(includeFile));
    }
    return SchemaLoader.build(path.basename(xsdFilePath), doc, xsdFilePath);
  }

  public static fromString(xml: string, name: string = 'schema.xsd'): SchemaModel {
    return SchemaLoader.build(name, SchemaLoader.parseXml(xml, name), name);
  }

  private static build(name: string, doc: Document, source: string): SchemaModel {
    const root = doc.documentElement;
    if (!root || root.localName !== 'schema' || root.namespaceURI !== XSD_NAMESPACE) {
      throw new SchemaLoadError(`${source} is not an XML Schema document`, source);
    }
    return new SchemaLoader(name, root).load();
  }

  private static loadXml(filePath: string): Document {
    return SchemaLoader.parseXml(fs.readFileSync(filePath, 'utf8'), filePath);
  }

  private static parseXml(xml: string, source: string): Document {
    const errors: string[] = [];
    const doc = new DOMParser({
      errorHandler: {
        warning: (msg: string) => console.warn(`Warning while parsing ${source}: ${msg}`),
        error: (msg: string) => errors.push(msg),
        fatalError: (msg: string) => errors.push(msg)
      }
    }).parseFromString(xml, 'application/xml');
    if (errors.length > 0) {
      throw new SchemaLoadError(`Could not parse ${source}: ${errors[0]}`, source);
    }
    return doc;
  }

  /**
   * Whether a file parses to an XML Schema document
   */
  public static isSchemaFile(xsdFilePath: string): boolean {
    const root = SchemaLoader.loadXml(xsdFilePath).documentElement;
    return !!root && root.localName === 'schema' && root.namespaceURI === XSD_NAMESPACE;
  }

  /**
   * The schemaLocation of every xs:include of a schema file, in document order
   */
  public static includeLocations(xsdFilePath: string): string[] {
    const root = SchemaLoader.loadXml(xsdFilePath).documentElement;
    if (!root) {
      return [];
    }
    return childElements(root)
      .filter(child => child.localName === 'include' && child.namespaceURI === XSD_NAMESPACE)
      .map(child => child.getAttribute('schemaLocation') || '')
      .filter(location => location.length > 0);
  }

  /**
   * Append the top-level components of an included document to the main schema.
   * Each copy takes the namespace declarations of the include's root that it
   * does not declare itself, so its QNames keep their bindings.
   */
  private static mergeXsds(mainDoc: Document, includeDoc: Document): void {
    const mainSchema = mainDoc.documentElement;
    const includeSchema = includeDoc.documentElement;
    const declarations = Array.from(includeSchema.attributes)
      .filter(attr => attr.name === 'xmlns' || attr.name.startsWith('xmlns:'))
      .map(attr => ({ name: attr.name, value: attr.value }));
    if (!includeSchema.hasAttribute('xmlns')) {
      // unprefixed names in the include have no namespace
      declarations.push({ name: 'xmlns', value: '' });
    }
    for (const node of childElements(includeSchema)) {
      if (node.localName === 'include') continue;
      const copy = node.cloneNode(true);
      if (isElement(copy)) {
        for (const attr of declarations) {
          if (!copy.hasAttribute(attr.name)) {
            copy.setAttribute(attr.name, attr.value);
          }
        }
      }
      mainSchema.appendChild(copy);
    }
  }

  private load(): SchemaModel {
    const elementNodes: Element[] = [];
    const notationNodes: Element[] = [];

    for (const child of childElements(this.root)) {
      const name = child.getAttribute('name');
      if (!name) continue;
      switch (child.localName) {
        case 'complexType':
        case 'simpleType':
          this.namedTypes.set(name, child);
          break;
        case 'element':
          elementNodes.push(child);
          break;
        case 'notation':
          notationNodes.push(child);
          break;
      }
    }

    const types = Array.from(this.namedTypes.values()).map(node => this.buildType(node));
    const elements = elementNodes.map(node => this.buildElement(node, 'global'));
    const notations = notationNodes.map(node => this.buildNotation(node));

    const localElements: ElementDeclaration[] = [];
    for (const child of childElements(this.root)) {
      this.collectLocalElements(child, localElements);
    }

    const model = new SchemaModel(this.name, this.targetNamespace, { elements, types, notations, localElements });
    if ((process.env.XSD_PSVI_VERBOSE || '').trim() === '1') {
      console.log(`Loaded schema "${this.name}": ${elements.length} elements, ${types.length} types, ${notations.length} notations`);
    }
    return model;
  }

  private collectLocalElements(node: Element, result: ElementDeclaration[]): void {
    for (const child of childElements(node)) {
      if (child.localName === 'element' && child.hasAttribute('name')) {
        result.push(this.buildElement(child, 'local'));
      }
      this.collectLocalElements(child, result);
    }
  }

  /**
   * Resolve a QName type reference in the scope of `context`
   */
  private resolveTypeRef(qname: string, context: Element, fallback: TypeDefinition): TypeDefinition {
    const { prefix, localName } = splitQName(qname.trim());
    const namespace = lookupNamespace(context, prefix);

    if (namespace === XSD_NAMESPACE) {
      const builtin = getBuiltinType(localName);
      if (builtin) {
        return builtin;
      }
    } else if (namespace === this.targetNamespace) {
      const node = this.namedTypes.get(localName);
      if (node) {
        return this.buildType(node);
      }
    }

    console.warn(`Unresolved type reference "${qname}" in ${this.name}, using ${fallback.name}`);
    return fallback;
  }

  private resolveSimpleTypeRef(qname: string, context: Element): SimpleTypeDefinition {
    const type = this.resolveTypeRef(qname, context, ANY_SIMPLE_TYPE);
    if (type.kind !== 'simple') {
      console.warn(`Type "${qname}" in ${this.name} is not a simple type, using anySimpleType`);
      return ANY_SIMPLE_TYPE;
    }
    return type;
  }

  private buildType(node: Element): TypeDefinition {
    const built = this.builtTypes.get(node);
    if (built) {
      return built;
    }

    const isSimple = node.localName === 'simpleType';
    if (this.inProgress.has(node)) {
      console.warn(`Circular derivation of type "${node.getAttribute('name') || '(anonymous)'}" in ${this.name}`);
      return isSimple ? ANY_SIMPLE_TYPE : ANY_TYPE;
    }

    this.inProgress.add(node);
    try {
      const type = isSimple ? this.buildSimpleType(node) : this.buildComplexType(node);
      this.builtTypes.set(node, type);
      return type;
    } finally {
      this.inProgress.delete(node);
    }
  }

  private buildInlineSimpleType(parent: Element): SimpleTypeDefinition | null {
    const inline = firstChild(parent, 'simpleType');
    if (!inline) {
      return null;
    }
    const type = this.buildType(inline);
    return type.kind === 'simple' ? type : ANY_SIMPLE_TYPE;
  }

  private buildSimpleType(node: Element): SimpleTypeDefinition {
    const name = node.getAttribute('name') || null;
    const namespace = this.targetNamespace;

    const restriction = firstChild(node, 'restriction');
    if (restriction) {
      const baseName = restriction.getAttribute('base') || null;
      const base = baseName
        ? this.resolveSimpleTypeRef(baseName, restriction)
        : this.buildInlineSimpleType(restriction) ?? ANY_SIMPLE_TYPE;
      return {
        kind: 'simple',
        name,
        namespace,
        variety: base.variety,
        primitiveKind: base.primitiveKind,
        baseTypeName: baseName ? splitQName(baseName).localName : base.name,
        itemType: base.itemType,
        memberTypes: base.memberTypes
      };
    }

    const list = firstChild(node, 'list');
    if (list) {
      const itemTypeName = list.getAttribute('itemType');
      const itemType = itemTypeName
        ? this.resolveSimpleTypeRef(itemTypeName, list)
        : this.buildInlineSimpleType(list) ?? ANY_SIMPLE_TYPE;
      return {
        kind: 'simple',
        name,
        namespace,
        variety: 'list',
        primitiveKind: itemType.variety === 'union' ? 'listOfUnion' : 'list',
        baseTypeName: 'anySimpleType',
        itemType,
        memberTypes: []
      };
    }

    const union = firstChild(node, 'union');
    if (union) {
      const memberTypes: SimpleTypeDefinition[] = [];
      const memberNames = (union.getAttribute('memberTypes') || '').trim();
      if (memberNames) {
        for (const memberName of memberNames.split(/\s+/)) {
          memberTypes.push(this.resolveSimpleTypeRef(memberName, union));
        }
      }
      for (const inline of childElements(union)) {
        if (inline.localName === 'simpleType') {
          const member = this.buildType(inline);
          memberTypes.push(member.kind === 'simple' ? member : ANY_SIMPLE_TYPE);
        }
      }
      return {
        kind: 'simple',
        name,
        namespace,
        variety: 'union',
        primitiveKind: 'anySimpleType',
        baseTypeName: 'anySimpleType',
        itemType: null,
        memberTypes
      };
    }

    return { ...ANY_SIMPLE_TYPE, name, namespace };
  }

  private buildComplexType(node: Element): ComplexTypeDefinition {
    const complex = (contentKind: ContentKind, simpleContentType: SimpleTypeDefinition | null = null): ComplexTypeDefinition => ({
      kind: 'complex',
      name: node.getAttribute('name') || null,
      namespace: this.targetNamespace,
      contentKind,
      simpleContentType,
      abstract: node.getAttribute('abstract') === 'true'
    });
    const mixed = node.getAttribute('mixed') === 'true';

    const simpleContent = firstChild(node, 'simpleContent');
    if (simpleContent) {
      const derivation = firstChild(simpleContent, 'extension') ?? firstChild(simpleContent, 'restriction');
      return complex('simple', derivation ? this.simpleContentOf(derivation) : ANY_SIMPLE_TYPE);
    }

    const complexContent = firstChild(node, 'complexContent');
    if (complexContent) {
      const isMixed = complexContent.hasAttribute('mixed')
        ? complexContent.getAttribute('mixed') === 'true'
        : mixed;
      const extension = firstChild(complexContent, 'extension');
      const derivation = extension ?? firstChild(complexContent, 'restriction');
      if (derivation && this.hasParticle(derivation)) {
        return complex(isMixed ? 'mixed' : 'element-only');
      }
      if (extension) {
        const baseName = extension.getAttribute('base');
        const base = baseName ? this.resolveTypeRef(baseName, extension, ANY_TYPE) : ANY_TYPE;
        if (base.kind === 'complex') {
          if (isMixed && base.contentKind === 'empty') {
            return complex('mixed');
          }
          return complex(base.contentKind, base.simpleContentType);
        }
        return complex('simple', base);
      }
      return complex(isMixed ? 'mixed' : 'empty');
    }

    if (this.hasParticle(node)) {
      return complex(mixed ? 'mixed' : 'element-only');
    }
    return complex(mixed ? 'mixed' : 'empty');
  }

  /**
   * Simple type of a simpleContent extension or restriction
   */
  private simpleContentOf(derivation: Element): SimpleTypeDefinition {
    const inline = this.buildInlineSimpleType(derivation);
    if (inline) {
      return inline;
    }
    const baseName = derivation.getAttribute('base');
    if (!baseName) {
      return ANY_SIMPLE_TYPE;
    }
    const base = this.resolveTypeRef(baseName, derivation, ANY_SIMPLE_TYPE);
    if (base.kind === 'simple') {
      return base;
    }
    return base.simpleContentType ?? ANY_SIMPLE_TYPE;
  }

  private hasParticle(node: Element): boolean {
    return childElements(node).some(child => PARTICLES.has(child.localName));
  }

  private buildElement(node: Element, scope: 'global' | 'local'): ElementDeclaration {
    const typeName = node.getAttribute('type');
    const inlineType = firstChild(node, 'complexType') ?? firstChild(node, 'simpleType');
    let typeDefinition: TypeDefinition = ANY_TYPE;
    if (typeName) {
      typeDefinition = this.resolveTypeRef(typeName, node, ANY_TYPE);
    } else if (inlineType) {
      typeDefinition = this.buildType(inlineType);
    }

    let valueConstraint: ValueConstraint | null = null;
    const fixed = optionalAttribute(node, 'fixed');
    const defaultValue = optionalAttribute(node, 'default');
    if (fixed !== null) {
      valueConstraint = { kind: 'fixed', value: fixed };
    } else if (defaultValue !== null) {
      valueConstraint = { kind: 'default', value: defaultValue };
    }

    let qualified = true;
    if (scope === 'local') {
      const form = node.getAttribute('form');
      qualified = form ? form === 'qualified' : this.qualifiedLocals;
    }

    return {
      name: node.getAttribute('name') || '',
      namespace: qualified ? this.targetNamespace : null,
      typeDefinition,
      nillable: node.getAttribute('nillable') === 'true',
      abstract: node.getAttribute('abstract') === 'true',
      scope,
      valueConstraint
    };
  }

  private buildNotation(node: Element): NotationDeclaration {
    return {
      name: node.getAttribute('name') || '',
      namespace: this.targetNamespace,
      publicId: optionalAttribute(node, 'public'),
      systemId: optionalAttribute(node, 'system')
    };
  }
}
