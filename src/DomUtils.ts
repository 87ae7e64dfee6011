export function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

/**
 * Direct element children, in document order
 */
export function childElements(parent: Element): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const child = parent.childNodes[i];
    if (isElement(child)) {
      result.push(child);
    }
  }
  return result;
}

/**
 * First direct child with the given local name
 */
export function firstChild(parent: Element, localName: string): Element | undefined {
  return childElements(parent).find(child => child.localName === localName);
}

/**
 * Attribute value, or null when the attribute is absent. An attribute present with an
 * empty value yields ''.
 */
export function optionalAttribute(element: Element, name: string): string | null {
  if (!element.hasAttribute(name)) {
    return null;
  }
  return element.getAttribute(name) ?? '';
}

const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

/**
 * Namespace bound to `prefix` ('' for the default namespace) by the xmlns attributes
 * in scope at `element`
 */
export function lookupNamespace(element: Element, prefix: string): string | null {
  if (prefix === 'xml') {
    return XML_NAMESPACE;
  }
  const attributeName = prefix ? `xmlns:${prefix}` : 'xmlns';
  let current: Node | null = element;
  while (current && isElement(current)) {
    if (current.hasAttribute(attributeName)) {
      return current.getAttribute(attributeName) || null;
    }
    current = current.parentNode;
  }
  return null;
}
