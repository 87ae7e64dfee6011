import * as fs from 'fs';
import { DOMParser } from '@xmldom/xmldom';
import { childElements } from './DomUtils';
import { NotSerializableError } from './NotSerializableError';
import { PSVIElement } from './PSVIElement';
import type { ElementPSVI, Validity } from './ValidationOutcome';

/**
 * A parsed XML document whose elements can carry PSVI records.
 */
export class PSVIDocument {
  private readonly nodes = new WeakMap<Element, PSVIElement>();

  constructor(public readonly document: Document) {}

  public static parse(xml: string): PSVIDocument {
    const doc = new DOMParser().parseFromString(xml, 'application/xml');
    return new PSVIDocument(doc);
  }

  public static fromFile(xmlFilePath: string): PSVIDocument {
    return PSVIDocument.parse(fs.readFileSync(xmlFilePath, 'utf8'));
  }

  public get documentElement(): Element | null {
    return this.document.documentElement;
  }

  /**
   * The PSVI node for `element`, created with a default outcome on first access
   */
  public getPSVI(element: Element): PSVIElement {
    let node = this.nodes.get(element);
    if (!node) {
      node = new PSVIElement(element);
      this.nodes.set(element, node);
    }
    return node;
  }

  public hasPSVI(element: Element): boolean {
    return this.nodes.has(element);
  }

  public attachOutcome(element: Element, outcome: ElementPSVI): PSVIElement {
    const node = this.getPSVI(element);
    node.attachOutcome(outcome);
    return node;
  }

  /**
   * The first element, in document order, whose record carries [schema information]
   */
  public getValidationRoot(): PSVIElement | null {
    for (const element of this.elements()) {
      const node = this.nodes.get(element);
      if (node && node.getSchemaInformation()) {
        return node;
      }
    }
    return null;
  }

  /**
   * Elements with an attached record of the given validity, in document order
   */
  public findByValidity(validity: Validity): PSVIElement[] {
    const result: PSVIElement[] = [];
    for (const element of this.elements()) {
      const node = this.nodes.get(element);
      if (node && node.getValidity() === validity) {
        result.push(node);
      }
    }
    return result;
  }

  public toJSON(): never {
    throw new NotSerializableError('PSVIDocument');
  }

  private *elements(): Generator<Element> {
    const root = this.document.documentElement;
    if (!root) return;

    const stack: Element[] = [root];
    while (stack.length > 0) {
      const element = stack.pop();
      if (!element) break;
      yield element;
      // push in reverse so children come out in document order
      stack.push(...childElements(element).reverse());
    }
  }
}
