import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { DOMParser } from '@xmldom/xmldom';
import { SchemaRegistry } from './SchemaRegistry';

const SCHEMA_DIR = path.resolve(__dirname, '../fixtures/schemas');

function parse(xml: string): Document {
  return new DOMParser().parseFromString(xml, 'application/xml');
}

describe('SchemaRegistry', () => {
  let registry: SchemaRegistry;

  beforeEach(() => {
    registry = new SchemaRegistry(SCHEMA_DIR);
  });

  afterEach(() => {
    registry.dispose();
    vi.restoreAllMocks();
  });

  describe('getSchema', () => {
    it('should load a schema with its includes', () => {
      const model = registry.getSchema('order');

      expect(model?.name).toBe('order.xsd');
      const [amount] = model?.getLocalElementDeclarations('amount') ?? [];
      expect(amount?.typeDefinition).toBe(model?.getTypeDefinition('Amount'));
      expect(amount?.typeDefinition.kind === 'simple' && amount.typeDefinition.primitiveKind).toBe('decimal');
    });

    it('should keep the namespace bindings of an include written with another prefix', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      const model = registry.getSchema('main');
      const amount = model?.getTypeDefinition('Amount');
      const amounts = model?.getTypeDefinition('Amounts');

      expect(amount?.kind === 'simple' && amount.primitiveKind).toBe('decimal');
      expect(amount?.kind === 'simple' && amount.baseTypeName).toBe('decimal');
      expect(amounts?.kind === 'simple' && amounts.itemType).toBe(amount);
      expect(model?.getElementDeclaration('total')?.typeDefinition).toBe(amount);
      expect(warn).not.toHaveBeenCalled();
    });

    it('should merge includes of a schema in the default XSD namespace', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      const model = registry.getSchema('plain');
      const amount = model?.getTypeDefinition('Amount');
      const amounts = model?.getTypeDefinition('Amounts');

      expect(amount?.kind === 'simple' && amount.primitiveKind).toBe('decimal');
      expect(amounts?.kind === 'simple' && amounts.itemType).toBe(amount);
      expect(model?.getElementDeclaration('label')?.typeDefinition.name).toBe('string');
      expect(warn).not.toHaveBeenCalled();
    });

    it('should reuse loaded schemas', () => {
      const first = registry.getSchema('order');

      expect(registry.getSchema('order')).toBe(first);
      expect(registry.getAvailableSchemas()).toEqual(['order']);
    });

    it('should return null and warn for a missing schema file', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      expect(registry.getSchema('invoice')).toBeNull();
      expect(warn).toHaveBeenCalledWith(`Schema file not found: ${path.join(SCHEMA_DIR, 'invoice.xsd')}`);
    });

    it('should return null and log for a file that is not a schema', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(registry.getSchema('broken')).toBeNull();
      expect(error).toHaveBeenCalledTimes(1);
      expect(error.mock.calls[0][0]).toBe('Error loading schema broken:');
      expect(registry.getAvailableSchemas()).toEqual([]);
    });
  });

  describe('getDiscoverableSchemas', () => {
    it('should list the XSD files of the directory that hold a schema', () => {
      expect(registry.getDiscoverableSchemas()).toEqual(['common', 'main', 'order', 'plain', 'types']);
    });

    it('should return an empty list for a missing directory', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const missing = new SchemaRegistry(path.join(SCHEMA_DIR, 'does-not-exist'));

      expect(missing.getDiscoverableSchemas()).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('detectSchemaLocation', () => {
    it('should read xsi:noNamespaceSchemaLocation', () => {
      const doc = parse('<order xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xsi:noNamespaceSchemaLocation="schemas/order.xsd"/>');

      expect(SchemaRegistry.detectSchemaLocation(doc)).toEqual({ schemaName: 'order', schemaFile: 'schemas/order.xsd' });
    });

    it('should take the location from xsi:schemaLocation pairs', () => {
      const doc = parse('<o:order xmlns:o="urn:test:orders" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xsi:schemaLocation="urn:test:orders  invoices.xsd"/>');

      expect(SchemaRegistry.detectSchemaLocation(doc)).toEqual({ schemaName: 'invoices', schemaFile: 'invoices.xsd' });
    });

    it('should fall back to the root element name', () => {
      expect(SchemaRegistry.detectSchemaLocation(parse('<Catalog/>'))).toEqual({ schemaName: 'catalog', schemaFile: 'catalog.xsd' });
    });
  });

  it('should load the schema a document names', () => {
    const doc = parse('<order xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xsi:noNamespaceSchemaLocation="order.xsd"><amount>9.50</amount></order>');

    const model = registry.getSchemaForDocument(doc);

    expect(model).toBe(registry.getSchema('order'));
    expect(model?.getElementDeclaration('order')?.scope).toBe('global');
  });
});
