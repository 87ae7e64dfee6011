import * as fs from 'fs';
import * as path from 'path';
import { XSI_NAMESPACE } from './SchemaModel';
import type { SchemaModel } from './SchemaModel';
import { SchemaLoader } from './SchemaLoader';

export interface SchemaLocation {
  schemaName: string | null;
  schemaFile: string | null;
}

/**
 * Loads schema models from a directory of XSD files on demand and keeps them for
 * reuse across documents.
 */
export class SchemaRegistry {
  private schemas: Map<string, SchemaModel> = new Map();
  private xsdDirectory: string;

  constructor(xsdDirectory: string) {
    this.xsdDirectory = xsdDirectory;
  }

  /**
   * Resolve the xs:include locations of a schema against its own directory
   * @param xsdFilePath The path to the XSD file to scan
   * @returns Absolute paths of the included files that exist
   */
  private discoverIncludes(xsdFilePath: string): string[] {
    try {
      const baseDir = path.dirname(path.resolve(xsdFilePath));
      const includes: string[] = [];
      for (const location of SchemaLoader.includeLocations(xsdFilePath)) {
        const includePath = path.resolve(baseDir, location);
        if (!fs.existsSync(includePath)) {
          console.warn(`Included schema not found: ${includePath}`);
        } else if (!includes.includes(includePath)) {
          includes.push(includePath);
        }
      }
      return includes;
    } catch (error) {
      console.warn(`Warning: Could not read includes from ${xsdFilePath}:`, error);
      return [];
    }
  }

  /**
   * Load a schema by name (file name without the .xsd extension)
   * @returns The loaded model, or null if loading failed
   */
  private loadSchema(schemaName: string): SchemaModel | null {
    const loaded = this.schemas.get(schemaName);
    if (loaded) {
      return loaded;
    }

    const xsdPath = path.join(this.xsdDirectory, `${schemaName}.xsd`);
    if (!fs.existsSync(xsdPath)) {
      console.warn(`Schema file not found: ${xsdPath}`);
      return null;
    }

    try {
      const schema = SchemaLoader.fromFile(xsdPath, this.discoverIncludes(xsdPath));
      this.schemas.set(schemaName, schema);
      return schema;
    } catch (error) {
      console.error(`Error loading schema ${schemaName}:`, error);
      return null;
    }
  }

  public getSchema(schemaName: string): SchemaModel | null {
    return this.loadSchema(schemaName);
  }

  /**
   * The schema a document names through xsi:noNamespaceSchemaLocation or
   * xsi:schemaLocation, or the one named after its root element
   */
  public getSchemaForDocument(doc: Document): SchemaModel | null {
    const location = SchemaRegistry.detectSchemaLocation(doc);
    if (!location.schemaName) {
      return null;
    }
    return this.loadSchema(location.schemaName);
  }

  /**
   * Names of the schemas currently loaded
   */
  public getAvailableSchemas(): string[] {
    return Array.from(this.schemas.keys());
  }

  /**
   * Names of the files in the schema directory whose root is an xs:schema
   */
  public getDiscoverableSchemas(): string[] {
    let files: string[];
    try {
      files = fs.readdirSync(this.xsdDirectory).filter(file => file.endsWith('.xsd')).sort();
    } catch (error) {
      console.warn(`Could not read XSD directory ${this.xsdDirectory}:`, error);
      return [];
    }
    return files
      .filter(file => this.isSchemaFile(path.join(this.xsdDirectory, file)))
      .map(file => path.basename(file, '.xsd'));
  }

  private isSchemaFile(filePath: string): boolean {
    try {
      return SchemaLoader.isSchemaFile(filePath);
    } catch (error) {
      console.warn(`Skipping unreadable schema file ${filePath}:`, error);
      return false;
    }
  }

  public dispose(): void {
    this.schemas.clear();
  }

  public static detectSchemaLocation(doc: Document): SchemaLocation {
    const root = doc.documentElement;
    if (!root) {
      return { schemaName: null, schemaFile: null };
    }

    const noNamespaceLocation = root.getAttributeNS(XSI_NAMESPACE, 'noNamespaceSchemaLocation');
    if (noNamespaceLocation) {
      return SchemaRegistry.fromLocation(noNamespaceLocation);
    }

    // pairs of namespace and location; the first location wins
    const schemaLocation = (root.getAttributeNS(XSI_NAMESPACE, 'schemaLocation') || '').trim().split(/\s+/);
    if (schemaLocation.length >= 2) {
      return SchemaRegistry.fromLocation(schemaLocation[1]);
    }

    const schemaName = (root.localName || root.nodeName).toLowerCase();
    return { schemaName, schemaFile: `${schemaName}.xsd` };
  }

  private static fromLocation(location: string): SchemaLocation {
    const schemaFile = location.trim();
    return { schemaName: path.basename(schemaFile, '.xsd'), schemaFile };
  }
}
