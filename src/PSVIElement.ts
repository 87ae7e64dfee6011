import { NotSerializableError } from './NotSerializableError';
import type {
  ElementDeclaration,
  NotationDeclaration,
  SchemaModel,
  SimpleTypeDefinition,
  TypeDefinition
} from './SchemaModel';
import type { SchemaValue } from './ValidatedValue';
import { ValidationOutcome } from './ValidationOutcome';
import type { ElementPSVI, ValidationAttempted, Validity } from './ValidationOutcome';
import type { ValueKind } from './ValueKind';

/**
 * An element node together with its PSVI record.
 *
 * The DOM element stays owned by its document; this object owns exactly one
 * {@link ValidationOutcome}, which starts at defaults and changes only through
 * {@link attachOutcome}.
 *
 * Only JSON serialization is refused (`toJSON` throws). `structuredClone` and
 * `v8.serialize` still copy the record, schema references included.
 */
export class PSVIElement implements ElementPSVI {
  private readonly outcome = new ValidationOutcome();

  constructor(public readonly element: Element) {}

  public get namespaceURI(): string | null {
    return this.element.namespaceURI;
  }

  public get localName(): string {
    return this.element.localName;
  }

  public get nodeName(): string {
    return this.element.nodeName;
  }

  /**
   * Copy the PSVI properties of `outcome` onto this node
   */
  public attachOutcome(outcome: ElementPSVI): void {
    this.outcome.mergeFrom(outcome);
  }

  public getSchemaDefault(): string | null {
    return this.outcome.getSchemaDefault();
  }

  public getSchemaNormalizedValue(): string | null {
    return this.outcome.getSchemaNormalizedValue();
  }

  public getIsSchemaSpecified(): boolean {
    return this.outcome.getIsSchemaSpecified();
  }

  public getValidationAttempted(): ValidationAttempted {
    return this.outcome.getValidationAttempted();
  }

  public getValidity(): Validity {
    return this.outcome.getValidity();
  }

  public getErrorCodes(): readonly string[] {
    return this.outcome.getErrorCodes();
  }

  public getErrorMessages(): readonly string[] {
    return this.outcome.getErrorMessages();
  }

  public getValidationContext(): string | null {
    return this.outcome.getValidationContext();
  }

  public getNil(): boolean {
    return this.outcome.getNil();
  }

  public getNotation(): NotationDeclaration | null {
    return this.outcome.getNotation();
  }

  public getTypeDefinition(): TypeDefinition | null {
    return this.outcome.getTypeDefinition();
  }

  public getMemberTypeDefinition(): SimpleTypeDefinition | null {
    return this.outcome.getMemberTypeDefinition();
  }

  public getElementDeclaration(): ElementDeclaration | null {
    return this.outcome.getElementDeclaration();
  }

  public getSchemaInformation(): SchemaModel | null {
    return this.outcome.getSchemaInformation();
  }

  public getSchemaValue(): SchemaValue {
    return this.outcome.getSchemaValue();
  }

  public getActualNormalizedValue(): unknown {
    return this.outcome.getActualNormalizedValue();
  }

  public getActualNormalizedValueKind(): ValueKind {
    return this.outcome.getActualNormalizedValueKind();
  }

  public getItemValueKinds(): readonly ValueKind[] {
    return this.outcome.getItemValueKinds();
  }

  // Schema components have no serialized form, so neither does PSVI data.
  public toJSON(): never {
    throw new NotSerializableError('PSVIElement');
  }
}
