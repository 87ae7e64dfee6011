import { EMPTY_STRING_LIST } from './EmptyList';
import { constraintValueOf, hasSimpleValue } from './SchemaModel';
import type {
  ElementDeclaration,
  NotationDeclaration,
  SchemaModel,
  SimpleTypeDefinition,
  TypeDefinition
} from './SchemaModel';
import { ValidatedValue } from './ValidatedValue';
import type { SchemaValue, ValidatedValueInit } from './ValidatedValue';
import type { ValueKind } from './ValueKind';

/** [validation attempted] */
export enum ValidationAttempted {
  None = 0,
  Partial = 1,
  Full = 2
}

/** [validity] */
export enum Validity {
  NotKnown = 0,
  Invalid = 1,
  Valid = 2
}

/**
 * Validation attempted and validity, paired so that an element nobody attempted to
 * validate can only have unknown validity.
 */
export type Assessment =
  | { readonly attempted: ValidationAttempted.None; readonly validity: Validity.NotKnown }
  | { readonly attempted: ValidationAttempted.Partial | ValidationAttempted.Full; readonly validity: Validity };

export const NOT_ASSESSED: Assessment = { attempted: ValidationAttempted.None, validity: Validity.NotKnown };

export function assess(attempted: ValidationAttempted, validity: Validity): Assessment {
  if (attempted === ValidationAttempted.None) {
    return NOT_ASSESSED;
  }
  return { attempted, validity };
}

export interface SchemaError {
  code: string;
  message: string;
}

/**
 * Read-only element PSVI contract shared by outcomes and the nodes carrying them.
 */
export interface ElementPSVI {
  getElementDeclaration(): ElementDeclaration | null;
  getTypeDefinition(): TypeDefinition | null;
  getMemberTypeDefinition(): SimpleTypeDefinition | null;
  getNil(): boolean;
  getIsSchemaSpecified(): boolean;
  getNotation(): NotationDeclaration | null;
  getValidationAttempted(): ValidationAttempted;
  getValidity(): Validity;
  getErrorCodes(): readonly string[];
  getErrorMessages(): readonly string[];
  getValidationContext(): string | null;
  getSchemaInformation(): SchemaModel | null;
  getSchemaValue(): SchemaValue;
  getSchemaDefault(): string | null;
  getSchemaNormalizedValue(): string | null;
  getActualNormalizedValue(): unknown;
  getActualNormalizedValueKind(): ValueKind;
  getItemValueKinds(): readonly ValueKind[];
}

export interface ValidationOutcomeInit {
  elementDeclaration?: ElementDeclaration | null;
  typeDefinition?: TypeDefinition | null;
  nil?: boolean;
  specified?: boolean;
  notation?: NotationDeclaration | null;
  validationAttempted?: ValidationAttempted;
  validity?: Validity;
  errors?: readonly SchemaError[];
  validationContext?: string | null;
  schemaInformation?: SchemaModel | null;
  value?: ValidatedValueInit | null;
}

/**
 * The PSVI record of one element: what validated it and how it went.
 *
 * A validator builds one per element during a validation pass; a node copies it in
 * with {@link ValidationOutcome.mergeFrom}.
 */
export class ValidationOutcome implements ElementPSVI {
  private elementDeclaration: ElementDeclaration | null = null;
  private typeDefinition: TypeDefinition | null = null;
  private nil: boolean = false;
  // false when the value was supplied by a schema default
  private specified: boolean = true;
  private notation: NotationDeclaration | null = null;
  private assessment: Assessment = NOT_ASSESSED;
  private errorCodes: readonly string[] | null = null;
  private errorMessages: readonly string[] | null = null;
  // qualified name or path expression
  private validationContext: string | null = null;
  private schemaInformation: SchemaModel | null = null;
  private readonly value = new ValidatedValue();

  constructor(init: ValidationOutcomeInit = {}) {
    this.elementDeclaration = init.elementDeclaration ?? null;
    this.typeDefinition = init.typeDefinition ?? null;
    this.nil = init.nil ?? false;
    this.specified = init.specified ?? true;
    this.notation = init.notation ?? null;
    this.assessment = assess(
      init.validationAttempted ?? ValidationAttempted.None,
      init.validity ?? Validity.NotKnown
    );
    if (init.errors) {
      this.errorCodes = Object.freeze(init.errors.map(e => e.code));
      this.errorMessages = Object.freeze(init.errors.map(e => e.message));
    }
    this.validationContext = init.validationContext ?? null;
    this.schemaInformation = init.schemaInformation ?? null;
    if (init.value && hasSimpleValue(this.typeDefinition)) {
      this.value.populate(init.value);
    }
  }

  /**
   * Overwrite every property of this outcome with those of `source`. The schema value
   * is copied only when the new type definition can carry one; otherwise it is reset.
   */
  public mergeFrom(source: ElementPSVI): void {
    this.elementDeclaration = source.getElementDeclaration();
    this.notation = source.getNotation();
    this.validationContext = source.getValidationContext();
    this.typeDefinition = source.getTypeDefinition();
    this.schemaInformation = source.getSchemaInformation();
    this.assessment = assess(source.getValidationAttempted(), source.getValidity());
    this.errorCodes = source.getErrorCodes();
    this.errorMessages = source.getErrorMessages();
    if (hasSimpleValue(this.typeDefinition)) {
      this.value.copyFrom(source.getSchemaValue());
    } else {
      this.value.reset();
    }
    this.specified = source.getIsSchemaSpecified();
    this.nil = source.getNil();
  }

  /**
   * [schema default]: the declaration's value constraint
   */
  public getSchemaDefault(): string | null {
    return constraintValueOf(this.elementDeclaration);
  }

  /**
   * [schema normalized value]
   */
  public getSchemaNormalizedValue(): string | null {
    return this.value.getNormalizedValue();
  }

  public getIsSchemaSpecified(): boolean {
    return this.specified;
  }

  public getValidationAttempted(): ValidationAttempted {
    return this.assessment.attempted;
  }

  public getValidity(): Validity {
    return this.assessment.validity;
  }

  public getAssessment(): Assessment {
    return this.assessment;
  }

  /**
   * Error codes of the validation attempt, index-aligned with {@link getErrorMessages}
   */
  public getErrorCodes(): readonly string[] {
    return this.errorCodes ?? EMPTY_STRING_LIST;
  }

  public getErrorMessages(): readonly string[] {
    return this.errorMessages ?? EMPTY_STRING_LIST;
  }

  public getValidationContext(): string | null {
    return this.validationContext;
  }

  /**
   * [nil]: whether the element was nilled with xsi:nil
   */
  public getNil(): boolean {
    return this.nil;
  }

  public getNotation(): NotationDeclaration | null {
    return this.notation;
  }

  public getTypeDefinition(): TypeDefinition | null {
    return this.typeDefinition;
  }

  /**
   * The union member that validated the value, when the type is a union or has
   * union simple content
   */
  public getMemberTypeDefinition(): SimpleTypeDefinition | null {
    return this.value.getMemberType();
  }

  public getElementDeclaration(): ElementDeclaration | null {
    return this.elementDeclaration;
  }

  /**
   * [schema information]: set only on the root of a validation episode
   */
  public getSchemaInformation(): SchemaModel | null {
    return this.schemaInformation;
  }

  public getSchemaValue(): SchemaValue {
    return this.value;
  }

  public getActualNormalizedValue(): unknown {
    return this.value.getActualValue();
  }

  public getActualNormalizedValueKind(): ValueKind {
    return this.value.getActualValueKind();
  }

  public getItemValueKinds(): readonly ValueKind[] {
    return this.value.getListValueKinds();
  }
}
