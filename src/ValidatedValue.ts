import { EMPTY_KIND_LIST } from './EmptyList';
import type { SimpleTypeDefinition } from './SchemaModel';
import type { ValueKind } from './ValueKind';

/**
 * Read-only view of a schema value
 */
export interface SchemaValue {
  getActualValue(): unknown;
  getActualValueKind(): ValueKind;
  getListValueKinds(): readonly ValueKind[];
  getNormalizedValue(): string | null;
  getMemberType(): SimpleTypeDefinition | null;
}

export interface ValidatedValueInit {
  actualValue: unknown;
  actualValueKind: ValueKind;
  normalizedValue: string;
  listValueKinds?: readonly ValueKind[];
  memberType?: SimpleTypeDefinition | null;
}

function copyActualValue(value: unknown): unknown {
  // list values are held as arrays, one entry per item
  return Array.isArray(value) ? value.slice() : value;
}

/**
 * Outcome of validating character content against a simple type.
 */
export class ValidatedValue implements SchemaValue {
  private actualValue: unknown = null;
  private actualValueKind: ValueKind = 'unavailable';
  private listValueKinds: readonly ValueKind[] | null = null;
  private normalizedValue: string | null = null;
  private memberType: SimpleTypeDefinition | null = null;

  constructor(init?: ValidatedValueInit) {
    if (init) {
      this.populate(init);
    }
  }

  /**
   * Fill in the value as computed by a validator
   */
  public populate(init: ValidatedValueInit): void {
    this.actualValue = init.actualValue;
    this.actualValueKind = init.actualValueKind;
    this.normalizedValue = init.normalizedValue;
    this.listValueKinds = init.listValueKinds ? Object.freeze(init.listValueKinds.slice()) : null;
    this.memberType = init.memberType ?? null;
  }

  public copyFrom(source: SchemaValue): void {
    const listKinds = source.getListValueKinds();
    this.actualValue = copyActualValue(source.getActualValue());
    this.actualValueKind = source.getActualValueKind();
    this.listValueKinds = listKinds.length > 0 ? Object.freeze(listKinds.slice()) : null;
    this.normalizedValue = source.getNormalizedValue();
    this.memberType = source.getMemberType();
  }

  public reset(): void {
    this.actualValue = null;
    this.actualValueKind = 'unavailable';
    this.listValueKinds = null;
    this.normalizedValue = null;
    this.memberType = null;
  }

  public isEmpty(): boolean {
    return this.normalizedValue === null &&
      this.actualValue === null &&
      this.actualValueKind === 'unavailable' &&
      this.listValueKinds === null &&
      this.memberType === null;
  }

  public getActualValue(): unknown {
    return this.actualValue;
  }

  public getActualValueKind(): ValueKind {
    return this.actualValueKind;
  }

  public getListValueKinds(): readonly ValueKind[] {
    return this.listValueKinds ?? EMPTY_KIND_LIST;
  }

  public getNormalizedValue(): string | null {
    return this.normalizedValue;
  }

  public getMemberType(): SimpleTypeDefinition | null {
    return this.memberType;
  }
}
