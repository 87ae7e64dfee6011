import type { ValueKind } from './ValueKind';

/**
 * Shared empty lists returned in place of null when nothing was recorded.
 */
export const EMPTY_STRING_LIST: readonly string[] = Object.freeze<string[]>([]);

export const EMPTY_KIND_LIST: readonly ValueKind[] = Object.freeze<ValueKind[]>([]);
