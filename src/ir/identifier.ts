// src/ir/identifier.ts
// Identifiers are compared by object identity. The numeric id only exists for debugging.

export interface Identifier {
  readonly type: 'Identifier';
  readonly id: number;
}

/**
 * Hands out fresh identifiers. Every translation owns one allocator,
 * so no counter is shared between translations.
 */
export class IdentifierAllocator {
  private counter = 0;

  next(): Identifier {
    return Object.freeze({ type: 'Identifier', id: this.counter++ });
  }
}
