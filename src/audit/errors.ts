export type InventoryErrorKind = 'IncompleteInventory' | 'FetchFailed';

export class InventoryError extends Error {
  readonly kind: InventoryErrorKind;

  constructor(kind: InventoryErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InventoryError';
    this.kind = kind;
  }
}

/** Bad caller input: region, mode, request body fields or a keep-list file. */
export class AuditInputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuditInputError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
