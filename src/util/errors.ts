export type SyncEtaErrorMetaData = Record<string, string | number | null>;

/**
 * Generic sync-eta error with attached metadata
 */
export class SyncEtaError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): SyncEtaErrorMetaData {
    return this.type;
  }
}
