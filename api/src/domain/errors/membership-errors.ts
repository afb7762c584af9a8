/**
 * Domain error taxonomy.
 *
 * NotFoundError subclasses are the only failures a query can raise against a
 * loaded index. IngestionError covers a source that cannot be read at all;
 * single bad records never raise, they are counted as skipped at build time.
 */
export abstract class NotFoundError extends Error {
  abstract readonly resource: 'group' | 'member' | 'dataset';

  constructor(
    message: string,
    readonly missingIds: string[],
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class GroupNotFoundError extends NotFoundError {
  readonly resource = 'group' as const;

  constructor(missingIds: string[]) {
    super(
      missingIds.length === 1
        ? `Group ${missingIds[0]} not found.`
        : `Groups not found: ${missingIds.join(', ')}.`,
      missingIds,
    );
  }
}

export class MemberNotFoundError extends NotFoundError {
  readonly resource = 'member' as const;

  constructor(memberId: string) {
    super(`Member ${memberId} not found.`, [memberId]);
  }
}

export class DatasetNotFoundError extends NotFoundError {
  readonly resource = 'dataset' as const;

  constructor(datasetId: string) {
    super(`Dataset ${datasetId} is not loaded.`, [datasetId]);
  }
}

export class IngestionError extends Error {
  constructor(
    message: string,
    readonly sourceKind: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IngestionError';
  }
}
