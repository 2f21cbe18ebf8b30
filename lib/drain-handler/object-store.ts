export interface ObjectRef {
  key: string,
  versionId?: string,
}

export interface ListCursor {
  keyMarker?: string,
  versionIdMarker?: string,
}

export interface ObjectPage {
  entries: ObjectRef[],
  next?: ListCursor,
}

/**
 * The slice of an object storage service the drain needs.
 * Listing is paginated; `next` is absent on the last page.
 */
export interface ObjectStore {
  listPage(bucketName: string, cursor?: ListCursor): Promise<ObjectPage>,
  deleteBatch(bucketName: string, entries: ObjectRef[]): Promise<void>,
}

export class BucketNotFoundError extends Error {
  constructor(bucketName: string) {
    super(`Bucket ${bucketName} does not exist.`);
    this.name = 'BucketNotFoundError';
  }
}

export interface FailedDeletion {
  key: string,
  versionId?: string,
  code?: string,
  message?: string,
}

export class DeleteObjectsError extends Error {
  readonly failures: FailedDeletion[];

  constructor(bucketName: string, failures: FailedDeletion[]) {
    const [first] = failures;
    const reason = first ? `${first.key} (${first.code ?? 'Unknown'}: ${first.message ?? 'no message'})` : 'unknown keys';
    super(`Failed to delete ${failures.length} object(s) from ${bucketName}: ${reason}`);
    this.name = 'DeleteObjectsError';
    this.failures = failures;
  }
}
