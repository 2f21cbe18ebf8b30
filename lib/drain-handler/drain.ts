import { Logger } from './logger';
import { ObjectStore, ListCursor, BucketNotFoundError } from './object-store';

export enum DrainOperation {
  Create = 'Create',
  Update = 'Update',
  Delete = 'Delete',
}

export enum DrainStatus {
  Success = 'success',
  Failed = 'failed',
}

export interface DrainRequest {
  operation: DrainOperation,
  bucketName: string,
}

export interface DrainResponse {
  status: DrainStatus,
  errorDetail?: string,
  deletedCount: number,
}

function describeError (error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

interface DrainProgress {
  deletedCount: number,
}

async function deleteAllObjects (bucketName: string, store: ObjectStore, logger: Logger, progress: DrainProgress) {
  let cursor: ListCursor | undefined;
  let pageCount = 0;
  do {
    const page = await store.listPage(bucketName, cursor);
    pageCount += 1;
    if (page.entries.length > 0) {
      await store.deleteBatch(bucketName, page.entries);
      progress.deletedCount += page.entries.length;
    }
    logger.debug('Drained page.', {
      page: pageCount,
      entries: page.entries.length,
      deletedCount: progress.deletedCount,
    });
    cursor = page.next;
  } while (cursor);
}

/**
 * Empties a bucket ahead of its deletion. Create and Update are no-ops.
 * Never throws: failures are reported in the response and whatever was not
 * deleted yet stays in the bucket.
 */
export async function drainBucket (request: DrainRequest, store: ObjectStore, logger: Logger): Promise<DrainResponse> {
  switch (request.operation) {
    case DrainOperation.Create:
    case DrainOperation.Update:
      logger.info('Nothing to drain.', {
        operation: request.operation,
      });
      return {
        status: DrainStatus.Success,
        deletedCount: 0,
      };
    case DrainOperation.Delete: {
      logger.info('Deleting objects in bucket.');
      const progress: DrainProgress = {
        deletedCount: 0,
      };
      try {
        await deleteAllObjects(request.bucketName, store, logger, progress);
        logger.info('Bucket drained.', {
          deletedCount: progress.deletedCount,
        });
        return {
          status: DrainStatus.Success,
          deletedCount: progress.deletedCount,
        };
      } catch (error) {
        if (error instanceof BucketNotFoundError) {
          logger.warn('Bucket already gone, nothing left to drain.');
          return {
            status: DrainStatus.Success,
            deletedCount: progress.deletedCount,
          };
        }
        const errorDetail = describeError(error);
        logger.error('Drain failed.', {
          error: errorDetail,
          deletedCount: progress.deletedCount,
        });
        return {
          status: DrainStatus.Failed,
          errorDetail,
          deletedCount: progress.deletedCount,
        };
      }
    }
    default:
      return assertNever(request.operation);
  }
}

function assertNever (operation: never): never {
  throw new Error(`Unsupported drain operation: ${String(operation)}`);
}
