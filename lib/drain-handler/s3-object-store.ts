import { S3Client, ListObjectVersionsCommand, DeleteObjectsCommand, ObjectIdentifier } from '@aws-sdk/client-s3';
import { ObjectStore, ObjectPage, ObjectRef, ListCursor, BucketNotFoundError, DeleteObjectsError, FailedDeletion } from './object-store';

// DeleteObjects accepts at most 1000 keys per request
export const MAX_PAGE_SIZE = 1000;

interface VersionedEntry {
  Key?: string,
  VersionId?: string,
}

function toObjectRefs (entries: VersionedEntry[] | undefined): ObjectRef[] {
  const objectRefs: ObjectRef[] = [];
  (entries ?? []).forEach(entry => {
    if (entry.Key === undefined) return;
    objectRefs.push({
      key: entry.Key,
      versionId: entry.VersionId,
    });
  });
  return objectRefs;
}

function isNoSuchBucket (error: unknown): boolean {
  return error instanceof Error && error.name === 'NoSuchBucket';
}

/**
 * Lists every object version and delete marker, so that a versioned bucket
 * ends up without anything that would block its deletion.
 */
export class S3ObjectStore implements ObjectStore {

  constructor(private readonly client: S3Client, private readonly pageSize = MAX_PAGE_SIZE) {}

  async listPage(bucketName: string, cursor?: ListCursor): Promise<ObjectPage> {
    try {
      const output = await this.client.send(new ListObjectVersionsCommand({
        Bucket: bucketName,
        KeyMarker: cursor?.keyMarker,
        VersionIdMarker: cursor?.versionIdMarker,
        MaxKeys: this.pageSize,
      }));
      const entries = [
        ...toObjectRefs(output.Versions),
        ...toObjectRefs(output.DeleteMarkers),
      ];
      if (!output.IsTruncated) {
        return { entries };
      }
      return {
        entries,
        next: {
          keyMarker: output.NextKeyMarker,
          versionIdMarker: output.NextVersionIdMarker,
        },
      };
    } catch (error) {
      if (isNoSuchBucket(error)) {
        throw new BucketNotFoundError(bucketName);
      }
      throw error;
    }
  }

  async deleteBatch(bucketName: string, entries: ObjectRef[]): Promise<void> {
    if (entries.length === 0) return;
    const objects: ObjectIdentifier[] = entries.map(entry => ({
      Key: entry.key,
      VersionId: entry.versionId,
    }));
    try {
      const output = await this.client.send(new DeleteObjectsCommand({
        Bucket: bucketName,
        Delete: {
          Objects: objects,
          Quiet: true,
        },
      }));
      const failures: FailedDeletion[] = (output.Errors ?? []).map(failure => ({
        key: failure.Key ?? '',
        versionId: failure.VersionId,
        code: failure.Code,
        message: failure.Message,
      }));
      if (failures.length > 0) {
        throw new DeleteObjectsError(bucketName, failures);
      }
    } catch (error) {
      if (isNoSuchBucket(error)) {
        throw new BucketNotFoundError(bucketName);
      }
      throw error;
    }
  }

}
