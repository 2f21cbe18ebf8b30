import { Construct, CustomResource, RemovalPolicy } from '@aws-cdk/core';
import { Bucket, BlockPublicAccess, BucketEncryption, LifecycleRule } from '@aws-cdk/aws-s3';
import { BucketDrain } from './bucket-drain';

export interface DrainedBucketProps {
  bucketName?: string,
  versioned?: boolean,
  lifecycleRules?: LifecycleRule[],
  drain: BucketDrain,
}

/**
 * Private, TLS-only bucket that is deleted together with its stack,
 * emptied first by the shared drain.
 */
export class DrainedBucket extends Construct {

  readonly bucket: Bucket;
  readonly drainResource: CustomResource;

  constructor(scope: Construct, id: string, drainedBucketProps: DrainedBucketProps) {
    super(scope, id);
    this.bucket = new Bucket(this, 'Bucket', {
      bucketName: drainedBucketProps.bucketName,
      versioned: drainedBucketProps.versioned,
      lifecycleRules: drainedBucketProps.lifecycleRules,
      blockPublicAccess: BlockPublicAccess.BLOCK_ALL,
      encryption: BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      removalPolicy: RemovalPolicy.DESTROY,
    });
    this.drainResource = drainedBucketProps.drain.drain(id + 'Drain', this.bucket);
  }

}
