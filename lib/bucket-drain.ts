import { join } from 'path';
import { Construct, CustomResource, Duration, RemovalPolicy } from '@aws-cdk/core';
import { IBucket } from '@aws-cdk/aws-s3';
import { Runtime, RuntimeFamily } from '@aws-cdk/aws-lambda';
import { NodejsFunction } from '@aws-cdk/aws-lambda-nodejs';
import { LogGroup, RetentionDays } from '@aws-cdk/aws-logs';
import { PolicyStatement, Effect } from '@aws-cdk/aws-iam';

export const DRAIN_RESOURCE_TYPE = 'Custom::EmptyS3Bucket';

const NODEJS_20 = new Runtime('nodejs20.x', RuntimeFamily.NODEJS, {
  supportsInlineCode: true,
});

export interface BucketDrainProps {
  timeout?: Duration,
  logLevel?: string,
  logRetention?: RetentionDays,
}

/**
 * Empties buckets on stack deletion so that CloudFormation can remove them.
 * One handler serves every bucket registered through drain().
 */
export class BucketDrain extends Construct {

  readonly handler: NodejsFunction;
  readonly logGroup: LogGroup;

  constructor(scope: Construct, id: string, bucketDrainProps: BucketDrainProps = {}) {
    super(scope, id);
    this.handler = new NodejsFunction(this, 'Handler', {
      entry: join(__dirname, 'drain-handler', 'index.ts'),
      handler: 'handler',
      runtime: NODEJS_20,
      timeout: bucketDrainProps.timeout ?? Duration.minutes(5),
      environment: {
        LOG_LEVEL: bucketDrainProps.logLevel ?? 'info',
      },
      bundling: {
        externalModules: [
          '@aws-sdk/*',
        ],
      },
    });
    this.logGroup = new LogGroup(this, 'HandlerLogs', {
      logGroupName: `/aws/lambda/${this.handler.functionName}`,
      retention: bucketDrainProps.logRetention ?? RetentionDays.ONE_WEEK,
      removalPolicy: RemovalPolicy.DESTROY,
    });
  }

  /**
   * The returned resource depends on the bucket, so on teardown it is
   * deleted (and the bucket emptied) before the bucket itself. It also
   * depends on the handler's log group, which therefore exists before the
   * first invocation and outlives the last one.
   */
  drain(id: string, bucket: IBucket) {
    this.handler.addToRolePolicy(new PolicyStatement({
      effect: Effect.ALLOW,
      actions: [
        's3:ListBucket',
        's3:ListBucketVersions',
      ],
      resources: [
        bucket.bucketArn,
      ],
    }));
    this.handler.addToRolePolicy(new PolicyStatement({
      effect: Effect.ALLOW,
      actions: [
        's3:DeleteObject',
        's3:DeleteObjectVersion',
      ],
      resources: [
        bucket.arnForObjects('*'),
      ],
    }));
    const drainResource = new CustomResource(this, id, {
      serviceToken: this.handler.functionArn,
      resourceType: DRAIN_RESOURCE_TYPE,
      properties: {
        BucketName: bucket.bucketName,
      },
      removalPolicy: RemovalPolicy.DESTROY,
    });
    drainResource.node.addDependency(bucket);
    drainResource.node.addDependency(this.handler);
    drainResource.node.addDependency(this.logGroup);
    return drainResource;
  }

}
