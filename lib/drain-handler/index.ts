import { CloudFormationCustomResourceEvent, Context } from 'aws-lambda';
import { S3Client } from '@aws-sdk/client-s3';
import { createLogger, parseLogLevel, Logger } from './logger';
import { ObjectStore } from './object-store';
import { S3ObjectStore } from './s3-object-store';
import { drainBucket, DrainOperation, DrainStatus } from './drain';
import { sendResponse, ResponseStatus, ResponseTransport, ResourceResult } from './cfn-response';

export interface DrainHandlerDeps {
  store: ObjectStore,
  transport: ResponseTransport,
  logger: Logger,
}

function toDrainOperation (event: CloudFormationCustomResourceEvent): DrainOperation {
  switch (event.RequestType) {
    case 'Create':
      return DrainOperation.Create;
    case 'Update':
      return DrainOperation.Update;
    case 'Delete':
      return DrainOperation.Delete;
  }
}

function readBucketName (event: CloudFormationCustomResourceEvent): string | undefined {
  const bucketName: unknown = event.ResourceProperties.BucketName;
  if (typeof bucketName !== 'string' || !bucketName) return undefined;
  return bucketName;
}

function physicalResourceIdOf (event: CloudFormationCustomResourceEvent, bucketName: string) {
  // a changed id makes CloudFormation send a Delete for the old one, which drains the old bucket
  if (event.RequestType === 'Delete') return event.PhysicalResourceId;
  return `drain-${bucketName}`;
}

async function drainForEvent (event: CloudFormationCustomResourceEvent, deps: DrainHandlerDeps): Promise<ResourceResult> {
  const bucketName = readBucketName(event);
  if (!bucketName) {
    if (event.RequestType === 'Delete') {
      deps.logger.warn('Missing BucketName resource property, nothing to drain.');
      return {
        status: ResponseStatus.Success,
        physicalResourceId: event.PhysicalResourceId,
      };
    }
    deps.logger.error('Missing BucketName resource property.');
    return {
      status: ResponseStatus.Failed,
      physicalResourceId: event.RequestType === 'Create' ? event.LogicalResourceId : event.PhysicalResourceId,
      reason: 'Missing BucketName resource property.',
    };
  }
  const operation = toDrainOperation(event);
  const logger = deps.logger.child({
    operation,
    bucketName,
  });
  const response = await drainBucket({
    operation,
    bucketName,
  }, deps.store, logger);
  const physicalResourceId = physicalResourceIdOf(event, bucketName);
  const data = {
    DeletedCount: response.deletedCount,
  };
  switch (response.status) {
    case DrainStatus.Success:
      return {
        status: ResponseStatus.Success,
        physicalResourceId,
        data,
      };
    case DrainStatus.Failed:
      return {
        status: ResponseStatus.Failed,
        physicalResourceId,
        reason: response.errorDetail,
        data,
      };
  }
}

/**
 * Runs the drain for one custom resource event and reports the outcome to
 * CloudFormation. A FAILED report halts the stack operation in progress.
 */
export async function handleDrainEvent (event: CloudFormationCustomResourceEvent, deps: DrainHandlerDeps) {
  const result = await drainForEvent(event, deps);
  await sendResponse(event, result, deps.transport);
  return result;
}

const s3Client = new S3Client({});

export async function handler (event: CloudFormationCustomResourceEvent, context: Context) {
  const logger = createLogger({
    context: {
      requestId: context.awsRequestId,
      logicalResourceId: event.LogicalResourceId,
    },
    minLevel: parseLogLevel(process.env.LOG_LEVEL),
  });
  logger.info('Received event.', {
    requestType: event.RequestType,
    stackId: event.StackId,
  });
  await handleDrainEvent(event, {
    store: new S3ObjectStore(s3Client),
    transport: fetch,
    logger,
  });
}
