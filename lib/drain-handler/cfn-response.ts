import { CloudFormationCustomResourceEvent, CloudFormationCustomResourceResponse } from 'aws-lambda';

export enum ResponseStatus {
  Success = 'SUCCESS',
  Failed = 'FAILED',
}

export interface ResourceResult {
  status: ResponseStatus,
  physicalResourceId: string,
  reason?: string,
  data?: Record<string, unknown>,
}

export type ResponseTransport = (url: string, init: { method: string, headers: Record<string, string>, body: string }) => Promise<{ ok: boolean, status: number }>;

export class ResponseDeliveryError extends Error {
  constructor(status: number) {
    super(`CloudFormation rejected the custom resource response with status ${status}.`);
    this.name = 'ResponseDeliveryError';
  }
}

export function buildResponseBody (event: CloudFormationCustomResourceEvent, result: ResourceResult): CloudFormationCustomResourceResponse {
  const common = {
    PhysicalResourceId: result.physicalResourceId,
    StackId: event.StackId,
    RequestId: event.RequestId,
    LogicalResourceId: event.LogicalResourceId,
    NoEcho: false,
    Data: result.data,
  };
  switch (result.status) {
    case ResponseStatus.Success:
      return {
        ...common,
        Status: 'SUCCESS',
        Reason: result.reason,
      };
    case ResponseStatus.Failed:
      return {
        ...common,
        Status: 'FAILED',
        Reason: result.reason ?? 'Unknown failure.',
      };
  }
}

/**
 * Uploads the result to the pre-signed URL CloudFormation is waiting on.
 */
export async function sendResponse (event: CloudFormationCustomResourceEvent, result: ResourceResult, transport: ResponseTransport) {
  const body = JSON.stringify(buildResponseBody(event, result));
  const response = await transport(event.ResponseURL, {
    method: 'PUT',
    headers: {
      'content-type': '',
      'content-length': Buffer.byteLength(body).toString(),
    },
    body,
  });
  if (!response.ok) {
    throw new ResponseDeliveryError(response.status);
  }
}
