import { App, CfnElement, IConstruct, Stack } from '@aws-cdk/core';
import { Template, Match } from '@aws-cdk/assertions';
import { SitePipelineStack } from '../lib/site-pipeline-stack';
import { parseSiteContext } from '../lib/context-helper';

function logicalIdOf (stack: Stack, construct: IConstruct): string {
  const resource = construct.node.defaultChild;
  if (!(resource instanceof CfnElement)) {
    throw new Error(`${construct.node.path} has no CloudFormation resource.`);
  }
  return stack.getLogicalId(resource);
}

describe('SitePipelineStack', () => {
  let stack: SitePipelineStack;
  let template: Template;

  beforeEach(() => {
    const app = new App({
      context: {
        'aws:cdk:bundling-stacks': [],
      },
    });
    const site = parseSiteContext({
      workload: 'demo',
      repository: 'example-org/demo-site',
      connectionArn: 'arn:aws:codestar-connections:us-east-1:123456789012:connection/test-connection',
    });
    stack = new SitePipelineStack(app, 'demo-dev-site', {
      env: {
        account: '123456789012',
        region: 'us-east-1',
      },
      site,
    });
    template = Template.fromStack(stack);
  });

  test('creates a versioned private site bucket', () => {
    template.hasResourceProperties('AWS::S3::Bucket', {
      BucketName: 'demo-dev-us-east-1-demo-dev-site-bucket',
      VersioningConfiguration: {
        Status: 'Enabled',
      },
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: true,
        BlockPublicPolicy: true,
        IgnorePublicAcls: true,
        RestrictPublicBuckets: true,
      },
      LifecycleConfiguration: {
        Rules: [
          Match.objectLike({
            Id: 'ExpireOldVersions',
          }),
          Match.objectLike({
            Id: 'DeleteOldVersions',
            ExpirationInDays: 365,
          }),
        ],
      },
      Tags: Match.arrayWith([
        {
          Key: 'workload',
          Value: 'demo',
        },
      ]),
    });
  });

  test('creates a separate artifact bucket', () => {
    template.resourceCountIs('AWS::S3::Bucket', 2);
  });

  test('denies requests without TLS', () => {
    template.hasResourceProperties('AWS::S3::BucketPolicy', {
      PolicyDocument: Match.objectLike({
        Statement: Match.arrayWith([
          Match.objectLike({
            Effect: 'Deny',
            Condition: {
              Bool: {
                'aws:SecureTransport': 'false',
              },
            },
          }),
        ]),
      }),
    });
  });

  test('lets only the access identity read the site bucket', () => {
    template.hasResourceProperties('AWS::CloudFront::CloudFrontOriginAccessIdentity', {
      CloudFrontOriginAccessIdentityConfig: {
        Comment: 'Access identity for S3 bucket',
      },
    });
    template.hasResourceProperties('AWS::S3::BucketPolicy', {
      PolicyDocument: Match.objectLike({
        Statement: Match.arrayWith([
          Match.objectLike({
            Effect: 'Allow',
            Action: 's3:GetObject',
            Principal: {
              CanonicalUser: Match.anyValue(),
            },
          }),
        ]),
      }),
    });
  });

  test('serves the site over HTTPS with the chosen price class', () => {
    template.hasResourceProperties('AWS::CloudFront::Distribution', {
      DistributionConfig: Match.objectLike({
        DefaultRootObject: 'index.html',
        PriceClass: 'PriceClass_100',
        DefaultCacheBehavior: Match.objectLike({
          ViewerProtocolPolicy: 'redirect-to-https',
          AllowedMethods: [
            'GET',
            'HEAD',
          ],
        }),
      }),
    });
  });

  test('orders the pipeline stages', () => {
    template.hasResourceProperties('AWS::CodePipeline::Pipeline', {
      Name: 'demo-dev-pipeline',
      Stages: [
        Match.objectLike({
          Name: 'Source',
          Actions: [
            Match.objectLike({
              ActionTypeId: Match.objectLike({
                Provider: 'CodeStarSourceConnection',
              }),
              Configuration: Match.objectLike({
                FullRepositoryId: 'example-org/demo-site',
                BranchName: 'main',
              }),
              OutputArtifacts: [
                {
                  Name: 'SourceOutput',
                },
              ],
            }),
          ],
        }),
        Match.objectLike({
          Name: 'Build',
          Actions: [
            Match.objectLike({
              InputArtifacts: [
                {
                  Name: 'SourceOutput',
                },
              ],
              OutputArtifacts: [
                {
                  Name: 'BuildOutput',
                },
              ],
            }),
          ],
        }),
        Match.objectLike({
          Name: 'Deploy',
          Actions: [
            Match.objectLike({
              ActionTypeId: Match.objectLike({
                Provider: 'S3',
              }),
              Configuration: Match.objectLike({
                Extract: 'true',
              }),
              InputArtifacts: [
                {
                  Name: 'BuildOutput',
                },
              ],
            }),
          ],
        }),
      ],
    });
  });

  test('bounds the build project', () => {
    template.hasResourceProperties('AWS::CodeBuild::Project', {
      Name: 'demo-dev-build',
      Environment: Match.objectLike({
        ComputeType: 'BUILD_GENERAL1_SMALL',
        Image: 'aws/codebuild/standard:7.0',
      }),
      TimeoutInMinutes: 10,
      QueuedTimeoutInMinutes: 5,
    });
  });

  test('drains both buckets on teardown', () => {
    template.resourceCountIs('Custom::EmptyS3Bucket', 2);
    template.resourceCountIs('AWS::Lambda::Function', 1);
    template.hasResourceProperties('AWS::Lambda::Function', {
      Runtime: 'nodejs20.x',
      Timeout: 300,
    });
  });

  test('drains each bucket before deleting it', () => {
    const handlerId = logicalIdOf(stack, stack.bucketDrain.handler);
    const logGroupId = logicalIdOf(stack, stack.bucketDrain.logGroup);
    [stack.siteBucket, stack.artifactBucket].forEach(drainedBucket => {
      const bucketId = logicalIdOf(stack, drainedBucket.bucket);
      const resource = template.toJSON().Resources[logicalIdOf(stack, drainedBucket.drainResource)];
      expect(resource.Type).toBe('Custom::EmptyS3Bucket');
      expect(resource.Properties).toEqual({
        ServiceToken: {
          'Fn::GetAtt': [
            handlerId,
            'Arn',
          ],
        },
        BucketName: {
          Ref: bucketId,
        },
      });
      expect(resource.DependsOn).toEqual(expect.arrayContaining([
        bucketId,
        handlerId,
        logGroupId,
      ]));
    });
  });

  test('grants the handler version-level access to each drained bucket', () => {
    [stack.siteBucket, stack.artifactBucket].forEach(drainedBucket => {
      const bucketId = logicalIdOf(stack, drainedBucket.bucket);
      template.hasResourceProperties('AWS::IAM::Policy', {
        PolicyDocument: Match.objectLike({
          Statement: Match.arrayWith([
            {
              Effect: 'Allow',
              Action: [
                's3:ListBucket',
                's3:ListBucketVersions',
              ],
              Resource: {
                'Fn::GetAtt': [
                  bucketId,
                  'Arn',
                ],
              },
            },
          ]),
        }),
      });
      template.hasResourceProperties('AWS::IAM::Policy', {
        PolicyDocument: Match.objectLike({
          Statement: Match.arrayWith([
            {
              Effect: 'Allow',
              Action: [
                's3:DeleteObject',
                's3:DeleteObjectVersion',
              ],
              Resource: {
                'Fn::Join': [
                  '',
                  [
                    {
                      'Fn::GetAtt': [
                        bucketId,
                        'Arn',
                      ],
                    },
                    '/*',
                  ],
                ],
              },
            },
          ]),
        }),
      });
    });
  });

  test('keeps the handler logs for one week', () => {
    template.hasResourceProperties('AWS::Logs::LogGroup', {
      RetentionInDays: 7,
    });
  });

  test('exports the distribution URL', () => {
    template.hasOutput('CloudFrontDistributionUrl', {
      Description: 'URL of the CloudFront distribution',
      Export: {
        Name: 'demo-dev-site-CloudFrontDistributionUrl',
      },
    });
  });
});
