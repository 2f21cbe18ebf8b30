import { Construct, Stack, StackProps, Duration, Tags, CfnOutput } from '@aws-cdk/core';
import { Artifact, Pipeline } from '@aws-cdk/aws-codepipeline';
import { buildConnectionSourceAction, buildSiteBuildAction, buildBucketDeployAction, buildOrderedStages, StageName } from './pipeline-helper';
import { SiteProps } from './context-helper';
import { BucketDrain } from './bucket-drain';
import { DrainedBucket } from './drained-bucket';
import { SiteCdn } from './site-cdn';

export interface SitePipelineProps extends StackProps {
  site: SiteProps,
}

export class SitePipelineStack extends Stack {

  readonly bucketDrain: BucketDrain;
  readonly siteBucket: DrainedBucket;
  readonly artifactBucket: DrainedBucket;
  readonly cdn: SiteCdn;
  readonly pipeline: Pipeline;

  constructor(scope: Construct, id: string, sitePipelineProps: SitePipelineProps) {
    super(scope, id, sitePipelineProps);
    const site = sitePipelineProps.site;
    const namePrefix = `${site.workload}-${site.environment}`;
    Tags.of(this).add('environment', site.environment);
    Tags.of(this).add('deployer', site.deployer);
    Tags.of(this).add('workload', site.workload);
    const drain = new BucketDrain(this, 'BucketDrain');
    this.bucketDrain = drain;
    this.siteBucket = new DrainedBucket(this, 'Site', {
      bucketName: `${namePrefix}-${this.region}-${this.stackName.toLowerCase()}-bucket`,
      versioned: true,
      lifecycleRules: [
        {
          id: 'ExpireOldVersions',
          noncurrentVersionExpiration: Duration.days(30),
        },
        {
          id: 'DeleteOldVersions',
          expiration: Duration.days(365),
        },
      ],
      drain,
    });
    this.artifactBucket = new DrainedBucket(this, 'Artifacts', {
      drain,
    });
    this.cdn = new SiteCdn(this, 'Cdn', {
      source: this.siteBucket.bucket,
      priceTier: site.priceTier,
    });
    const sourceOutput = new Artifact('SourceOutput');
    const sourceAction = buildConnectionSourceAction({
      repository: site.repository,
      branch: site.branch,
      connectionArn: site.connectionArn,
      output: sourceOutput,
    });
    const buildOutput = new Artifact('BuildOutput');
    const buildAction = buildSiteBuildAction(this, {
      projectName: `${namePrefix}-build`,
      buildImage: site.buildImage,
      input: sourceOutput,
      outputs: [
        buildOutput,
      ],
    });
    const deployAction = buildBucketDeployAction({
      input: buildOutput,
      bucket: this.siteBucket.bucket,
    });
    this.pipeline = new Pipeline(this, 'SitePipeline', {
      pipelineName: `${namePrefix}-pipeline`,
      artifactBucket: this.artifactBucket.bucket,
      stages: buildOrderedStages({
        [StageName.Source]: [
          sourceAction,
        ],
        [StageName.Build]: [
          buildAction,
        ],
        [StageName.Deploy]: [
          deployAction,
        ],
      }),
      restartExecutionOnUpdate: false,
    });
    new CfnOutput(this, 'CloudFrontDistributionUrl', {
      description: 'URL of the CloudFront distribution',
      value: `https://${this.cdn.distribution.distributionDomainName}`,
      exportName: `${this.stackName}-CloudFrontDistributionUrl`,
    });
  }

}
