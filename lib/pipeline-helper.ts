import { PipelineProject, LinuxBuildImage, ComputeType, CfnProject } from '@aws-cdk/aws-codebuild';
import { Artifact, IAction, StageProps } from '@aws-cdk/aws-codepipeline';
import { CodeStarConnectionsSourceAction, CodeBuildAction, S3DeployAction } from '@aws-cdk/aws-codepipeline-actions';
import { IBucket } from '@aws-cdk/aws-s3';
import { Construct, Duration } from '@aws-cdk/core';

/**
 * Stages run strictly in this order, each one consuming the artifact the
 * previous one produced.
 */
export enum StageName {
  Source = 'Source',
  Build = 'Build',
  Deploy = 'Deploy',
}

export const STAGE_ORDER: readonly StageName[] = [
  StageName.Source,
  StageName.Build,
  StageName.Deploy,
];

export type StageActions = Record<StageName, IAction[]>;

export function buildOrderedStages (stageActions: StageActions): StageProps[] {
  return STAGE_ORDER.map(stageName => ({
    stageName,
    actions: stageActions[stageName],
  }));
}

export interface ConnectionSourceActionProps {
  repository: string,
  branch: string,
  connectionArn: string,
  output: Artifact,
}

export function buildConnectionSourceAction (connectionSourceActionProps: ConnectionSourceActionProps) {
  const [owner, repo] = connectionSourceActionProps.repository.split('/');
  return new CodeStarConnectionsSourceAction({
    actionName: 'SourceAction',
    connectionArn: connectionSourceActionProps.connectionArn,
    owner,
    repo,
    branch: connectionSourceActionProps.branch,
    output: connectionSourceActionProps.output,
  });
}

export interface SiteBuildActionProps {
  projectName: string,
  buildImage: string,
  input: Artifact,
  outputs: Artifact[],
  timeout?: Duration,
  queuedTimeout?: Duration,
}

export function buildSiteBuildAction (scope: Construct, siteBuildActionProps: SiteBuildActionProps) {
  const environment = {
    buildImage: LinuxBuildImage.fromCodeBuildImageId(siteBuildActionProps.buildImage),
    computeType: ComputeType.SMALL,
  };
  const siteProject = new PipelineProject(scope, 'BuildProject', {
    projectName: siteBuildActionProps.projectName,
    environment,
    timeout: siteBuildActionProps.timeout ?? Duration.minutes(10),
  });
  const queuedTimeout = siteBuildActionProps.queuedTimeout ?? Duration.minutes(5);
  const cfnProject = siteProject.node.defaultChild;
  if (cfnProject instanceof CfnProject) {
    cfnProject.queuedTimeoutInMinutes = queuedTimeout.toMinutes();
  }
  return new CodeBuildAction({
    actionName: 'BuildAction',
    project: siteProject,
    input: siteBuildActionProps.input,
    outputs: siteBuildActionProps.outputs,
  });
}

export interface BucketDeployActionProps {
  input: Artifact,
  bucket: IBucket,
}

export function buildBucketDeployAction (bucketDeployActionProps: BucketDeployActionProps) {
  return new S3DeployAction({
    actionName: 'DeployAction',
    input: bucketDeployActionProps.input,
    bucket: bucketDeployActionProps.bucket,
    extract: true,
  });
}
