#!/usr/bin/env node
import 'source-map-support/register';
import { App } from '@aws-cdk/core';
import { SitePipelineStack } from '../lib/site-pipeline-stack';
import { parseSiteContext } from '../lib/context-helper';

const app = new App();
const appEnv = {
  region: process.env.CDK_DEFAULT_REGION,
  account: process.env.CDK_DEFAULT_ACCOUNT,
};
// fail before any construct exists when the parameters are malformed
const siteProps = parseSiteContext(app.node.tryGetContext('site'));
new SitePipelineStack(app, `${siteProps.workload}-${siteProps.environment}-site`, {
  site: siteProps,
  env: appEnv,
});
app.synth();
