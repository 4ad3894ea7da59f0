#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { pascalCase } from 'change-case-commonjs';
import { Environment } from '@common/parameters/environments';
import { validateDeployment } from '@common/helpers/validate-deployment';
import { resolveEnvironment } from 'parameters/environments';
import { PlatformInfraStage } from 'lib/stages/platform-infra-stage';

const app = new cdk.App();

// Get environment (specified in cdk.json context or at runtime with --context)
const envName: string = app.node.tryGetContext('env') || Environment.DEVELOPMENT;

// Unknown environments stop here, before any stack is declared
const envParams = resolveEnvironment(envName);

validateDeployment(envParams.tags.Project, envParams.environment, envParams.accountId);

const defaultEnv = {
  account: process.env.CDK_DEFAULT_ACCOUNT || envParams.accountId,
  region: envParams.region,
};

new PlatformInfraStage(app, pascalCase(envParams.environment), {
  env: defaultEnv,
  params: envParams,
});

// --------------------------------- Tagging  -------------------------------------
cdk.Tags.of(app).add('Project', envParams.tags.Project);
cdk.Tags.of(app).add('Environment', envParams.environment);
