#!/usr/bin/env node
import "source-map-support/register";
import { App, Aspects, Tags } from "aws-cdk-lib";
import { AwsSolutionsChecks, NagSuppressions } from "cdk-nag";
import { Account } from "../lib/account";
import { DEFAULT_CONFIG_NAME, loadConfig } from "../lib/config";
import { PipelineStack } from "../lib/pipeline-stack";

const { env } = process;

async function main() {
  console.info("CDK_DEFAULT_ACCOUNT:", env.CDK_DEFAULT_ACCOUNT);
  console.info("CDK_DEFAULT_REGION:", env.CDK_DEFAULT_REGION);

  const configName = env.CDK_APP_CONFIG ?? DEFAULT_CONFIG_NAME;
  const config = await loadConfig(configName, { verbose: true });

  console.info("Configuration loaded successfully");

  const app = new App();

  const tags: { [key: string]: string } = {
    "Managed by": "aws-cdk",
    Owner: `${env.USER}`,
    ...config.tags,
  };

  for (const [key, value] of Object.entries(tags)) {
    console.info(`Adding Key Value: "${key}" // "${value}"`);
    Tags.of(app).add(key, value);
  }

  const pipelineAccount = new Account(config.pipeline.account, config, config.pipeline.region);

  new PipelineStack(app, "EKS-PipelineStack", {
    description: "CDK Pipeline to deploy resources for the EKS project",
    config,
    env: pipelineAccount.env,
    synthEnv: {
      CDK_APP_CONFIG: configName,
      ...(env.CDK_VPC_PRESENT ? { CDK_VPC_PRESENT: env.CDK_VPC_PRESENT } : {}),
    },
  });

  Aspects.of(app).add(new AwsSolutionsChecks({ verbose: true }));

  NagSuppressions.addResourceSuppressions(
    app,
    [
      {
        id: "AwsSolutions-IAM5",
        reason: "CDK Pipelines generates wildcard permissions for its artifact bucket and CodeBuild reports",
      },
      {
        id: "AwsSolutions-CB4",
        reason: "CodeBuild projects generated by CDK Pipelines use the pipeline artifact key",
      },
    ],
    true
  );

  app.synth();
}

main().catch(e => {
  console.error(e);
  process.exitCode = 1;
});
