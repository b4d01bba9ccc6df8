import { Construct } from "constructs";
import { Stack, StackProps, aws_codebuild as codebuild, aws_codecommit as codecommit, aws_iam as iam } from "aws-cdk-lib";
import { CodeBuildStep, CodePipeline, CodePipelineSource, ShellStep } from "aws-cdk-lib/pipelines";
import { Account } from "./account";
import { ConfigurationDocument } from "./config";
import { DEFAULT_CROSS_ACCOUNT_ROLE_NAME } from "./CrossAccountSessionCache";
import { EksClusterDeploymentStage, KeypairDeploymentStage } from "./stages";

export type DeploymentStep =
  | { kind: "keypair"; accountLabel: string; region: string; waveId: string; stageId: string }
  | { kind: "cluster"; accountLabel: string; region: string; stageId: string };

/**
 * Pipeline steps in deployment order: for every entry and region the keypair
 * wave, then the cluster stage.
 */
export function deploymentSteps(config: ConfigurationDocument): DeploymentStep[] {
  return config.eks.deployment.flatMap(({ account: accountLabel, regions }) => {
    const phase = `${accountLabel.charAt(0).toUpperCase()}${accountLabel.slice(1)}`;

    return regions.flatMap((region): DeploymentStep[] => [
      {
        kind: "keypair",
        accountLabel,
        region,
        waveId: `${phase}-Keypair-${region}`,
        stageId: `Keypair-${phase}-${region}`,
      },
      { kind: "cluster", accountLabel, region, stageId: `${phase}-EksCluster-${region}` },
    ]);
  });
}

/**
 * Permissions of the synth step: reading cluster parameters, assuming the
 * Parameter Store role of every deployment account for VPC discovery, and the
 * CDK lookup role for `Vpc.fromLookup`.
 */
export function synthRolePolicyStatements(stack: Stack, config: ConfigurationDocument): iam.PolicyStatement[] {
  const { cluster_name: clusterName, target_region: targetRegion } = config.eks;
  const deploymentAccountIds = [...new Set(config.eks.deployment.map(({ account }) => new Account(account, config).id))];

  return [
    new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: ["eks:DescribeCluster"],
      resources: [`arn:${stack.partition}:eks:${targetRegion}:${stack.account}:cluster/${clusterName}`],
    }),
    new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: [
        "ssm:GetParameter",
        "ssm:GetParameters",
        "ssm:GetParameterHistory",
        "ssm:DescribeParameters",
        "ssm:PutParameter",
        "ssm:DeleteParameter",
        "ssm:AddTagsToResource",
      ],
      resources: [`arn:${stack.partition}:ssm:${targetRegion}:${stack.account}:parameter/eks/*`],
    }),
    new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: ["sts:AssumeRole"],
      resources: deploymentAccountIds.map(
        accountId => `arn:${stack.partition}:iam::${accountId}:role/${DEFAULT_CROSS_ACCOUNT_ROLE_NAME}`
      ),
    }),
    new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: ["sts:AssumeRole"],
      resources: ["*"],
      conditions: {
        StringEquals: { "iam:ResourceTag/aws-cdk:bootstrap-role": "lookup" },
      },
    }),
  ];
}

export interface PipelineStackProps extends StackProps {
  config: ConfigurationDocument;
  /**
   * Variables handed to `cdk synth` in CodeBuild, so the pipeline resolves
   * the same configuration as the local run
   */
  synthEnv?: { [key: string]: string };
}

/**
 * Self-mutating pipeline that deploys, for every deployment entry and region,
 * a keypair wave followed by the cluster stage.
 */
export class PipelineStack extends Stack {
  readonly pipeline: CodePipeline;

  constructor(scope: Construct, id: string, props: PipelineStackProps) {
    super(scope, id, props);

    const { config } = props;
    const { repositoryname: repositoryName, branchname: branchName } = config.pipeline;
    const sourceRepo = codecommit.Repository.fromRepositoryName(this, `${repositoryName}-repo`, repositoryName);

    const pipelineSource = CodePipelineSource.codeCommit(sourceRepo, branchName, {
      codeBuildCloneOutput: true,
    });

    this.pipeline = new CodePipeline(this, repositoryName, {
      pipelineName: repositoryName,
      crossAccountKeys: true,
      enableKeyRotation: true,
      synth: new CodeBuildStep(`${repositoryName}-buildStep`, {
        input: pipelineSource,
        buildEnvironment: {
          buildImage: codebuild.LinuxBuildImage.STANDARD_7_0,
          computeType: codebuild.ComputeType.SMALL,
        },
        env: props.synthEnv,
        installCommands: ["npm ci"],
        commands: ["npx cdk synth -q"],
        rolePolicyStatements: synthRolePolicyStatements(this, config),
      }),
    });

    this.pipeline.addWave("Scanning").addPre(
      new ShellStep("Code Scanning", {
        input: pipelineSource,
        commands: ["npm ci", "npm audit --audit-level=high", "npm test"],
      })
    );

    for (const step of deploymentSteps(config)) {
      const stageProps = { config, accountLabel: step.accountLabel, region: step.region };

      if (step.kind === "keypair") {
        this.pipeline.addWave(step.waveId).addStage(new KeypairDeploymentStage(this, step.stageId, stageProps));
      } else {
        this.pipeline.addStage(new EksClusterDeploymentStage(this, step.stageId, stageProps));
      }
    }
  }
}
