import { Stage, StageProps } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as blueprints from "@aws-quickstart/eks-blueprints";
import { Account } from "./account";
import { ConfigurationDocument } from "./config";
import { DeploymentGraph, StageKind, applyStackDependencies, createStageGraph } from "./DeploymentGraph";
import { KeypairStack } from "./keypair-stack";
import { EksNetworkStack } from "./eks-network-stack";
import { EksIamStack } from "./eks-iam-stack";
import { buildEksClusterStack } from "./eks-cluster-stack";
import { EksSSMParametersStack } from "./eks-parameters-stack";

export interface DeploymentStageProps extends StageProps {
  readonly config: ConfigurationDocument;
  /** Label of the target account under `accounts`, also used as the deployment phase */
  readonly accountLabel: string;
  readonly region: string;
}

function targetEnvironment({ config, accountLabel, region }: DeploymentStageProps) {
  return new Account(accountLabel, config, region).env;
}

export class KeypairDeploymentStage extends Stage {
  readonly keypairStack: KeypairStack;

  constructor(scope: Construct, id: string, props: DeploymentStageProps) {
    const env = targetEnvironment(props);
    super(scope, id, { ...props, env });

    this.keypairStack = new KeypairStack(this, "KeypairStack", {
      description: "Keypair for EC2 instances",
      config: props.config,
      env,
    });
  }
}

/**
 * Network, IAM, cluster and parameter stacks of one account/region. Their
 * ordering comes from the stage graph and is handed to the CDK as stack
 * dependencies.
 */
export class EksClusterDeploymentStage extends Stage {
  readonly graph: DeploymentGraph<StageKind>;
  readonly eksNetworkStack: EksNetworkStack;
  readonly eksIamStack: EksIamStack;
  readonly eksClusterStack: blueprints.EksBlueprint;
  readonly eksParams: EksSSMParametersStack;

  constructor(scope: Construct, id: string, props: DeploymentStageProps) {
    const { account, region = props.region } = targetEnvironment(props);
    const env = { account, region };
    super(scope, id, { ...props, env });

    const { config, accountLabel } = props;

    this.eksNetworkStack = new EksNetworkStack(this, "EksNetworkStack", {
      description: "EKS Network Stack",
      config,
      accountLabel,
      env,
    });

    this.eksIamStack = new EksIamStack(this, "EksIamStack", {
      description: "EKS IAM Stack",
      config,
      env,
    });

    this.eksClusterStack = buildEksClusterStack(this, "EksClusterStack", {
      description: "EKS Cluster Stack",
      config,
      vpc: this.eksNetworkStack.vpc,
      policyKmsCrossAccountUsage: this.eksIamStack.policyKmsCrossAccountUsage,
      env,
    });

    this.eksParams = new EksSSMParametersStack(this, "EksSSMParametersStack", {
      description: "EKS Cluster Parameters Stack",
      cluster: this.eksClusterStack.getClusterInfo().cluster,
      env,
    });

    this.graph = createStageGraph();
    applyStackDependencies(this.graph, {
      network: this.eksNetworkStack,
      iam: this.eksIamStack,
      cluster: this.eksClusterStack,
      params: this.eksParams,
    });
  }
}
