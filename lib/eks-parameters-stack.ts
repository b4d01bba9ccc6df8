import { Stack, StackProps, aws_eks as eks, aws_ssm as ssm } from "aws-cdk-lib";
import { Construct } from "constructs";

export interface EksSSMParametersStackProps extends StackProps {
  cluster: eks.ICluster;
}

/**
 * Publishes the cluster's coordinates to Parameter Store under `/eks/` for
 * tooling that deploys workloads onto it.
 */
export class EksSSMParametersStack extends Stack {
  constructor(scope: Construct, id: string, props: EksSSMParametersStackProps) {
    super(scope, id, props);

    const { cluster } = props;

    const parameters: [string, string, string | undefined][] = [
      ["EksClusterNameParam", "/eks/clusterName", cluster.clusterName],
      ["EksClusterArnParam", "/eks/clusterArn", cluster.clusterArn],
      ["EksClusterEndpointParam", "/eks/clusterEndpoint", cluster.clusterEndpoint],
      ["EksClusterSecurityGroupsParam", "/eks/clusterSecurityGroup", cluster.clusterSecurityGroupId],
      ["EksClusterOIDCProviderArn", "/eks/oidc/provider_arn", cluster.openIdConnectProvider.openIdConnectProviderArn],
      ["EksClusterKubectlLambdaRoleArn", "/eks/kubectl/lambda/role_arn", cluster.kubectlLambdaRole?.roleArn],
      ["EksClusterKubectlRoleArn", "/eks/kubectl/role_arn", cluster.kubectlRole?.roleArn],
      ["EksClusterKubectlSgId", "/eks/kubectl/sg_id", cluster.kubectlSecurityGroup?.securityGroupId],
    ];

    for (const [id, parameterName, stringValue] of parameters) {
      // kubectl details only exist on clusters that run their own kubectl provider
      if (stringValue === undefined) continue;

      new ssm.StringParameter(this, id, { parameterName, stringValue });
    }
  }
}
