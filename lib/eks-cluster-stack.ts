import { Construct } from "constructs";
import { StackProps, aws_ec2 as ec2, aws_eks as eks, aws_iam as iam } from "aws-cdk-lib";
import * as blueprints from "@aws-quickstart/eks-blueprints";
import { NagSuppressions } from "cdk-nag";
import { ConfigurationDocument, NodeGroupConfig } from "./config";
import { BastionHostAddOn } from "./eks-blueprints/addons/bastion-host-addon";

export interface EksClusterStackProps extends StackProps {
  config: ConfigurationDocument;
  vpc: ec2.IVpc;
  policyKmsCrossAccountUsage: iam.IManagedPolicy;
  env: { account: string; region: string };
}

/**
 * Builds the blueprint stack holding the EKS cluster, its managed node group
 * and add-ons. The control plane endpoint is private; administration goes
 * through the bastion host add-on.
 */
export function buildEksClusterStack(scope: Construct, id: string, props: EksClusterStackProps): blueprints.EksBlueprint {
  const { config, vpc, policyKmsCrossAccountUsage, env } = props;
  const { cluster_name: clusterName, version } = config.eks;

  const clusterRole = blueprints.getResource(({ scope }) => {
    return new iam.Role(scope, `${clusterName}-cluster-role`, {
      description: `Cluster IAM Role for EKS Cluster: ${clusterName}`,
      assumedBy: new iam.ServicePrincipal("eks.amazonaws.com"),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName("AmazonEKSClusterPolicy"),
        iam.ManagedPolicy.fromAwsManagedPolicyName("AmazonEKSServicePolicy"),
      ],
    });
  });

  // Defined in the cluster stack to avoid a circular reference with the node group
  const nodeRole = blueprints.getResource(({ scope }) => {
    return new iam.Role(scope, `${clusterName}-worker-node-role`, {
      description: `Worker node role for EKS Cluster: ${clusterName}`,
      assumedBy: new iam.ServicePrincipal("ec2.amazonaws.com"),
      managedPolicies: [
        policyKmsCrossAccountUsage,
        iam.ManagedPolicy.fromAwsManagedPolicyName("AmazonEC2ContainerRegistryReadOnly"),
        iam.ManagedPolicy.fromAwsManagedPolicyName("AmazonEKS_CNI_Policy"),
        iam.ManagedPolicy.fromAwsManagedPolicyName("AmazonEKSWorkerNodePolicy"),
        iam.ManagedPolicy.fromAwsManagedPolicyName("AmazonSSMManagedInstanceCore"),
        iam.ManagedPolicy.fromAwsManagedPolicyName("CloudWatchAgentServerPolicy"),
      ],
    });
  });

  const clusterProvider = new blueprints.GenericClusterProvider({
    version: eks.KubernetesVersion.of(version),
    clusterName,
    endpointAccess: eks.EndpointAccess.PRIVATE,
    authenticationMode: eks.AuthenticationMode.API_AND_CONFIG_MAP,
    vpcSubnets: [{ subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS }],
    role: clusterRole,
    managedNodeGroups: [computeNodeGroup(config.eks.node_group, nodeRole)],
    clusterLogging: [
      eks.ClusterLoggingTypes.API,
      eks.ClusterLoggingTypes.AUDIT,
      eks.ClusterLoggingTypes.AUTHENTICATOR,
      eks.ClusterLoggingTypes.CONTROLLER_MANAGER,
      eks.ClusterLoggingTypes.SCHEDULER,
    ],
    tags: config.tags,
  });

  const addOns: blueprints.ClusterAddOn[] = [
    new blueprints.addons.VpcCniAddOn(),
    new blueprints.addons.KubeProxyAddOn(),
    new blueprints.addons.CoreDnsAddOn(),
    new blueprints.addons.EksPodIdentityAgentAddOn(),
    new blueprints.addons.AwsLoadBalancerControllerAddOn(),
    new blueprints.addons.EbsCsiDriverAddOn({ version: "auto" }),
    new blueprints.KarpenterAddOn({
      values: {
        replicas: 1,
      },
    }),
    new BastionHostAddOn({ keyName: config.admin.key_name }),
  ];

  console.info(`[${clusterName}] Kubernetes ${version} in ${env.account}/${env.region}`);

  const clusterStack = blueprints.EksBlueprint.builder()
    .account(env.account)
    .region(env.region)
    .name(clusterName)
    .clusterProvider(clusterProvider)
    .resourceProvider(blueprints.GlobalResources.Vpc, new blueprints.DirectVpcProvider(vpc))
    .addOns(...addOns)
    .build(scope, id, {
      description: props.description ?? `Stack to create EKS Cluster: ${clusterName}`,
    });

  NagSuppressions.addStackSuppressions(
    clusterStack,
    [
      {
        id: "AwsSolutions-IAM4",
        reason: "Managed policies are the ones EKS documents for cluster, node and add-on roles",
      },
      {
        id: "AwsSolutions-IAM5",
        reason: "Add-on and kubectl handler roles are generated by the blueprints library",
      },
      {
        id: "AwsSolutions-L1",
        reason: "Lambda runtimes of the kubectl and cluster handlers are chosen by the CDK",
      },
      {
        id: "AwsSolutions-SF1",
        reason: "Provider state machines are generated by the CDK",
      },
      {
        id: "AwsSolutions-SF2",
        reason: "Provider state machines are generated by the CDK",
      },
    ],
    true
  );

  return clusterStack;
}

function computeNodeGroup(nodeGroup: NodeGroupConfig, nodeRole: iam.Role): blueprints.ManagedNodeGroup {
  const instanceType = new ec2.InstanceType(nodeGroup.instance_type);

  return {
    id: "compute-ng",
    instanceTypes: [instanceType],
    amiType:
      instanceType.architecture === ec2.InstanceArchitecture.ARM_64
        ? eks.NodegroupAmiType.AL2023_ARM_64_STANDARD
        : eks.NodegroupAmiType.AL2023_X86_64_STANDARD,
    nodeGroupCapacityType: nodeGroup.capacity === "SPOT" ? eks.CapacityType.SPOT : eks.CapacityType.ON_DEMAND,
    nodeGroupSubnets: { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
    minSize: nodeGroup.min_size,
    maxSize: nodeGroup.max_size,
    desiredSize: nodeGroup.desired_size,
    nodeRole,
    labels: {
      purpose: "general",
    },
  };
}
