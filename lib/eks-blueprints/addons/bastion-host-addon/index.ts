import { Construct } from "constructs";
import * as blueprints from "@aws-quickstart/eks-blueprints";
import { CfnOutput, Stack, aws_ec2 as ec2, aws_eks as eks, aws_iam as iam } from "aws-cdk-lib";

export interface BastionHostAddOnProps {
  /**
   * EC2 key pair the host is launched with; it must exist in the target account
   */
  readonly keyName: string;
  /**
   * @default t4g.nano
   */
  readonly instanceType?: string;
  /**
   * kubectl release installed by the user data
   *
   * @default "v1.31.0"
   */
  readonly kubectlVersion?: string;
}

const defaultProps = {
  instanceType: "t4g.nano",
  kubectlVersion: "v1.31.0",
};

/**
 * Administrative host in a private subnet of the cluster VPC. It is reached
 * through SSM Session Manager and holds a cluster-admin access entry, which is
 * the only way to run kubectl against the private endpoint.
 */
export class BastionHostAddOn implements blueprints.ClusterAddOn {
  readonly id = "bastion-host-addon";
  readonly props: Required<BastionHostAddOnProps>;

  constructor(props: BastionHostAddOnProps) {
    this.props = { ...defaultProps, ...props };
  }

  deploy(clusterInfo: blueprints.ClusterInfo): Promise<Construct> {
    const { cluster } = clusterInfo;
    const stack = Stack.of(cluster);
    const instanceType = new ec2.InstanceType(this.props.instanceType);

    const role = new iam.Role(stack, "EksBastionHostRole", {
      description: `Bastion host role for EKS Cluster: ${cluster.clusterName}`,
      assumedBy: new iam.ServicePrincipal("ec2.amazonaws.com"),
      managedPolicies: [iam.ManagedPolicy.fromAwsManagedPolicyName("AmazonSSMManagedInstanceCore")],
    });

    role.addToPolicy(
      new iam.PolicyStatement({
        actions: ["eks:DescribeCluster", "eks:ListClusters"],
        resources: [cluster.clusterArn],
      })
    );

    const securityGroup = new ec2.SecurityGroup(stack, "EksBastionHostSecurityGroup", {
      vpc: cluster.vpc,
      description: "Security Group for the EKS bastion host",
      allowAllOutbound: true,
    });

    cluster.connections.allowFrom(securityGroup, ec2.Port.HTTPS, "kubectl from the bastion host");

    const architecture = instanceType.architecture === ec2.InstanceArchitecture.ARM_64 ? "arm64" : "amd64";

    const userData = ec2.UserData.forLinux();
    userData.addCommands(
      "dnf update -y",
      `curl -sSLo /usr/local/bin/kubectl https://dl.k8s.io/release/${this.props.kubectlVersion}/bin/linux/${architecture}/kubectl`,
      "chmod 0755 /usr/local/bin/kubectl",
      `su - ec2-user -c "aws eks update-kubeconfig --name ${cluster.clusterName} --region ${stack.region}"`
    );

    const instance = new ec2.Instance(stack, "EksBastionHost", {
      vpc: cluster.vpc,
      vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
      instanceType,
      machineImage: ec2.MachineImage.latestAmazonLinux2023({
        cpuType: architecture === "arm64" ? ec2.AmazonLinuxCpuType.ARM_64 : ec2.AmazonLinuxCpuType.X86_64,
      }),
      securityGroup,
      role,
      keyPair: ec2.KeyPair.fromKeyPairName(stack, "EksBastionHostKeyPair", this.props.keyName),
      requireImdsv2: true,
      detailedMonitoring: true,
      userData,
      blockDevices: [
        {
          deviceName: "/dev/xvda",
          volume: ec2.BlockDeviceVolume.ebs(8, {
            encrypted: true,
            volumeType: ec2.EbsDeviceVolumeType.GP3,
          }),
        },
      ],
    });

    new eks.AccessEntry(stack, "EksBastionHostAccessEntry", {
      cluster,
      principal: role.roleArn,
      accessPolicies: [
        eks.AccessPolicy.fromAccessPolicyName("AmazonEKSClusterAdminPolicy", {
          accessScopeType: eks.AccessScopeType.CLUSTER,
        }),
      ],
    });

    new CfnOutput(stack, "EksBastionHostInstanceId", {
      value: instance.instanceId,
      description: "Start a session with: aws ssm start-session --target <instance id>",
    });

    return Promise.resolve(instance);
  }
}
