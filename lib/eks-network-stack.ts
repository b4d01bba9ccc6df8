import { CfnOutput, Stack, StackProps, Tags, aws_ec2 as ec2, aws_ssm as ssm } from "aws-cdk-lib";
import { Construct } from "constructs";
import { ConfigurationDocument } from "./config";

export interface EksNetworkStackProps extends StackProps {
  config: ConfigurationDocument;
  /** Label of the account (under `accounts`) the stack is deployed to */
  accountLabel: string;
}

/**
 * Network for the cluster. A VPC whose id is known for the account and
 * region (`accounts.<label>.vpc.<region>`) is looked up; otherwise a two-AZ
 * VPC with public and private subnets is created.
 */
export class EksNetworkStack extends Stack {
  readonly vpc: ec2.IVpc;

  constructor(scope: Construct, id: string, props: EksNetworkStackProps) {
    super(scope, id, props);

    const { config, accountLabel } = props;
    const region = props.env?.region ?? config.eks.target_region;
    const existingVpcId = config.accounts[accountLabel]?.vpc?.[region];

    if (existingVpcId) {
      console.info(`[${accountLabel}/${region}] Using existing VPC: ${existingVpcId}`);
      this.vpc = ec2.Vpc.fromLookup(this, "EksVpc", { vpcId: existingVpcId });
    } else {
      this.vpc = this.createVpc(config.eks.cluster_name);
    }

    new ssm.StringParameter(this, "EksVpcId", {
      parameterName: "/eks/vpc_id",
      stringValue: this.vpc.vpcId,
    });

    new CfnOutput(this, "VpcId", { value: this.vpc.vpcId });
  }

  private createVpc(clusterName: string): ec2.Vpc {
    const vpc = new ec2.Vpc(this, "EksVpc", {
      ipAddresses: ec2.IpAddresses.cidr("10.0.0.0/16"),
      maxAzs: 2,
      natGateways: 1,
      restrictDefaultSecurityGroup: true,
      subnetConfiguration: [
        {
          name: "PublicSubnet",
          subnetType: ec2.SubnetType.PUBLIC,
          cidrMask: 19,
          mapPublicIpOnLaunch: false,
        },
        {
          name: "PrivateSubnet",
          subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
          cidrMask: 19,
        },
      ],
    });

    vpc.addFlowLog("EksVpcFlowLog");

    vpc.publicSubnets.forEach(subnet => {
      Tags.of(subnet).add(`kubernetes.io/cluster/${clusterName}`, "shared");
      Tags.of(subnet).add("kubernetes.io/role/elb", "1");
    });
    vpc.privateSubnets.forEach(subnet => {
      Tags.of(subnet).add(`kubernetes.io/cluster/${clusterName}`, "shared");
      Tags.of(subnet).add("kubernetes.io/role/internal-elb", "1");
    });

    return vpc;
  }
}
