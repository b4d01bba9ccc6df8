import { Stack, StackProps, aws_ec2 as ec2 } from "aws-cdk-lib";
import { Construct } from "constructs";
import { ConfigurationDocument } from "./config";

export interface KeypairStackProps extends StackProps {
  config: ConfigurationDocument;
}

/**
 * Imports the administrator's public key as an EC2 key pair, used by the
 * bastion host of the cluster deployed in the same account and region.
 */
export class KeypairStack extends Stack {
  readonly adminKeyPair: ec2.CfnKeyPair;

  constructor(scope: Construct, id: string, props: KeypairStackProps) {
    super(scope, id, props);

    const { key_name: keyName, key_material: publicKeyMaterial } = props.config.admin;

    this.adminKeyPair = new ec2.CfnKeyPair(this, "AdminKeyPair", {
      keyName,
      publicKeyMaterial,
    });
  }
}
