import { Stack, StackProps, aws_iam as iam } from "aws-cdk-lib";
import { Construct } from "constructs";
import { Account } from "./account";
import { ConfigurationDocument } from "./config";

export interface EksIamStackProps extends StackProps {
  config: ConfigurationDocument;
}

export class EksIamStack extends Stack {
  /** Lets worker nodes use KMS keys owned by the pipeline (tooling) account. */
  readonly policyKmsCrossAccountUsage: iam.ManagedPolicy;

  constructor(scope: Construct, id: string, props: EksIamStackProps) {
    super(scope, id, props);

    const toolingAccount = new Account(props.config.pipeline.account, props.config);

    this.policyKmsCrossAccountUsage = new iam.ManagedPolicy(this, "EksKmsCrossAccountUsagePolicy", {
      path: "/eks/",
      // IAM names are account-wide and the stack is deployed once per region
      managedPolicyName: `EksKmsCrossAccountUsagePolicy-${this.region}`,
      document: new iam.PolicyDocument({
        statements: [
          new iam.PolicyStatement({
            effect: iam.Effect.ALLOW,
            actions: [
              "kms:CreateGrant",
              "kms:Decrypt",
              "kms:DescribeKey",
              "kms:GenerateDataKeyWithoutPlainText",
              "kms:ReEncrypt*",
            ],
            resources: [`arn:${this.partition}:kms:*:${toolingAccount.id}:key/*`],
          }),
        ],
      }),
    });
  }
}
