import { GetParameterCommand, GetParameterCommandOutput, SSMClient } from "@aws-sdk/client-ssm";
import { STSClient } from "@aws-sdk/client-sts";
import { z } from "zod";
import { Account } from "./account";
import { ConfigTree, cloneTree, deepMerge } from "./config-tree";
import {
  CrossAccountCredentials,
  CrossAccountSessionCache,
  DEFAULT_CROSS_ACCOUNT_ROLE_NAME,
  errorMessage,
} from "./CrossAccountSessionCache";
import { ConfigError, LookupError } from "./errors";

export const VPC_ID_PARAMETER_NAME = "/eks/vpc/vpc_id";

export type SsmClientFactory = (region: string, credentials: CrossAccountCredentials) => SSMClient;

export interface ConfigResolverOptions {
  /**
   * Role assumed in every target account
   *
   * @default "ParameterStoreCrossAccountRole"
   */
  readonly roleName?: string;
  /**
   * Parameter holding the VPC id in each account/region
   *
   * @default "/eks/vpc/vpc_id"
   */
  readonly parameterName?: string;
  readonly stsClient?: STSClient;
  readonly ssmClientFactory?: SsmClientFactory;
  readonly verbose?: boolean;
}

const DeploymentsSchema = z.object({
  eks: z.object({
    deployment: z.array(
      z.object({
        account: z.string().min(1),
        regions: z.array(z.string().min(1)),
      })
    ),
  }),
});

interface ProbeTarget {
  label: string;
  accountId: string;
  regions: string[];
}

/**
 * Completes a configuration document with the VPC ids that are created
 * out-of-band in each deployment account.
 */
export class ConfigResolver {
  private readonly options: Required<Omit<ConfigResolverOptions, "stsClient">> & { stsClient?: STSClient };

  constructor(options?: ConfigResolverOptions) {
    this.options = {
      roleName: options?.roleName ?? DEFAULT_CROSS_ACCOUNT_ROLE_NAME,
      parameterName: options?.parameterName ?? VPC_ID_PARAMETER_NAME,
      stsClient: options?.stsClient,
      ssmClientFactory: options?.ssmClientFactory ?? ((region, credentials) => new SSMClient({ region, credentials })),
      verbose: options?.verbose ?? false,
    };
  }

  /**
   * Returns a deep copy of `raw`. When `vpcPresent` is false every
   * `accounts.<label>.vpc.<region>` referenced by `eks.deployment` is filled
   * from Parameter Store first.
   *
   * Results are committed only once every lookup succeeded: a failure in any
   * account rejects the whole call and `raw` is left untouched.
   */
  async resolve(raw: ConfigTree, vpcPresent: boolean): Promise<ConfigTree> {
    if (vpcPresent) return cloneTree(raw);

    const targets = this.probeTargets(raw);
    const sessions = new CrossAccountSessionCache(this.options.stsClient ?? new STSClient({}), this.options.roleName);

    const discovered = await Promise.all(targets.map(target => this.probe(target, sessions)));

    if (this.options.verbose) console.debug(`Assumed ${sessions.size} cross-account session(s)`);

    return discovered.reduce((config, patch) => deepMerge(config, patch), cloneTree(raw));
  }

  private probeTargets(raw: ConfigTree): ProbeTarget[] {
    const parsed = DeploymentsSchema.safeParse(raw);

    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new ConfigError(`Invalid deployment configuration: ${issues}`);
    }

    return parsed.data.eks.deployment.map(({ account: label, regions }) => {
      const accountId = Account.accountIdFromLabel(label, raw);

      if (accountId === undefined) {
        throw new ConfigError(`Deployment references unknown account label "${label}"`);
      }

      return { label, accountId, regions };
    });
  }

  private async probe(target: ProbeTarget, sessions: CrossAccountSessionCache): Promise<ConfigTree> {
    const { label, accountId, regions } = target;
    const vpcIds: Record<string, string> = {};

    for (const region of regions) {
      const credentials = await sessions.credentialsFor(accountId, region);
      vpcIds[region] = await this.lookupVpcId(accountId, region, credentials);

      if (this.options.verbose) console.info(`[${label}/${region}] VPC: ${vpcIds[region]}`);
    }

    return { accounts: { [label]: { vpc: vpcIds } } };
  }

  private async lookupVpcId(accountId: string, region: string, credentials: CrossAccountCredentials): Promise<string> {
    const { parameterName } = this.options;
    const ssm = this.options.ssmClientFactory(region, credentials);

    let response: GetParameterCommandOutput;
    try {
      response = await ssm.send(new GetParameterCommand({ Name: parameterName }));
    } catch (e) {
      throw new LookupError(accountId, region, `Unable to read ${parameterName}: ${errorMessage(e)}`, { cause: e });
    } finally {
      ssm.destroy();
    }

    const vpcId = response.Parameter?.Value;

    if (!vpcId) {
      throw new LookupError(accountId, region, `Parameter ${parameterName} has no value`);
    }

    return vpcId;
  }
}
