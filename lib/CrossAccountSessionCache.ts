import { AssumeRoleCommand, AssumeRoleCommandOutput, STSClient } from "@aws-sdk/client-sts";
import { CredentialError } from "./errors";

export const DEFAULT_CROSS_ACCOUNT_ROLE_NAME = "ParameterStoreCrossAccountRole";

export interface CrossAccountCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken: string;
  readonly expiration?: Date;
}

/**
 * Temporary credentials per target account, obtained through `sts:AssumeRole`.
 *
 * The cache is keyed by account id and stores the pending request, so callers
 * racing on the same unseen account share a single role assumption. One
 * instance lives for one resolution pass and is never shared across runs.
 */
export class CrossAccountSessionCache {
  private readonly sessions = new Map<string, Promise<CrossAccountCredentials>>();

  constructor(private readonly sts: STSClient, private readonly roleName: string = DEFAULT_CROSS_ACCOUNT_ROLE_NAME) {}

  get size(): number {
    return this.sessions.size;
  }

  roleArnFor(accountId: string): string {
    return `arn:aws:iam::${accountId}:role/${this.roleName}`;
  }

  /**
   * @param region only used to report which lookup triggered a failed assumption
   */
  credentialsFor(accountId: string, region: string): Promise<CrossAccountCredentials> {
    let session = this.sessions.get(accountId);

    if (session === undefined) {
      session = this.assumeRole(accountId, region);
      this.sessions.set(accountId, session);
    }

    return session;
  }

  private async assumeRole(accountId: string, region: string): Promise<CrossAccountCredentials> {
    const roleArn = this.roleArnFor(accountId);

    let response: AssumeRoleCommandOutput;
    try {
      response = await this.sts.send(
        new AssumeRoleCommand({
          RoleArn: roleArn,
          RoleSessionName: `${accountId}-${this.roleName}`,
        })
      );
    } catch (e) {
      throw new CredentialError(accountId, region, `Unable to assume ${roleArn}: ${errorMessage(e)}`, { cause: e });
    }

    const credentials = response.Credentials;

    if (!credentials?.AccessKeyId || !credentials.SecretAccessKey || !credentials.SessionToken) {
      throw new CredentialError(accountId, region, `AssumeRole on ${roleArn} returned incomplete credentials`);
    }

    return {
      accessKeyId: credentials.AccessKeyId,
      secretAccessKey: credentials.SecretAccessKey,
      sessionToken: credentials.SessionToken,
      expiration: credentials.Expiration,
    };
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
