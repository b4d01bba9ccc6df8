import "aws-sdk-client-mock-jest";
import { mockClient } from "aws-sdk-client-mock";
import { AssumeRoleCommand, STSClient } from "@aws-sdk/client-sts";
import { GetParameterCommand, SSMClient } from "@aws-sdk/client-ssm";
import { ConfigResolver, SsmClientFactory, VPC_ID_PARAMETER_NAME } from "../lib/ConfigResolver";
import { ConfigTree } from "../lib/config-tree";
import { ConfigError, CredentialError, LookupError } from "../lib/errors";

const stsMock = mockClient(STSClient);

const DEV_ACCOUNT = "111111111111";
const PROD_ACCOUNT = "333333333333";

function stubAssumeRole(...accountIds: string[]) {
  for (const accountId of accountIds) {
    stsMock.on(AssumeRoleCommand, { RoleArn: `arn:aws:iam::${accountId}:role/ParameterStoreCrossAccountRole` }).resolves({
      Credentials: {
        AccessKeyId: `test-key-${accountId}`,
        SecretAccessKey: "test-secret",
        SessionToken: "test-token",
        Expiration: new Date("2030-01-01T00:00:00Z"),
      },
    });
  }
}

/**
 * Parameter Store stand-in: values are keyed by `<access key id>/<region>`, so a
 * lookup only succeeds with the credentials of the right account.
 */
function parameterStore(vpcIds: Record<string, string>) {
  const requests: { region: string; accessKeyId: string; name: string | undefined }[] = [];

  const factory: SsmClientFactory = (region, credentials) => {
    const client = new SSMClient({ region, credentials });

    mockClient(client)
      .on(GetParameterCommand)
      .callsFake(input => {
        requests.push({ region, accessKeyId: credentials.accessKeyId, name: input.Name });

        const vpcId = vpcIds[`${credentials.accessKeyId}/${region}`];
        if (vpcId === undefined) throw new Error("ParameterNotFound");

        return { Parameter: { Name: input.Name, Value: vpcId } };
      });

    return client;
  };

  return { factory, requests };
}

function resolverWith(factory: SsmClientFactory, roleName?: string, parameterName?: string) {
  return new ConfigResolver({
    stsClient: new STSClient({ region: "us-east-1" }),
    ssmClientFactory: factory,
    roleName,
    parameterName,
  });
}

describe("ConfigResolver", () => {
  beforeEach(() => {
    stsMock.reset();
  });

  test("returns an equal deep copy without probing when the VPC is present", async () => {
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT, vpc: { "us-west-2": "vpc-1" } } },
      eks: { deployment: [{ account: "dev", regions: ["us-west-2"] }] },
      pipeline: { account: "dev" },
    };
    const { factory, requests } = parameterStore({});

    const resolved = await resolverWith(factory).resolve(raw, true);

    expect(resolved).toEqual(raw);
    expect(resolved).not.toBe(raw);
    expect(resolved.accounts).not.toBe(raw.accounts);
    expect(stsMock).not.toHaveReceivedCommand(AssumeRoleCommand);
    expect(requests).toHaveLength(0);
  });

  test("injects the discovered VPC id and leaves the rest of the document unchanged", async () => {
    stubAssumeRole(DEV_ACCOUNT);
    const { factory } = parameterStore({ [`test-key-${DEV_ACCOUNT}/us-west-2`]: "vpc-abc123" });
    const raw: ConfigTree = {
      eks: { deployment: [{ account: "dev", regions: ["us-west-2"] }] },
      accounts: { dev: { id: DEV_ACCOUNT } },
    };

    const resolved = await resolverWith(factory).resolve(raw, false);

    expect(resolved).toEqual({
      eks: { deployment: [{ account: "dev", regions: ["us-west-2"] }] },
      accounts: { dev: { id: DEV_ACCOUNT, vpc: { "us-west-2": "vpc-abc123" } } },
    });
    expect(raw).toEqual({
      eks: { deployment: [{ account: "dev", regions: ["us-west-2"] }] },
      accounts: { dev: { id: DEV_ACCOUNT } },
    });
  });

  test("assumes the role once per account id across entries, regions and labels", async () => {
    stubAssumeRole(DEV_ACCOUNT);
    const { factory, requests } = parameterStore({
      [`test-key-${DEV_ACCOUNT}/us-west-2`]: "vpc-west",
      [`test-key-${DEV_ACCOUNT}/us-east-1`]: "vpc-east",
      [`test-key-${DEV_ACCOUNT}/eu-west-1`]: "vpc-eu",
    });
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT }, sandbox: { id: DEV_ACCOUNT } },
      eks: {
        deployment: [
          { account: "dev", regions: ["us-west-2", "us-east-1"] },
          { account: "dev", regions: ["eu-west-1"] },
          { account: "sandbox", regions: ["us-west-2"] },
        ],
      },
    };

    const resolved = await resolverWith(factory).resolve(raw, false);

    expect(stsMock).toHaveReceivedCommandTimes(AssumeRoleCommand, 1);
    expect(stsMock).toHaveReceivedCommandWith(AssumeRoleCommand, {
      RoleArn: `arn:aws:iam::${DEV_ACCOUNT}:role/ParameterStoreCrossAccountRole`,
      RoleSessionName: `${DEV_ACCOUNT}-ParameterStoreCrossAccountRole`,
    });
    expect(requests).toHaveLength(4);
    expect(resolved.accounts).toEqual({
      dev: { id: DEV_ACCOUNT, vpc: { "us-west-2": "vpc-west", "us-east-1": "vpc-east", "eu-west-1": "vpc-eu" } },
      sandbox: { id: DEV_ACCOUNT, vpc: { "us-west-2": "vpc-west" } },
    });
  });

  test("uses the credentials of each account for its own lookups", async () => {
    stubAssumeRole(DEV_ACCOUNT, PROD_ACCOUNT);
    const { factory, requests } = parameterStore({
      [`test-key-${DEV_ACCOUNT}/us-west-2`]: "vpc-dev",
      [`test-key-${PROD_ACCOUNT}/us-west-2`]: "vpc-prod",
    });
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT }, prod: { id: Number(PROD_ACCOUNT) } },
      eks: {
        deployment: [
          { account: "dev", regions: ["us-west-2"] },
          { account: "prod", regions: ["us-west-2"] },
        ],
      },
    };

    const resolved = await resolverWith(factory).resolve(raw, false);

    expect(stsMock).toHaveReceivedCommandTimes(AssumeRoleCommand, 2);
    expect(requests.map(({ accessKeyId }) => accessKeyId).sort()).toEqual([
      `test-key-${DEV_ACCOUNT}`,
      `test-key-${PROD_ACCOUNT}`,
    ]);
    expect(resolved.accounts).toEqual({
      dev: { id: DEV_ACCOUNT, vpc: { "us-west-2": "vpc-dev" } },
      prod: { id: Number(PROD_ACCOUNT), vpc: { "us-west-2": "vpc-prod" } },
    });
  });

  test("keeps earlier regions and sibling keys when merging", async () => {
    stubAssumeRole(DEV_ACCOUNT);
    const { factory } = parameterStore({
      [`test-key-${DEV_ACCOUNT}/us-west-2`]: "vpc-west",
      [`test-key-${DEV_ACCOUNT}/us-east-1`]: "vpc-east",
    });
    const resolver = resolverWith(factory);
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT, region: "us-west-2", vpc: { "eu-west-1": "vpc-existing" } } },
      eks: { deployment: [{ account: "dev", regions: ["us-west-2"] }] },
    };

    const first = await resolver.resolve(raw, false);
    const second = await resolver.resolve(
      { ...first, eks: { deployment: [{ account: "dev", regions: ["us-east-1"] }] } },
      false
    );

    expect(second.accounts).toEqual({
      dev: {
        id: DEV_ACCOUNT,
        region: "us-west-2",
        vpc: { "eu-west-1": "vpc-existing", "us-west-2": "vpc-west", "us-east-1": "vpc-east" },
      },
    });
  });

  test("rejects an unknown account label before any remote call", async () => {
    const { factory, requests } = parameterStore({});
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT } },
      eks: { deployment: [{ account: "prod", regions: ["us-west-2"] }] },
    };

    const resolving = resolverWith(factory).resolve(raw, false);

    await expect(resolving).rejects.toThrow(ConfigError);
    await expect(resolving).rejects.toThrow('Deployment references unknown account label "prod"');
    expect(stsMock).not.toHaveReceivedCommand(AssumeRoleCommand);
    expect(requests).toHaveLength(0);
    expect(raw.accounts).toEqual({ dev: { id: DEV_ACCOUNT } });
  });

  test("rejects a document without deployments", async () => {
    const { factory } = parameterStore({});

    await expect(resolverWith(factory).resolve({ accounts: {} }, false)).rejects.toThrow(
      "Invalid deployment configuration: eks: Required"
    );
  });

  test("reports a failed role assumption with the account and region", async () => {
    stsMock.on(AssumeRoleCommand).rejects(new Error("AccessDenied"));
    const { factory } = parameterStore({});
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT } },
      eks: { deployment: [{ account: "dev", regions: ["us-west-2"] }] },
    };

    const error = await resolverWith(factory)
      .resolve(raw, false)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CredentialError);
    expect(error).toMatchObject({
      accountId: DEV_ACCOUNT,
      region: "us-west-2",
      message: `[${DEV_ACCOUNT}/us-west-2] Unable to assume arn:aws:iam::${DEV_ACCOUNT}:role/ParameterStoreCrossAccountRole: AccessDenied`,
    });
  });

  test("treats a response without credentials as a credential failure", async () => {
    stsMock.on(AssumeRoleCommand).resolves({});
    const { factory } = parameterStore({});
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT } },
      eks: { deployment: [{ account: "dev", regions: ["us-west-2"] }] },
    };

    await expect(resolverWith(factory).resolve(raw, false)).rejects.toThrow(
      `[${DEV_ACCOUNT}/us-west-2] AssumeRole on arn:aws:iam::${DEV_ACCOUNT}:role/ParameterStoreCrossAccountRole returned incomplete credentials`
    );
  });

  test("fails the whole run when one lookup fails", async () => {
    stubAssumeRole(DEV_ACCOUNT, PROD_ACCOUNT);
    const { factory } = parameterStore({ [`test-key-${DEV_ACCOUNT}/us-west-2`]: "vpc-dev" });
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT }, prod: { id: PROD_ACCOUNT } },
      eks: {
        deployment: [
          { account: "dev", regions: ["us-west-2"] },
          { account: "prod", regions: ["us-east-1"] },
        ],
      },
    };

    const error = await resolverWith(factory)
      .resolve(raw, false)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LookupError);
    expect(error).toMatchObject({
      accountId: PROD_ACCOUNT,
      region: "us-east-1",
      message: `[${PROD_ACCOUNT}/us-east-1] Unable to read ${VPC_ID_PARAMETER_NAME}: ParameterNotFound`,
    });
    expect(raw.accounts).toEqual({ dev: { id: DEV_ACCOUNT }, prod: { id: PROD_ACCOUNT } });
  });

  test("honours a custom role and parameter name", async () => {
    stsMock.on(AssumeRoleCommand).resolves({
      Credentials: {
        AccessKeyId: `test-key-${DEV_ACCOUNT}`,
        SecretAccessKey: "test-secret",
        SessionToken: "test-token",
        Expiration: undefined,
      },
    });
    const { factory, requests } = parameterStore({ [`test-key-${DEV_ACCOUNT}/us-west-2`]: "vpc-custom" });
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT } },
      eks: { deployment: [{ account: "dev", regions: ["us-west-2"] }] },
    };

    await resolverWith(factory, "VpcReaderRole", "/network/vpc_id").resolve(raw, false);

    expect(stsMock).toHaveReceivedCommandWith(AssumeRoleCommand, {
      RoleArn: `arn:aws:iam::${DEV_ACCOUNT}:role/VpcReaderRole`,
      RoleSessionName: `${DEV_ACCOUNT}-VpcReaderRole`,
    });
    expect(requests).toEqual([{ region: "us-west-2", accessKeyId: `test-key-${DEV_ACCOUNT}`, name: "/network/vpc_id" }]);
  });

  test("falls back to the default names when options are passed as undefined", async () => {
    stubAssumeRole(DEV_ACCOUNT);
    const { factory, requests } = parameterStore({ [`test-key-${DEV_ACCOUNT}/us-west-2`]: "vpc-abc123" });
    const resolver = new ConfigResolver({
      roleName: undefined,
      parameterName: undefined,
      stsClient: new STSClient({ region: "us-east-1" }),
      ssmClientFactory: factory,
      verbose: undefined,
    });
    const raw: ConfigTree = {
      accounts: { dev: { id: DEV_ACCOUNT } },
      eks: { deployment: [{ account: "dev", regions: ["us-west-2"] }] },
    };

    const resolved = await resolver.resolve(raw, false);

    expect(stsMock).toHaveReceivedCommandWith(AssumeRoleCommand, {
      RoleArn: `arn:aws:iam::${DEV_ACCOUNT}:role/ParameterStoreCrossAccountRole`,
    });
    expect(requests.map(({ name }) => name)).toEqual([VPC_ID_PARAMETER_NAME]);
    expect(resolved.accounts).toEqual({ dev: { id: DEV_ACCOUNT, vpc: { "us-west-2": "vpc-abc123" } } });
  });
});
