import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigResolver, ConfigResolverOptions } from "./ConfigResolver";
import { ConfigTree, isConfigTree } from "./config-tree";
import { ConfigError } from "./errors";

export const DEFAULT_CONFIG_NAME = "config";
export const DEFAULT_CONFIG_DIR = path.join(__dirname, "..", "config");

const CONFIG_EXTENSIONS = [".json", ".yaml", ".yml"];

const AccountIdSchema = z
  .union([z.string(), z.number().int()])
  .transform(id => String(id))
  .pipe(z.string().regex(/^\d{12}$/, "must be a 12-digit AWS account id"));

const AccountSchema = z
  .object({
    id: AccountIdSchema,
    region: z.string().optional(),
    vpc: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

const DeploymentSchema = z
  .object({
    account: z.string().min(1),
    regions: z.array(z.string().min(1)).min(1),
  })
  .passthrough();

const NodeGroupSchema = z.object({
  instance_type: z.string().default("t4g.small"),
  min_size: z.number().int().min(0).default(1),
  max_size: z.number().int().min(1).default(1),
  desired_size: z.number().int().min(0).default(1),
  capacity: z.enum(["SPOT", "ON_DEMAND"]).default("SPOT"),
});

export const ConfigurationDocumentSchema = z
  .object({
    pipeline: z
      .object({
        account: z.string().min(1),
        region: z.string().min(1),
        repositoryname: z.string().min(1),
        branchname: z.string().min(1),
      })
      .passthrough(),
    accounts: z.record(z.string(), AccountSchema),
    eks: z
      .object({
        cluster_name: z.string().min(1),
        target_region: z.string().min(1),
        version: z.string().default("1.31"),
        deployment: z.array(DeploymentSchema).min(1),
        node_group: NodeGroupSchema.default({}),
      })
      .passthrough(),
    admin: z
      .object({
        key_name: z.string().min(1),
        key_material: z.string().min(1),
      })
      .passthrough(),
    tags: z.record(z.string(), z.string()).optional(),
  })
  .passthrough()
  .superRefine((doc, ctx) => {
    const labels = new Set(Object.keys(doc.accounts));

    if (!labels.has(doc.pipeline.account)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pipeline", "account"],
        message: `unknown account label "${doc.pipeline.account}"`,
      });
    }

    const targets = new Set<string>();
    doc.eks.deployment.forEach(({ account, regions }, index) => {
      if (!labels.has(account)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["eks", "deployment", index, "account"],
          message: `unknown account label "${account}"`,
        });
      }

      // stage ids are derived from the label and region
      regions.forEach((region, regionIndex) => {
        const target = `${account}/${region}`;

        if (targets.has(target)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["eks", "deployment", index, "regions", regionIndex],
            message: `region ${region} is already deployed for "${account}"`,
          });
        }
        targets.add(target);
      });
    });

    const owners = new Map<string, string>();
    for (const [label, { id }] of Object.entries(doc.accounts)) {
      const owner = owners.get(id);

      if (owner !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["accounts", label, "id"],
          message: `account id ${id} is already used by "${owner}"`,
        });
      }
      owners.set(id, label);
    }
  });

export type ConfigurationDocument = z.output<typeof ConfigurationDocumentSchema>;
export type DeploymentEntry = ConfigurationDocument["eks"]["deployment"][number];
export type NodeGroupConfig = ConfigurationDocument["eks"]["node_group"];

export interface LoadConfigOptions extends ConfigResolverOptions {
  /**
   * Whether VPC ids are already present in the document. When false they are
   * discovered through Parameter Store in each deployment account.
   *
   * @default `CDK_VPC_PRESENT` environment variable, otherwise true
   */
  readonly vpcPresent?: boolean;
  /**
   * @default the `config` directory at the project root
   */
  readonly configDir?: string;
  readonly resolver?: ConfigResolver;
}

export function configFilePath(name: string, configDir: string = DEFAULT_CONFIG_DIR): string {
  const candidates = CONFIG_EXTENSIONS.map(extension => path.join(configDir, `${name}${extension}`));
  const found = candidates.find(candidate => fs.existsSync(candidate));

  if (found === undefined) {
    throw new ConfigError(`Configuration "${name}" not found, looked for: ${candidates.join(", ")}`);
  }

  return found;
}

/** JSON documents are read by the YAML parser as well. */
export function readConfigTree(filePath: string): ConfigTree {
  let document: unknown;

  try {
    document = yaml.load(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Unable to parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }

  if (!isConfigTree(document)) {
    throw new ConfigError(`${filePath} must contain a mapping at the top level`);
  }

  return document;
}

export function parseConfigurationDocument(tree: ConfigTree, source = "configuration"): ConfigurationDocument {
  const parsed = ConfigurationDocumentSchema.safeParse(tree);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `  - ${issue.path.join(".")}: ${issue.message}`).join("\n");
    throw new ConfigError(`Invalid ${source}:\n${issues}`);
  }

  return parsed.data;
}

export function vpcPresentFromEnv(value: string | undefined = process.env.CDK_VPC_PRESENT): boolean {
  if (value === undefined || value.trim() === "") return true;

  return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
}

/**
 * Loads `config/<name>.json` (or `.yaml`), fills in the VPC ids when they are
 * not part of the file, and validates the result.
 */
export async function loadConfig(
  name: string = process.env.CDK_APP_CONFIG ?? DEFAULT_CONFIG_NAME,
  options: LoadConfigOptions = {}
): Promise<ConfigurationDocument> {
  const filePath = configFilePath(name, options.configDir);
  const vpcPresent = options.vpcPresent ?? vpcPresentFromEnv();

  if (options.verbose) console.info(`Loading configuration from ${filePath} (VPC present: ${vpcPresent})`);

  const resolver = options.resolver ?? new ConfigResolver(options);
  const resolved = await resolver.resolve(readConfigTree(filePath), vpcPresent);

  return Object.freeze(parseConfigurationDocument(resolved, filePath));
}
