import { ConfigTree, getPath, isConfigTree } from "./config-tree";
import { ConfigError } from "./errors";

/**
 * View over `accounts.<label>` in the configuration document.
 */
export class Account {
  readonly label: string;
  readonly id: string;
  readonly region: string | undefined;

  /**
   * Returns the id of `accountLabel`, or `undefined` when the label (or its id)
   * is not present in `config`.
   */
  static accountIdFromLabel(accountLabel: string, config: ConfigTree): string | undefined {
    const id = getPath(config, ["accounts", accountLabel, "id"]);

    if (typeof id === "string" && id.length > 0) return id;
    if (typeof id === "number" && Number.isFinite(id)) return String(id);

    return undefined;
  }

  /**
   * Reverse lookup of {@link accountIdFromLabel}. When several labels share an id the
   * first one declared wins.
   */
  static accountLabelFromId(accountId: string | number, config: ConfigTree): string | undefined {
    const accounts = config["accounts"];

    if (!isConfigTree(accounts)) return undefined;

    return Object.keys(accounts).find(label => Account.accountIdFromLabel(label, config) === String(accountId));
  }

  constructor(accountLabel: string, config: ConfigTree, accountRegion?: string) {
    const id = Account.accountIdFromLabel(accountLabel, config);

    if (id === undefined) {
      throw new ConfigError(`Account label "${accountLabel}" is not defined under "accounts"`);
    }

    this.label = accountLabel;
    this.id = id;
    this.region = accountRegion ?? stringAt(config, ["accounts", accountLabel, "region"]) ?? stringAt(config, ["pipeline", "region"]);
  }

  get env(): { account: string; region: string | undefined } {
    return { account: this.id, region: this.region };
  }
}

function stringAt(config: ConfigTree, path: string[]): string | undefined {
  const value = getPath(config, path);
  return typeof value === "string" ? value : undefined;
}
