/**
 * Base class for every failure raised while resolving configuration or
 * wiring deployment stages. Each error aborts the run before synthesis.
 */
export class EksDeploymentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed configuration key, or an unknown account label. */
export class ConfigError extends EksDeploymentError {}

export class CredentialError extends EksDeploymentError {
  constructor(
    readonly accountId: string,
    readonly region: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${accountId}/${region}] ${message}`, options);
  }
}

export class LookupError extends EksDeploymentError {
  constructor(
    readonly accountId: string,
    readonly region: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${accountId}/${region}] ${message}`, options);
  }
}

export class CycleError extends EksDeploymentError {
  constructor(readonly dependent: string, readonly prerequisite: string) {
    super(`Adding dependency "${dependent}" -> "${prerequisite}" would create a cycle`);
  }
}
