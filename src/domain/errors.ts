/**
 * Error taxonomy. Every error carries a stable `code` so the CLI and MCP
 * surfaces can report it without string matching.
 */

export class DomainkitError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Registration collision without an explicit replace. */
export class DuplicateDomainError extends DomainkitError {
  constructor(readonly domain: string) {
    super("DUPLICATE_DOMAIN", `domain '${domain}' is already registered`);
  }
}

/** A handler's extraction logic threw; isolated at the registry boundary. */
export class HandlerExecutionError extends DomainkitError {
  constructor(readonly domain: string, operation: string, cause: unknown) {
    super("HANDLER_EXECUTION", `handler '${domain}' failed in ${operation}: ${messageOf(cause)}`, { cause });
  }
}

/** The external synthesis call failed, timed out or was cancelled. */
export class GenerationFailure extends DomainkitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_FAILED", message, options);
  }
}

/** A synthesized artifact failed syntax or structural checks. */
export class ValidationFailure extends DomainkitError {
  constructor(readonly issues: string[]) {
    super("VALIDATION_FAILED", `handler spec rejected: ${issues.join("; ")}`);
  }
}

/** A handler object does not satisfy the DomainHandler contract. */
export class HandlerContractError extends DomainkitError {
  constructor(readonly domain: string, reason: string) {
    super("HANDLER_CONTRACT", `handler '${domain}' violates the handler contract: ${reason}`);
  }
}

export class UnknownDomainError extends DomainkitError {
  constructor(readonly domain: string) {
    super("UNKNOWN_DOMAIN", `no handler registered for domain '${domain}'`);
  }
}

export class ConfigError extends DomainkitError {
  constructor(readonly issues: string[]) {
    super("CONFIG_INVALID", `invalid configuration: ${issues.join("; ")}`);
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
