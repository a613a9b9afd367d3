import type { ZodError } from "zod";

/**
 * Base class for every error raised by the forum itself.
 */
export class ForumError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ForumError";
  }
}

/**
 * A data-model or usage violation: bad field values, conflicting call options,
 * a forwarded message whose original does not match its reference.
 */
export class ValidationError extends ForumError {
  constructor(
    message: string,
    public readonly model?: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "ValidationError";
  }

  static fromZodError(model: string, error: ZodError): ValidationError {
    const issue = error.issues[0];
    if (!issue) {
      return new ValidationError(`invalid ${model}`, model);
    }
    const field = issue.path.join(".");
    return new ValidationError(
      field ? `invalid ${model} field \`${field}\`: ${issue.message}` : `invalid ${model}: ${issue.message}`,
      model,
      field || undefined
    );
  }
}

/**
 * Raised when an agent tries to respond but neither it nor any of its
 * ancestors was asked.
 */
export class NoAskingAgentError extends ValidationError {
  constructor(public readonly agentAlias: string) {
    super(`${agentAlias} was not asked and has no asking ancestor to respond to`);
    this.name = "NoAskingAgentError";
  }
}

/**
 * The store has no value under the requested hash key.
 */
export class NotFoundError extends ForumError {
  constructor(public readonly hashKey: string) {
    super(`no immutable value stored under ${hashKey}`);
    this.name = "NotFoundError";
  }
}

/**
 * An error thrown from inside an agent body. It never escapes the agent's
 * task: the original error is delivered as the agent's final response and
 * this wrapper is recorded as the call outcome.
 */
export class AgentFailure extends ForumError {
  constructor(
    public readonly agentAlias: string,
    public override readonly cause: Error
  ) {
    super(`agent ${agentAlias} failed: ${cause.message}`, { cause });
    this.name = "AgentFailure";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
