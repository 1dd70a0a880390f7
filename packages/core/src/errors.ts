export type FlowErrorCode = "CHANNEL_NOT_FOUND" | "USE_AFTER_DISPOSE";

export class FlowRegistryError extends Error {
  constructor(readonly code: FlowErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ChannelNotFoundError extends FlowRegistryError {
  constructor(readonly key: string) {
    super(
      "CHANNEL_NOT_FOUND",
      `Channel with key '${key}' does not exist. Call execute() or init() first.`
    );
  }
}

export class UseAfterDisposeError extends FlowRegistryError {
  constructor(readonly operation: string) {
    super("USE_AFTER_DISPOSE", `Cannot call ${operation}() on a disposed registry`);
  }
}
