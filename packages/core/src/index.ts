export type {
  Comparator,
  Failure,
  FlowKind,
  FlowState,
  FlowStatus,
  Initial,
  Loading,
  Success,
} from "./types.js";

export {
  failure,
  flowStateEquals,
  initial,
  isFailure,
  isInitial,
  isLoading,
  isSuccess,
  loading,
  statusOf,
  success,
} from "./state.js";

export { when, type WhenHandlers } from "./when.js";
export { channel, type Channel } from "./channel.js";
export {
  createChannelRegistry,
  type ChannelRegistry,
  type ChannelRegistryOptions,
} from "./registry.js";
export {
  ChannelNotFoundError,
  FlowRegistryError,
  UseAfterDisposeError,
  type FlowErrorCode,
} from "./errors.js";
export { logger, type Logger } from "./logger.js";
