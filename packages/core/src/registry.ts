import { channel, type Channel } from "./channel.js";
import { ChannelNotFoundError, UseAfterDisposeError } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { initial } from "./state.js";
import type { FlowState } from "./types.js";

export interface ChannelRegistry {
  /** 沒有就建立（seed 為 Initial），已存在則原樣回傳 */
  ensure<T>(key: string): Channel<FlowState<T>>;
  /** 找不到時丟出 ChannelNotFoundError */
  lookup<T>(key: string): Channel<FlowState<T>>;
  has(key: string): boolean;
  keys(): string[];
  readonly size: number;
  readonly disposed: boolean;
  dispose(): void;
}

export interface ChannelRegistryOptions {
  logger?: Logger;
}

/**
 * Each key owns an independent channel, typed by whatever payload the caller
 * first used it with. Reads trust the caller's `T`: a key reused with another
 * payload type is not detected.
 */
export function createChannelRegistry(options: ChannelRegistryOptions = {}): ChannelRegistry {
  const log = options.logger ?? defaultLogger;
  const channels = new Map<string, Channel<FlowState<unknown>>>();
  let disposed = false;

  function assertAlive(operation: string) {
    if (disposed) throw new UseAfterDisposeError(operation);
  }

  // Map 存的是 FlowState<unknown>，型別由呼叫端宣告
  function typed<T>(ch: Channel<FlowState<unknown>>): Channel<FlowState<T>> {
    return ch as Channel<FlowState<T>>;
  }

  return {
    ensure<T>(key: string) {
      assertAlive("ensure");
      let ch = channels.get(key);
      if (!ch) {
        ch = channel<FlowState<unknown>>(initial());
        channels.set(key, ch);
        log.debug(`created channel '${key}'`);
      }
      return typed<T>(ch);
    },

    lookup<T>(key: string) {
      assertAlive("lookup");
      const ch = channels.get(key);
      if (!ch) throw new ChannelNotFoundError(key);
      return typed<T>(ch);
    },

    has(key: string) {
      return channels.has(key);
    },

    keys() {
      return [...channels.keys()];
    },

    get size() {
      return channels.size;
    },

    get disposed() {
      return disposed;
    },

    dispose() {
      if (disposed) return;
      disposed = true;
      for (const ch of channels.values()) ch.close();
      log.debug(`disposed ${channels.size} channel(s)`);
      channels.clear();
    },
  };
}
