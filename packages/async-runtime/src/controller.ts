import {
  createChannelRegistry,
  failure,
  loading,
  logger as defaultLogger,
  success,
  UseAfterDisposeError,
  type Channel,
  type FlowState,
} from "@flow-registry/core";
import type {
  ExecuteOptions,
  FlowController,
  FlowControllerOptions,
  UnitOfWork,
} from "./types.js";

// null-prototype 物件或 toString 會丟錯的值，String() 本身就會失敗
function messageOf(err: unknown): string {
  try {
    return String(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

function stackOf(err: unknown): string | undefined {
  return err instanceof Error ? err.stack : undefined;
}

/**
 * Owns one keyed registry of lifecycle channels. Hosts keep the controller as
 * a field and forward to it; nothing is shared between controllers.
 *
 * const flows = createFlowController({ name: "profile" });
 * await flows.execute("user", () => api.fetchUser(id), {
 *   onError: (err) => toast(String(err)),
 * });
 * flows.currentState<User>("user"); // { kind: "success", data: ... }
 */
export function createFlowController(options: FlowControllerOptions = {}): FlowController {
  const base = options.logger ?? defaultLogger;
  const log = options.name ? base.withTag(options.name) : base;
  const policy = options.policy ?? "overlap";
  const registry = createChannelRegistry({ logger: log });

  // latest policy 用：每個 key 最新一次 execute 的 token
  const tokens = new Map<string, number>();

  function assertAlive(operation: string) {
    if (registry.disposed) throw new UseAfterDisposeError(operation);
  }

  function publish<T>(key: string, ch: Channel<FlowState<T>>, state: FlowState<T>, token: number) {
    if (ch.closed()) {
      log.warn(`execute('${key}') settled after dispose; dropping ${state.kind}`);
      return;
    }
    if (policy === "latest" && state.kind !== "loading" && tokens.get(key) !== token) {
      log.debug(`'${key}': stale ${state.kind} ignored`);
      return;
    }
    ch.set(state);
    log.debug(`'${key}' -> ${state.kind}`);
  }

  async function execute<T>(
    key: string,
    work: UnitOfWork<T>,
    callbacks: ExecuteOptions<T> = {}
  ): Promise<void> {
    assertAlive("execute");
    const ch = registry.ensure<T>(key);
    const token = (tokens.get(key) ?? 0) + 1;
    tokens.set(key, token);

    try {
      publish(key, ch, loading(), token);

      const result = await work();

      await callbacks.onSuccess?.(result);

      publish(key, ch, success(result), token);
    } catch (err) {
      // 先發佈 Failure，onError 本身失敗時訂閱者也已經看得到
      publish(key, ch, failure(messageOf(err)), token);
      await callbacks.onError?.(err, stackOf(err));
    } finally {
      await callbacks.onComplete?.();
    }
  }

  return {
    getStream<T>(key: string) {
      assertAlive("getStream");
      return registry.lookup<T>(key).asObservable();
    },

    currentState<T>(key: string) {
      assertAlive("currentState");
      return registry.lookup<T>(key).get();
    },

    execute,

    init<T>(key: string) {
      assertAlive("init");
      registry.ensure<T>(key);
    },

    has(key: string) {
      return registry.has(key);
    },

    dispose() {
      tokens.clear();
      registry.dispose();
    },
  };
}
