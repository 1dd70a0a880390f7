import type { FlowState } from "./types.js";

export interface WhenHandlers<T, R> {
  loading: () => R;
  success: (data: T | undefined) => R;
  failure: (message: string | undefined) => R;
  /** 其餘狀態（目前只有 initial） */
  orElse: () => R;
}

/**
 * Runs exactly one handler for the state's variant.
 *
 * const label = when(controller.currentState<User>("user"), {
 *   loading: () => "Loading…",
 *   success: (user) => user?.name ?? "nobody",
 *   failure: (message) => `Failed: ${message}`,
 *   orElse: () => "",
 * });
 */
export function when<T, R>(state: FlowState<T>, handlers: WhenHandlers<T, R>): R {
  switch (state.kind) {
    case "loading":
      return handlers.loading();
    case "success":
      return handlers.success(state.data);
    case "failure":
      return handlers.failure(state.message);
    case "initial":
      return handlers.orElse();
    default: {
      const unreachable: never = state;
      return unreachable;
    }
  }
}
