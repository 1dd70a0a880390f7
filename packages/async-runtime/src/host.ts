import type { ExecuteOptions, FlowController, UnitOfWork } from "./types.js";

/** 給 host 轉發用的四個操作 */
export type FlowHost = Pick<FlowController, "getStream" | "currentState" | "execute" | "dispose">;

/**
 * Binds the host-facing operations of an owned controller, so a component can
 * expose them without inheriting from anything:
 *
 * class ProfileViewModel {
 *   private readonly flows = createFlowController();
 *   readonly ops = delegateFlow(this.flows);
 * }
 */
export function delegateFlow(controller: FlowController): FlowHost {
  return {
    getStream<T>(key: string) {
      return controller.getStream<T>(key);
    },
    currentState<T>(key: string) {
      return controller.currentState<T>(key);
    },
    execute<T>(key: string, work: UnitOfWork<T>, options?: ExecuteOptions<T>) {
      return controller.execute<T>(key, work, options);
    },
    dispose() {
      controller.dispose();
    },
  };
}
