export { createFlowController } from "./controller.js";
export { delegateFlow, type FlowHost } from "./host.js";
export type {
  ExecuteOptions,
  ExecutePolicy,
  FlowController,
  FlowControllerOptions,
  UnitOfWork,
} from "./types.js";
