export type FlowKind = "initial" | "loading" | "success" | "failure";

export interface Initial {
  readonly kind: Extract<FlowKind, "initial">;
}

export interface Loading {
  readonly kind: Extract<FlowKind, "loading">;
}

export interface Success<T> {
  readonly kind: Extract<FlowKind, "success">;
  /** 任務結果；undefined 也是合法的成功結果 */
  readonly data: T | undefined;
}

export interface Failure {
  readonly kind: Extract<FlowKind, "failure">;
  /** 錯誤的文字描述（可能沒有） */
  readonly message: string | undefined;
}

/** 一次非同步操作的生命週期：initial → loading → success / failure */
export type FlowState<T> = Initial | Loading | Success<T> | Failure;

/** 給只需要粗略狀態的 UI 使用 */
export type FlowStatus = "idle" | "pending" | "success" | "error";

export type Comparator<T> = (a: T, b: T) => boolean;
