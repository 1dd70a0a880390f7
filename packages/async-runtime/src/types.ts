import type { FlowState, Logger } from "@flow-registry/core";
import type { Observable } from "rxjs";

export type UnitOfWork<T> = () => Promise<T | undefined>;

export interface ExecuteOptions<T> {
  onSuccess?: (data: T | undefined) => void | Promise<void>;
  /** 在 Failure 發佈之後才呼叫；這裡丟出的錯誤會往外傳 */
  onError?: (error: unknown, stack: string | undefined) => void | Promise<void>;
  /** 成功或失敗都會呼叫一次 */
  onComplete?: () => void | Promise<void>;
}

/**
 * overlap: 同一個 key 的多次 execute 互不阻擋，最後發佈的狀態勝出
 * latest:  只有同一個 key 最新的一次 execute 可以發佈終態
 */
export type ExecutePolicy = "overlap" | "latest";

export interface FlowControllerOptions {
  /** 出現在 log tag 裡，方便分辨是哪個 host */
  name?: string;
  logger?: Logger;
  policy?: ExecutePolicy;
}

export interface FlowController {
  getStream<T>(key: string): Observable<FlowState<T>>;
  currentState<T>(key: string): FlowState<T>;
  execute<T>(key: string, work: UnitOfWork<T>, options?: ExecuteOptions<T>): Promise<void>;
  /** 事先建立 channel（狀態為 Initial），已存在則不變 */
  init<T>(key: string): void;
  has(key: string): boolean;
  dispose(): void;
}
