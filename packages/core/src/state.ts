import isEqual from "lodash/isEqual.js";
import type {
  Comparator,
  Failure,
  FlowKind,
  FlowState,
  FlowStatus,
  Initial,
  Loading,
  Success,
} from "./types.js";

const defaultEquals: Comparator<unknown> = isEqual;

const STATUS: Record<FlowKind, FlowStatus> = {
  initial: "idle",
  loading: "pending",
  success: "success",
  failure: "error",
};

const INITIAL: Initial = { kind: "initial" };
const LOADING: Loading = { kind: "loading" };
Object.freeze(INITIAL);
Object.freeze(LOADING);

export function initial(): Initial {
  return INITIAL;
}

export function loading(): Loading {
  return LOADING;
}

export function success<T>(data?: T): Success<T> {
  const state: Success<T> = { kind: "success", data };
  return Object.freeze(state);
}

export function failure(message?: string): Failure {
  const state: Failure = { kind: "failure", message };
  return Object.freeze(state);
}

export function isInitial<T>(state: FlowState<T>): state is Initial {
  return state.kind === "initial";
}

export function isLoading<T>(state: FlowState<T>): state is Loading {
  return state.kind === "loading";
}

export function isSuccess<T>(state: FlowState<T>): state is Success<T> {
  return state.kind === "success";
}

export function isFailure<T>(state: FlowState<T>): state is Failure {
  return state.kind === "failure";
}

/**
 * Same variant and equal payload. Success data is compared by value
 * (arrays, objects, maps and sets included) unless `equals` is given;
 * pass `Object.is` for identity. Failure messages are compared as strings.
 */
export function flowStateEquals<T>(
  a: FlowState<T>,
  b: FlowState<T>,
  equals: Comparator<T | undefined> = defaultEquals
): boolean {
  switch (a.kind) {
    case "initial":
    case "loading":
      return a.kind === b.kind;
    case "success":
      return b.kind === "success" && equals(a.data, b.data);
    case "failure":
      return b.kind === "failure" && Object.is(a.message, b.message);
  }
}

export function statusOf<T>(state: FlowState<T>): FlowStatus {
  return STATUS[state.kind];
}
