import { BehaviorSubject, type Observable, type Observer, type Subscription } from "rxjs";

export interface Channel<T> {
  /** 目前的值，不建立訂閱 */
  get(): T;
  /** 發佈新值；相同的值也會送出，close 之後忽略 */
  set(next: T): void;
  subscribe(observer: Partial<Observer<T>> | ((value: T) => void)): Subscription;
  /** 新訂閱者會先收到目前的值，再收到之後的每一次 set */
  asObservable(): Observable<T>;
  close(): void;
  closed(): boolean;
}

export function channel<T>(initial: T): Channel<T> {
  const subject = new BehaviorSubject<T>(initial);
  let done = false;

  const set = (next: T) => {
    if (done) return;
    subject.next(next);
  };

  const close = () => {
    if (done) return;
    done = true;
    subject.complete();
  };

  return {
    get: () => subject.getValue(),
    set,
    subscribe: (observer) => subject.subscribe(observer),
    asObservable: () => subject.asObservable(),
    close,
    closed: () => done,
  };
}
