import { ReplaySubject, type Observable } from 'rxjs'

export type TObserver<T> = (value: T) => void

/**
 * Single-slot observable holder for the latest value of one call shape.
 *
 *   set(v) ──► ReplaySubject(1) ──► observers (registration order, synchronous)
 *
 * A late observer receives only the most recent value, never the history.
 */
export class ResultCell<T> {
  private subject = new ReplaySubject<T>(1)
  private current: T | undefined
  private observerErrors: unknown[] = []

  /** Latest value, or undefined before the first set. */
  get value(): T | undefined {
    return this.current
  }

  get value$(): Observable<T> {
    return this.subject.asObservable()
  }

  /**
   * Notifies every observer, then rethrows the first error an observer threw.
   * The new value is kept either way.
   */
  set(value: T): void {
    this.current = value
    this.subject.next(value)
    this.rethrowObserverError()
  }

  /**
   * Registers an observer and returns its unsubscribe function. If the observer
   * throws on the immediate replay of the current value, it is not registered
   * and the error is rethrown.
   */
  observe(observer: TObserver<T>): () => void {
    const subscription = this.subject.subscribe((value) => this.deliver(observer, value))
    try {
      this.rethrowObserverError()
    } catch (caughtError) {
      subscription.unsubscribe()
      throw caughtError
    }
    return () => subscription.unsubscribe()
  }

  // rxjs would report an observer error asynchronously; keep it on the caller's stack.
  private deliver(observer: TObserver<T>, value: T): void {
    try {
      observer(value)
    } catch (caughtError) {
      this.observerErrors.push(caughtError)
    }
  }

  private rethrowObserverError(): void {
    if (this.observerErrors.length === 0) return
    const [firstError] = this.observerErrors.splice(0)
    throw firstError
  }
}
