import type { StateChangeHandler } from '../core/types'
import type { DefaultStateProcessor } from '../processor'
import type { Action } from '../types'

/** Reactive holder; `current` is replaced on every commit */
export interface StateRef<S extends object> {
  current: S
}

export interface StoreInstance<S extends object, A extends Action = Action> {
  /** The owned processor. Its observer is managed by the store */
  processor: Omit<DefaultStateProcessor<S, A>, 'setStateChangeHandler'>
  /** valtio proxy mirroring the committed state, for snapshot/subscribe consumers */
  proxy: StateRef<S>
  dispatch: (action: A) => void
  getState: () => S
  /** Listener is called synchronously on every commit. Returns unsubscribe */
  subscribe: (listener: StateChangeHandler<S>) => () => void
}
