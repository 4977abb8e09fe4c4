/**
 * Store factory
 *
 * Wraps one processor with a valtio proxy and a listener set.
 *
 * Architecture:
 * - processor: runs the pipeline and owns the committed state
 * - proxy: valtio proxy `{ current }`. The state is stored as a `ref`, so
 *   valtio tracks the replacement of `current` but never wraps or deep-tracks
 *   the (immutable) state itself
 * - listeners: notified on every commit, even when the state is unchanged
 *
 * Valtio only notifies when `current` changes identity; use `subscribe` to
 * hear about every commit.
 */

import { proxy, ref } from 'valtio/vanilla'

import type { StateChangeHandler } from '../core/types'
import {
  type CreateProcessorOptions,
  createStateProcessor,
} from '../processor'
import type { Action } from '../types'
import type { StateRef, StoreInstance } from './types'

/**
 * @example
 * ```typescript
 * const store = createStore<PostsState>({
 *   initialState: { loading: false, posts: null },
 *   reducer: postsReducer,
 * })
 *
 * const unsubscribe = store.subscribe((state) => render(state))
 * store.dispatch(loadPosts({ posts: [1, 2, 3] }))
 *
 * // valtio consumers
 * subscribe(store.proxy, () => console.log(snapshot(store.proxy).current))
 * ```
 */
export const createStore = <S extends object, A extends Action = Action>(
  options: CreateProcessorOptions<S, A>,
): StoreInstance<S, A> => {
  const listeners = new Set<StateChangeHandler<S>>()
  const stateRef = proxy<StateRef<S>>({ current: ref(options.initialState) })
  const { onStateChange } = options

  const processor = createStateProcessor<S, A>({
    ...options,
    onStateChange: (state) => {
      stateRef.current = ref(state)
      onStateChange?.(state)
      listeners.forEach((listener) => {
        listener(state)
      })
    },
  })

  return {
    processor,
    proxy: stateRef,
    dispatch: (action) => {
      processor.dispatch(action)
    },
    getState: () => processor.state,
    subscribe: (listener) => {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
  }
}
