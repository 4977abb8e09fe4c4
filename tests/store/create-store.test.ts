import { snapshot, subscribe } from 'valtio/vanilla'
import { describe, expect, it, vi } from 'vitest'

import { createStore } from '~/store/create-store'
import { REJECT } from '~/types'

import {
  initialPostsState,
  loadPosts,
  openPost,
  postsReducer,
} from '../mocks/posts'

describe('createStore', () => {
  it('exposes the initial state through getState and the proxy', () => {
    const store = createStore({
      initialState: initialPostsState,
      reducer: postsReducer,
    })

    expect(store.getState()).toBe(initialPostsState)
    expect(store.proxy.current).toBe(initialPostsState)
  })

  it('mirrors every commit into the proxy', () => {
    const store = createStore({
      initialState: initialPostsState,
      reducer: postsReducer,
    })

    store.dispatch(loadPosts({ posts: [1, 2, 3] }))

    expect(store.proxy.current).toBe(store.getState())
    expect(snapshot(store.proxy).current).toEqual({
      loading: false,
      posts: [1, 2, 3],
    })
  })

  it('notifies valtio subscribers synchronously when notifyInSync is set', () => {
    const store = createStore({
      initialState: initialPostsState,
      reducer: postsReducer,
    })
    const onChange = vi.fn()
    const unsubscribe = subscribe(store.proxy, onChange, true)

    store.dispatch(loadPosts({ posts: null }))
    unsubscribe()

    expect(onChange).toHaveBeenCalledTimes(1)
  })

  it('calls onStateChange before listeners, in subscription order', () => {
    const calls: string[] = []
    const store = createStore({
      initialState: initialPostsState,
      reducer: postsReducer,
      onStateChange: () => calls.push('onStateChange'),
    })
    store.subscribe(() => calls.push('first'))
    store.subscribe(() => calls.push('second'))

    store.dispatch(loadPosts({ posts: null }))

    expect(calls).toEqual(['onStateChange', 'first', 'second'])
  })

  it('notifies listeners on every commit, including unchanged states', () => {
    const listener = vi.fn()
    const store = createStore({
      initialState: initialPostsState,
      reducer: (state) => state,
    })
    store.subscribe(listener)

    store.dispatch(loadPosts({ posts: null }))
    store.dispatch(loadPosts({ posts: null }))

    expect(listener).toHaveBeenCalledTimes(2)
    expect(listener).toHaveBeenLastCalledWith(initialPostsState)
  })

  it('does not notify on rejection', () => {
    const listener = vi.fn()
    const store = createStore({
      initialState: initialPostsState,
      reducer: () => REJECT,
      onRejected: vi.fn(),
    })
    store.subscribe(listener)

    store.dispatch(openPost({ id: 1 }))

    expect(listener).not.toHaveBeenCalled()
    expect(store.proxy.current).toBe(initialPostsState)
  })

  it('stops notifying after unsubscribe', () => {
    const listener = vi.fn()
    const store = createStore({
      initialState: initialPostsState,
      reducer: postsReducer,
    })
    const unsubscribe = store.subscribe(listener)

    store.dispatch(loadPosts({ posts: null }))
    unsubscribe()
    store.dispatch(loadPosts({ posts: [1] }))

    expect(listener).toHaveBeenCalledTimes(1)
  })
})
