import type { Action, ReducerInput } from '../types'
import {
  DefaultStateProcessor,
  type DefaultProcessorOptions,
} from './default-state-processor'

export interface CreateProcessorOptions<S, A extends Action = Action>
  extends DefaultProcessorOptions<S, A> {
  initialState: S
  reducer: ReducerInput<S, A>
}

/**
 * Create a processor with its reducer, middleware and hooks wired up front.
 *
 * @example
 * ```typescript
 * const posts = createStateProcessor<PostsState>({
 *   initialState: { loading: false, posts: null },
 *   reducer: postsReducer,
 *   pre: [routeActions(openPost.match, openPostRoute)],
 *   post: [validateState(postsStateSchema)],
 *   onStateChange: render,
 *   config: { name: 'posts' },
 * })
 *
 * posts.dispatch(loadPosts({ posts: null }))
 * ```
 */
export const createStateProcessor = <S, A extends Action = Action>(
  options: CreateProcessorOptions<S, A>,
): DefaultStateProcessor<S, A> => {
  const { initialState, ...rest } = options
  return new DefaultStateProcessor<S, A>(initialState, rest)
}
