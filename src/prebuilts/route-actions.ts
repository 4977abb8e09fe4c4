import type { Action, Middleware } from '../types'
import { REJECT } from '../types'

/**
 * Pre-middleware that hands matching actions to `handler` and keeps them
 * away from the reducer. Other actions pass through untouched.
 *
 * The handler runs inside the pipeline: it must not dispatch into the same
 * processor synchronously. Schedule follow-up dispatches instead.
 */
export const routeActions = <S, A extends Action = Action>(
  match: (action: A) => boolean,
  handler: (action: A, state: S) => void,
): Middleware<S, A> => ({
  name: 'routeActions',
  reduce: (state, action) => {
    if (!match(action)) return state
    handler(action, state)
    return REJECT
  },
})
