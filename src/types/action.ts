/**
 * Actions
 *
 * An action is an immutable command with a human-readable `name` used for
 * diagnostics. Any other fields are payload.
 *
 * @example
 * ```typescript
 * const loadPosts = defineAction<{ posts: number[] | null }>('LoadPosts')
 *
 * processor.dispatch(loadPosts({ posts: null }))
 *
 * const reducer = (state: PostsState, action: Action) =>
 *   loadPosts.match(action) ? { ...state, loading: action.posts === null } : state
 * ```
 */

export interface Action {
  readonly name: string
}

export type ActionOf<
  NAME extends string,
  PAYLOAD extends object,
> = Readonly<PAYLOAD> & { readonly name: NAME }

export interface ActionCreator<NAME extends string, PAYLOAD extends object> {
  (payload: PAYLOAD): ActionOf<NAME, PAYLOAD>
  readonly actionName: NAME
  /** Narrow any action to the ones this creator produces */
  match: (action: Action) => action is ActionOf<NAME, PAYLOAD>
}

/**
 * Create a typed action creator.
 * Produced actions are frozen; a `name` field in the payload is ignored.
 */
export const defineAction = <
  PAYLOAD extends object = Record<never, never>,
  NAME extends string = string,
>(
  name: NAME,
): ActionCreator<NAME, PAYLOAD> => {
  const match = (action: Action): action is ActionOf<NAME, PAYLOAD> =>
    action.name === name

  const create = (payload: PAYLOAD): ActionOf<NAME, PAYLOAD> => {
    const action = { ...payload, name }
    Object.freeze(action)
    return action
  }

  return Object.assign(create, { actionName: name, match })
}
