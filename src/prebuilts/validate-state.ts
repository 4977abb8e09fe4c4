/**
 * validateState prebuilt
 *
 * Post-middleware that rejects a candidate next state failing a Zod schema,
 * so an invalid state is never committed. The state passes through by
 * reference; parsed output (defaults, stripped keys) is not used.
 */

import type { z } from 'zod'

import type { Action, Middleware } from '../types'
import { REJECT } from '../types'
import { toValidationIssues, type ValidationIssue } from './validate-action'

export interface ValidateStateOptions<S, A extends Action> {
  onInvalid?: (state: S, action: A, issues: ValidationIssue[]) => void
}

export const validateState = <S, A extends Action = Action>(
  schema: z.ZodSchema<S>,
  options: ValidateStateOptions<S, A> = {},
): Middleware<S, A> => ({
  name: 'validateState',
  reduce: (state, action) => {
    const result = schema.safeParse(state)
    if (result.success) return state

    options.onInvalid?.(state, action, toValidationIssues(result.error))
    return REJECT
  },
})
