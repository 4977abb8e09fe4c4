/**
 * validateAction prebuilt
 *
 * Pre-middleware that rejects actions whose shape does not match a Zod
 * schema, before they reach the reducer. Restrict it to a set of action
 * names to leave every other action untouched.
 *
 * @example
 * ```typescript
 * processor.addPreMiddleware(
 *   validateAction(z.object({ id: z.number().int().positive() }), {
 *     names: ['OpenPost'],
 *   }),
 * )
 * ```
 */

import type { z } from 'zod'

import type { Action, Middleware } from '../types'
import { REJECT } from '../types'

export interface ValidationIssue {
  /** Dotted path of the offending field (empty string for root) */
  field: string
  message: string
}

export const toValidationIssues = (error: z.ZodError): ValidationIssue[] =>
  error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }))

export interface ValidateActionOptions<A extends Action> {
  /** Only validate actions with these names */
  names?: readonly string[]
  onInvalid?: (action: A, issues: ValidationIssue[]) => void
}

export const validateAction = <S, A extends Action = Action>(
  schema: z.ZodSchema,
  options: ValidateActionOptions<A> = {},
): Middleware<S, A> => ({
  name: 'validateAction',
  reduce: (state, action) => {
    if (options.names && !options.names.includes(action.name)) return state

    const result = schema.safeParse(action)
    if (result.success) return state

    options.onInvalid?.(action, toValidationIssues(result.error))
    return REJECT
  },
})
