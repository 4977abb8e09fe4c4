export { routeActions } from './route-actions'
export {
  toValidationIssues,
  validateAction,
  type ValidateActionOptions,
  type ValidationIssue,
} from './validate-action'
export { validateState, type ValidateStateOptions } from './validate-state'
