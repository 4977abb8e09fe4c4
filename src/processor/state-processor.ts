/**
 * StateProcessor
 *
 * Owns the current state, one reducer, and ordered pre/post middleware.
 * `dispatch` runs the pipeline synchronously and either commits (state
 * replaced, observer notified), rejects (`rejected` hook), or aborts on a
 * reducer fault (nothing happens beyond the fault report).
 *
 * Not safe for concurrent use: callers must not process two actions at
 * once. Synchronous re-entry from a middleware or the reducer is detected
 * and throws unless `detectReentrancy` is turned off, in which case the
 * interleaving is undefined. The observer and the rejected hook run after
 * the stages have finished and may dispatch again.
 */

import { resolveConfig, type ResolvedProcessorConfig } from '../core/config'
import type { ProcessorOptions, StateChangeHandler } from '../core/types'
import {
  normalizeMiddleware,
  normalizeReducer,
  type PipelineRun,
  processAction,
  reducerName,
} from '../pipeline'
import type {
  Action,
  FaultEvent,
  MiddlewareApi,
  MiddlewareEntry,
  MiddlewareInput,
  PipelineOutcome,
  Reducer,
  ReducerInput,
  StageResult,
} from '../types'
import { REJECT } from '../types'
import { createLogger, type ProcessorLogger } from '../utils/log'
import { createTiming, type Timing } from '../utils/timing'

const noop = () => {
  // no-op
}

export abstract class StateProcessor<S, A extends Action = Action>
  implements Reducer<S, A>
{
  protected readonly config: ResolvedProcessorConfig
  protected readonly logger: ProcessorLogger

  private current: S
  private reducer: MiddlewareEntry<S, A> | null = null
  private readonly preMiddleware: MiddlewareEntry<S, A>[] = []
  private readonly postMiddleware: MiddlewareEntry<S, A>[] = []
  private stateChangeHandler: StateChangeHandler<S> = noop
  private readonly timing: Timing
  private readonly onFault: (event: FaultEvent<A>) => void
  private readonly api: MiddlewareApi<S>
  /** Number of `process` calls whose stages are currently running */
  private depth = 0

  constructor(initialState: S, options: ProcessorOptions<S, A> = {}) {
    this.config = resolveConfig(options.config)
    this.current = initialState

    this.logger = createLogger({
      name: this.config.name,
      logPipeline: this.config.debug.logPipeline,
    })
    this.timing = createTiming({
      timing: this.config.debug.timing,
      timingThreshold: this.config.debug.timingThreshold,
      prefix: this.config.name,
      onSlowOperation: options.onSlowOperation,
      onSummary: options.onTimingSummary,
    })
    this.onFault =
      options.onFault ??
      ((event) => {
        this.logger.logFault(event)
      })
    this.api = {
      name: this.config.name,
      reject: REJECT,
      getState: () => this.current,
    }

    if (options.reducer) this.setReducer(options.reducer)
    if (options.onStateChange) this.setStateChangeHandler(options.onStateChange)
    options.pre?.forEach((m) => {
      this.addPreMiddleware(m)
    })
    options.post?.forEach((m) => {
      this.addPostMiddleware(m)
    })
  }

  /** Last committed state */
  get state(): S {
    return this.current
  }

  get name(): string {
    return this.config.name
  }

  setReducer(reducer: ReducerInput<S, A>): void {
    const normalized = normalizeReducer(reducer)
    this.reducer = {
      name: reducerName(reducer),
      fn: (state, action) => normalized.reduce(state, action),
    }
  }

  /** Replaces any previous observer */
  setStateChangeHandler(handler: StateChangeHandler<S>): void {
    this.stateChangeHandler = handler
  }

  addPreMiddleware(middleware: MiddlewareInput<S, A>): void {
    this.preMiddleware.push(
      normalizeMiddleware(
        middleware,
        this.api,
        'pre',
        this.preMiddleware.length,
      ),
    )
  }

  addPostMiddleware(middleware: MiddlewareInput<S, A>): void {
    this.postMiddleware.push(
      normalizeMiddleware(
        middleware,
        this.api,
        'post',
        this.postMiddleware.length,
      ),
    )
  }

  addMiddleware(
    pre: MiddlewareInput<S, A>,
    post: MiddlewareInput<S, A>,
  ): void {
    this.addPreMiddleware(pre)
    this.addPostMiddleware(post)
  }

  dispatch(action: A): void {
    this.process(this.current, action)
  }

  /** Runs only the reducer, so a processor can serve as another one's reducer */
  reduce(state: S, action: A): StageResult<S> {
    return this.requireReducer().fn(state, action)
  }

  /**
   * Run the full pipeline for `action` starting from `state`.
   * @throws Error when no reducer is configured or on detected re-entry
   */
  process(state: S, action: A): PipelineOutcome<S> {
    const reducer = this.requireReducer()

    if (this.depth > 0 && this.config.detectReentrancy) {
      throw new Error(
        `[${this.config.name}] Reentrant dispatch of "${action.name}" while another action is being processed. ` +
          'Dispatch follow-up actions after the current one completes.',
      )
    }

    this.depth++
    let run: PipelineRun<S>
    try {
      run = processAction(
        state,
        action,
        {
          pre: [...this.preMiddleware],
          reducer,
          post: [...this.postMiddleware],
        },
        { timing: this.timing, onFault: this.onFault },
      )
    } finally {
      this.depth--
    }

    this.logger.logPipeline(run.trace)

    const { outcome } = run
    switch (outcome.status) {
      case 'committed':
        this.commit(outcome.state)
        break
      case 'rejected':
        this.rejected(outcome.state, action)
        break
      case 'aborted':
        break
    }

    return outcome
  }

  /** Invoked once for every rejected action. Faults thrown here reach the dispatch caller */
  protected abstract rejected(state: S, action: A): void

  private commit(next: S): void {
    this.current = next
    this.stateChangeHandler(next)
  }

  private requireReducer(): MiddlewareEntry<S, A> {
    if (!this.reducer) {
      throw new Error(
        `[${this.config.name}] No reducer configured. Pass one to the constructor or call setReducer() before dispatching.`,
      )
    }
    return this.reducer
  }
}
