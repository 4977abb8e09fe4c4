import type { ProcessorOptions, RejectedHandler } from '../core/types'
import type { Action } from '../types'
import { StateProcessor } from './state-processor'

export interface DefaultProcessorOptions<S, A extends Action = Action>
  extends ProcessorOptions<S, A> {
  /** Called on every rejection instead of logging it */
  onRejected?: RejectedHandler<S, A>
}

/**
 * Ready-to-use processor. Rejections go to `onRejected` when given,
 * otherwise they are logged with console.info.
 */
export class DefaultStateProcessor<
  S,
  A extends Action = Action,
> extends StateProcessor<S, A> {
  private readonly onRejected: RejectedHandler<S, A> | undefined

  constructor(initialState: S, options: DefaultProcessorOptions<S, A> = {}) {
    super(initialState, options)
    this.onRejected = options.onRejected
  }

  protected rejected(state: S, action: A): void {
    if (this.onRejected) {
      this.onRejected(state, action)
      return
    }
    this.logger.logRejected(state, action)
  }
}
