import {AsyncLocalStorage} from 'node:async_hooks'
import {PoisonedError} from './Errors'
import type {Status} from './Lazy'

/** The cells whose producers are running on the current logical call path */
const producing = new AsyncLocalStorage<ReadonlySet<object>>()

type State<A> =
  | {status: 'pending'; produce: () => A | PromiseLike<A>}
  | {status: 'in progress'; result: Promise<A>}
  | {status: 'done'; value: A}
  | {status: 'poisoned'; reason: unknown}

/**
 * The asynchronous counterpart of Lazy: any number of callers may force the
 * cell while its producer is suspended, and exactly one of them runs it.
 *
 * Callers elsewhere wait for the winner's result. A caller on the producer's
 * own call path (tracked across awaits) gets undefined instead of waiting on
 * itself.
 */
export class AsyncLazy<A> {
  private state: State<A>

  constructor(produce: () => A | PromiseLike<A>) {
    this.state = {status: 'pending', produce}
  }

  static of<A>(value: A): AsyncLazy<A> {
    const cell = new AsyncLazy(() => value)
    cell.state = {status: 'done', value}
    return cell
  }

  get status(): Status {
    return this.state.status
  }

  peek(): A | undefined {
    return this.state.status === 'done' ? this.state.value : undefined
  }

  async force(): Promise<A | undefined> {
    const state = this.state
    switch (state.status) {
      case 'done':
        return state.value
      case 'poisoned':
        throw new PoisonedError(state.reason)
      case 'in progress':
        if (producing.getStore()?.has(this)) {
          return undefined
        }
        return state.result.catch(reason => {
          throw new PoisonedError(reason)
        })
      case 'pending': {
        const produce = state.produce
        const path = new Set<object>(producing.getStore())
        path.add(this)
        // the state must read 'in progress' before the producer starts
        const result = Promise.resolve()
          .then(() => producing.run(path, produce))
          .then(
            value => {
              this.state = {status: 'done', value}
              return value
            },
            reason => {
              this.state = {status: 'poisoned', reason}
              throw reason
            }
          )
        this.state = {status: 'in progress', result}
        return result
      }
    }
  }
}
