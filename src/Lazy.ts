import {PoisonedError} from './Errors'

export type Status = 'pending' | 'in progress' | 'done' | 'poisoned'

type State<A> =
  | {status: 'pending'; produce: () => A}
  | {status: 'in progress'}
  | {status: 'done'; value: A}
  | {status: 'poisoned'; reason: unknown}

/**
 * A memoizing cell: runs its producer at most once, on the first force, and
 * caches the result forever.
 *
 * Forcing a cell from inside its own producer does not recurse: the answer is
 * simply `undefined`, the value is not yet available. This is what lets a
 * self-referential list read its own prefix while it is being built.
 */
export class Lazy<A> {
  private state: State<A>

  constructor(produce: () => A) {
    this.state = {status: 'pending', produce}
  }

  /** A cell that is already evaluated */
  static of<A>(value: A): Lazy<A> {
    const cell = new Lazy(() => value)
    cell.state = {status: 'done', value}
    return cell
  }

  get status(): Status {
    return this.state.status
  }

  /** The cached value, without forcing */
  peek(): A | undefined {
    return this.state.status === 'done' ? this.state.value : undefined
  }

  /** Returns the cached value, running the producer if this is the first force.

  Returns undefined if the cell is already being produced further up the
  call stack. Throws PoisonedError if the producer failed on an earlier
  force; the error of the failing run itself propagates unchanged. */
  force(): A | undefined {
    const state = this.state
    switch (state.status) {
      case 'done':
        return state.value
      case 'in progress':
        return undefined
      case 'poisoned':
        throw new PoisonedError(state.reason)
      case 'pending': {
        this.state = {status: 'in progress'}
        let settled: State<A> = {status: 'poisoned', reason: undefined}
        try {
          const value = state.produce()
          settled = {status: 'done', value}
          return value
        } catch (reason) {
          settled = {status: 'poisoned', reason}
          throw reason
        } finally {
          this.state = settled
        }
      }
    }
  }
}
