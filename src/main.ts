import * as Inspect from './Inspect'
import type {Node, Options} from './Inspect'
export {Inspect}
export type {Options}

export {Lazy} from './Lazy'
export type {Status} from './Lazy'
export {AsyncLazy} from './AsyncLazy'
export {PoisonedError, IndexError} from './Errors'

export * from './lazylist'
export * as Async from './asynclazylist'

export const limit = (limit: number): Partial<Options> => ({limit})

/** Prints the evaluated prefix of a list on stdout, without forcing it */
export function print<A>(list: Node<A>, options?: Partial<Options>): void {
  Inspect.Stdout.List(list, options)
}
