import {AsyncLazy} from './AsyncLazy'
import {IndexError} from './Errors'
import * as Inspect from './Inspect'

export type Cons<A> = {head: A; tail: AsyncLazyList<A>}

export type Content<A> = Cons<A> | undefined

/**
 * A lazy list over asynchronous cells. Any number of consumers can walk the
 * list at once: each node is produced by whichever consumer reaches it first,
 * and the others wait for that result.
 */
export class AsyncLazyList<A> implements AsyncIterable<A> {
  constructor(readonly cell: AsyncLazy<Content<A>>) {}

  prepend(head: A): AsyncLazyList<A> {
    return cons(head, this)
  }

  uncons(): Promise<Content<A>> {
    return this.cell.force()
  }

  async isEmpty(): Promise<boolean> {
    return (await this.cell.force()) === undefined && this.cell.status === 'done'
  }

  async get(index: number): Promise<A | undefined> {
    return (await this.nth(index))?.head
  }

  async at(index: number): Promise<A> {
    const node = await this.nth(index)
    if (node === undefined) {
      throw new IndexError(index)
    }
    return node.head
  }

  async length(): Promise<number> {
    let n = 0
    for await (const _ of this) {
      n++
    }
    return n
  }

  async *[Symbol.asyncIterator](): AsyncIterableIterator<A> {
    let child = await this.cell.force()
    while (child !== undefined) {
      yield child.head
      child = await child.tail.cell.force()
    }
  }

  async toArray(): Promise<A[]> {
    const out: A[] = []
    for await (const x of this) {
      out.push(x)
    }
    return out
  }

  toString(): string {
    return Inspect.render(Inspect.prefix(this))
  }

  private async nth(index: number): Promise<Cons<A> | undefined> {
    if (!Number.isInteger(index) || index < 0) {
      return undefined
    }
    let child = await this.cell.force()
    for (let i = 0; child !== undefined && i < index; ++i) {
      child = await child.tail.cell.force()
    }
    return child
  }
}

export function nil<A>(): AsyncLazyList<A> {
  return new AsyncLazyList(AsyncLazy.of<Content<A>>(undefined))
}

export function cons<A>(head: A, tail: AsyncLazyList<A>): AsyncLazyList<A> {
  return new AsyncLazyList(AsyncLazy.of<Content<A>>({head, tail}))
}

function thunk<A>(expr: () => Promise<Content<A>>): AsyncLazyList<A> {
  return new AsyncLazyList(new AsyncLazy(expr))
}

function isAsyncIterable<A>(
  source: Iterable<A | PromiseLike<A>> | AsyncIterable<A>
): source is AsyncIterable<A> {
  return Symbol.asyncIterator in source
}

const finished: IteratorReturnResult<undefined> = {done: true, value: undefined}

/** Walks a sync iterable, waiting for each element that is a promise */
function lift<A>(source: Iterable<A | PromiseLike<A>>): AsyncIterator<A> {
  const it = source[Symbol.iterator]()
  return {
    next() {
      const next = it.next()
      return next.done
        ? Promise.resolve(finished)
        : new Promise<A>(resolve => resolve(next.value)).then(
            (value): IteratorYieldResult<A> => ({done: false, value})
          )
    },
  }
}

/** A list that pulls one element from the source each time a new node is forced.

Elements that are promises are awaited, so the list holds what they resolve to;
a rejected element poisons its node. The source is never closed: a caller that
abandons the list before its end must release the source itself. */
export function fromIterable<A>(
  source: Iterable<A | PromiseLike<A>> | AsyncIterable<A>
): AsyncLazyList<A> {
  function go(it: AsyncIterator<A>): AsyncLazyList<A> {
    return thunk(async () => {
      const next = await it.next()
      return next.done ? undefined : {head: next.value, tail: go(it)}
    })
  }
  return go(isAsyncIterable(source) ? source[Symbol.asyncIterator]() : lift(source))
}

/** A self-referential list whose step may be asynchronous; see `cyclic` in lazylist */
export function cyclic<A>(
  step: (list: AsyncLazyList<A>) => A | undefined | PromiseLike<A | undefined>
): AsyncLazyList<A> {
  function go(): AsyncLazyList<A> {
    return thunk(() =>
      new Promise<A | undefined>(resolve => resolve(step(list))).then(head =>
        head === undefined ? undefined : {head, tail: go()}
      )
    )
  }
  const list = go()
  return list
}
