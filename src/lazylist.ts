import {IndexError} from './Errors'
import * as Inspect from './Inspect'
import {Lazy} from './Lazy'

export type Cons<A> = {head: A; tail: LazyList<A>}

/** Evaluated contents of a list node: a head and a tail, or the empty list (undefined) */
export type Content<A> = Cons<A> | undefined

/**
 * A lazy list is a memoizing cell that evaluates to either a pair of a value
 * and a tail or the empty list.
 *
 * Lists are persistent: prepending shares the old list as the tail, and the
 * evaluated prefix is shared by everyone holding a reference to any node of it.
 */
export class LazyList<A> implements Iterable<A> {
  constructor(readonly cell: Lazy<Content<A>>) {}

  prepend(head: A): LazyList<A> {
    return cons(head, this)
  }

  /** Forces the first node only */
  uncons(): Content<A> {
    return this.cell.force()
  }

  isEmpty(): boolean {
    return this.cell.force() === undefined && this.cell.status === 'done'
  }

  /** The element at the index, or undefined if the list ends (or is still
  being produced) before it */
  get(index: number): A | undefined {
    return this.nth(index)?.head
  }

  /** The element at the index, throwing IndexError if there is none */
  at(index: number): A {
    const node = this.nth(index)
    if (node === undefined) {
      throw new IndexError(index)
    }
    return node.head
  }

  /** Forces the whole spine. Does not return for infinite lists. */
  length(): number {
    let n = 0
    for (const _ of this) {
      n++
    }
    return n
  }

  *[Symbol.iterator](): IterableIterator<A> {
    let child = this.cell.force()
    while (child !== undefined) {
      yield child.head
      child = child.tail.cell.force()
    }
  }

  iter(): IterableIterator<A> {
    return this[Symbol.iterator]()
  }

  toArray(): A[] {
    return toArray(this)
  }

  /** The evaluated prefix, without forcing anything */
  toString(): string {
    return Inspect.render(Inspect.prefix(this))
  }

  private nth(index: number): Cons<A> | undefined {
    if (!Number.isInteger(index) || index < 0) {
      return undefined
    }
    let child = this.cell.force()
    for (let i = 0; child !== undefined && i < index; ++i) {
      child = child.tail.cell.force()
    }
    return child
  }
}

export function nil<A>(): LazyList<A> {
  return new LazyList(Lazy.of<Content<A>>(undefined))
}

export function cons<A>(head: A, tail: LazyList<A>): LazyList<A> {
  return new LazyList(Lazy.of<Content<A>>({head, tail}))
}

function thunk<A>(expr: () => Content<A>): LazyList<A> {
  return new LazyList(new Lazy(expr))
}

/** A list that pulls one element from the iterator each time a new node is forced.

The iterator is never closed: a caller that abandons the list before its end
must release the source itself. */
export function fromIterable<A>(source: Iterable<A>): LazyList<A> {
  function go(it: Iterator<A>): LazyList<A> {
    return thunk(() => {
      const next = it.next()
      return next.done ? undefined : {head: next.value, tail: go(it)}
    })
  }
  return go(source[Symbol.iterator]())
}

export function fromArray<A>(arr: A[]): LazyList<A> {
  function go(idx: number): LazyList<A> {
    return thunk(() => (idx >= arr.length ? undefined : {head: arr[idx], tail: go(idx + 1)}))
  }
  return go(0)
}

/**
 * A self-referential list. To produce each element, `step` is called with
 * the list itself; it may read the elements produced so far, while reading
 * the position currently being produced gives undefined. The list ends when
 * `step` returns undefined.
 *
 * ```
 * const nats = cyclic<number>(l => l.length())
 * nats.get(5) // 5
 * ```
 */
export function cyclic<A>(step: (list: LazyList<A>) => A | undefined): LazyList<A> {
  function go(): LazyList<A> {
    return thunk(() => {
      const head = step(list)
      return head === undefined ? undefined : {head, tail: go()}
    })
  }
  const list = go()
  return list
}

/** The infinite list `seed, next(seed), next(next(seed)), ...` */
export function iterate<A>(seed: A, next: (a: A) => A): LazyList<A> {
  return thunk(() => ({head: seed, tail: iterate(next(seed), next)}))
}

export function map<A, B>(f: (a: A) => B, l: LazyList<A>): LazyList<B> {
  return thunk(() => {
    const as = l.uncons()
    return as ? {head: f(as.head), tail: map(f, as.tail)} : undefined
  })
}

export function takeWhile<A>(p: (a: A) => boolean, l: LazyList<A>): LazyList<A> {
  return thunk(() => {
    const as = l.uncons()
    return as && p(as.head) ? {head: as.head, tail: takeWhile(p, as.tail)} : undefined
  })
}

export function take<A>(n: number, l: LazyList<A>): LazyList<A> {
  return thunk(() => {
    const as = n > 0 ? l.uncons() : undefined
    return as ? {head: as.head, tail: take(n - 1, as.tail)} : undefined
  })
}

export function toArray<A>(l: LazyList<A>): A[] {
  const out = []
  let child = l.uncons()
  while (child !== undefined) {
    out.push(child.head)
    child = child.tail.uncons()
  }
  return out
}
