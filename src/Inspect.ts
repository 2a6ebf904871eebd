import * as Utils from './Utils'
import type {Status} from './Lazy'

export const defaultOptions = {
  /** Most elements to show */
  limit: 10,
}

export type Options = typeof defaultOptions

/** The view of a list node that inspection needs, shared by the sync and async lists */
export interface Node<A> {
  readonly cell: Cell<{head: A; tail: Node<A>} | undefined>
}

export interface Cell<A> {
  readonly status: Status
  peek(): A | undefined
}

/** Why an evaluated prefix stops where it does */
export type Rest = 'nil' | 'truncated' | Exclude<Status, 'done'>

export type Prefix<A> = {items: A[]; rest: Rest}

/** Collects the evaluated prefix of a list. Never forces a node. */
export function prefix<A>(list: Node<A>, options?: Partial<Options>): Prefix<A> {
  const opts = {...defaultOptions, ...(options || {})}
  const items: A[] = []
  let node = list
  for (;;) {
    const status = node.cell.status
    if (status !== 'done') {
      return {items, rest: status}
    }
    const child = node.cell.peek()
    if (child === undefined) {
      return {items, rest: 'nil'}
    }
    if (items.length >= opts.limit) {
      return {items, rest: 'truncated'}
    }
    items.push(child.head)
    node = child.tail
  }
}

const tokens: Record<Rest, string | undefined> = {
  nil: undefined,
  truncated: '...',
  pending: '?',
  'in progress': '<in progress>',
  poisoned: '<poisoned>',
}

/** Renders a prefix as `[1, 2, ?]` */
export function render<A>(p: Prefix<A>): string {
  const token = tokens[p.rest]
  const parts = p.items.map(x => Utils.show(x))
  return '[' + (token === undefined ? parts : [...parts, token]).join(', ') + ']'
}

export function Format(log: (...msg: string[]) => void) {
  return {
    Prefix<A>(p: Prefix<A>) {
      log(render(p))
    },
    List<A>(list: Node<A>, options?: Partial<Options>) {
      this.Prefix(prefix(list, options))
    },
    Cell<A>(cell: Cell<A>) {
      if (cell.status === 'done') {
        log(cell.status + ':', Utils.show(cell.peek()))
      } else {
        log(cell.status)
      }
    },
  }
}

export const Stdout = Format((...msg) => console.log(...msg))
export const Write = () => {
  const messages: string[][] = []
  return {
    ...Format((...msg) => messages.push(msg)),
    messages,
  }
}
