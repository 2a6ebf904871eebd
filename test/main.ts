import test from 'tape'
import * as L from '../src/main'

test('main exposes both list flavours', async t => {
  const sync = L.fromArray([1, 2]).prepend(0)
  t.deepEqual(sync.toArray(), [0, 1, 2])
  const lazy = L.Async.fromIterable([1, 2]).prepend(0)
  t.deepEqual(await lazy.toArray(), [0, 1, 2])
  t.deepEqual(L.limit(3), {limit: 3})
  t.equal(L.Inspect.render(L.Inspect.prefix(sync, L.limit(1))), '[0, ...]')
})

test('print writes the evaluated prefix to stdout', t => {
  const lines: unknown[][] = []
  const log = console.log
  console.log = (...msg: unknown[]) => {
    lines.push(msg)
  }
  try {
    const l = L.fromArray(['a', 'b'])
    l.get(0)
    L.print(l)
    L.print(l, L.limit(0))
    L.Inspect.Stdout.Cell(L.Lazy.of(3))
  } finally {
    console.log = log
  }
  t.deepEqual(lines, [['["a", ?]'], ['[...]'], ['done:', '3']])
  t.end()
})
