import test from 'tape'
import * as Async from '../src/asynclazylist'
import {IndexError, PoisonedError} from '../src/Errors'

const tick = (ms = 1) => new Promise<void>(resolve => setTimeout(resolve, ms))

test('async round trip from an array', async t => {
  const l = Async.fromIterable([1, 2, 3])
  t.deepEqual(await l.toArray(), [1, 2, 3])
  t.equal(await l.length(), 3)
  t.equal(await l.get(1), 2)
  t.equal(await l.get(3), undefined)
  t.equal(await l.at(2), 3)
})

test('async empty list', async t => {
  const l = Async.nil<number>()
  t.ok(await l.isEmpty())
  t.equal(await l.length(), 0)
  t.equal(await l.get(0), undefined)
  try {
    await l.at(0)
    t.fail('expected an IndexError')
  } catch (e) {
    t.ok(e instanceof IndexError)
  }
})

test('prepend shares the tail', async t => {
  const l1 = Async.fromIterable(['b', 'c'])
  const l2 = l1.prepend('a')
  t.deepEqual(await l2.toArray(), ['a', 'b', 'c'])
  t.deepEqual(await l1.toArray(), ['b', 'c'])
  t.deepEqual(await Async.cons('z', Async.nil<string>()).toArray(), ['z'])
})

test('concurrent consumers pull each element once', async t => {
  let pulled = 0
  async function* source() {
    for (const x of [1, 2, 3, 4, 5]) {
      await tick()
      pulled++
      yield x
    }
  }
  const l = Async.fromIterable(source())
  const [a, b, c] = await Promise.all([l.get(3), l.get(3), l.toArray()])
  t.equal(a, 4)
  t.equal(b, 4)
  t.deepEqual(c, [1, 2, 3, 4, 5])
  t.equal(pulled, 5)
})

test('for await walks the list', async t => {
  const seen: number[] = []
  for await (const x of Async.fromIterable([3, 2, 1])) {
    seen.push(x)
  }
  t.deepEqual(seen, [3, 2, 1])
})

test('async cyclic list of primes', async t => {
  const primes = Async.cyclic<number>(async l => {
    const n = await l.length()
    if (n === 0) {
      return 2
    } else if (n === 100) {
      return undefined
    }
    const known = await l.toArray()
    let candidate = known[known.length - 1] + 1
    while (known.some(p => candidate % p === 0)) {
      candidate++
    }
    return candidate
  })
  const [a, b] = await Promise.all([primes.get(20), primes.get(20)])
  t.equal(a, 73)
  t.equal(b, 73)
  t.equal(await primes.get(99), 541)
  t.equal(await primes.length(), 100)
})

test('async cyclic step reading its own position sees undefined', async t => {
  const seen: (number | undefined)[] = []
  const l = Async.cyclic<number>(async l => {
    const n = await l.length()
    seen.push(await l.get(n))
    return n < 2 ? n : undefined
  })
  t.deepEqual(await l.toArray(), [0, 1])
  t.deepEqual(seen, [undefined, undefined, undefined])
})

test('a synchronous cyclic step is accepted', async t => {
  const rendered: string[] = []
  const l = Async.cyclic<string>(l => {
    rendered.push(l.toString())
    return rendered.length === 1 ? 'first' : undefined
  })
  t.deepEqual(await l.toArray(), ['first'])
  t.deepEqual(rendered, ['[<in progress>]', '["first", <in progress>]'])
  t.equal(l.toString(), '["first"]')
})

test('a failing async source poisons its node', async t => {
  async function* source() {
    yield 'ok'
    throw new Error('source failed')
  }
  const l = Async.fromIterable(source())
  t.equal(await l.get(0), 'ok')
  try {
    await l.get(1)
    t.fail('expected the source error')
  } catch (e) {
    t.ok(e instanceof Error && e.message === 'source failed')
  }
  try {
    await l.toArray()
    t.fail('expected a PoisonedError')
  } catch (e) {
    t.ok(e instanceof PoisonedError)
  }
})

test('async cyclic list is not empty to its own first step', async t => {
  const empty: boolean[] = []
  const l = Async.cyclic<string>(async l => {
    empty.push(await l.isEmpty())
    return empty.length === 1 ? 'x' : undefined
  })
  t.deepEqual(await l.toArray(), ['x'])
  t.deepEqual(empty, [false, false])
})

test('async at beyond the end of a non-empty list rejects', async t => {
  const l = Async.fromIterable([1])
  t.equal(await l.at(0), 1)
  try {
    await l.at(1)
    t.fail('expected an IndexError')
  } catch (e) {
    t.ok(e instanceof IndexError && e.index === 1)
  }
})

test('uncons forces the first node only', async t => {
  let pulled = 0
  const l = Async.fromIterable(
    (function* () {
      for (const x of ['a', 'b']) {
        pulled++
        yield x
      }
    })()
  )
  const first = await l.uncons()
  t.equal(first?.head, 'a')
  t.equal(pulled, 1)
  t.equal(await first?.tail.get(0), 'b')
  t.equal(await Async.nil<string>().uncons(), undefined)
})

test('promise elements are awaited', async t => {
  const l = Async.fromIterable<number>([Promise.resolve(5), 6])
  t.equal((await l.uncons())?.head, 5)
  t.deepEqual(await l.toArray(), [5, 6])
  const failing = Async.fromIterable<number>(
    (function* () {
      yield 1
      yield Promise.reject(new Error('element failed'))
    })()
  )
  t.equal(await failing.get(0), 1)
  try {
    await failing.get(1)
    t.fail('expected the element error')
  } catch (e) {
    t.ok(e instanceof Error && e.message === 'element failed')
  }
  try {
    await failing.get(1)
    t.fail('expected a PoisonedError')
  } catch (e) {
    t.ok(e instanceof PoisonedError)
  }
})
