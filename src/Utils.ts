import stringify from 'json-stringify-pretty-compact'

export function range(to: number) {
  return fromTo(0, to)
}

export function fromTo(begin: number, end: number) {
  const out = []
  for (let i = begin; i < end; ++i) {
    out.push(i)
  }
  return out
}

/** Show a value as compact JSON, with indentation when it does not fit on a line.

Values JSON has no encoding for are shown with String, bigints with their `n` suffix. */
export function show(x: unknown): string {
  switch (typeof x) {
    case 'undefined':
      return 'undefined'
    case 'bigint':
      return `${x}n`
    case 'function':
    case 'symbol':
      return String(x)
  }
  try {
    return stringify(x)
  } catch (e) {
    // cyclic objects, bigints nested in objects
    return String(x)
  }
}
