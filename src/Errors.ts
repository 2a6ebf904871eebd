/** Thrown when forcing a cell whose producer previously failed */
export class PoisonedError extends Error {
  constructor(readonly reason: unknown) {
    super('Lazy value has previously been poisoned')
    this.name = 'PoisonedError'
  }
}

export class IndexError extends RangeError {
  constructor(readonly index: number) {
    super(`Index out of range: ${index}`)
    this.name = 'IndexError'
  }
}
