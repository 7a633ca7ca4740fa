// src/utils/assert.ts
//docstring
// Responsibility: failures for programmer errors, such as a renderer kind outside the known set.
// Boundary: malformed field input never reaches here; renderers absorb it.
export class InvariantError extends Error {
  public override readonly name = 'InvariantError'
}

// Exhaustiveness guard for switches over closed unions.
export function assertNever(x: never, label: string): never {
  throw new InvariantError(`${label}: ${String(x)}`)
}
