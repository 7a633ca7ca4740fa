// src/types/index.ts
//docstring
// Responsibility: types root export (@/types).
// Boundary: type re-exports only.
export type * from './context'
export type * from './field'
export type * from './json'
export type * from './records'
