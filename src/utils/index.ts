// src/utils/index.ts
//docstring
// Responsibility: utils root export (@/utils).
// Boundary: re-exports only.
export * from './assert'
export * from './format'
export * from './logger'
