// src/types/records.ts
//docstring
// Responsibility: record shapes behind the error, exception and extra field conventions.
// Boundary: type definitions only; readers live in renderers/records.ts.

/** Error object as emitted by logrus-style loggers: message plus newline-joined stack. */
export type ErrorRecord = {
  error: string
  stack: string
}

/** `{"file": "...", "trace": ["...", ...]}` */
export type ExceptionRecord = {
  file: string
  trace: string[]
}

/** `{"class": "...", "line": 42}` */
export type ExtraRecord = {
  class: string
  line: number
}
